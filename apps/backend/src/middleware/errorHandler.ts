import type { NextFunction, Request, Response } from 'express';
import type { ErrorResponse } from '@imagevault/api-contracts';
import { ApiError } from '../shared/apiError.js';
import { ERROR_CODES, ERROR_MESSAGES, type ErrorCode } from '../shared/errors.js';
import { logger } from '../utils/logger.js';

function isJsonSyntaxError(err: unknown): boolean {
  // body-parser tags malformed JSON with type 'entity.parse.failed'
  return err instanceof SyntaxError && 'type' in err && err.type === 'entity.parse.failed';
}

export function errorHandler(err: unknown, req: Request, res: Response<ErrorResponse>, next: NextFunction) {
  const requestId = req.requestId;

  // Don't send response if headers already sent
  if (res.headersSent) {
    logger.warn('http.error.headersSent', { requestId, method: req.method, path: req.path });
    return next(err);
  }

  const send = (status: number, code: ErrorCode, message?: string, details?: unknown) => {
    const body: ErrorResponse = {
      success: false,
      error: {
        code,
        message: message ?? ERROR_MESSAGES[code],
        ...(details !== undefined ? { details } : {}),
      },
      ...(requestId ? { requestId } : {}),
    };
    return res.status(status).json(body);
  };

  if (err instanceof ApiError) {
    if (err.status >= 500) {
      logger.error('http.error', { method: req.method, path: req.path, errorCode: err.errorCode, errorMessage: err.message });
    }
    return send(err.status, err.errorCode, err.message, err.details);
  }

  if (isJsonSyntaxError(err)) {
    return send(400, ERROR_CODES.VALIDATION_ERROR, 'Malformed JSON body');
  }

  const isProduction = process.env.NODE_ENV === 'production';
  const error = err instanceof Error ? err : new Error(String(err));

  logger.error('http.error', {
    method: req.method,
    path: req.path,
    userId: req.userId ?? null,
    errorName: error.name,
    errorMessage: error.message,
    // Stack can contain sensitive paths; keep it only outside production.
    ...(isProduction ? {} : { stack: error.stack }),
  });

  // In production, never expose error details to prevent information leakage
  return send(500, ERROR_CODES.INTERNAL_ERROR, isProduction ? undefined : error.message);
}

export function notFoundHandler(req: Request, res: Response<ErrorResponse>) {
  const body: ErrorResponse = {
    success: false,
    error: {
      code: ERROR_CODES.NOT_FOUND,
      message: `Route ${req.method} ${req.path} not found`,
    },
    ...(req.requestId ? { requestId: req.requestId } : {}),
  };
  res.status(404).json(body);
}
