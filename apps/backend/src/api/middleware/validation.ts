import type { Request, RequestHandler } from 'express';
import { ZodError, type ZodType, type ZodTypeDef } from 'zod';
import type { ErrorResponse } from '@imagevault/api-contracts';
import { ERROR_CODES } from '../../shared/errors.js';

type Schema<T> = ZodType<T, ZodTypeDef, unknown>;

interface RequestSchemas<TParams, TQuery, TBody> {
  params?: Schema<TParams>;
  query?: Schema<TQuery>;
  body?: Schema<TBody>;
}

/**
 * Replaces params, query and body with their parsed values (defaults and coercions applied).
 * A schema failure is answered here with 400; anything else reaches the error handler.
 */
export function validateRequest<
  TParams = Request['params'],
  TQuery = Request['query'],
  TBody = Request['body'],
  TResBody = unknown
>(schemas: RequestSchemas<TParams, TQuery, TBody>): RequestHandler<TParams, TResBody | ErrorResponse, TBody, TQuery> {
  return (req, res, next) => {
    try {
      if (schemas.params) req.params = schemas.params.parse(req.params);
      if (schemas.query) req.query = schemas.query.parse(req.query);
      if (schemas.body) req.body = schemas.body.parse(req.body);
    } catch (error) {
      if (error instanceof ZodError) {
        const response: ErrorResponse = {
          success: false,
          error: {
            code: ERROR_CODES.VALIDATION_ERROR,
            message: 'Invalid request data',
            details: {
              issues: error.issues.map((issue) => ({
                path: issue.path.join('.'),
                message: issue.message,
              })),
            },
          },
          ...(req.requestId ? { requestId: req.requestId } : {}),
        };
        res.status(400).json(response);
        return;
      }
      next(error);
      return;
    }
    next();
  };
}
