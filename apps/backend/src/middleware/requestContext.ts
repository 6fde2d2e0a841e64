import type { NextFunction, Request, RequestHandler, Response } from 'express';
import { randomUUID } from 'crypto';
import { logger } from '../utils/logger.js';
import { runWithRequestContext, type RequestContextStore } from '../utils/asyncContext.js';

export type AccessLogOptions = {
  /** Share of ordinary requests written to the access log, 0..1. */
  sampleRate: number;
  /** Requests at or above this duration are logged as `http.slow`. */
  slowMs: number;
};

const MAX_REQUEST_ID_LENGTH = 128;

function shouldSample(rate: number): boolean {
  if (rate >= 1) return true;
  if (rate <= 0) return false;
  return Math.random() < rate;
}

function requestIdFrom(req: Request): string {
  const incoming = req.headers['x-request-id'];
  const value = (Array.isArray(incoming) ? incoming[0] : incoming)?.trim();
  // Upstream ids are echoed back in headers and logs; drop anything oversized.
  if (value && value.length <= MAX_REQUEST_ID_LENGTH) return value;
  return randomUUID();
}

export function requestContext(options: AccessLogOptions): RequestHandler {
  return (req: Request, res: Response, next: NextFunction) => {
    const requestId = requestIdFrom(req);
    req.requestId = requestId;
    res.setHeader('X-Request-Id', requestId);

    const startedAt = process.hrtime.bigint();
    const store: RequestContextStore = { requestId, userId: null };

    res.on('finish', () => {
      const durationMs = Math.round(Number(process.hrtime.bigint() - startedAt) / 1_000_000);
      const entry = {
        requestId,
        method: req.method,
        path: req.originalUrl.split('?')[0],
        status: res.statusCode,
        durationMs,
        userId: store.userId,
      };

      if (res.statusCode >= 500) {
        logger.error('http.request', entry);
      } else if (durationMs >= options.slowMs) {
        logger.warn('http.slow', { ...entry, slowMs: options.slowMs });
      } else if (shouldSample(options.sampleRate)) {
        logger.info('http.request', entry);
      }
    });

    runWithRequestContext(store, () => next());
  };
}
