import type { NextFunction, Request, Response } from 'express';
import { validateUserId } from '@imagevault/shared';
import { ApiError } from '../../shared/apiError.js';
import { setContextUser } from '../../utils/asyncContext.js';

export const USER_ID_HEADER = 'user-id';

/**
 * Resolves the caller from the `user-id` header.
 * Missing header → 401, malformed value → 400. There is no token verification:
 * the service trusts whatever sits in front of it to authenticate the caller.
 */
export function requireUser<P, ResBody, ReqBody, ReqQuery>(
  req: Request<P, ResBody, ReqBody, ReqQuery>,
  _res: Response<ResBody>,
  next: NextFunction
) {
  const raw = req.header(USER_ID_HEADER);
  const userId = typeof raw === 'string' ? raw.trim() : '';

  if (!userId) {
    return next(
      new ApiError({ status: 401, errorCode: 'UNAUTHORIZED', message: `Missing ${USER_ID_HEADER} header` })
    );
  }

  const check = validateUserId(userId);
  if (!check.valid) {
    return next(new ApiError({ status: 400, errorCode: 'VALIDATION_ERROR', message: check.error }));
  }

  req.userId = userId;
  setContextUser(userId);
  next();
}

/** Handlers run after requireUser; this keeps the `string | undefined` out of their bodies. */
export function callerId(req: Pick<Request, 'userId'>): string {
  if (!req.userId) {
    throw new ApiError({ status: 401, errorCode: 'UNAUTHORIZED', message: `Missing ${USER_ID_HEADER} header` });
  }
  return req.userId;
}
