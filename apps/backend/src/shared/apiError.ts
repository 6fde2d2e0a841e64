import { ERROR_MESSAGES, type ErrorCode } from './errors.js';

export class ApiError extends Error {
  public readonly status: number;
  public readonly errorCode: ErrorCode;
  public readonly details?: unknown;

  constructor(params: { status: number; errorCode: ErrorCode; message?: string; details?: unknown }) {
    super(params.message || ERROR_MESSAGES[params.errorCode]);
    this.name = 'ApiError';
    this.status = params.status;
    this.errorCode = params.errorCode;
    this.details = params.details;
  }
}

export function badRequest(message: string, details?: unknown): ApiError {
  return new ApiError({ status: 400, errorCode: 'VALIDATION_ERROR', message, details });
}

export function notFound(message?: string): ApiError {
  return new ApiError({ status: 404, errorCode: 'IMAGE_NOT_FOUND', message });
}

export function forbidden(message?: string): ApiError {
  return new ApiError({ status: 403, errorCode: 'FORBIDDEN', message });
}

export function conflict(errorCode: 'IMAGE_DELETED' | 'INVALID_STATUS_TRANSITION', message?: string): ApiError {
  return new ApiError({ status: 409, errorCode, message });
}
