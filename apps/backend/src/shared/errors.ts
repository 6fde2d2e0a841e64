export const ERROR_CODES = {
  VALIDATION_ERROR: 'VALIDATION_ERROR',
  INVALID_PAGINATION_TOKEN: 'INVALID_PAGINATION_TOKEN',
  UPLOAD_NOT_FOUND: 'UPLOAD_NOT_FOUND',
  UNAUTHORIZED: 'UNAUTHORIZED',
  FORBIDDEN: 'FORBIDDEN',
  NOT_FOUND: 'NOT_FOUND',
  IMAGE_NOT_FOUND: 'IMAGE_NOT_FOUND',
  IMAGE_DELETED: 'IMAGE_DELETED',
  INVALID_STATUS_TRANSITION: 'INVALID_STATUS_TRANSITION',
  IMAGE_GONE: 'IMAGE_GONE',
  INTERNAL_ERROR: 'INTERNAL_ERROR',
} as const;

export type ErrorCode = (typeof ERROR_CODES)[keyof typeof ERROR_CODES];

export const ERROR_MESSAGES: Record<ErrorCode, string> = {
  VALIDATION_ERROR: 'Validation failed',
  INVALID_PAGINATION_TOKEN: 'Invalid pagination token',
  UPLOAD_NOT_FOUND: 'Uploaded object not found',
  UNAUTHORIZED: 'Unauthorized',
  FORBIDDEN: 'Forbidden',
  NOT_FOUND: 'Not found',
  IMAGE_NOT_FOUND: 'Image not found',
  IMAGE_DELETED: 'Image has been deleted',
  INVALID_STATUS_TRANSITION: 'Invalid status transition',
  IMAGE_GONE: 'Image has been deleted',
  INTERNAL_ERROR: 'Internal server error',
};
