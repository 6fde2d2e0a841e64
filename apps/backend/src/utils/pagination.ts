import { ApiError } from '../shared/apiError.js';
import { ERROR_CODES } from '../shared/errors.js';
import type { PageKey } from '../repositories/types.js';

export class PaginationError extends ApiError {
  constructor(message: string, details?: Record<string, unknown>) {
    super({ status: 400, errorCode: ERROR_CODES.INVALID_PAGINATION_TOKEN, message, details });
    this.name = 'PaginationError';
  }
}

export function encodePageToken(key: PageKey | undefined): string | null {
  if (!key || Object.keys(key).length === 0) return null;
  const raw = JSON.stringify(key);
  return Buffer.from(raw, 'utf8').toString('base64').replace(/\+/g, '-').replace(/\//g, '_').replace(/=+$/g, '');
}

function isPageKey(value: unknown): value is PageKey {
  return typeof value === 'object' && value !== null && !Array.isArray(value) && Object.keys(value).length > 0;
}

export function decodePageToken(token: unknown): PageKey | undefined {
  if (token === undefined || token === null) return undefined;
  if (typeof token !== 'string') {
    throw new PaginationError('Pagination token must be a string');
  }
  if (token.trim() === '') {
    return undefined;
  }

  let parsed: unknown;
  try {
    const normalized = token.replace(/-/g, '+').replace(/_/g, '/');
    const pad = normalized.length % 4 === 0 ? 0 : 4 - (normalized.length % 4);
    const raw = Buffer.from(normalized + '='.repeat(pad), 'base64').toString('utf8');
    parsed = JSON.parse(raw);
  } catch (err) {
    throw new PaginationError('Invalid pagination token', {
      cause: err instanceof Error ? err.message : String(err),
    });
  }

  if (!isPageKey(parsed)) {
    throw new PaginationError('Invalid pagination token');
  }
  return parsed;
}
