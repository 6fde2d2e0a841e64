export const IMAGE_STATUS = {
  PROCESSING: 'processing',
  ACTIVE: 'active',
  ERROR: 'error',
  DELETED: 'deleted',
} as const;

export type ImageStatus = (typeof IMAGE_STATUS)[keyof typeof IMAGE_STATUS];

export const IMAGE_STATUSES: readonly ImageStatus[] = Object.values(IMAGE_STATUS);

export const LIMITS = {
  USER_ID_MIN_LENGTH: 3,
  USER_ID_MAX_LENGTH: 128,
  MAX_TAGS: 10,
  MAX_TAG_LENGTH: 50,
  MAX_DESCRIPTION_LENGTH: 500,
  MAX_FILENAME_LENGTH: 255,
  DEFAULT_MAX_IMAGE_SIZE: 10 * 1024 * 1024,
} as const;

export const PAGINATION = {
  DEFAULT_PAGE_SIZE: 50,
  MAX_PAGE_SIZE: 100,
} as const;

export const PRESIGNED_URL = {
  DEFAULT_EXPIRY_SECONDS: 900,
  MAX_EXPIRY_SECONDS: 3600,
} as const;

export const DEFAULT_ALLOWED_CONTENT_TYPES = [
  'image/jpeg',
  'image/jpg',
  'image/png',
  'image/gif',
  'image/webp',
] as const;
