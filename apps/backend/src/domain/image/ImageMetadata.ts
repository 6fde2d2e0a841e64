import { randomUUID } from 'crypto';
import {
  IMAGE_STATUS,
  IMAGE_STATUSES,
  type ImageStatus,
  type ValidationResult,
  validateContentType,
  validateDescription,
  validateDimension,
  validateFileSize,
  validateTags,
  validateUserId,
} from '@imagevault/shared';

export type ImageMetadata = {
  imageId: string;
  userId: string;
  filename: string;
  contentType: string;
  size: number;
  s3Bucket: string;
  s3Key: string;
  uploadTimestamp: string;
  tags: string[];
  description?: string;
  width?: number;
  height?: number;
  status: ImageStatus;
  metadata: Record<string, unknown>;
};

/** Fields a write may change. `description: null` clears the stored value. */
export type ImageMetadataPatch = {
  status?: ImageStatus;
  size?: number;
  width?: number;
  height?: number;
  tags?: string[];
  description?: string | null;
  metadata?: Record<string, unknown>;
};

export type NewImageMetadataInput = {
  userId: string;
  filename: string;
  contentType: string;
  s3Bucket: string;
  s3Key: string;
  tags?: string[];
  description?: string;
  metadata?: Record<string, unknown>;
  imageId?: string;
  now?: Date;
};

export function createImageMetadata(input: NewImageMetadataInput): ImageMetadata {
  return {
    imageId: input.imageId ?? randomUUID(),
    userId: input.userId,
    filename: input.filename,
    contentType: input.contentType,
    size: 0,
    s3Bucket: input.s3Bucket,
    s3Key: input.s3Key,
    uploadTimestamp: (input.now ?? new Date()).toISOString(),
    tags: input.tags ?? [],
    ...(input.description ? { description: input.description } : {}),
    status: IMAGE_STATUS.PROCESSING,
    metadata: input.metadata ?? {},
  };
}

const TRANSITIONS: Record<ImageStatus, readonly ImageStatus[]> = {
  processing: ['processing', 'active', 'error'],
  active: ['active'],
  error: ['error'],
  deleted: [],
};

/**
 * Status updates only. `deleted` is reached through DELETE (markDeleted), never through here,
 * and nothing leaves it.
 */
export function canTransition(from: ImageStatus, to: ImageStatus): boolean {
  return TRANSITIONS[from].includes(to);
}

export type StatusUpdate = {
  status: ImageStatus;
  size?: number;
  width?: number;
  height?: number;
};

export function applyStatusUpdate(record: ImageMetadata, update: StatusUpdate, now: Date = new Date()): ImageMetadataPatch {
  return {
    status: update.status,
    // size is only meaningful once the bytes are in place
    ...(update.status === IMAGE_STATUS.ACTIVE && update.size !== undefined ? { size: update.size } : {}),
    ...(update.width !== undefined ? { width: update.width } : {}),
    ...(update.height !== undefined ? { height: update.height } : {}),
    metadata: { ...record.metadata, statusUpdatedAt: now.toISOString() },
  };
}

/** The record a patch would leave behind, for validating before the write. */
export function mergePatch(record: ImageMetadata, patch: ImageMetadataPatch): ImageMetadata {
  const merged: ImageMetadata = {
    ...record,
    ...(patch.status !== undefined ? { status: patch.status } : {}),
    ...(patch.size !== undefined ? { size: patch.size } : {}),
    ...(patch.width !== undefined ? { width: patch.width } : {}),
    ...(patch.height !== undefined ? { height: patch.height } : {}),
    ...(patch.tags !== undefined ? { tags: patch.tags } : {}),
    ...(patch.metadata !== undefined ? { metadata: patch.metadata } : {}),
  };
  if (patch.description === null) delete merged.description;
  else if (patch.description !== undefined) merged.description = patch.description;
  return merged;
}

export function markDeleted(record: ImageMetadata, now: Date = new Date()): ImageMetadataPatch {
  return {
    status: IMAGE_STATUS.DELETED,
    metadata: { ...record.metadata, deletedAt: now.toISOString() },
  };
}

export function validateImageMetadata(
  record: ImageMetadata,
  limits: { maxImageSize: number; allowedContentTypes: readonly string[] }
): ValidationResult {
  const checks: Array<() => ValidationResult> = [
    () => validateUserId(record.userId),
    () => validateContentType(record.contentType, limits.allowedContentTypes),
    // size stays 0 until an upload is confirmed; only active records must carry one
    () =>
      record.status !== IMAGE_STATUS.ACTIVE && record.size === 0
        ? { valid: true }
        : validateFileSize(record.size, limits.maxImageSize),
    () => validateTags(record.tags),
    () => validateDescription(record.description),
    () => (record.width === undefined ? { valid: true } : validateDimension('width', record.width)),
    () => (record.height === undefined ? { valid: true } : validateDimension('height', record.height)),
    () =>
      IMAGE_STATUSES.includes(record.status)
        ? { valid: true }
        : { valid: false, error: `Invalid status: ${String(record.status)}` },
  ];

  for (const check of checks) {
    const result = check();
    if (!result.valid) return result;
  }
  return { valid: true };
}
