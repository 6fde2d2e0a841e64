import {
  IMAGE_STATUS,
  PAGINATION,
  PRESIGNED_URL,
  type ImageStatus,
  clampInt,
  sanitizeFilename,
  validateContentType,
  validateDescription,
  validateDimension,
  validateFileSize,
  validateImageId,
  validateTags,
  validateUserId,
  type ValidationResult,
} from '@imagevault/shared';
import {
  applyStatusUpdate,
  canTransition,
  createImageMetadata,
  markDeleted,
  mergePatch,
  validateImageMetadata,
  type ImageMetadata,
  type ImageMetadataPatch,
} from '../../domain/image/ImageMetadata.js';
import type { ImageListFilters, ImageMetadataRepository } from '../../repositories/types.js';
import { ApiError, badRequest, conflict, forbidden, notFound } from '../../shared/apiError.js';
import type { HeadObjectResult, ImageObjectStorage } from '../../storage/types.js';
import { errorMeta, logger } from '../../utils/logger.js';
import { decodePageToken, encodePageToken } from '../../utils/pagination.js';

export type UpdatableImageStatus = Exclude<ImageStatus, 'deleted'>;

export type ImageServiceConfig = {
  maxImageSize: number;
  allowedContentTypes: readonly string[];
  defaultUrlExpirySeconds: number;
};

export type ImageServiceDeps = {
  repo: ImageMetadataRepository;
  storage: ImageObjectStorage;
  config: ImageServiceConfig;
  now?: () => Date;
};

export type CreateUploadInput = {
  filename: string;
  contentType: string;
  tags?: string[];
  description?: string;
  expiry?: number;
};

export type UploadTicket = {
  imageId: string;
  uploadUrl: string;
  objectKey: string;
  bucket: string;
  expirySeconds: number;
  uploadMethod: 'PUT';
  headers: { 'Content-Type': string };
  image: ImageMetadata;
};

export type ListImagesInput = ImageListFilters & {
  limit?: number;
  pageToken?: string;
};

export type ImageListPage = {
  items: ImageMetadata[];
  count: number;
  nextToken: string | null;
  hasMore: boolean;
};

export type StatusUpdateInput = {
  status: ImageStatus;
  size?: number;
  width?: number;
  height?: number;
};

export type StatusUpdateResult = {
  imageId: string;
  status: UpdatableImageStatus;
  size?: number;
  width?: number;
  height?: number;
};

export type DetailsUpdateInput = {
  tags?: string[];
  description?: string | null;
};

export type DeleteResult = {
  imageId: string;
  deleted: true;
  deleteType: 'soft' | 'hard';
};

export type DownloadTicket = {
  downloadUrl: string;
  imageId: string;
  expirySeconds: number;
  expiresAt: string;
};

function assertValid(result: ValidationResult): void {
  if (!result.valid) throw badRequest(result.error);
}

function isUpdatableStatus(status: ImageStatus): status is UpdatableImageStatus {
  return status !== IMAGE_STATUS.DELETED;
}

/**
 * Sequences the object store and the metadata table for one caller.
 * Every operation on an existing image loads it first and checks that the caller owns it.
 */
export class ImageService {
  private readonly repo: ImageMetadataRepository;
  private readonly storage: ImageObjectStorage;
  private readonly config: ImageServiceConfig;
  private readonly now: () => Date;

  constructor(deps: ImageServiceDeps) {
    this.repo = deps.repo;
    this.storage = deps.storage;
    this.config = deps.config;
    this.now = deps.now ?? (() => new Date());
  }

  private expirySeconds(requested: number | undefined): number {
    const fallback = this.config.defaultUrlExpirySeconds;
    return clampInt(requested ?? fallback, 1, PRESIGNED_URL.MAX_EXPIRY_SECONDS, fallback);
  }

  private assertStorable(record: ImageMetadata): void {
    assertValid(validateImageMetadata(record, this.config));
  }

  /** Validates the record the patch leaves behind, then writes it. */
  private async updateChecked(record: ImageMetadata, patch: ImageMetadataPatch): Promise<ImageMetadata> {
    this.assertStorable(mergePatch(record, patch));
    const updated = await this.repo.update(record.imageId, patch);
    if (!updated) throw notFound();
    return updated;
  }

  private async loadOwned(userId: string, imageId: string): Promise<ImageMetadata> {
    assertValid(validateUserId(userId));
    assertValid(validateImageId(imageId));

    const record = await this.repo.findById(imageId);
    if (!record) throw notFound();
    if (record.userId !== userId) {
      logger.warn('image.access.denied', { imageId, userId });
      throw forbidden('You do not have access to this image');
    }
    return record;
  }

  async createUpload(userId: string, input: CreateUploadInput): Promise<UploadTicket> {
    assertValid(validateUserId(userId));
    assertValid(validateContentType(input.contentType, this.config.allowedContentTypes));
    if (input.tags !== undefined) assertValid(validateTags(input.tags));
    assertValid(validateDescription(input.description));

    const now = this.now();
    const filename = sanitizeFilename(input.filename);
    const expirySeconds = this.expirySeconds(input.expiry);
    const objectKey = this.storage.buildObjectKey(userId, filename, now);

    const uploadUrl = await this.storage.createUploadUrl({
      key: objectKey,
      contentType: input.contentType,
      expiresIn: expirySeconds,
    });

    const image = createImageMetadata({
      userId,
      filename,
      contentType: input.contentType,
      s3Bucket: this.storage.bucket,
      s3Key: objectKey,
      tags: input.tags,
      description: input.description,
      metadata: { presignedUpload: true },
      now,
    });

    this.assertStorable(image);
    // An issued URL whose record fails to save is left to expire.
    await this.repo.put(image);

    logger.info('image.upload.created', { imageId: image.imageId, userId, key: objectKey, expirySeconds });

    return {
      imageId: image.imageId,
      uploadUrl,
      objectKey,
      bucket: this.storage.bucket,
      expirySeconds,
      uploadMethod: 'PUT',
      headers: { 'Content-Type': input.contentType },
      image,
    };
  }

  async getImage(userId: string, imageId: string): Promise<ImageMetadata> {
    return this.loadOwned(userId, imageId);
  }

  async listImages(userId: string, input: ListImagesInput = {}): Promise<ImageListPage> {
    assertValid(validateUserId(userId));

    const limit = clampInt(input.limit ?? PAGINATION.DEFAULT_PAGE_SIZE, 1, PAGINATION.MAX_PAGE_SIZE, PAGINATION.DEFAULT_PAGE_SIZE);
    if (input.minSize !== undefined && input.maxSize !== undefined && input.minSize > input.maxSize) {
      throw badRequest('minSize cannot be greater than maxSize');
    }
    const exclusiveStartKey = decodePageToken(input.pageToken);

    const page = await this.repo.queryByUser({
      userId,
      filters: {
        status: input.status,
        tags: input.tags,
        contentType: input.contentType,
        minSize: input.minSize,
        maxSize: input.maxSize,
      },
      limit,
      exclusiveStartKey,
    });

    const nextToken = encodePageToken(page.lastEvaluatedKey);
    logger.debug('image.list', { userId, count: page.items.length, hasMore: nextToken !== null });

    return {
      items: page.items,
      count: page.items.length,
      nextToken,
      hasMore: nextToken !== null,
    };
  }

  async updateStatus(userId: string, imageId: string, input: StatusUpdateInput): Promise<StatusUpdateResult> {
    const target = input.status;
    if (!isUpdatableStatus(target)) {
      throw badRequest('Status must be one of: processing, active, error');
    }
    if (input.size !== undefined) assertValid(validateFileSize(input.size, this.config.maxImageSize));
    if (input.width !== undefined) assertValid(validateDimension('width', input.width));
    if (input.height !== undefined) assertValid(validateDimension('height', input.height));

    const record = await this.loadOwned(userId, imageId);
    if (record.status === IMAGE_STATUS.DELETED) {
      throw conflict('IMAGE_DELETED', 'Cannot update status of a deleted image');
    }
    if (!canTransition(record.status, target)) {
      throw conflict('INVALID_STATUS_TRANSITION', `Cannot change status from '${record.status}' to '${target}'`);
    }

    let size = input.size;
    if (target === IMAGE_STATUS.ACTIVE) {
      size = await this.confirmUpload(record, size);
    }

    const patch = applyStatusUpdate(record, { status: target, size, width: input.width, height: input.height }, this.now());
    const updated = await this.updateChecked(record, patch);

    logger.info('image.status.updated', { imageId, userId, from: record.status, to: target });

    return {
      imageId,
      status: target,
      ...(target === IMAGE_STATUS.ACTIVE && updated.size > 0 ? { size: updated.size } : {}),
      ...(updated.width !== undefined ? { width: updated.width } : {}),
      ...(updated.height !== undefined ? { height: updated.height } : {}),
    };
  }

  /** Checks the object landed; fills in the size from the store when the caller did not send one. */
  private async confirmUpload(record: ImageMetadata, size: number | undefined): Promise<number | undefined> {
    let head: HeadObjectResult;
    try {
      head = await this.storage.headObject(record.s3Key);
    } catch (error) {
      logger.warn('image.upload.head_failed', { imageId: record.imageId, key: record.s3Key, ...errorMeta(error) });
      return size;
    }

    if (!head.exists) {
      throw new ApiError({
        status: 400,
        errorCode: 'UPLOAD_NOT_FOUND',
        message: 'Image has not been uploaded yet',
        details: { objectKey: record.s3Key },
      });
    }
    if (size !== undefined) return size;

    assertValid(validateFileSize(head.size, this.config.maxImageSize));
    return head.size;
  }

  async updateDetails(userId: string, imageId: string, input: DetailsUpdateInput): Promise<ImageMetadata> {
    if (input.tags === undefined && input.description === undefined) {
      throw badRequest('At least one of tags or description is required');
    }
    if (input.tags !== undefined) assertValid(validateTags(input.tags));
    assertValid(validateDescription(input.description));

    const record = await this.loadOwned(userId, imageId);
    if (record.status === IMAGE_STATUS.DELETED) {
      throw conflict('IMAGE_DELETED', 'Cannot update a deleted image');
    }

    const patch: ImageMetadataPatch = {
      ...(input.tags !== undefined ? { tags: input.tags } : {}),
      // empty string and null both clear the description
      ...(input.description !== undefined ? { description: input.description || null } : {}),
    };
    const updated = await this.updateChecked(record, patch);

    logger.info('image.details.updated', { imageId, userId, fields: Object.keys(patch) });
    return updated;
  }

  async deleteImage(userId: string, imageId: string, options: { hard?: boolean } = {}): Promise<DeleteResult> {
    const record = await this.loadOwned(userId, imageId);

    if (!options.hard) {
      if (record.status !== IMAGE_STATUS.DELETED) {
        await this.updateChecked(record, markDeleted(record, this.now()));
      }
      logger.info('image.deleted', { imageId, userId, deleteType: 'soft' });
      return { imageId, deleted: true, deleteType: 'soft' };
    }

    try {
      await this.storage.deleteObject(record.s3Key);
    } catch (error) {
      // The record goes regardless; the orphaned object is left behind.
      logger.warn('image.delete.object_failed', { imageId, key: record.s3Key, ...errorMeta(error) });
    }
    await this.repo.delete(imageId);

    logger.info('image.deleted', { imageId, userId, deleteType: 'hard' });
    return { imageId, deleted: true, deleteType: 'hard' };
  }

  async getDownloadUrl(userId: string, imageId: string, options: { expiry?: number } = {}): Promise<DownloadTicket> {
    const record = await this.loadOwned(userId, imageId);
    if (record.status === IMAGE_STATUS.DELETED) {
      throw new ApiError({ status: 410, errorCode: 'IMAGE_GONE', message: 'Image has been deleted' });
    }

    const expirySeconds = this.expirySeconds(options.expiry);
    const issuedAt = this.now();
    const downloadUrl = await this.storage.createDownloadUrl({
      key: record.s3Key,
      expiresIn: expirySeconds,
      filename: record.filename,
    });

    logger.info('image.download.url_issued', { imageId, userId, expirySeconds });

    return {
      downloadUrl,
      imageId,
      expirySeconds,
      expiresAt: new Date(issuedAt.getTime() + expirySeconds * 1000).toISOString(),
    };
  }
}
