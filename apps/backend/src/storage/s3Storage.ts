import { randomBytes } from 'crypto';
import {
  DeleteObjectCommand,
  GetObjectCommand,
  HeadObjectCommand,
  PutObjectCommand,
  type S3Client,
} from '@aws-sdk/client-s3';
import { getSignedUrl } from '@aws-sdk/s3-request-presigner';
import type { AppConfig } from '../config/env.js';
import { logger } from '../utils/logger.js';
import type { CreateDownloadUrlArgs, CreateUploadUrlArgs, HeadObjectResult, ImageObjectStorage } from './types.js';

export type S3StorageConfig = {
  bucket: string;
  keyPrefix: string;
};

function formatDay(now: Date): string {
  const y = now.getUTCFullYear();
  const m = String(now.getUTCMonth() + 1).padStart(2, '0');
  const d = String(now.getUTCDate()).padStart(2, '0');
  return `${y}${m}${d}`;
}

function httpStatusOf(err: unknown): number | undefined {
  if (typeof err !== 'object' || err === null || !('$metadata' in err)) return undefined;
  const meta = err.$metadata;
  if (typeof meta !== 'object' || meta === null || !('httpStatusCode' in meta)) return undefined;
  return typeof meta.httpStatusCode === 'number' ? meta.httpStatusCode : undefined;
}

export function isS3NotFound(err: unknown): boolean {
  if (err instanceof Error && (err.name === 'NotFound' || err.name === 'NoSuchKey')) return true;
  return httpStatusOf(err) === 404;
}

function attachmentDisposition(filename: string): string {
  const ascii = filename.replace(/[^\x20-\x7e]/g, '_').replace(/["\\]/g, '_');
  return `attachment; filename="${ascii}"; filename*=UTF-8''${encodeURIComponent(filename)}`;
}

export class S3ImageStorage implements ImageObjectStorage {
  kind: 's3' = 's3';
  private readonly cfg: S3StorageConfig;
  private readonly client: S3Client;

  constructor(client: S3Client, cfg: S3StorageConfig) {
    this.client = client;
    this.cfg = cfg;
  }

  get bucket(): string {
    return this.cfg.bucket;
  }

  buildObjectKey(userId: string, filename: string, now: Date = new Date()): string {
    const unique = randomBytes(4).toString('hex');
    return `${this.cfg.keyPrefix}${userId}/${formatDay(now)}/${unique}_${filename}`;
  }

  async createUploadUrl(args: CreateUploadUrlArgs): Promise<string> {
    const url = await getSignedUrl(
      this.client,
      new PutObjectCommand({
        Bucket: this.cfg.bucket,
        Key: args.key,
        ContentType: args.contentType,
      }),
      { expiresIn: args.expiresIn }
    );
    logger.debug('s3.presign.upload', { key: args.key, expiresIn: args.expiresIn });
    return url;
  }

  async createDownloadUrl(args: CreateDownloadUrlArgs): Promise<string> {
    const url = await getSignedUrl(
      this.client,
      new GetObjectCommand({
        Bucket: this.cfg.bucket,
        Key: args.key,
        ...(args.filename ? { ResponseContentDisposition: attachmentDisposition(args.filename) } : {}),
      }),
      { expiresIn: args.expiresIn }
    );
    logger.debug('s3.presign.download', { key: args.key, expiresIn: args.expiresIn });
    return url;
  }

  async headObject(key: string): Promise<HeadObjectResult> {
    try {
      const head = await this.client.send(
        new HeadObjectCommand({
          Bucket: this.cfg.bucket,
          Key: key,
        })
      );
      return {
        exists: true,
        size: typeof head.ContentLength === 'number' ? head.ContentLength : 0,
        ...(head.ContentType ? { contentType: head.ContentType } : {}),
      };
    } catch (err) {
      if (isS3NotFound(err)) return { exists: false };
      throw err;
    }
  }

  async deleteObject(key: string): Promise<void> {
    await this.client.send(
      new DeleteObjectCommand({
        Bucket: this.cfg.bucket,
        Key: key,
      })
    );
    logger.info('s3.object.deleted', { bucket: this.cfg.bucket, key });
  }
}

export function s3StorageConfigFrom(config: AppConfig): S3StorageConfig {
  return {
    bucket: config.s3.bucket,
    keyPrefix: config.s3.keyPrefix,
  };
}
