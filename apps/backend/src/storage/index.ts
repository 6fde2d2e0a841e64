import type { S3Client } from '@aws-sdk/client-s3';
import type { AppConfig } from '../config/env.js';
import type { ImageObjectStorage } from './types.js';
import { S3ImageStorage, s3StorageConfigFrom } from './s3Storage.js';

export type { ImageObjectStorage, HeadObjectResult } from './types.js';
export { S3ImageStorage, isS3NotFound } from './s3Storage.js';

export function createImageStorage(client: S3Client, config: AppConfig): ImageObjectStorage {
  return new S3ImageStorage(client, s3StorageConfigFrom(config));
}
