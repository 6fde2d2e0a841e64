import type { DynamoDBDocumentClient } from '@aws-sdk/lib-dynamodb';
import type { AppConfig } from '../config/env.js';
import type { RepositoryContext } from './types.js';
import { createImageMetadataRepository } from './ImageMetadataRepository.js';

export function createRepositoryContext(client: DynamoDBDocumentClient, config: Pick<AppConfig, 'dynamodb'>): RepositoryContext {
  return {
    images: createImageMetadataRepository(client, config.dynamodb),
  };
}
