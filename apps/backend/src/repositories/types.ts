import type { ImageStatus } from '@imagevault/shared';
import type { ImageMetadata, ImageMetadataPatch } from '../domain/image/ImageMetadata.js';

/** DynamoDB's LastEvaluatedKey, passed back verbatim as ExclusiveStartKey. */
export type PageKey = Record<string, unknown>;

export type ImagePage = {
  items: ImageMetadata[];
  lastEvaluatedKey?: PageKey;
};

export type ImageListFilters = {
  status?: ImageStatus;
  /** Matches when any of the tags is present. */
  tags?: string[];
  contentType?: string;
  minSize?: number;
  maxSize?: number;
};

export type QueryByUserArgs = {
  userId: string;
  filters?: ImageListFilters;
  limit: number;
  exclusiveStartKey?: PageKey;
};

export type ImageMetadataRepository = {
  put: (record: ImageMetadata) => Promise<void>;
  findById: (imageId: string) => Promise<ImageMetadata | null>;
  queryByUser: (args: QueryByUserArgs) => Promise<ImagePage>;
  /** Resolves to null when the item does not exist; never creates one. */
  update: (imageId: string, patch: ImageMetadataPatch) => Promise<ImageMetadata | null>;
  delete: (imageId: string) => Promise<void>;
};

export type ImageTableConfig = {
  tableName: string;
  userIndex: string;
};

export type RepositoryContext = {
  images: ImageMetadataRepository;
};
