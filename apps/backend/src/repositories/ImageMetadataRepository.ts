import {
  DeleteCommand,
  GetCommand,
  PutCommand,
  QueryCommand,
  UpdateCommand,
  type DynamoDBDocumentClient,
} from '@aws-sdk/lib-dynamodb';
import { z } from 'zod';
import type { ImageMetadata, ImageMetadataPatch } from '../domain/image/ImageMetadata.js';
import { logger } from '../utils/logger.js';
import type { ImageListFilters, ImageMetadataRepository, ImagePage, ImageTableConfig, PageKey } from './types.js';

// Attribute names as stored in the table.
const StoredImageItemSchema = z.object({
  image_id: z.string(),
  user_id: z.string(),
  filename: z.string(),
  content_type: z.string(),
  size: z.number().default(0),
  s3_bucket: z.string(),
  s3_key: z.string(),
  upload_timestamp: z.string(),
  tags: z.array(z.string()).default([]),
  description: z.string().optional(),
  width: z.number().optional(),
  height: z.number().optional(),
  status: z.enum(['processing', 'active', 'error', 'deleted']).default('active'),
  metadata: z.record(z.unknown()).default({}),
});

type StoredImageItem = z.input<typeof StoredImageItemSchema>;

export function toStoredItem(record: ImageMetadata): StoredImageItem {
  return {
    image_id: record.imageId,
    user_id: record.userId,
    filename: record.filename,
    content_type: record.contentType,
    size: record.size,
    s3_bucket: record.s3Bucket,
    s3_key: record.s3Key,
    upload_timestamp: record.uploadTimestamp,
    tags: record.tags,
    ...(record.description ? { description: record.description } : {}),
    ...(record.width !== undefined ? { width: record.width } : {}),
    ...(record.height !== undefined ? { height: record.height } : {}),
    status: record.status,
    metadata: record.metadata,
  };
}

export function fromStoredItem(item: unknown): ImageMetadata {
  const parsed = StoredImageItemSchema.safeParse(item);
  // A bad row is a server fault, so it must not surface as a ZodError.
  if (!parsed.success) {
    const fields = parsed.error.issues.map((issue) => issue.path.join('.') || '(root)');
    throw new Error(`Stored image item is malformed: ${[...new Set(fields)].join(', ')}`);
  }
  const stored = parsed.data;
  return {
    imageId: stored.image_id,
    userId: stored.user_id,
    filename: stored.filename,
    contentType: stored.content_type,
    size: stored.size,
    s3Bucket: stored.s3_bucket,
    s3Key: stored.s3_key,
    uploadTimestamp: stored.upload_timestamp,
    tags: stored.tags,
    ...(stored.description !== undefined ? { description: stored.description } : {}),
    ...(stored.width !== undefined ? { width: stored.width } : {}),
    ...(stored.height !== undefined ? { height: stored.height } : {}),
    status: stored.status,
    metadata: stored.metadata,
  };
}

type ExpressionParts = {
  expression?: string;
  names: Record<string, string>;
  values: Record<string, unknown>;
};

export function buildListFilter(filters: ImageListFilters = {}): ExpressionParts {
  const clauses: string[] = [];
  const names: Record<string, string> = {};
  const values: Record<string, unknown> = {};

  if (filters.status) {
    clauses.push('#status = :status');
    names['#status'] = 'status';
    values[':status'] = filters.status;
  }
  if (filters.tags && filters.tags.length > 0) {
    names['#tags'] = 'tags';
    const anyTag = filters.tags.map((tag, i) => {
      values[`:tag${i}`] = tag;
      return `contains(#tags, :tag${i})`;
    });
    clauses.push(anyTag.length > 1 ? `(${anyTag.join(' OR ')})` : anyTag.join(''));
  }
  if (filters.contentType) {
    clauses.push('#content_type = :content_type');
    names['#content_type'] = 'content_type';
    values[':content_type'] = filters.contentType;
  }
  if (filters.minSize !== undefined) {
    clauses.push('#size >= :min_size');
    names['#size'] = 'size';
    values[':min_size'] = filters.minSize;
  }
  if (filters.maxSize !== undefined) {
    clauses.push('#size <= :max_size');
    names['#size'] = 'size';
    values[':max_size'] = filters.maxSize;
  }

  return {
    ...(clauses.length > 0 ? { expression: clauses.join(' AND ') } : {}),
    names,
    values,
  };
}

// Patch keys double as attribute names.
const PATCH_FIELDS: ReadonlyArray<keyof ImageMetadataPatch> = [
  'status',
  'size',
  'width',
  'height',
  'tags',
  'description',
  'metadata',
];

export function buildUpdateExpression(patch: ImageMetadataPatch): ExpressionParts {
  const sets: string[] = [];
  const removes: string[] = [];
  const names: Record<string, string> = {};
  const values: Record<string, unknown> = {};

  for (const field of PATCH_FIELDS) {
    const value = patch[field];
    if (value === undefined) continue;
    names[`#${field}`] = field;
    if (value === null) {
      removes.push(`#${field}`);
    } else {
      sets.push(`#${field} = :${field}`);
      values[`:${field}`] = value;
    }
  }

  const sections = [
    ...(sets.length > 0 ? [`SET ${sets.join(', ')}`] : []),
    ...(removes.length > 0 ? [`REMOVE ${removes.join(', ')}`] : []),
  ];

  return {
    ...(sections.length > 0 ? { expression: sections.join(' ') } : {}),
    names,
    values,
  };
}

function isConditionalCheckFailure(err: unknown): boolean {
  return err instanceof Error && err.name === 'ConditionalCheckFailedException';
}

function toPage(items: unknown[] | undefined, lastEvaluatedKey: PageKey | undefined): ImagePage {
  return {
    items: (items ?? []).map(fromStoredItem),
    ...(lastEvaluatedKey ? { lastEvaluatedKey } : {}),
  };
}

export function createImageMetadataRepository(
  client: DynamoDBDocumentClient,
  table: ImageTableConfig
): ImageMetadataRepository {
  return {
    put: async (record) => {
      await client.send(
        new PutCommand({
          TableName: table.tableName,
          Item: toStoredItem(record),
        })
      );
      logger.debug('dynamodb.image.put', { imageId: record.imageId });
    },

    findById: async (imageId) => {
      const res = await client.send(
        new GetCommand({
          TableName: table.tableName,
          Key: { image_id: imageId },
        })
      );
      return res.Item ? fromStoredItem(res.Item) : null;
    },

    queryByUser: async ({ userId, filters, limit, exclusiveStartKey }) => {
      const filter = buildListFilter(filters);
      const res = await client.send(
        new QueryCommand({
          TableName: table.tableName,
          IndexName: table.userIndex,
          KeyConditionExpression: '#user_id = :user_id',
          ...(filter.expression ? { FilterExpression: filter.expression } : {}),
          ExpressionAttributeNames: { '#user_id': 'user_id', ...filter.names },
          ExpressionAttributeValues: { ':user_id': userId, ...filter.values },
          Limit: limit,
          // newest first (upload_timestamp is the index sort key)
          ScanIndexForward: false,
          ...(exclusiveStartKey ? { ExclusiveStartKey: exclusiveStartKey } : {}),
        })
      );
      return toPage(res.Items, res.LastEvaluatedKey);
    },

    update: async (imageId, patch) => {
      const update = buildUpdateExpression(patch);
      if (!update.expression) {
        // nothing to write; still report whether the item exists
        const res = await client.send(new GetCommand({ TableName: table.tableName, Key: { image_id: imageId } }));
        return res.Item ? fromStoredItem(res.Item) : null;
      }

      try {
        const res = await client.send(
          new UpdateCommand({
            TableName: table.tableName,
            Key: { image_id: imageId },
            UpdateExpression: update.expression,
            ConditionExpression: 'attribute_exists(#image_id)',
            ExpressionAttributeNames: { '#image_id': 'image_id', ...update.names },
            ...(Object.keys(update.values).length > 0 ? { ExpressionAttributeValues: update.values } : {}),
            ReturnValues: 'ALL_NEW',
          })
        );
        return res.Attributes ? fromStoredItem(res.Attributes) : null;
      } catch (err) {
        if (isConditionalCheckFailure(err)) return null;
        throw err;
      }
    },

    delete: async (imageId) => {
      await client.send(
        new DeleteCommand({
          TableName: table.tableName,
          Key: { image_id: imageId },
        })
      );
      logger.debug('dynamodb.image.deleted', { imageId });
    },
  };
}
