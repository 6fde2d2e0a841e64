import { z } from 'zod';
import { PAGINATION } from '@imagevault/shared';

export const TokenPaginationQuerySchema = z.object({
  limit: z.coerce.number().int().min(1).default(PAGINATION.DEFAULT_PAGE_SIZE),
  nextToken: z.string().min(1).optional(),
});

export const TokenPaginationMetaSchema = z.object({
  count: z.number().int().min(0),
  nextToken: z.string().nullable(),
  hasMore: z.boolean(),
});

export type TokenPaginationQuery = z.infer<typeof TokenPaginationQuerySchema>;
export type TokenPaginationMeta = z.infer<typeof TokenPaginationMetaSchema>;
