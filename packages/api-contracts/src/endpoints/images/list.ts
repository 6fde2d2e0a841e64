import { z } from 'zod';
import { ImageStatusSchema } from '../../common/enums.js';
import { TokenPaginationMetaSchema, TokenPaginationQuerySchema } from '../../common/pagination.js';
import { createSuccessSchema } from '../../common/responses.js';
import { ImageListItemSchema } from '../../entities/image.js';

const SizeQuerySchema = z.coerce.number().int().min(0).optional();

// snake_case spellings are accepted too; the camelCase key wins when both are sent
export const ListImagesQuerySchema = TokenPaginationQuerySchema.extend({
  next_token: z.string().min(1).optional(),
  status: ImageStatusSchema.optional(),
  tags: z.string().optional(),
  contentType: z.string().min(1).optional(),
  content_type: z.string().min(1).optional(),
  minSize: SizeQuerySchema,
  min_size: SizeQuerySchema,
  maxSize: SizeQuerySchema,
  max_size: SizeQuerySchema,
}).transform((q) => ({
  limit: q.limit,
  nextToken: q.nextToken ?? q.next_token,
  status: q.status,
  tags: q.tags,
  contentType: q.contentType ?? q.content_type,
  minSize: q.minSize ?? q.min_size,
  maxSize: q.maxSize ?? q.max_size,
}));

export const ListImagesResponseSchema = createSuccessSchema(
  TokenPaginationMetaSchema.extend({
    items: z.array(ImageListItemSchema),
  })
);

export type ListImagesQuery = z.infer<typeof ListImagesQuerySchema>;
export type ListImagesResponse = z.infer<typeof ListImagesResponseSchema>;
