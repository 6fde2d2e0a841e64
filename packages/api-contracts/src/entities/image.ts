import { z } from 'zod';
import { ImageStatusSchema } from '../common/enums.js';

export const ImageListItemSchema = z.object({
  imageId: z.string().uuid(),
  userId: z.string(),
  filename: z.string(),
  contentType: z.string(),
  size: z.number().int().min(0),
  uploadTimestamp: z.string().datetime(),
  tags: z.array(z.string()),
  description: z.string().nullable(),
  width: z.number().int().positive().nullable(),
  height: z.number().int().positive().nullable(),
  status: ImageStatusSchema,
});

export const ImageMetadataSchema = ImageListItemSchema.extend({
  s3Key: z.string(),
  s3Bucket: z.string(),
  metadata: z.record(z.unknown()),
});

export type ImageListItem = z.infer<typeof ImageListItemSchema>;
export type ImageMetadataDto = z.infer<typeof ImageMetadataSchema>;
