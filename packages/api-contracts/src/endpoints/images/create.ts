import { z } from 'zod';
import { ImageMetadataSchema } from '../../entities/image.js';
import { createSuccessSchema } from '../../common/responses.js';

export const CreateImageBodySchema = z.object({
  filename: z.string().min(1),
  contentType: z.string().min(1),
  tags: z.array(z.string()).optional(),
  description: z.string().optional(),
  expiry: z.number().int().positive().optional(),
});

export const UploadTicketSchema = z.object({
  imageId: z.string().uuid(),
  uploadUrl: z.string().url(),
  objectKey: z.string(),
  bucket: z.string(),
  expirySeconds: z.number().int().positive(),
  uploadMethod: z.literal('PUT'),
  headers: z.object({ 'Content-Type': z.string() }),
  image: ImageMetadataSchema,
});

export const CreateImageResponseSchema = createSuccessSchema(UploadTicketSchema);

export type CreateImageBody = z.infer<typeof CreateImageBodySchema>;
export type UploadTicket = z.infer<typeof UploadTicketSchema>;
export type CreateImageResponse = z.infer<typeof CreateImageResponseSchema>;
