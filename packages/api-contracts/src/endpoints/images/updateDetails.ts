import { z } from 'zod';
import { ImageMetadataSchema } from '../../entities/image.js';
import { createSuccessSchema } from '../../common/responses.js';

export const UpdateImageDetailsBodySchema = z
  .object({
    tags: z.array(z.string()).optional(),
    description: z.string().nullable().optional(),
  })
  .strict()
  .refine((body) => body.tags !== undefined || body.description !== undefined, {
    message: 'At least one of tags or description is required',
  });

export const UpdateImageDetailsResponseSchema = createSuccessSchema(ImageMetadataSchema);

export type UpdateImageDetailsBody = z.infer<typeof UpdateImageDetailsBodySchema>;
export type UpdateImageDetailsResponse = z.infer<typeof UpdateImageDetailsResponseSchema>;
