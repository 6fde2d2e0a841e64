import { z } from 'zod';
import { parseBool } from '@imagevault/shared';
import { DeleteTypeSchema } from '../../common/enums.js';
import { createSuccessSchema } from '../../common/responses.js';

export const DeleteImageQuerySchema = z
  .object({
    hardDelete: z.string().optional(),
    hard_delete: z.string().optional(),
  })
  .transform((query) => ({ hardDelete: parseBool(query.hardDelete ?? query.hard_delete) }));

export const DeleteImageResultSchema = z.object({
  imageId: z.string().uuid(),
  deleted: z.literal(true),
  deleteType: DeleteTypeSchema,
});

export const DeleteImageResponseSchema = createSuccessSchema(DeleteImageResultSchema);

export type DeleteImageQuery = z.infer<typeof DeleteImageQuerySchema>;
export type DeleteImageResult = z.infer<typeof DeleteImageResultSchema>;
export type DeleteImageResponse = z.infer<typeof DeleteImageResponseSchema>;
