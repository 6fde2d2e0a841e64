import { z } from 'zod';
import { UpdatableImageStatusSchema } from '../../common/enums.js';
import { createSuccessSchema } from '../../common/responses.js';

export const UpdateImageStatusBodySchema = z.object({
  status: UpdatableImageStatusSchema,
  size: z.number().optional(),
  width: z.number().optional(),
  height: z.number().optional(),
});

export const UpdateImageStatusResultSchema = z.object({
  imageId: z.string().uuid(),
  status: UpdatableImageStatusSchema,
  size: z.number().int().positive().optional(),
  width: z.number().int().positive().optional(),
  height: z.number().int().positive().optional(),
});

export const UpdateImageStatusResponseSchema = createSuccessSchema(UpdateImageStatusResultSchema);

export type UpdateImageStatusBody = z.infer<typeof UpdateImageStatusBodySchema>;
export type UpdateImageStatusResult = z.infer<typeof UpdateImageStatusResultSchema>;
export type UpdateImageStatusResponse = z.infer<typeof UpdateImageStatusResponseSchema>;
