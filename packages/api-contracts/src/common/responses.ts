import { z } from 'zod';
import { ApiErrorSchema } from './errors.js';

export function createSuccessSchema<T extends z.ZodTypeAny>(dataSchema: T) {
  return z.object({
    success: z.literal(true),
    message: z.string().optional(),
    data: dataSchema,
  });
}

export const ErrorResponseSchema = z.object({
  success: z.literal(false),
  error: ApiErrorSchema,
  requestId: z.string().optional(),
});

export type ErrorResponse = z.infer<typeof ErrorResponseSchema>;
