import { z } from 'zod';

// Format checks happen in the service so every layer reports the same message.
export const ImageIdParamsSchema = z.object({
  imageId: z.string().min(1),
});

export type ImageIdParams = z.infer<typeof ImageIdParamsSchema>;
