import { z } from 'zod';
import { ImageMetadataSchema } from '../../entities/image.js';
import { createSuccessSchema } from '../../common/responses.js';

export const GetImageResponseSchema = createSuccessSchema(ImageMetadataSchema);

export type GetImageResponse = z.infer<typeof GetImageResponseSchema>;
