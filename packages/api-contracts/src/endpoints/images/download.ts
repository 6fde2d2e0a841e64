import { z } from 'zod';
import { parseBool } from '@imagevault/shared';
import { createSuccessSchema } from '../../common/responses.js';

export const DownloadImageQuerySchema = z
  .object({
    expiry: z.coerce.number().int().positive().optional(),
    redirect: z.string().optional(),
  })
  .transform((query) => ({ expiry: query.expiry, redirect: parseBool(query.redirect) }));

export const DownloadTicketSchema = z.object({
  downloadUrl: z.string().url(),
  imageId: z.string().uuid(),
  expirySeconds: z.number().int().positive(),
  expiresAt: z.string().datetime(),
});

export const DownloadImageResponseSchema = createSuccessSchema(DownloadTicketSchema);

export type DownloadImageQuery = z.infer<typeof DownloadImageQuerySchema>;
export type DownloadTicket = z.infer<typeof DownloadTicketSchema>;
export type DownloadImageResponse = z.infer<typeof DownloadImageResponseSchema>;
