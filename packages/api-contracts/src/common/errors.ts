import { z } from 'zod';

export const ValidationIssueSchema = z.object({
  path: z.string(),
  message: z.string(),
});

export const ApiErrorSchema = z.object({
  code: z.string(),
  message: z.string(),
  details: z.unknown().optional(),
});

export type ValidationIssue = z.infer<typeof ValidationIssueSchema>;
export type ApiErrorBody = z.infer<typeof ApiErrorSchema>;
