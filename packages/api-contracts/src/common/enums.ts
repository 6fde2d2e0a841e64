import { z } from 'zod';

export const ImageStatusSchema = z.enum(['processing', 'active', 'error', 'deleted']);

// `deleted` is only reachable through DELETE.
export const UpdatableImageStatusSchema = z.enum(['processing', 'active', 'error']);

export const DeleteTypeSchema = z.enum(['soft', 'hard']);

export type ImageStatus = z.infer<typeof ImageStatusSchema>;
export type UpdatableImageStatus = z.infer<typeof UpdatableImageStatusSchema>;
export type DeleteType = z.infer<typeof DeleteTypeSchema>;
