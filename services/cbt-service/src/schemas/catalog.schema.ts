import { z } from 'zod';

/** Shared by exam types and subjects. */
export const CatalogCreateSchema = z.object({
  name: z.string().trim().min(1).max(100),
  description: z.string().trim().nullable().optional(),
});

export const CatalogUpdateSchema = CatalogCreateSchema.partial();

export type CatalogCreateBody = z.infer<typeof CatalogCreateSchema>;
export type CatalogUpdateBody = z.infer<typeof CatalogUpdateSchema>;
