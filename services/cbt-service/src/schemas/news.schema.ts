import { z } from 'zod';

export const NewsCreateSchema = z.object({
  title: z.string().trim().min(1).max(500),
  content: z.string().trim().min(1),
  url: z.string().url(),
  date: z.coerce.date(),
});

export const NewsUpdateSchema = NewsCreateSchema.partial();

export type NewsCreateBody = z.infer<typeof NewsCreateSchema>;
export type NewsUpdateBody = z.infer<typeof NewsUpdateSchema>;
