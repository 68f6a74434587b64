import { z } from 'zod';

export const ForumPostCreateSchema = z.object({
  title: z.string().trim().min(1),
  content: z.string().trim().min(1),
  subject: z.string().trim().min(1),
});

export const ForumPostListQuerySchema = z.object({
  subject: z.string().trim().min(1, 'Subject is required'),
  page: z.coerce.number().int().min(1).default(1),
  limit: z.coerce.number().int().min(1).max(100).default(5),
  sort: z.enum(['newest', 'popular']).default('newest'),
});

export const ForumReplyCreateSchema = z.object({
  content: z.string().trim().min(1),
});
