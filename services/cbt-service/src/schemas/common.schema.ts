import { z } from 'zod';

export const idParam = z.coerce.number().int().positive();

export const IdParamsSchema = z.object({
  id: idParam,
});

export const PaginationQuerySchema = z.object({
  skip: z.coerce.number().int().min(0).default(0),
  limit: z.coerce.number().int().min(1).max(1000).default(100),
});

/** Empty strings from forms and spreadsheets count as "not provided". */
export const optionalText = z
  .string()
  .trim()
  .transform((val) => (val === '' ? undefined : val))
  .optional();
