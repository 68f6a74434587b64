import { z } from 'zod';
import { idParam } from './common.schema';

export const TestCreateSchema = z.object({
  exam_type_id: idParam,
  subject_id: idParam,
  duration_minutes: z.number().int().positive(),
  question_count: z.number().int().positive(),
});

export const TestUpdateSchema = z.object({
  exam_type_id: idParam.optional(),
  subject_id: idParam.optional(),
  duration_minutes: z.number().int().positive().optional(),
  question_count: z.number().int().positive().optional(),
  is_active: z.boolean().optional(),
});

export type TestCreateBody = z.infer<typeof TestCreateSchema>;
export type TestUpdateBody = z.infer<typeof TestUpdateSchema>;
