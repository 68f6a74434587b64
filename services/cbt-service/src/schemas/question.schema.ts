import { z } from 'zod';
import { idParam } from './common.schema';

const options = z.record(z.unknown()).nullable();

export const QuestionCreateSchema = z.object({
  exam_type_id: idParam,
  subject_id: idParam,
  question_text: z.string().trim().min(1),
  question_type: z.string().trim().min(1).max(50),
  options: options.optional(),
  correct_answer: z.string().min(1).max(500),
  explanation: z.string().nullable().optional(),
});

export const QuestionBulkSchema = z.array(QuestionCreateSchema).min(1, 'At least one question is required');

export const QuestionUpdateSchema = z.object({
  question_text: z.string().trim().min(1).optional(),
  question_type: z.string().trim().min(1).max(50).optional(),
  options: options.optional(),
  correct_answer: z.string().min(1).max(500).optional(),
  explanation: z.string().nullable().optional(),
});

export const QuestionListQuerySchema = z.object({
  exam_type_id: idParam.optional(),
  subject_id: idParam.optional(),
  skip: z.coerce.number().int().min(0).default(0),
  limit: z.coerce.number().int().min(1).max(1000).default(100),
});

export const ExamTypeSubjectParamsSchema = z.object({
  examTypeId: idParam,
  subjectId: idParam,
});

export type QuestionCreateBody = z.infer<typeof QuestionCreateSchema>;
export type QuestionUpdateBody = z.infer<typeof QuestionUpdateSchema>;
