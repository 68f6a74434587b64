import { z } from 'zod';
import { idParam } from './common.schema';

const timeSpent = z.number().int().min(0);

export const AttemptStartSchema = z.object({
  test_id: idParam,
});

/** Staff may start an attempt on behalf of another user via ?user_id= */
export const AttemptStartQuerySchema = z.object({
  user_id: idParam.optional(),
});

export const AttemptSubmitSchema = z.object({
  attempt_id: idParam,
  answers: z.array(
    z.object({
      question_id: idParam,
      answer_text: z.string(),
      time_spent: timeSpent.nullable().optional(),
    })
  ),
});

export const PracticeAttemptSchema = z.object({
  exam_type_id: idParam,
  subject_id: idParam,
  score: z.number().int().min(0),
  total_questions: z.number().int().min(0),
  time_spent: timeSpent,
  answers: z.array(
    z.object({
      question_id: idParam,
      answer_text: z.string(),
      is_correct: z.boolean(),
      time_spent: timeSpent.nullable().optional(),
    })
  ),
});

export type AttemptSubmitBody = z.infer<typeof AttemptSubmitSchema>;
export type PracticeAttemptBody = z.infer<typeof PracticeAttemptSchema>;
