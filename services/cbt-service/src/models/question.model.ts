/**
 * Question Model - PostgreSQL Schema
 * Question bank entries; correct_answer is the grading source of truth
 */

import type { Pool } from 'pg';
import type { Queryable } from '@cbt/shared';

export type QuestionOptions = Record<string, unknown>;

type QuestionRow = {
  id: number;
  exam_type_id: number;
  subject_id: number;
  question_text: string;
  question_image: string | null;
  question_type: string;
  options: QuestionOptions | null;
  correct_answer: string;
  explanation: string | null;
  explanation_image: string | null;
  created_at: Date;
};

export interface Question {
  id: number;
  examTypeId: number;
  subjectId: number;
  questionText: string;
  questionImage: string | null;
  questionType: string;
  options: QuestionOptions | null;
  correctAnswer: string;
  explanation: string | null;
  explanationImage: string | null;
  createdAt: Date;
}

export interface QuestionCreateInput {
  examTypeId: number;
  subjectId: number;
  questionText: string;
  questionType: string;
  options: QuestionOptions | null;
  correctAnswer: string;
  explanation: string | null;
}

export interface QuestionPatch {
  questionText?: string;
  questionType?: string;
  options?: QuestionOptions | null;
  correctAnswer?: string;
  explanation?: string | null;
  questionImage?: string | null;
  explanationImage?: string | null;
}

export interface QuestionFilter {
  examTypeId?: number;
  subjectId?: number;
  skip: number;
  limit: number;
}

export function applyQuestionPatch(question: Question, patch: QuestionPatch): Question {
  return {
    ...question,
    questionText: patch.questionText ?? question.questionText,
    questionType: patch.questionType ?? question.questionType,
    options: patch.options !== undefined ? patch.options : question.options,
    correctAnswer: patch.correctAnswer ?? question.correctAnswer,
    explanation: patch.explanation !== undefined ? patch.explanation : question.explanation,
    questionImage: patch.questionImage !== undefined ? patch.questionImage : question.questionImage,
    explanationImage: patch.explanationImage !== undefined ? patch.explanationImage : question.explanationImage,
  };
}

export async function createQuestionsTable(pool: Pool): Promise<void> {
  await pool.query(`
    CREATE TABLE IF NOT EXISTS questions (
      id SERIAL PRIMARY KEY,
      exam_type_id INTEGER NOT NULL REFERENCES exam_types(id) ON DELETE CASCADE,
      subject_id INTEGER NOT NULL REFERENCES subjects(id) ON DELETE CASCADE,
      question_text TEXT NOT NULL,
      question_image VARCHAR(500),
      question_type VARCHAR(50) NOT NULL,
      options JSONB,
      correct_answer TEXT NOT NULL,
      explanation TEXT,
      explanation_image VARCHAR(500),
      created_at TIMESTAMPTZ NOT NULL DEFAULT NOW()
    );
  `);

  await pool.query(`
    CREATE INDEX IF NOT EXISTS idx_questions_exam_subject ON questions(exam_type_id, subject_id);
  `);
}

function rowToQuestion(row: QuestionRow): Question {
  return {
    id: row.id,
    examTypeId: row.exam_type_id,
    subjectId: row.subject_id,
    questionText: row.question_text,
    questionImage: row.question_image,
    questionType: row.question_type,
    options: row.options,
    correctAnswer: row.correct_answer,
    explanation: row.explanation,
    explanationImage: row.explanation_image,
    createdAt: row.created_at,
  };
}

function serializeOptions(options: QuestionOptions | null): string | null {
  return options === null ? null : JSON.stringify(options);
}

export interface QuestionStore {
  create(input: QuestionCreateInput, db?: Queryable): Promise<Question>;
  findById(id: number): Promise<Question | null>;
  findByIds(ids: number[], db?: Queryable): Promise<Question[]>;
  list(filter: QuestionFilter): Promise<Question[]>;
  /** Whole pool for one exam type + subject, used for sampling. */
  findByExamTypeAndSubject(examTypeId: number, subjectId: number): Promise<Question[]>;
  save(question: Question): Promise<Question>;
  delete(id: number): Promise<boolean>;
}

export class QuestionRepository implements QuestionStore {
  constructor(private pool: Pool) {}

  async create(input: QuestionCreateInput, db: Queryable = this.pool): Promise<Question> {
    const result = await db.query<QuestionRow>(
      `INSERT INTO questions (
        exam_type_id, subject_id, question_text, question_type, options, correct_answer, explanation
      ) VALUES ($1, $2, $3, $4, $5, $6, $7)
      RETURNING *`,
      [
        input.examTypeId,
        input.subjectId,
        input.questionText,
        input.questionType,
        serializeOptions(input.options),
        input.correctAnswer,
        input.explanation,
      ]
    );
    return rowToQuestion(result.rows[0]);
  }

  async findById(id: number): Promise<Question | null> {
    const result = await this.pool.query<QuestionRow>('SELECT * FROM questions WHERE id = $1', [id]);
    return result.rows.length > 0 ? rowToQuestion(result.rows[0]) : null;
  }

  async findByIds(ids: number[], db: Queryable = this.pool): Promise<Question[]> {
    if (ids.length === 0) {
      return [];
    }
    const result = await db.query<QuestionRow>('SELECT * FROM questions WHERE id = ANY($1::int[])', [ids]);
    return result.rows.map(rowToQuestion);
  }

  async list(filter: QuestionFilter): Promise<Question[]> {
    const conditions: string[] = [];
    const values: unknown[] = [];
    let paramIndex = 1;

    if (filter.examTypeId !== undefined) {
      conditions.push(`exam_type_id = $${paramIndex++}`);
      values.push(filter.examTypeId);
    }
    if (filter.subjectId !== undefined) {
      conditions.push(`subject_id = $${paramIndex++}`);
      values.push(filter.subjectId);
    }

    const where = conditions.length > 0 ? `WHERE ${conditions.join(' AND ')}` : '';
    values.push(filter.skip, filter.limit);

    const result = await this.pool.query<QuestionRow>(
      `SELECT * FROM questions ${where} ORDER BY id ASC OFFSET $${paramIndex++} LIMIT $${paramIndex}`,
      values
    );
    return result.rows.map(rowToQuestion);
  }

  async findByExamTypeAndSubject(examTypeId: number, subjectId: number): Promise<Question[]> {
    const result = await this.pool.query<QuestionRow>(
      'SELECT * FROM questions WHERE exam_type_id = $1 AND subject_id = $2 ORDER BY id ASC',
      [examTypeId, subjectId]
    );
    return result.rows.map(rowToQuestion);
  }

  async save(question: Question): Promise<Question> {
    const result = await this.pool.query<QuestionRow>(
      `UPDATE questions
       SET question_text = $2, question_type = $3, options = $4, correct_answer = $5,
           explanation = $6, question_image = $7, explanation_image = $8
       WHERE id = $1
       RETURNING *`,
      [
        question.id,
        question.questionText,
        question.questionType,
        serializeOptions(question.options),
        question.correctAnswer,
        question.explanation,
        question.questionImage,
        question.explanationImage,
      ]
    );
    return rowToQuestion(result.rows[0]);
  }

  async delete(id: number): Promise<boolean> {
    const result = await this.pool.query('DELETE FROM questions WHERE id = $1', [id]);
    return (result.rowCount ?? 0) > 0;
  }
}
