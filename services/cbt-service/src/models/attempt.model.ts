/**
 * Attempt Model - PostgreSQL Schema
 * Test/practice attempts and the answers graded at submission
 */

import type { Pool } from 'pg';
import type { Queryable } from '@cbt/shared';

export type AttemptStatus = 'in_progress' | 'completed';

type AttemptRow = {
  id: number;
  user_id: number;
  test_id: number | null;
  exam_type_id: number | null;
  subject_id: number | null;
  is_practice: boolean;
  start_time: Date;
  end_time: Date | null;
  status: string;
  score: number | null;
  percentage: number | null;
  passed: boolean | null;
  time_taken: number | null;
};

type AnswerRow = {
  id: number;
  attempt_id: number;
  question_id: number | null;
  answer_text: string;
  is_correct: boolean;
  marks_obtained: number;
  time_spent: number | null;
};

interface AttemptBase {
  id: number;
  userId: number;
  testId: number | null;
  examTypeId: number | null;
  subjectId: number | null;
  isPractice: boolean;
  startTime: Date;
}

export interface InProgressAttempt extends AttemptBase {
  status: 'in_progress';
}

/**
 * Outcome fields exist only once an attempt is completed.
 */
export interface AttemptOutcome {
  endTime: Date;
  score: number;
  percentage: number;
  passed: boolean;
  timeTaken: number;
}

export interface CompletedAttempt extends AttemptBase, AttemptOutcome {
  status: 'completed';
}

export type Attempt = InProgressAttempt | CompletedAttempt;

export interface Answer {
  id: number;
  attemptId: number;
  questionId: number | null;
  answerText: string;
  isCorrect: boolean;
  marksObtained: number;
  timeSpent: number | null;
}

export interface AttemptStartInput {
  userId: number;
  testId: number;
  examTypeId: number;
  subjectId: number;
  startTime: Date;
}

export interface PracticeAttemptInput extends AttemptOutcome {
  userId: number;
  examTypeId: number;
  subjectId: number;
  startTime: Date;
}

export interface AnswerInput {
  questionId: number;
  answerText: string;
  isCorrect: boolean;
  marksObtained: number;
  timeSpent: number | null;
}

export interface CompletedAttemptFilter {
  testId?: number;
  userId?: number;
}

export async function createAttemptTables(pool: Pool): Promise<void> {
  await pool.query(`
    CREATE TABLE IF NOT EXISTS attempts (
      id SERIAL PRIMARY KEY,
      user_id INTEGER NOT NULL REFERENCES users(id) ON DELETE CASCADE,
      test_id INTEGER REFERENCES tests(id) ON DELETE SET NULL,
      exam_type_id INTEGER REFERENCES exam_types(id) ON DELETE SET NULL,
      subject_id INTEGER REFERENCES subjects(id) ON DELETE SET NULL,
      is_practice BOOLEAN NOT NULL DEFAULT false,
      start_time TIMESTAMPTZ NOT NULL DEFAULT NOW(),
      end_time TIMESTAMPTZ,
      status VARCHAR(20) NOT NULL DEFAULT 'in_progress' CHECK (status IN ('in_progress', 'completed')),
      score INTEGER,
      percentage DOUBLE PRECISION,
      passed BOOLEAN,
      time_taken INTEGER,
      CONSTRAINT chk_attempt_outcome CHECK (
        (status = 'in_progress' AND end_time IS NULL AND score IS NULL AND percentage IS NULL AND passed IS NULL)
        OR (status = 'completed' AND end_time IS NOT NULL AND score IS NOT NULL AND percentage IS NOT NULL AND passed IS NOT NULL)
      )
    );
  `);

  await pool.query(`
    CREATE INDEX IF NOT EXISTS idx_attempts_user_id ON attempts(user_id);
    CREATE INDEX IF NOT EXISTS idx_attempts_test_status ON attempts(test_id, status);
  `);

  await pool.query(`
    CREATE TABLE IF NOT EXISTS answers (
      id SERIAL PRIMARY KEY,
      attempt_id INTEGER NOT NULL REFERENCES attempts(id) ON DELETE CASCADE,
      question_id INTEGER REFERENCES questions(id) ON DELETE SET NULL,
      answer_text TEXT NOT NULL,
      is_correct BOOLEAN NOT NULL DEFAULT false,
      marks_obtained INTEGER NOT NULL DEFAULT 0,
      time_spent INTEGER
    );
  `);

  await pool.query(`
    CREATE INDEX IF NOT EXISTS idx_answers_attempt_id ON answers(attempt_id);
  `);
}

function rowToAttempt(row: AttemptRow): Attempt {
  const base: AttemptBase = {
    id: row.id,
    userId: row.user_id,
    testId: row.test_id,
    examTypeId: row.exam_type_id,
    subjectId: row.subject_id,
    isPractice: row.is_practice,
    startTime: row.start_time,
  };

  if (row.status !== 'completed') {
    return { ...base, status: 'in_progress' };
  }

  // chk_attempt_outcome guarantees these are set for completed rows
  return {
    ...base,
    status: 'completed',
    endTime: row.end_time ?? row.start_time,
    score: row.score ?? 0,
    percentage: row.percentage ?? 0,
    passed: row.passed ?? false,
    timeTaken: row.time_taken ?? 0,
  };
}

function toCompleted(attempt: Attempt): CompletedAttempt {
  if (attempt.status !== 'completed') {
    throw new Error(`Attempt ${attempt.id} is not completed`);
  }
  return attempt;
}

function rowToAnswer(row: AnswerRow): Answer {
  return {
    id: row.id,
    attemptId: row.attempt_id,
    questionId: row.question_id,
    answerText: row.answer_text,
    isCorrect: row.is_correct,
    marksObtained: row.marks_obtained,
    timeSpent: row.time_spent,
  };
}

export interface AttemptStore {
  create(input: AttemptStartInput): Promise<InProgressAttempt>;
  createPractice(input: PracticeAttemptInput, db?: Queryable): Promise<CompletedAttempt>;
  findById(id: number): Promise<Attempt | null>;
  /** Row-locks the attempt for the rest of the transaction `db` belongs to. */
  findByIdForUpdate(id: number, db: Queryable): Promise<Attempt | null>;
  complete(id: number, outcome: AttemptOutcome, db?: Queryable): Promise<CompletedAttempt>;
  addAnswers(attemptId: number, answers: AnswerInput[], db?: Queryable): Promise<Answer[]>;
  findAnswers(attemptId: number): Promise<Answer[]>;
  listByUser(userId: number): Promise<Attempt[]>;
  /** Completed attempts ordered by id ascending. */
  listCompleted(filter?: CompletedAttemptFilter): Promise<CompletedAttempt[]>;
}

export class AttemptRepository implements AttemptStore {
  constructor(private pool: Pool) {}

  async create(input: AttemptStartInput): Promise<InProgressAttempt> {
    const result = await this.pool.query<AttemptRow>(
      `INSERT INTO attempts (user_id, test_id, exam_type_id, subject_id, is_practice, start_time, status)
       VALUES ($1, $2, $3, $4, false, $5, 'in_progress')
       RETURNING *`,
      [input.userId, input.testId, input.examTypeId, input.subjectId, input.startTime]
    );
    const attempt = rowToAttempt(result.rows[0]);
    if (attempt.status !== 'in_progress') {
      throw new Error(`Attempt ${attempt.id} was not created in progress`);
    }
    return attempt;
  }

  async createPractice(input: PracticeAttemptInput, db: Queryable = this.pool): Promise<CompletedAttempt> {
    const result = await db.query<AttemptRow>(
      `INSERT INTO attempts (
        user_id, test_id, exam_type_id, subject_id, is_practice, start_time, end_time,
        status, score, percentage, passed, time_taken
      ) VALUES ($1, NULL, $2, $3, true, $4, $5, 'completed', $6, $7, $8, $9)
      RETURNING *`,
      [
        input.userId,
        input.examTypeId,
        input.subjectId,
        input.startTime,
        input.endTime,
        input.score,
        input.percentage,
        input.passed,
        input.timeTaken,
      ]
    );
    return toCompleted(rowToAttempt(result.rows[0]));
  }

  async findById(id: number): Promise<Attempt | null> {
    const result = await this.pool.query<AttemptRow>('SELECT * FROM attempts WHERE id = $1', [id]);
    return result.rows.length > 0 ? rowToAttempt(result.rows[0]) : null;
  }

  async findByIdForUpdate(id: number, db: Queryable): Promise<Attempt | null> {
    const result = await db.query<AttemptRow>('SELECT * FROM attempts WHERE id = $1 FOR UPDATE', [id]);
    return result.rows.length > 0 ? rowToAttempt(result.rows[0]) : null;
  }

  async complete(id: number, outcome: AttemptOutcome, db: Queryable = this.pool): Promise<CompletedAttempt> {
    const result = await db.query<AttemptRow>(
      `UPDATE attempts
       SET status = 'completed', end_time = $2, score = $3, percentage = $4, passed = $5, time_taken = $6
       WHERE id = $1 AND status = 'in_progress'
       RETURNING *`,
      [id, outcome.endTime, outcome.score, outcome.percentage, outcome.passed, outcome.timeTaken]
    );
    if (result.rows.length === 0) {
      throw new Error(`Attempt ${id} could not be completed`);
    }
    return toCompleted(rowToAttempt(result.rows[0]));
  }

  async addAnswers(attemptId: number, answers: AnswerInput[], db: Queryable = this.pool): Promise<Answer[]> {
    const saved: Answer[] = [];
    for (const answer of answers) {
      const result = await db.query<AnswerRow>(
        `INSERT INTO answers (attempt_id, question_id, answer_text, is_correct, marks_obtained, time_spent)
         VALUES ($1, $2, $3, $4, $5, $6)
         RETURNING *`,
        [attemptId, answer.questionId, answer.answerText, answer.isCorrect, answer.marksObtained, answer.timeSpent]
      );
      saved.push(rowToAnswer(result.rows[0]));
    }
    return saved;
  }

  async findAnswers(attemptId: number): Promise<Answer[]> {
    const result = await this.pool.query<AnswerRow>(
      'SELECT * FROM answers WHERE attempt_id = $1 ORDER BY id ASC',
      [attemptId]
    );
    return result.rows.map(rowToAnswer);
  }

  async listByUser(userId: number): Promise<Attempt[]> {
    const result = await this.pool.query<AttemptRow>(
      'SELECT * FROM attempts WHERE user_id = $1 ORDER BY start_time DESC, id DESC',
      [userId]
    );
    return result.rows.map(rowToAttempt);
  }

  async listCompleted(filter: CompletedAttemptFilter = {}): Promise<CompletedAttempt[]> {
    const conditions = [`status = 'completed'`];
    const values: unknown[] = [];

    if (filter.testId !== undefined) {
      values.push(filter.testId);
      conditions.push(`test_id = $${values.length}`);
    }
    if (filter.userId !== undefined) {
      values.push(filter.userId);
      conditions.push(`user_id = $${values.length}`);
    }

    const result = await this.pool.query<AttemptRow>(
      `SELECT * FROM attempts WHERE ${conditions.join(' AND ')} ORDER BY id ASC`,
      values
    );
    return result.rows.map(rowToAttempt).map(toCompleted);
  }
}
