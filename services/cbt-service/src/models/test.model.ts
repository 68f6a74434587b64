/**
 * Test Model - PostgreSQL Schema
 * A test is a template; its questions are sampled from the bank when it is read
 */

import type { Pool } from 'pg';

type TestRow = {
  id: number;
  title: string;
  exam_type_id: number;
  subject_id: number;
  duration_minutes: number;
  question_count: number;
  total_marks: number;
  passing_marks: number;
  is_active: boolean;
  created_by: number | null;
  created_at: Date;
};

export interface Test {
  id: number;
  title: string;
  examTypeId: number;
  subjectId: number;
  durationMinutes: number;
  questionCount: number;
  totalMarks: number;
  passingMarks: number;
  isActive: boolean;
  createdBy: number | null;
  createdAt: Date;
}

export interface TestCreateInput {
  title: string;
  examTypeId: number;
  subjectId: number;
  durationMinutes: number;
  questionCount: number;
  totalMarks: number;
  passingMarks: number;
  createdBy: number;
}

export interface TestPatch {
  title?: string;
  examTypeId?: number;
  subjectId?: number;
  durationMinutes?: number;
  questionCount?: number;
  totalMarks?: number;
  passingMarks?: number;
  isActive?: boolean;
}

export function applyTestPatch(test: Test, patch: TestPatch): Test {
  return {
    ...test,
    title: patch.title ?? test.title,
    examTypeId: patch.examTypeId ?? test.examTypeId,
    subjectId: patch.subjectId ?? test.subjectId,
    durationMinutes: patch.durationMinutes ?? test.durationMinutes,
    questionCount: patch.questionCount ?? test.questionCount,
    totalMarks: patch.totalMarks ?? test.totalMarks,
    passingMarks: patch.passingMarks ?? test.passingMarks,
    isActive: patch.isActive ?? test.isActive,
  };
}

export async function createTestsTable(pool: Pool): Promise<void> {
  await pool.query(`
    CREATE TABLE IF NOT EXISTS tests (
      id SERIAL PRIMARY KEY,
      title VARCHAR(200) NOT NULL,
      exam_type_id INTEGER NOT NULL REFERENCES exam_types(id) ON DELETE CASCADE,
      subject_id INTEGER NOT NULL REFERENCES subjects(id) ON DELETE CASCADE,
      duration_minutes INTEGER NOT NULL CHECK (duration_minutes > 0),
      question_count INTEGER NOT NULL CHECK (question_count > 0),
      total_marks INTEGER NOT NULL,
      passing_marks INTEGER NOT NULL,
      is_active BOOLEAN NOT NULL DEFAULT true,
      created_by INTEGER REFERENCES users(id) ON DELETE SET NULL,
      created_at TIMESTAMPTZ NOT NULL DEFAULT NOW()
    );
  `);

  await pool.query(`
    CREATE INDEX IF NOT EXISTS idx_tests_exam_type_id ON tests(exam_type_id);
    CREATE INDEX IF NOT EXISTS idx_tests_subject_id ON tests(subject_id);
  `);
}

function rowToTest(row: TestRow): Test {
  return {
    id: row.id,
    title: row.title,
    examTypeId: row.exam_type_id,
    subjectId: row.subject_id,
    durationMinutes: row.duration_minutes,
    questionCount: row.question_count,
    totalMarks: row.total_marks,
    passingMarks: row.passing_marks,
    isActive: row.is_active,
    createdBy: row.created_by,
    createdAt: row.created_at,
  };
}

export interface TestStore {
  create(input: TestCreateInput): Promise<Test>;
  findById(id: number): Promise<Test | null>;
  findByIds(ids: number[]): Promise<Test[]>;
  list(skip: number, limit: number): Promise<Test[]>;
  listByExamType(examTypeId: number): Promise<Test[]>;
  listBySubject(subjectId: number): Promise<Test[]>;
  save(test: Test): Promise<Test>;
  delete(id: number): Promise<boolean>;
}

export class TestRepository implements TestStore {
  constructor(private pool: Pool) {}

  async create(input: TestCreateInput): Promise<Test> {
    const result = await this.pool.query<TestRow>(
      `INSERT INTO tests (
        title, exam_type_id, subject_id, duration_minutes, question_count,
        total_marks, passing_marks, is_active, created_by
      ) VALUES ($1, $2, $3, $4, $5, $6, $7, true, $8)
      RETURNING *`,
      [
        input.title,
        input.examTypeId,
        input.subjectId,
        input.durationMinutes,
        input.questionCount,
        input.totalMarks,
        input.passingMarks,
        input.createdBy,
      ]
    );
    return rowToTest(result.rows[0]);
  }

  async findById(id: number): Promise<Test | null> {
    const result = await this.pool.query<TestRow>('SELECT * FROM tests WHERE id = $1', [id]);
    return result.rows.length > 0 ? rowToTest(result.rows[0]) : null;
  }

  async findByIds(ids: number[]): Promise<Test[]> {
    if (ids.length === 0) {
      return [];
    }
    const result = await this.pool.query<TestRow>('SELECT * FROM tests WHERE id = ANY($1::int[])', [ids]);
    return result.rows.map(rowToTest);
  }

  async list(skip: number, limit: number): Promise<Test[]> {
    const result = await this.pool.query<TestRow>(
      'SELECT * FROM tests ORDER BY id ASC OFFSET $1 LIMIT $2',
      [skip, limit]
    );
    return result.rows.map(rowToTest);
  }

  async listByExamType(examTypeId: number): Promise<Test[]> {
    const result = await this.pool.query<TestRow>(
      'SELECT * FROM tests WHERE exam_type_id = $1 ORDER BY id ASC',
      [examTypeId]
    );
    return result.rows.map(rowToTest);
  }

  async listBySubject(subjectId: number): Promise<Test[]> {
    const result = await this.pool.query<TestRow>(
      'SELECT * FROM tests WHERE subject_id = $1 ORDER BY id ASC',
      [subjectId]
    );
    return result.rows.map(rowToTest);
  }

  async save(test: Test): Promise<Test> {
    const result = await this.pool.query<TestRow>(
      `UPDATE tests
       SET title = $2, exam_type_id = $3, subject_id = $4, duration_minutes = $5,
           question_count = $6, total_marks = $7, passing_marks = $8, is_active = $9
       WHERE id = $1
       RETURNING *`,
      [
        test.id,
        test.title,
        test.examTypeId,
        test.subjectId,
        test.durationMinutes,
        test.questionCount,
        test.totalMarks,
        test.passingMarks,
        test.isActive,
      ]
    );
    return rowToTest(result.rows[0]);
  }

  async delete(id: number): Promise<boolean> {
    const result = await this.pool.query('DELETE FROM tests WHERE id = $1', [id]);
    return (result.rowCount ?? 0) > 0;
  }
}
