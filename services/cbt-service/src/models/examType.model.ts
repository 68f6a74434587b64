/**
 * Exam Type Model - PostgreSQL Schema
 * Examining bodies (WAEC, NECO, JAMB, ...) that questions and tests are grouped under
 */

import type { Pool } from 'pg';

type ExamTypeRow = {
  id: number;
  name: string;
  description: string | null;
  created_at: Date;
};

export interface ExamType {
  id: number;
  name: string;
  description: string | null;
  createdAt: Date;
}

export interface ExamTypeCreateInput {
  name: string;
  description: string | null;
}

export interface ExamTypePatch {
  name?: string;
  description?: string | null;
}

export function applyExamTypePatch(examType: ExamType, patch: ExamTypePatch): ExamType {
  return {
    ...examType,
    name: patch.name ?? examType.name,
    description: patch.description !== undefined ? patch.description : examType.description,
  };
}

export async function createExamTypesTable(pool: Pool): Promise<void> {
  await pool.query(`
    CREATE TABLE IF NOT EXISTS exam_types (
      id SERIAL PRIMARY KEY,
      name VARCHAR(100) NOT NULL UNIQUE,
      description TEXT,
      created_at TIMESTAMPTZ NOT NULL DEFAULT NOW()
    );
  `);
}

function rowToExamType(row: ExamTypeRow): ExamType {
  return {
    id: row.id,
    name: row.name,
    description: row.description,
    createdAt: row.created_at,
  };
}

export interface ExamTypeStore {
  create(input: ExamTypeCreateInput): Promise<ExamType>;
  findById(id: number): Promise<ExamType | null>;
  findByName(name: string): Promise<ExamType | null>;
  list(): Promise<ExamType[]>;
  save(examType: ExamType): Promise<ExamType>;
  delete(id: number): Promise<boolean>;
}

export class ExamTypeRepository implements ExamTypeStore {
  constructor(private pool: Pool) {}

  async create(input: ExamTypeCreateInput): Promise<ExamType> {
    const result = await this.pool.query<ExamTypeRow>(
      'INSERT INTO exam_types (name, description) VALUES ($1, $2) RETURNING *',
      [input.name, input.description]
    );
    return rowToExamType(result.rows[0]);
  }

  async findById(id: number): Promise<ExamType | null> {
    const result = await this.pool.query<ExamTypeRow>('SELECT * FROM exam_types WHERE id = $1', [id]);
    return result.rows.length > 0 ? rowToExamType(result.rows[0]) : null;
  }

  async findByName(name: string): Promise<ExamType | null> {
    const result = await this.pool.query<ExamTypeRow>('SELECT * FROM exam_types WHERE name = $1', [name]);
    return result.rows.length > 0 ? rowToExamType(result.rows[0]) : null;
  }

  async list(): Promise<ExamType[]> {
    const result = await this.pool.query<ExamTypeRow>('SELECT * FROM exam_types ORDER BY name ASC');
    return result.rows.map(rowToExamType);
  }

  async save(examType: ExamType): Promise<ExamType> {
    const result = await this.pool.query<ExamTypeRow>(
      'UPDATE exam_types SET name = $2, description = $3 WHERE id = $1 RETURNING *',
      [examType.id, examType.name, examType.description]
    );
    return rowToExamType(result.rows[0]);
  }

  async delete(id: number): Promise<boolean> {
    const result = await this.pool.query('DELETE FROM exam_types WHERE id = $1', [id]);
    return (result.rowCount ?? 0) > 0;
  }
}
