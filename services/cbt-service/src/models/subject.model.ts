/**
 * Subject Model - PostgreSQL Schema
 */

import type { Pool } from 'pg';

type SubjectRow = {
  id: number;
  name: string;
  description: string | null;
  created_at: Date;
};

export interface Subject {
  id: number;
  name: string;
  description: string | null;
  createdAt: Date;
}

export interface SubjectCreateInput {
  name: string;
  description: string | null;
}

export interface SubjectPatch {
  name?: string;
  description?: string | null;
}

export function applySubjectPatch(subject: Subject, patch: SubjectPatch): Subject {
  return {
    ...subject,
    name: patch.name ?? subject.name,
    description: patch.description !== undefined ? patch.description : subject.description,
  };
}

export async function createSubjectsTable(pool: Pool): Promise<void> {
  await pool.query(`
    CREATE TABLE IF NOT EXISTS subjects (
      id SERIAL PRIMARY KEY,
      name VARCHAR(100) NOT NULL UNIQUE,
      description TEXT,
      created_at TIMESTAMPTZ NOT NULL DEFAULT NOW()
    );
  `);
}

function rowToSubject(row: SubjectRow): Subject {
  return {
    id: row.id,
    name: row.name,
    description: row.description,
    createdAt: row.created_at,
  };
}

export interface SubjectStore {
  create(input: SubjectCreateInput): Promise<Subject>;
  findById(id: number): Promise<Subject | null>;
  findByName(name: string): Promise<Subject | null>;
  findByIds(ids: number[]): Promise<Subject[]>;
  list(): Promise<Subject[]>;
  save(subject: Subject): Promise<Subject>;
  delete(id: number): Promise<boolean>;
}

export class SubjectRepository implements SubjectStore {
  constructor(private pool: Pool) {}

  async create(input: SubjectCreateInput): Promise<Subject> {
    const result = await this.pool.query<SubjectRow>(
      'INSERT INTO subjects (name, description) VALUES ($1, $2) RETURNING *',
      [input.name, input.description]
    );
    return rowToSubject(result.rows[0]);
  }

  async findById(id: number): Promise<Subject | null> {
    const result = await this.pool.query<SubjectRow>('SELECT * FROM subjects WHERE id = $1', [id]);
    return result.rows.length > 0 ? rowToSubject(result.rows[0]) : null;
  }

  async findByName(name: string): Promise<Subject | null> {
    const result = await this.pool.query<SubjectRow>('SELECT * FROM subjects WHERE name = $1', [name]);
    return result.rows.length > 0 ? rowToSubject(result.rows[0]) : null;
  }

  async findByIds(ids: number[]): Promise<Subject[]> {
    if (ids.length === 0) {
      return [];
    }
    const result = await this.pool.query<SubjectRow>('SELECT * FROM subjects WHERE id = ANY($1::int[])', [ids]);
    return result.rows.map(rowToSubject);
  }

  async list(): Promise<Subject[]> {
    const result = await this.pool.query<SubjectRow>('SELECT * FROM subjects ORDER BY name ASC');
    return result.rows.map(rowToSubject);
  }

  async save(subject: Subject): Promise<Subject> {
    const result = await this.pool.query<SubjectRow>(
      'UPDATE subjects SET name = $2, description = $3 WHERE id = $1 RETURNING *',
      [subject.id, subject.name, subject.description]
    );
    return rowToSubject(result.rows[0]);
  }

  async delete(id: number): Promise<boolean> {
    const result = await this.pool.query('DELETE FROM subjects WHERE id = $1', [id]);
    return (result.rowCount ?? 0) > 0;
  }
}
