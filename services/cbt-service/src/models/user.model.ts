/**
 * User Model - PostgreSQL Schema
 * Accounts for students, teachers and admins
 */

import type { Pool } from 'pg';
import type { Queryable } from '@cbt/shared';

export const USER_ROLES = ['student', 'teacher', 'admin'] as const;
export type UserRole = (typeof USER_ROLES)[number];

type UserRow = {
  id: number;
  username: string;
  email: string;
  hashed_password: string;
  full_name: string | null;
  role: string;
  is_active: boolean;
  created_at: Date;
};

export interface User {
  id: number;
  username: string;
  email: string;
  hashedPassword: string;
  fullName: string | null;
  role: UserRole;
  isActive: boolean;
  createdAt: Date;
}

export interface UserCreateInput {
  username: string;
  email: string;
  hashedPassword: string;
  fullName: string | null;
  role: UserRole;
}

/**
 * Fields a caller may change. Password changes arrive already hashed.
 */
export interface UserPatch {
  username?: string;
  email?: string;
  fullName?: string | null;
  role?: UserRole;
  isActive?: boolean;
  hashedPassword?: string;
}

export function isUserRole(value: string): value is UserRole {
  return USER_ROLES.some((role) => role === value);
}

export function applyUserPatch(user: User, patch: UserPatch): User {
  return {
    ...user,
    username: patch.username ?? user.username,
    email: patch.email ?? user.email,
    fullName: patch.fullName !== undefined ? patch.fullName : user.fullName,
    role: patch.role ?? user.role,
    isActive: patch.isActive ?? user.isActive,
    hashedPassword: patch.hashedPassword ?? user.hashedPassword,
  };
}

export async function createUsersTable(pool: Pool): Promise<void> {
  await pool.query(`
    CREATE TABLE IF NOT EXISTS users (
      id SERIAL PRIMARY KEY,
      username VARCHAR(50) NOT NULL UNIQUE,
      email VARCHAR(100) NOT NULL UNIQUE,
      hashed_password VARCHAR(255) NOT NULL,
      full_name VARCHAR(100),
      role VARCHAR(20) NOT NULL DEFAULT 'student' CHECK (role IN ('student', 'teacher', 'admin')),
      is_active BOOLEAN NOT NULL DEFAULT true,
      created_at TIMESTAMPTZ NOT NULL DEFAULT NOW()
    );
  `);
}

function rowToUser(row: UserRow): User {
  return {
    id: row.id,
    username: row.username,
    email: row.email,
    hashedPassword: row.hashed_password,
    fullName: row.full_name,
    role: isUserRole(row.role) ? row.role : 'student',
    isActive: row.is_active,
    createdAt: row.created_at,
  };
}

export interface UserStore {
  create(input: UserCreateInput, db?: Queryable): Promise<User>;
  findById(id: number): Promise<User | null>;
  findByUsername(username: string): Promise<User | null>;
  findByUsernameOrEmail(username: string, email: string): Promise<User | null>;
  findByIds(ids: number[]): Promise<User[]>;
  list(skip: number, limit: number): Promise<User[]>;
  save(user: User): Promise<User>;
  delete(id: number): Promise<boolean>;
}

export class UserRepository implements UserStore {
  constructor(private pool: Pool) {}

  async create(input: UserCreateInput, db: Queryable = this.pool): Promise<User> {
    const result = await db.query<UserRow>(
      `INSERT INTO users (username, email, hashed_password, full_name, role)
       VALUES ($1, $2, $3, $4, $5)
       RETURNING *`,
      [input.username, input.email, input.hashedPassword, input.fullName, input.role]
    );
    return rowToUser(result.rows[0]);
  }

  async findById(id: number): Promise<User | null> {
    const result = await this.pool.query<UserRow>('SELECT * FROM users WHERE id = $1', [id]);
    return result.rows.length > 0 ? rowToUser(result.rows[0]) : null;
  }

  async findByUsername(username: string): Promise<User | null> {
    const result = await this.pool.query<UserRow>('SELECT * FROM users WHERE username = $1', [username]);
    return result.rows.length > 0 ? rowToUser(result.rows[0]) : null;
  }

  async findByUsernameOrEmail(username: string, email: string): Promise<User | null> {
    const result = await this.pool.query<UserRow>(
      'SELECT * FROM users WHERE username = $1 OR email = $2 LIMIT 1',
      [username, email]
    );
    return result.rows.length > 0 ? rowToUser(result.rows[0]) : null;
  }

  async findByIds(ids: number[]): Promise<User[]> {
    if (ids.length === 0) {
      return [];
    }
    const result = await this.pool.query<UserRow>('SELECT * FROM users WHERE id = ANY($1::int[])', [ids]);
    return result.rows.map(rowToUser);
  }

  async list(skip: number, limit: number): Promise<User[]> {
    const result = await this.pool.query<UserRow>(
      'SELECT * FROM users ORDER BY id ASC OFFSET $1 LIMIT $2',
      [skip, limit]
    );
    return result.rows.map(rowToUser);
  }

  async save(user: User): Promise<User> {
    const result = await this.pool.query<UserRow>(
      `UPDATE users
       SET username = $2, email = $3, hashed_password = $4, full_name = $5, role = $6, is_active = $7
       WHERE id = $1
       RETURNING *`,
      [user.id, user.username, user.email, user.hashedPassword, user.fullName, user.role, user.isActive]
    );
    return rowToUser(result.rows[0]);
  }

  async delete(id: number): Promise<boolean> {
    const result = await this.pool.query('DELETE FROM users WHERE id = $1', [id]);
    return (result.rowCount ?? 0) > 0;
  }
}
