import { z } from 'zod';
import { BCRYPT_MAX_BYTES, utf8ByteLength } from '../utils/password';
import { optionalText } from './common.schema';

const password = z
  .string()
  .min(1, 'Password is required')
  .refine((val) => utf8ByteLength(val) <= BCRYPT_MAX_BYTES, 'Password too long (max 72 bytes)');

const username = z.string().trim().min(1).max(50);
const role = z.enum(['student', 'teacher', 'admin']);

export const RegisterSchema = z.object({
  username,
  email: z.string().trim().email().max(100),
  full_name: z.string().trim().min(1).max(100),
  password,
  role: role.default('student'),
});

export const LoginSchema = z.object({
  username: z.string().min(1),
  password: z.string().min(1),
});

export const RefreshTokenSchema = z.object({
  token: z.string().min(1).optional(),
});

export const UserUpdateSchema = z.object({
  username: username.optional(),
  email: z.string().trim().email().max(100).optional(),
  full_name: z.string().trim().min(1).max(100).optional(),
  role: role.optional(),
  is_active: z.boolean().optional(),
});

/**
 * One spreadsheet row of a bulk upload. Email falls back to <username>@example.com.
 */
export const BulkUserRowSchema = z.object({
  username,
  email: optionalText.pipe(z.string().email().max(100).optional()),
  password,
  full_name: z.string().trim().min(1, 'full_name is required').max(100),
});

export type RegisterBody = z.infer<typeof RegisterSchema>;
export type UserUpdateBody = z.infer<typeof UserUpdateSchema>;
export type BulkUserRow = z.infer<typeof BulkUserRowSchema>;
