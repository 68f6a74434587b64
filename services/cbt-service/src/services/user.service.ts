/**
 * User Service - registration, login, token refresh, account management, bulk import
 */

import { ZodError } from 'zod';
import {
  ConflictError,
  ForbiddenError,
  NotFoundError,
  UnauthorizedError,
  logAuthEvent,
} from '@cbt/shared';
import logger from '@cbt/shared/config/logger';
import { applyUserPatch, User, UserPatch, UserRole, UserStore } from '../models/user.model';
import { CredentialService, IssuedToken } from './credential.service';
import { BulkUserRowSchema, RegisterBody, UserUpdateBody } from '../schemas/user.schema';
import { isUniqueViolation } from '../utils/dbErrors';
import { SheetRow } from '../utils/spreadsheet';

export interface AuthSession {
  token: IssuedToken;
  user: User;
}

export interface BulkRowResult {
  username: string;
  status: 'success' | 'failed';
  message: string;
}

export interface BulkUploadReport {
  totalProcessed: number;
  successful: number;
  failed: number;
  details: BulkRowResult[];
}

function describeRowError(error: unknown): string {
  if (error instanceof ZodError) {
    return error.errors.map((issue) => `${issue.path.join('.')}: ${issue.message}`).join('; ');
  }
  return error instanceof Error ? error.message : String(error);
}

export class UserService {
  constructor(
    private users: UserStore,
    private credentials: CredentialService
  ) {}

  async register(input: RegisterBody): Promise<User> {
    if (input.role === 'admin') {
      throw new ForbiddenError('Admin accounts cannot be self-registered');
    }
    const user = await this.createAccount({
      username: input.username,
      email: input.email,
      password: input.password,
      fullName: input.full_name,
      role: input.role,
    });
    logAuthEvent('register', user.username);
    return user;
  }

  async login(username: string, password: string): Promise<AuthSession> {
    const user = await this.users.findByUsername(username);
    const valid = user !== null && (await this.credentials.verifyPassword(password, user.hashedPassword));

    if (!user || !valid || !user.isActive) {
      logAuthEvent('login', username, false);
      throw new UnauthorizedError('Invalid credentials');
    }

    logAuthEvent('login', username);
    return { token: this.credentials.issueToken(user.username), user };
  }

  async refresh(token: string): Promise<AuthSession> {
    const username = this.credentials.verifyRefreshableToken(token);
    const user = await this.requireActiveUser(username);
    logAuthEvent('token_refresh', username);
    return { token: this.credentials.issueToken(user.username), user };
  }

  /**
   * Resolve a bearer token to its active user.
   */
  async authenticate(token: string): Promise<User> {
    const username = this.credentials.verifyAccessToken(token);
    return this.requireActiveUser(username);
  }

  async listUsers(skip: number, limit: number): Promise<User[]> {
    return this.users.list(skip, limit);
  }

  async getUser(id: number): Promise<User> {
    const user = await this.users.findById(id);
    if (!user) {
      throw new NotFoundError('User not found');
    }
    return user;
  }

  async updateUser(id: number, body: UserUpdateBody, actor: User): Promise<User> {
    const isAdmin = actor.role === 'admin';
    if (!isAdmin && actor.id !== id) {
      throw new ForbiddenError('You can only update your own account');
    }
    if (!isAdmin && (body.role !== undefined || body.is_active !== undefined)) {
      throw new ForbiddenError('Only admins can change role or active status');
    }

    const user = await this.getUser(id);
    const patch: UserPatch = {
      username: body.username,
      email: body.email,
      fullName: body.full_name,
      role: body.role,
      isActive: body.is_active,
    };

    if ((patch.username && patch.username !== user.username) || (patch.email && patch.email !== user.email)) {
      const clash = await this.users.findByUsernameOrEmail(patch.username ?? '', patch.email ?? '');
      if (clash && clash.id !== user.id) {
        throw new ConflictError('User with this username or email already exists');
      }
    }

    try {
      return await this.users.save(applyUserPatch(user, patch));
    } catch (error) {
      if (isUniqueViolation(error)) {
        throw new ConflictError('User with this username or email already exists');
      }
      throw error;
    }
  }

  async deleteUser(id: number, actor: User): Promise<void> {
    if (actor.role !== 'admin' && actor.id !== id) {
      throw new ForbiddenError('You can only delete your own account');
    }
    const deleted = await this.users.delete(id);
    if (!deleted) {
      throw new NotFoundError('User not found');
    }
  }

  /**
   * Rows are created one at a time, each in its own statement, so a failing row
   * never undoes the ones before it.
   */
  async bulkRegister(rows: SheetRow[]): Promise<BulkUploadReport> {
    const report: BulkUploadReport = { totalProcessed: 0, successful: 0, failed: 0, details: [] };

    for (const row of rows) {
      report.totalProcessed += 1;
      try {
        const item = BulkUserRowSchema.parse(row);
        await this.createAccount({
          username: item.username,
          email: item.email ?? `${item.username}@example.com`,
          password: item.password,
          fullName: item.full_name,
          role: 'student',
        });
        report.successful += 1;
        report.details.push({ username: item.username, status: 'success', message: 'User created successfully' });
      } catch (error) {
        report.failed += 1;
        report.details.push({
          username: row.username || 'unknown',
          status: 'failed',
          message: describeRowError(error),
        });
      }
    }

    logAuthEvent('bulk_register', undefined, report.failed === 0, {
      totalProcessed: report.totalProcessed,
      successful: report.successful,
      failed: report.failed,
    });
    return report;
  }

  /**
   * Create the configured admin account if it does not exist yet.
   */
  async ensureAdmin(admin: { username: string; password: string; email: string }): Promise<void> {
    const existing = await this.users.findByUsername(admin.username);
    if (existing) {
      logger.info('Admin user already exists', { username: admin.username });
      return;
    }
    await this.createAccount({
      username: admin.username,
      email: admin.email,
      password: admin.password,
      fullName: 'System Administrator',
      role: 'admin',
    });
    logger.info('Admin user created', { username: admin.username });
  }

  private async requireActiveUser(username: string): Promise<User> {
    const user = await this.users.findByUsername(username);
    if (!user || !user.isActive) {
      logAuthEvent('token_verify', username, false);
      throw new UnauthorizedError();
    }
    return user;
  }

  private async createAccount(input: {
    username: string;
    email: string;
    password: string;
    fullName: string | null;
    role: UserRole;
  }): Promise<User> {
    const existing = await this.users.findByUsernameOrEmail(input.username, input.email);
    if (existing) {
      throw new ConflictError(`User with username '${input.username}' or email '${input.email}' already exists`);
    }

    const hashedPassword = await this.credentials.hashPassword(input.password);
    try {
      return await this.users.create({
        username: input.username,
        email: input.email,
        hashedPassword,
        fullName: input.fullName,
        role: input.role,
      });
    } catch (error) {
      if (isUniqueViolation(error)) {
        throw new ConflictError(`User with username '${input.username}' or email '${input.email}' already exists`);
      }
      throw error;
    }
  }
}
