import { Pool } from 'pg';
import {
  createPostgresPool,
  createTransactionRunner,
  logDatabaseOperation,
  TransactionRunner,
} from '@cbt/shared';
import logger from '@cbt/shared/config/logger';
import { CbtConfig } from './index';
import { createUsersTable } from '../models/user.model';
import { createExamTypesTable } from '../models/examType.model';
import { createSubjectsTable } from '../models/subject.model';
import { createQuestionsTable } from '../models/question.model';
import { createTestsTable } from '../models/test.model';
import { createAttemptTables } from '../models/attempt.model';
import { createNewsTable } from '../models/news.model';
import { createForumTables } from '../models/forum.model';

export interface Database {
  pool: Pool;
  runInTransaction: TransactionRunner;
}

export function createDatabase(config: CbtConfig): Database {
  const pool = createPostgresPool({
    connectionString: config.database.connectionString,
    ssl: config.database.ssl,
    max: config.database.poolMax,
  });
  return { pool, runInTransaction: createTransactionRunner(pool) };
}

/**
 * Create every table the service needs. Idempotent; order follows foreign keys.
 */
export async function initializeCbtTables(pool: Pool): Promise<void> {
  const steps: Array<[string, (p: Pool) => Promise<void>]> = [
    ['users', createUsersTable],
    ['exam_types', createExamTypesTable],
    ['subjects', createSubjectsTable],
    ['questions', createQuestionsTable],
    ['tests', createTestsTable],
    ['attempts', createAttemptTables],
    ['news', createNewsTable],
    ['forum', createForumTables],
  ];

  for (const [table, create] of steps) {
    await create(pool);
    logDatabaseOperation('ensure table', table);
  }

  logger.info('Database tables initialized', { service: 'cbt-service', tables: steps.length });
}
