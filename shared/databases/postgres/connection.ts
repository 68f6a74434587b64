import { Pool, QueryResult, QueryResultRow } from 'pg';
import logger from '../../config/logger';

/**
 * Anything that can run a parameterised query: the pool itself or a client checked
 * out for a transaction. Repositories accept either.
 */
export interface Queryable {
	query<R extends QueryResultRow = QueryResultRow>(text: string, values?: unknown[]): Promise<QueryResult<R>>;
}

export type TransactionRunner = <T>(handler: (db: Queryable) => Promise<T>) => Promise<T>;

/** The parts of a pg.PoolClient a transaction uses. */
export interface TransactionClient extends Queryable {
	release(): void;
}

/** The parts of a pg.Pool a transaction uses. */
export interface TransactionPool {
	connect(): Promise<TransactionClient>;
}

export interface PostgresPoolOptions {
	connectionString: string;
	ssl: boolean;
	max?: number;
	idleTimeoutMillis?: number;
	connectionTimeoutMillis?: number;
}

/**
 * Appends sslmode when SSL is requested and the URL does not already carry one.
 * uselibpqcompat keeps pg-connection-string from treating `require` as `verify-full`.
 */
export function buildPostgresConnectionString(url: string, ssl: boolean): string {
	if (ssl && !/sslmode=/.test(url)) {
		const sep = url.includes('?') ? '&' : '?';
		return `${url}${sep}uselibpqcompat=true&sslmode=require`;
	}
	return url;
}

export function createPostgresPool(options: PostgresPoolOptions): Pool {
	const pool = new Pool({
		connectionString: buildPostgresConnectionString(options.connectionString, options.ssl),
		ssl: options.ssl ? { rejectUnauthorized: false } : false,
		max: options.max ?? 10,
		idleTimeoutMillis: options.idleTimeoutMillis ?? 30000,
		connectionTimeoutMillis: options.connectionTimeoutMillis ?? 30000,
	});

	// An idle client erroring must not take the process down
	pool.on('error', (err) => {
		logger.error('Unexpected PostgreSQL pool error', { error: err.message });
	});

	return pool;
}

const TRANSIENT_MARKERS = ['Connection terminated', 'ECONNRESET', 'ECONNREFUSED', 'Client has encountered a connection error'];

export function isTransientConnectionError(err: unknown): boolean {
	if (!(err instanceof Error)) {
		return false;
	}
	const code = 'code' in err ? err.code : undefined;
	return (
		code === 'ECONNRESET' ||
		code === 'ECONNREFUSED' ||
		TRANSIENT_MARKERS.some((marker) => err.message.includes(marker))
	);
}

const MAX_ATTEMPTS = 3;

/**
 * Run handler inside BEGIN/COMMIT on a dedicated client; ROLLBACK on any error.
 * Transient connection failures are retried with exponential backoff.
 */
export async function withTransaction<T>(
	pool: TransactionPool,
	handler: (client: TransactionClient) => Promise<T>
): Promise<T> {
	for (let attempt = 1; ; attempt++) {
		let client: TransactionClient | null = null;
		try {
			client = await pool.connect();
			await client.query('BEGIN');
			const result = await handler(client);
			await client.query('COMMIT');
			return result;
		} catch (err) {
			if (client) {
				await client.query('ROLLBACK').catch((rollbackErr: unknown) => {
					logger.warn('Rollback failed', {
						error: rollbackErr instanceof Error ? rollbackErr.message : String(rollbackErr),
					});
				});
			}

			if (!isTransientConnectionError(err) || attempt >= MAX_ATTEMPTS) {
				throw err;
			}

			const delay = Math.min(1000 * Math.pow(2, attempt - 1), 5000);
			logger.warn('Database connection error, retrying', {
				delay,
				attempt,
				maxRetries: MAX_ATTEMPTS,
				error: err instanceof Error ? err.message : String(err),
			});
			await new Promise((resolve) => setTimeout(resolve, delay));
		} finally {
			client?.release();
		}
	}
}

/**
 * Bind a pool to the TransactionRunner shape services depend on.
 */
export function createTransactionRunner(pool: TransactionPool): TransactionRunner {
	return (handler) => withTransaction(pool, handler);
}
