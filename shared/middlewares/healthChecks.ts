/**
 * Health Check Middleware
 * Provides /health (liveness) and /ready (readiness) endpoints
 * /ready checks database connectivity
 */

import { Request, Response } from 'express';
import logger from '../config/logger';
import { Queryable } from '../databases/postgres/connection';

interface HealthCheckOptions {
	serviceName: string;
	postgresPool?: Queryable;
}

type CheckStatus = 'ok' | 'error';

/**
 * Check PostgreSQL connection health
 */
export async function checkPostgres(pool?: Queryable): Promise<CheckStatus> {
	if (!pool) {
		return 'ok'; // Service doesn't use PostgreSQL
	}

	try {
		const result = await pool.query('SELECT 1 as health');
		return result.rows.length > 0 ? 'ok' : 'error';
	} catch (error) {
		logger.warn('PostgreSQL health check failed', {
			error: error instanceof Error ? error.message : String(error),
		});
		return 'error';
	}
}

/**
 * /health - liveness probe (always 200 while the process is serving)
 * /ready - readiness probe (503 when a dependency is unhealthy)
 */
export function createHealthCheckEndpoints(options: HealthCheckOptions) {
	const { serviceName, postgresPool } = options;

	const healthHandler = (_req: Request, res: Response) => {
		res.status(200).json({
			status: 'ok',
			service: serviceName,
			timestamp: new Date().toISOString(),
		});
	};

	const readyHandler = async (_req: Request, res: Response) => {
		const checks = {
			postgres: await checkPostgres(postgresPool),
		};

		const allHealthy = Object.values(checks).every((status) => status === 'ok');

		res.status(allHealthy ? 200 : 503).json({
			ready: allHealthy,
			service: serviceName,
			checks,
			timestamp: new Date().toISOString(),
		});
	};

	return {
		healthHandler,
		readyHandler,
	};
}
