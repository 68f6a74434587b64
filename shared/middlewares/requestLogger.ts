import { Request, Response, NextFunction } from 'express';
import { logApiRequest } from '../config/logger';

/**
 * Logs every request once the response has been sent, with its duration.
 */
export function requestLogger(req: Request, res: Response, next: NextFunction): void {
	const startedAt = process.hrtime.bigint();
	res.on('finish', () => {
		const elapsedMs = Number((process.hrtime.bigint() - startedAt) / BigInt(1000000));
		logApiRequest(req, res, elapsedMs);
	});
	next();
}
