/**
 * Correlation ID Middleware
 * Extracts or generates a correlation ID per request so log lines can be tied together
 */

import { Request, Response, NextFunction } from 'express';
import { v4 as uuidv4 } from 'uuid';

const HEADER = 'x-correlation-id';

/**
 * Format: corr-{timestamp}-{uuid}
 */
function generateCorrelationId(): string {
	return `corr-${Date.now()}-${uuidv4()}`;
}

function extractCorrelationId(req: Request): string {
	const correlationId = req.headers[HEADER] || req.headers['correlation-id'];

	if (Array.isArray(correlationId)) {
		return correlationId[0] || generateCorrelationId();
	}

	return correlationId || generateCorrelationId();
}

declare global {
	namespace Express {
		interface Request {
			correlationId?: string;
		}
	}
}

/**
 * - Reads X-Correlation-ID (or Correlation-Id), generating one if missing
 * - Attaches it to req.correlationId and to the request headers so the logger sees it
 * - Echoes it in the response header
 */
export function correlationIdMiddleware(
	req: Request,
	res: Response,
	next: NextFunction
): void {
	const correlationId = extractCorrelationId(req);

	req.correlationId = correlationId;
	req.headers[HEADER] = correlationId;
	res.setHeader('X-Correlation-ID', correlationId);

	next();
}

