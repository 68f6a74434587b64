import { Request, Response, NextFunction, RequestHandler } from 'express';

type AsyncRequestHandler = (req: Request, res: Response, next: NextFunction) => Promise<unknown>;

/**
 * Forwards rejected handler promises to the Express error chain.
 */
export const asyncHandler =
	(fn: AsyncRequestHandler): RequestHandler =>
	(req, res, next) => {
		fn(req, res, next).catch(next);
	};
