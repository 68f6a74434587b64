import { Request, Response, NextFunction, RequestHandler } from 'express';
import { ForbiddenError, UnauthorizedError } from '@cbt/shared';
import type { User } from '../models/user.model';
import type { UserService } from '../services/user.service';
import { isAdmin, isStaff } from '../utils/access';

// Extend Express Request with the authenticated user
declare global {
	namespace Express {
		interface Request {
			authUser?: User;
		}
	}
}

export interface AuthMiddleware {
	requireAuth: RequestHandler;
	requireAdmin: RequestHandler;
	requireStaff: RequestHandler;
}

export function extractBearerToken(req: Request): string | null {
	const header = req.headers.authorization;
	if (!header || !header.startsWith('Bearer ')) {
		return null;
	}
	const token = header.slice(7).trim();
	return token || null;
}

/**
 * The user attached by requireAuth. Handlers behind requireAuth call this
 * instead of reading req.authUser directly.
 */
export function requireUser(req: Request): User {
	if (!req.authUser) {
		throw new UnauthorizedError();
	}
	return req.authUser;
}

export function createAuthMiddleware(userService: UserService): AuthMiddleware {
	const authenticate = async (req: Request): Promise<User> => {
		const token = extractBearerToken(req);
		if (!token) {
			throw new UnauthorizedError('Not authenticated');
		}
		const user = await userService.authenticate(token);
		req.authUser = user;
		return user;
	};

	const guard =
		(allowed: (user: User) => boolean): RequestHandler =>
		(req: Request, _res: Response, next: NextFunction) => {
			authenticate(req)
				.then((user) => (allowed(user) ? next() : next(new ForbiddenError())))
				.catch(next);
		};

	return {
		requireAuth: guard(() => true),
		requireAdmin: guard(isAdmin),
		requireStaff: guard(isStaff),
	};
}
