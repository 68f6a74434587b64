import jwt from 'jsonwebtoken';

export type SigningAlgorithm = 'HS256' | 'HS384' | 'HS512';

export interface TokenClaims {
	sub: string;
	iat: number;
	exp: number;
}

export interface TokenOptions {
	secret: string;
	algorithm: SigningAlgorithm;
}

function isTokenClaims(value: unknown): value is TokenClaims {
	if (typeof value !== 'object' || value === null) {
		return false;
	}
	const claims: Record<string, unknown> = { ...value };
	return typeof claims.sub === 'string' && typeof claims.iat === 'number' && typeof claims.exp === 'number';
}

/**
 * Sign a token whose iat/exp are set by the caller (seconds since epoch).
 */
export function signToken(claims: TokenClaims, options: TokenOptions): string {
	return jwt.sign(claims, options.secret, { algorithm: options.algorithm });
}

/**
 * Verify signature and (unless ignoreExpiration) expiry. Throws jsonwebtoken errors on failure.
 */
export function verifyToken(
	token: string,
	options: TokenOptions & { ignoreExpiration?: boolean; clockTimestamp?: number }
): TokenClaims {
	const decoded = jwt.verify(token, options.secret, {
		algorithms: [options.algorithm],
		ignoreExpiration: options.ignoreExpiration ?? false,
		clockTimestamp: options.clockTimestamp,
	});
	if (!isTokenClaims(decoded)) {
		throw new jwt.JsonWebTokenError('token payload is missing sub/iat/exp');
	}
	return decoded;
}

