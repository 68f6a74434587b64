/**
 * Credential Service - password hashing and access tokens
 */

import bcrypt from 'bcryptjs';
import { getUnixTime, subMinutes } from 'date-fns';
import { signToken, verifyToken, TokenClaims, UnauthorizedError } from '@cbt/shared';
import { AuthConfig } from '../config';
import { truncateToByteLimit } from '../utils/password';

export type Clock = () => Date;

export interface IssuedToken {
  accessToken: string;
  tokenType: 'bearer';
  expiresAt: Date;
}

export class CredentialService {
  constructor(
    private config: AuthConfig,
    private clock: Clock = () => new Date()
  ) {}

  private get tokenOptions() {
    return { secret: this.config.secretKey, algorithm: this.config.algorithm };
  }

  /**
   * Same 72-byte truncation is applied here and in verifyPassword.
   */
  async hashPassword(password: string): Promise<string> {
    return bcrypt.hash(truncateToByteLimit(password), this.config.bcryptSaltRounds);
  }

  async verifyPassword(password: string, hashedPassword: string): Promise<boolean> {
    return bcrypt.compare(truncateToByteLimit(password), hashedPassword);
  }

  issueToken(username: string): IssuedToken {
    const now = this.clock();
    const iat = getUnixTime(now);
    const exp = iat + this.config.accessTokenExpireMinutes * 60;
    return {
      accessToken: signToken({ sub: username, iat, exp }, this.tokenOptions),
      tokenType: 'bearer',
      expiresAt: new Date(exp * 1000),
    };
  }

  /**
   * Verify signature and expiry; returns the username in `sub`.
   */
  verifyAccessToken(token: string): string {
    try {
      return verifyToken(token, { ...this.tokenOptions, clockTimestamp: getUnixTime(this.clock()) }).sub;
    } catch {
      throw new UnauthorizedError();
    }
  }

  /**
   * Accepts a token that is still valid or expired within the grace window.
   * Returns the username it was issued for.
   */
  verifyRefreshableToken(token: string): string {
    let claims: TokenClaims;
    try {
      claims = verifyToken(token, { ...this.tokenOptions, ignoreExpiration: true });
    } catch {
      throw new UnauthorizedError('Invalid token');
    }

    const graceCutoff = getUnixTime(subMinutes(this.clock(), this.config.refreshGraceMinutes));
    if (claims.exp < graceCutoff) {
      throw new UnauthorizedError('Token expired beyond the refresh window');
    }
    return claims.sub;
  }
}
