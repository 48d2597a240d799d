import jwt from 'jsonwebtoken';
import { getJwtSecret, getTokenTtlSeconds } from '../config.js';
import type { TokenValidation } from '../types/auth-types.js';

const ALGORITHM = 'HS256';

const toSeconds = (ms: number): number => Math.floor(ms / 1000);

/**
 * Issue a signed access token for a subject
 * @param subject - Username carried in the `sub` claim
 * @param now - Issue time in epoch milliseconds
 * @returns A signed JWT whose `exp` is now + TTL
 * @throws Error if JWT_SECRET is not set
 */
export const issueToken = (subject: string, now: number = Date.now()): string => {
  const secret = getJwtSecret();
  const iat = toSeconds(now);

  return jwt.sign({ sub: subject, iat, exp: iat + getTokenTtlSeconds() }, secret, {
    algorithm: ALGORITHM
  });
};

/**
 * Check a token's signature and expiry
 * @param now - Evaluation time in epoch milliseconds; the token is valid while now < exp
 * @returns The subject on success. Expired, tampered and malformed tokens all
 * come back as `{ valid: false }`.
 * @throws Error if JWT_SECRET is not set
 */
export const validateToken = (token: string, now: number = Date.now()): TokenValidation => {
  const secret = getJwtSecret();

  try {
    const decoded = jwt.verify(token, secret, {
      algorithms: [ALGORITHM],
      clockTimestamp: toSeconds(now)
    });

    if (typeof decoded === 'string' || typeof decoded.sub !== 'string' || typeof decoded.exp !== 'number') {
      return { valid: false };
    }
    return { valid: true, subject: decoded.sub };
  } catch (error) {
    // TokenExpiredError and NotBeforeError both extend JsonWebTokenError
    if (error instanceof jwt.JsonWebTokenError) {
      return { valid: false };
    }
    throw error;
  }
};
