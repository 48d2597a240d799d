import type { Request, Response, NextFunction } from 'express';
import { resolveIdentity, toPublicUser } from '../services/auth-service.js';

/**
 * Extract the bearer token from the Authorization header
 * The scheme name is matched case-insensitively
 * @returns Token string or null if not found
 */
const extractToken = (req: Request): string | null => {
  const authHeader = req.headers.authorization?.trim();
  if (!authHeader) {
    return null;
  }

  const separator = authHeader.indexOf(' ');
  if (separator === -1) {
    return null;
  }

  const scheme = authHeader.slice(0, separator);
  const token = authHeader.slice(separator + 1).trim();
  if (scheme.toLowerCase() !== 'bearer' || token.length === 0) {
    return null;
  }

  return token;
};

const rejectUnauthenticated = (res: Response, error: string, message: string): void => {
  res.setHeader('WWW-Authenticate', 'Bearer');
  res.status(401).json({ error, message });
};

/**
 * Authentication middleware that requires a valid bearer token naming an existing user
 * Returns 401 if the token is missing, invalid, expired, or its user is gone
 * Attaches the public user to req.user on success
 */
export const requireAuth = (
  req: Request,
  res: Response,
  next: NextFunction
): void => {
  const token = extractToken(req);

  if (!token) {
    rejectUnauthenticated(res, 'Authentication required', 'No token provided');
    return;
  }

  try {
    const user = resolveIdentity(token);
    if (!user) {
      rejectUnauthenticated(res, 'Authentication failed', 'Could not validate credentials');
      return;
    }

    req.user = toPublicUser(user);
    next();
  } catch (error) {
    next(error);
  }
};
