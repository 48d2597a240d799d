// Central configuration, read from the environment at call time so tests can
// override individual values

import type { LogLevel } from './utils/logger.js';

const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error'];

const parseIntOr = (raw: string | undefined, fallback: number): number => {
  const value = parseInt(raw || '', 10);
  return Number.isNaN(value) ? fallback : value;
};

// --- Server ---
export const getPort = (): number => parseIntOr(process.env.PORT, 3000);

export const isProduction = (): boolean => process.env.NODE_ENV === 'production';

/**
 * Allowed CORS origins. An empty list means any origin is reflected.
 */
export const getCorsOrigins = (): string[] =>
  (process.env.CORS_ORIGINS || '')
    .split(',')
    .map((origin) => origin.trim())
    .filter((origin) => origin.length > 0);

// --- Tokens ---

/**
 * Get JWT secret from environment variable
 * Throws an error if JWT_SECRET is not set
 */
export const getJwtSecret = (): string => {
  const secret = process.env.JWT_SECRET;

  if (!secret) {
    throw new Error(
      'JWT_SECRET environment variable is not set. ' +
      'This is required for token generation and validation. ' +
      'Please set JWT_SECRET in your environment or .env file.'
    );
  }

  return secret;
};

export const DEFAULT_TOKEN_TTL_MINUTES = 24 * 60;

export const getTokenTtlSeconds = (): number => {
  const minutes = parseIntOr(process.env.ACCESS_TOKEN_TTL_MINUTES, DEFAULT_TOKEN_TTL_MINUTES);
  return Math.max(minutes, 1) * 60;
};

// --- Passwords ---
export const MIN_BCRYPT_ROUNDS = 10;

/**
 * Number of bcrypt rounds, never below MIN_BCRYPT_ROUNDS
 */
export const getBcryptRounds = (): number =>
  Math.max(parseIntOr(process.env.BCRYPT_ROUNDS, MIN_BCRYPT_ROUNDS), MIN_BCRYPT_ROUNDS);

// --- Database ---
export const getDbPath = (): string => process.env.DB_PATH || './data/dev.db';

export const getDbBusyTimeoutMs = (): number => parseIntOr(process.env.DB_BUSY_TIMEOUT_MS, 5000);

// --- Logging ---
export const getLogLevel = (): LogLevel => {
  const level = (process.env.LOG_LEVEL || '').toLowerCase();
  return LOG_LEVELS.find((candidate) => candidate === level) ?? 'info';
};
