import bcrypt from 'bcrypt';
import { getBcryptRounds } from '../config.js';
import { createLogger } from './logger.js';

const log = createLogger('password');

/**
 * Hash a plain text password using bcrypt with a per-hash random salt
 * @param plain - The plain text password to hash
 * @returns A promise that resolves to the bcrypt hash
 */
export const hashPassword = async (plain: string): Promise<string> => {
  const rounds = getBcryptRounds();
  return bcrypt.hash(plain, rounds);
};

/**
 * Verify a plain text password against a bcrypt hash
 * Resolves false for a mismatch and for a stored hash bcrypt cannot read
 * @param plain - The plain text password to verify
 * @param hash - The bcrypt hash to compare against
 */
export const verifyPassword = async (plain: string, hash: string): Promise<boolean> => {
  try {
    return await bcrypt.compare(plain, hash);
  } catch (error) {
    log.warn('Stored password hash could not be checked', {
      reason: error instanceof Error ? error.message : String(error)
    });
    return false;
  }
};
