import { describe, it, expect, afterEach } from 'vitest';
import { hashPassword, verifyPassword } from './password.js';

describe('password utilities', () => {
  const originalEnv = process.env.BCRYPT_ROUNDS;

  afterEach(() => {
    // Restore original environment
    if (originalEnv) {
      process.env.BCRYPT_ROUNDS = originalEnv;
    } else {
      delete process.env.BCRYPT_ROUNDS;
    }
  });

  const roundsOf = (hash: string): number => parseInt(hash.split('$')[2] ?? '', 10);

  describe('hashPassword', () => {
    it('should return a bcrypt hash', async () => {
      const hash = await hashPassword('mySecurePassword123');

      // Bcrypt hashes start with $2a$, $2b$, or $2y$
      expect(hash).toMatch(/^\$2[aby]\$/);
      expect(hash).toHaveLength(60);
    });

    it('should use 10 rounds by default', async () => {
      delete process.env.BCRYPT_ROUNDS;
      const hash = await hashPassword('testPassword');

      expect(roundsOf(hash)).toBe(10);
    });

    it('should respect BCRYPT_ROUNDS environment variable', async () => {
      process.env.BCRYPT_ROUNDS = '11';
      const hash = await hashPassword('testPassword');

      expect(roundsOf(hash)).toBe(11);
    });

    it('should enforce minimum 10 rounds even if lower value is set', async () => {
      process.env.BCRYPT_ROUNDS = '5';
      const hash = await hashPassword('testPassword');

      expect(roundsOf(hash)).toBe(10);
    });

    it('should generate different hashes for the same password', async () => {
      const hash1 = await hashPassword('samePassword');
      const hash2 = await hashPassword('samePassword');

      // Same password should produce different hashes due to salt
      expect(hash1).not.toBe(hash2);
    });
  });

  describe('verifyPassword', () => {
    it('should return true for matching password', async () => {
      const hash = await hashPassword('correctPassword123');

      expect(await verifyPassword('correctPassword123', hash)).toBe(true);
    });

    it('should return false for non-matching password', async () => {
      const hash = await hashPassword('correctPassword123');

      expect(await verifyPassword('wrongPassword', hash)).toBe(false);
    });

    it('should return false instead of failing for a malformed stored hash', async () => {
      await expect(verifyPassword('anything', 'not-a-bcrypt-hash')).resolves.toBe(false);
      await expect(verifyPassword('anything', '')).resolves.toBe(false);
    });
  });
});
