import { describe, it, expect, beforeEach } from 'vitest';
import { register, login, resolveIdentity } from './auth-service.js';
import { resetDatabase } from '../db.js';
import { deleteUser, findUserByUsername } from '../models/user.js';
import { validateToken } from '../utils/jwt.js';
import { AppError } from '../utils/errors.js';

const expectAppError = async (promise: Promise<unknown>, statusCode: number, message: string) => {
  const error = await promise.then(
    () => {
      throw new Error('Should have thrown an error');
    },
    (err: unknown) => err
  );
  expect(error).toBeInstanceOf(AppError);
  expect(error).toMatchObject({ statusCode, message });
};

describe('Auth Service', () => {
  beforeEach(() => {
    // Reset database before each test
    resetDatabase();
  });

  describe('register', () => {
    it('should create the user and return the public projection', async () => {
      const user = await register({ username: 'alice', email: 'a@x.com', password: 'secret1' });

      expect(user).toEqual({
        id: 1,
        username: 'alice',
        email: 'a@x.com',
        created_at: expect.any(String)
      });
      // Password hash should not be returned
      expect(user).not.toHaveProperty('password_hash');
      expect(Number.isNaN(Date.parse(user.created_at))).toBe(false);
    });

    it('should hash the password before storing', async () => {
      await register({ username: 'alice', email: 'a@x.com', password: 'secret1' });

      const stored = findUserByUsername('alice');
      expect(stored?.password_hash).toMatch(/^\$2[aby]\$/);
      expect(stored?.password_hash).toHaveLength(60);
    });

    it('should reject a duplicate username even with a different email', async () => {
      await register({ username: 'alice', email: 'a@x.com', password: 'secret1' });

      await expectAppError(
        register({ username: 'alice', email: 'other@x.com', password: 'secret1' }),
        400,
        'Username or email already in use'
      );
    });

    it('should reject a duplicate email', async () => {
      await register({ username: 'alice', email: 'a@x.com', password: 'secret1' });

      await expectAppError(
        register({ username: 'alice2', email: 'a@x.com', password: 'secret1' }),
        400,
        'Username or email already in use'
      );
    });

    it('should let exactly one of two concurrent registrations for a username succeed', async () => {
      const results = await Promise.allSettled([
        register({ username: 'alice', email: 'a@x.com', password: 'secret1' }),
        register({ username: 'alice', email: 'b@x.com', password: 'secret2' })
      ]);

      const fulfilled = results.filter((result) => result.status === 'fulfilled');
      const rejected = results.filter(
        (result): result is PromiseRejectedResult => result.status === 'rejected'
      );

      expect(fulfilled).toHaveLength(1);
      expect(rejected).toHaveLength(1);
      expect(rejected[0]?.reason).toBeInstanceOf(AppError);
      expect(rejected[0]?.reason).toMatchObject({ statusCode: 400 });
    });
  });

  describe('login', () => {
    beforeEach(async () => {
      await register({ username: 'alice', email: 'a@x.com', password: 'secret1' });
    });

    it('should return a bearer token whose subject is the username', async () => {
      const response = await login({ username: 'alice', password: 'secret1' });

      expect(response.token_type).toBe('bearer');
      expect(validateToken(response.access_token)).toEqual({ valid: true, subject: 'alice' });
    });

    it('should reject login with wrong password', async () => {
      await expectAppError(
        login({ username: 'alice', password: 'wrong-password' }),
        401,
        'Incorrect username or password'
      );
    });

    it('should reject login with an unknown username using the same message', async () => {
      await expectAppError(
        login({ username: 'nobody', password: 'secret1' }),
        401,
        'Incorrect username or password'
      );
    });
  });

  describe('resolveIdentity', () => {
    it('should resolve a login token to the registered user', async () => {
      const registered = await register({ username: 'bob', email: 'bob@x.com', password: 'hunter22' });
      const { access_token } = await login({ username: 'bob', password: 'hunter22' });

      const user = resolveIdentity(access_token);

      expect(user?.id).toBe(registered.id);
      expect(user?.username).toBe('bob');
    });

    it('should return null for an invalid token', () => {
      expect(resolveIdentity('not-a-token')).toBeNull();
    });

    it('should return null once the token has expired', async () => {
      await register({ username: 'bob', email: 'bob@x.com', password: 'hunter22' });
      const { access_token } = await login({ username: 'bob', password: 'hunter22' });

      expect(resolveIdentity(access_token, Date.now() + 25 * 60 * 60 * 1000)).toBeNull();
    });

    it('should return null when the user was deleted after the token was issued', async () => {
      const registered = await register({ username: 'bob', email: 'bob@x.com', password: 'hunter22' });
      const { access_token } = await login({ username: 'bob', password: 'hunter22' });

      deleteUser(registered.id);

      expect(resolveIdentity(access_token)).toBeNull();
    });
  });
});
