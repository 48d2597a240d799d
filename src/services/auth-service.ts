import { hashPassword, verifyPassword } from '../utils/password.js';
import { issueToken, validateToken } from '../utils/jwt.js';
import { createUser, DuplicateUserError, findUserByUsername, findUserByUsernameOrEmail } from '../models/user.js';
import { createConflictError, createUnauthorizedError } from '../utils/errors.js';
import { createLogger } from '../utils/logger.js';
import type { AccessTokenResponse, PublicUser, User } from '../types/auth-types.js';
import type { LoginInput, RegisterInput } from '../schemas/auth.js';

const log = createLogger('auth');

const DUPLICATE_USER_MESSAGE = 'Username or email already in use';
const BAD_CREDENTIALS_MESSAGE = 'Incorrect username or password';

/**
 * Strip the password hash from a stored user
 */
export const toPublicUser = (user: User): PublicUser => ({
  id: user.id,
  username: user.username,
  email: user.email,
  created_at: user.created_at
});

/**
 * Register a new user
 * @returns The public projection of the created user
 * @throws AppError 400 if the username or email is already taken
 */
export const register = async ({ username, email, password }: RegisterInput): Promise<PublicUser> => {
  if (findUserByUsernameOrEmail(username, email)) {
    throw createConflictError(DUPLICATE_USER_MESSAGE);
  }

  const passwordHash = await hashPassword(password);

  // A concurrent registration can win between the check above and this insert;
  // the unique constraints catch it
  try {
    const user = createUser(username, email, passwordHash);
    log.info('User registered', { userId: user.id, username: user.username });
    return toPublicUser(user);
  } catch (error) {
    if (error instanceof DuplicateUserError) {
      throw createConflictError(DUPLICATE_USER_MESSAGE);
    }
    throw error;
  }
};

/**
 * Authenticate a user with username and password
 * @returns A bearer token for the user
 * @throws AppError 401 if credentials are invalid (same message whether the
 * username or the password was wrong)
 */
export const login = async ({ username, password }: LoginInput): Promise<AccessTokenResponse> => {
  const user = findUserByUsername(username);

  if (!user || !(await verifyPassword(password, user.password_hash))) {
    log.info('Login rejected', { username });
    throw createUnauthorizedError(BAD_CREDENTIALS_MESSAGE);
  }

  return {
    access_token: issueToken(user.username),
    token_type: 'bearer'
  };
};

/**
 * Resolve a bearer token to the stored user it names
 * @param now - Evaluation time in epoch milliseconds
 * @returns The user, or null when the token is invalid or its subject no longer exists
 */
export const resolveIdentity = (token: string, now: number = Date.now()): User | null => {
  const result = validateToken(token, now);
  if (!result.valid) {
    return null;
  }

  return findUserByUsername(result.subject) ?? null;
};
