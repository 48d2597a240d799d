import Database from 'better-sqlite3';
import { getDb } from '../db.js';
import type { User } from '../types/auth-types.js';

/**
 * Raised when a username or email is already taken at insert time
 */
export class DuplicateUserError extends Error {
  constructor() {
    super('Username or email already in use');
    this.name = 'DuplicateUserError';
  }
}

const isUniqueViolation = (error: unknown): boolean =>
  error instanceof Database.SqliteError &&
  (error.code === 'SQLITE_CONSTRAINT_UNIQUE' || error.code === 'SQLITE_CONSTRAINT_PRIMARYKEY');

/**
 * Create a new user in the database
 * @param passwordHash - Bcrypt hash of the user's password
 * @returns The created user with ID
 * @throws DuplicateUserError if the username or email already exists
 */
export const createUser = (username: string, email: string, passwordHash: string): User => {
  const db = getDb();
  const stmt = db.prepare<[string, string, string, string]>(`
    INSERT INTO users (username, email, password_hash, created_at)
    VALUES (?, ?, ?, ?)
  `);

  try {
    const result = stmt.run(username, email, passwordHash, new Date().toISOString());
    const user = findUserById(Number(result.lastInsertRowid));
    if (!user) {
      throw new Error(`User ${result.lastInsertRowid} missing right after insert`);
    }
    return user;
  } catch (error) {
    if (isUniqueViolation(error)) {
      throw new DuplicateUserError();
    }
    throw error;
  }
};

/**
 * Find a user whose username or email matches either value
 */
export const findUserByUsernameOrEmail = (username: string, email: string): User | undefined => {
  return getDb()
    .prepare<[string, string], User>('SELECT * FROM users WHERE username = ? OR email = ? LIMIT 1')
    .get(username, email);
};

export const findUserByUsername = (username: string): User | undefined => {
  return getDb()
    .prepare<[string], User>('SELECT * FROM users WHERE username = ?')
    .get(username);
};

export const findUserById = (id: number): User | undefined => {
  return getDb()
    .prepare<[number], User>('SELECT * FROM users WHERE id = ?')
    .get(id);
};

/**
 * Delete a user. Their tasks go with them through the foreign key cascade.
 * @returns true if a row was removed
 */
export const deleteUser = (id: number): boolean => {
  const result = getDb().prepare<[number]>('DELETE FROM users WHERE id = ?').run(id);
  return result.changes > 0;
};
