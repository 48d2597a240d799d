import Database from 'better-sqlite3';
import { dirname } from 'node:path';
import { mkdirSync, existsSync } from 'node:fs';
import { getDbBusyTimeoutMs, getDbPath } from './config.js';
import { createLogger } from './utils/logger.js';

const log = createLogger('db');

/**
 * Export type for the database instance
 */
export type DbInstance = Database.Database;

const IN_MEMORY = ':memory:';

/**
 * Ensure the database directory exists
 */
const ensureDbDirectory = (dbPath: string): void => {
  if (dbPath === IN_MEMORY) {
    return;
  }

  const dir = dirname(dbPath);
  if (!existsSync(dir)) {
    mkdirSync(dir, { recursive: true });
  }
};

/**
 * Create the database schema
 */
const createSchema = (db: DbInstance): void => {
  db.exec(`
    CREATE TABLE IF NOT EXISTS users (
      id INTEGER PRIMARY KEY AUTOINCREMENT,
      username TEXT NOT NULL UNIQUE,
      email TEXT NOT NULL UNIQUE,
      password_hash TEXT NOT NULL,
      created_at TEXT NOT NULL
    );
  `);

  // Deleting a user removes their tasks
  db.exec(`
    CREATE TABLE IF NOT EXISTS tasks (
      id INTEGER PRIMARY KEY AUTOINCREMENT,
      title TEXT NOT NULL,
      description TEXT,
      completed INTEGER NOT NULL DEFAULT 0,
      due_date TEXT,
      owner_id INTEGER NOT NULL REFERENCES users(id) ON DELETE CASCADE,
      created_at TEXT NOT NULL,
      updated_at TEXT NOT NULL
    );
  `);

  db.exec(`
    CREATE INDEX IF NOT EXISTS idx_tasks_owner_id ON tasks(owner_id);
  `);
};

/**
 * Open the SQLite database and apply the schema
 */
const initDb = (): DbInstance => {
  const dbPath = getDbPath();
  ensureDbDirectory(dbPath);

  // timeout bounds how long a statement waits on a locked database
  const db = new Database(dbPath, { timeout: getDbBusyTimeoutMs() });

  db.pragma('foreign_keys = ON');
  if (dbPath !== IN_MEMORY) {
    db.pragma('journal_mode = WAL');
  }

  createSchema(db);
  log.debug(`Database ready at ${dbPath}`);

  return db;
};

let instance: DbInstance | null = null;

/**
 * Get the shared database handle, opening it on first use
 */
export const getDb = (): DbInstance => {
  if (!instance) {
    instance = initDb();
  }
  return instance;
};

/**
 * Run work inside a single transaction. It commits when `work` returns and
 * rolls back when it throws, so the handle is never left mid-transaction.
 */
export const withTransaction = <T>(work: (db: DbInstance) => T): T => {
  const db = getDb();
  return db.transaction(() => work(db))();
};

/**
 * Remove every row and reset id sequences. Used by tests.
 */
export const resetDatabase = (): void => {
  withTransaction((db) => {
    db.exec('DELETE FROM tasks; DELETE FROM users;');
    // sqlite_sequence only exists once an AUTOINCREMENT table has had a row
    const hasSequence = db
      .prepare<[], { name: string }>("SELECT name FROM sqlite_master WHERE name = 'sqlite_sequence'")
      .get();
    if (hasSequence) {
      db.exec("DELETE FROM sqlite_sequence WHERE name IN ('users', 'tasks');");
    }
  });
};

/**
 * Close the database handle. The next getDb() call opens a fresh one.
 */
export const closeDatabase = (): void => {
  if (instance) {
    instance.close();
    instance = null;
    log.info('Database closed');
  }
};
