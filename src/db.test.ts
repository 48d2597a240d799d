import { describe, it, expect, beforeEach } from 'vitest';
import { getDb, resetDatabase, withTransaction } from './db.js';
import { createUser, deleteUser, DuplicateUserError } from './models/user.js';
import { createTask, listTasksByOwner } from './models/task.js';

describe('database', () => {
  beforeEach(() => {
    resetDatabase();
  });

  it('should enforce foreign keys', () => {
    expect(getDb().pragma('foreign_keys', { simple: true })).toBe(1);
  });

  it('should reject a task whose owner does not exist', () => {
    expect(() => createTask(999, { title: 'orphan' })).toThrow(/FOREIGN KEY constraint failed/);
  });

  it('should delete a user\'s tasks along with the user', () => {
    const alice = createUser('alice', 'alice@example.com', 'stored-hash');
    const bob = createUser('bob', 'bob@example.com', 'stored-hash');
    createTask(alice.id, { title: 'one' });
    createTask(alice.id, { title: 'two' });
    createTask(bob.id, { title: 'three' });

    expect(deleteUser(alice.id)).toBe(true);

    expect(listTasksByOwner(alice.id)).toEqual([]);
    expect(listTasksByOwner(bob.id)).toHaveLength(1);
  });

  it('should reject duplicate usernames and emails at the storage layer', () => {
    createUser('alice', 'alice@example.com', 'stored-hash');

    expect(() => createUser('alice', 'new@example.com', 'stored-hash')).toThrow(DuplicateUserError);
    expect(() => createUser('alice2', 'alice@example.com', 'stored-hash')).toThrow(DuplicateUserError);
  });

  it('should roll back a transaction that throws', () => {
    expect(() =>
      withTransaction(() => {
        createUser('alice', 'alice@example.com', 'stored-hash');
        throw new Error('abort');
      })
    ).toThrow('abort');

    const count = getDb().prepare<[], { n: number }>('SELECT COUNT(*) AS n FROM users').get();
    expect(count?.n).toBe(0);
  });

  it('should restart ids after a reset', () => {
    createUser('alice', 'alice@example.com', 'stored-hash');
    resetDatabase();

    expect(createUser('bob', 'bob@example.com', 'stored-hash').id).toBe(1);
  });
});
