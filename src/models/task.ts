import { getDb, withTransaction } from '../db.js';
import type { NewTask, Task, TaskChanges, TaskRow } from '../types/task-types.js';

const toTask = (row: TaskRow): Task => ({
  ...row,
  completed: row.completed === 1,
});

/**
 * Insert a task for the given owner
 * @returns The stored task
 */
export const createTask = (ownerId: number, input: NewTask): Task => {
  const now = new Date().toISOString();

  return withTransaction((db) => {
    const result = db
      .prepare<[string, string | null, string | null, number, string, string]>(`
        INSERT INTO tasks (title, description, completed, due_date, owner_id, created_at, updated_at)
        VALUES (?, ?, 0, ?, ?, ?, ?)
      `)
      .run(input.title, input.description ?? null, input.due_date ?? null, ownerId, now, now);

    const row = db
      .prepare<[number], TaskRow>('SELECT * FROM tasks WHERE id = ?')
      .get(Number(result.lastInsertRowid));
    if (!row) {
      throw new Error(`Task ${result.lastInsertRowid} missing right after insert`);
    }
    return toTask(row);
  });
};

/**
 * All tasks of one owner, oldest first
 */
export const listTasksByOwner = (ownerId: number): Task[] => {
  return getDb()
    .prepare<[number], TaskRow>('SELECT * FROM tasks WHERE owner_id = ? ORDER BY id')
    .all(ownerId)
    .map(toTask);
};

/**
 * Find a task by id, but only if it belongs to the owner.
 * A task owned by someone else is indistinguishable from a missing one.
 */
export const findOwnedTask = (id: number, ownerId: number): Task | undefined => {
  const row = getDb()
    .prepare<[number, number], TaskRow>('SELECT * FROM tasks WHERE id = ? AND owner_id = ?')
    .get(id, ownerId);
  return row ? toTask(row) : undefined;
};

/**
 * Apply the fields present in `changes` to an owned task and refresh updated_at
 * @returns The updated task, or undefined if the owner has no such task
 */
export const updateOwnedTask = (id: number, ownerId: number, changes: TaskChanges): Task | undefined => {
  return withTransaction((db) => {
    const row = db
      .prepare<[number, number], TaskRow>('SELECT * FROM tasks WHERE id = ? AND owner_id = ?')
      .get(id, ownerId);
    if (!row) {
      return undefined;
    }

    const current = toTask(row);
    const next: Task = {
      ...current,
      ...(changes.title !== undefined && { title: changes.title }),
      ...(changes.description !== undefined && { description: changes.description }),
      ...(changes.completed !== undefined && { completed: changes.completed }),
      ...(changes.due_date !== undefined && { due_date: changes.due_date }),
      updated_at: nextTimestamp(current.updated_at),
    };

    db.prepare<[string, string | null, number, string | null, string, number]>(`
      UPDATE tasks
      SET title = ?, description = ?, completed = ?, due_date = ?, updated_at = ?
      WHERE id = ?
    `).run(next.title, next.description, next.completed ? 1 : 0, next.due_date, next.updated_at, id);

    return next;
  });
};

/**
 * Delete an owned task
 * @returns true if the task existed and belonged to the owner
 */
export const deleteOwnedTask = (id: number, ownerId: number): boolean => {
  const result = getDb()
    .prepare<[number, number]>('DELETE FROM tasks WHERE id = ? AND owner_id = ?')
    .run(id, ownerId);
  return result.changes > 0;
};

// updated_at must move forward even when two writes land in the same millisecond
const nextTimestamp = (previous: string): string => {
  const now = Date.now();
  const last = Date.parse(previous);
  return new Date(Number.isNaN(last) || now > last ? now : last + 1).toISOString();
};
