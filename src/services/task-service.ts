import {
  createTask as insertTask,
  deleteOwnedTask,
  findOwnedTask,
  listTasksByOwner,
  updateOwnedTask
} from '../models/task.js';
import { createNotFoundError } from '../utils/errors.js';
import type { NewTask, Task, TaskChanges } from '../types/task-types.js';

// Used for both "no such task" and "someone else's task"
const TASK_NOT_FOUND_MESSAGE = 'Task not found';

export const createTask = (ownerId: number, input: NewTask): Task => {
  return insertTask(ownerId, input);
};

export const listTasks = (ownerId: number): Task[] => {
  return listTasksByOwner(ownerId);
};

/**
 * @throws AppError 404 unless the task exists and belongs to the owner
 */
export const getTask = (ownerId: number, taskId: number): Task => {
  const task = findOwnedTask(taskId, ownerId);
  if (!task) {
    throw createNotFoundError(TASK_NOT_FOUND_MESSAGE);
  }
  return task;
};

/**
 * Apply a partial update; fields missing from `changes` keep their value
 * @throws AppError 404 unless the task exists and belongs to the owner
 */
export const updateTask = (ownerId: number, taskId: number, changes: TaskChanges): Task => {
  const task = updateOwnedTask(taskId, ownerId, changes);
  if (!task) {
    throw createNotFoundError(TASK_NOT_FOUND_MESSAGE);
  }
  return task;
};

/**
 * @throws AppError 404 unless the task exists and belongs to the owner
 */
export const deleteTask = (ownerId: number, taskId: number): void => {
  if (!deleteOwnedTask(taskId, ownerId)) {
    throw createNotFoundError(TASK_NOT_FOUND_MESSAGE);
  }
};
