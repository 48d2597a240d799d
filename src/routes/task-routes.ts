import { Router } from 'express';
import type { Request, Response, NextFunction } from 'express';
import { requireAuth } from '../middleware/auth-middleware.js';
import * as taskService from '../services/task-service.js';
import { CreateTaskSchema, TaskIdSchema, UpdateTaskSchema } from '../schemas/task.js';
import { validate } from '../utils/validation.js';
import { createUnauthorizedError } from '../utils/errors.js';
import type { PublicUser } from '../types/auth-types.js';

const router = Router();

// Every task route needs an authenticated caller
router.use(requireAuth);

const currentUser = (req: Request): PublicUser => {
  if (!req.user) {
    throw createUnauthorizedError('Authentication required');
  }
  return req.user;
};

/**
 * POST /tasks/
 * Create a task owned by the caller
 */
router.post('/', (req: Request, res: Response, next: NextFunction) => {
  try {
    const owner = currentUser(req);
    const input = validate(CreateTaskSchema, req.body);

    res.status(201).json(taskService.createTask(owner.id, input));
  } catch (error) {
    next(error);
  }
});

/**
 * GET /tasks/
 * All of the caller's tasks
 */
router.get('/', (req: Request, res: Response, next: NextFunction) => {
  try {
    const owner = currentUser(req);

    res.status(200).json(taskService.listTasks(owner.id));
  } catch (error) {
    next(error);
  }
});

/**
 * GET /tasks/:id
 * 404 when the task is missing or belongs to someone else
 */
router.get('/:id', (req: Request, res: Response, next: NextFunction) => {
  try {
    const owner = currentUser(req);
    const { id } = validate(TaskIdSchema, req.params);

    res.status(200).json(taskService.getTask(owner.id, id));
  } catch (error) {
    next(error);
  }
});

/**
 * PUT /tasks/:id
 * Partial update: only the keys present in the body change
 */
router.put('/:id', (req: Request, res: Response, next: NextFunction) => {
  try {
    const owner = currentUser(req);
    const { id } = validate(TaskIdSchema, req.params);
    const changes = validate(UpdateTaskSchema, req.body);

    res.status(200).json(taskService.updateTask(owner.id, id, changes));
  } catch (error) {
    next(error);
  }
});

/**
 * DELETE /tasks/:id
 */
router.delete('/:id', (req: Request, res: Response, next: NextFunction) => {
  try {
    const owner = currentUser(req);
    const { id } = validate(TaskIdSchema, req.params);

    taskService.deleteTask(owner.id, id);
    res.status(204).end();
  } catch (error) {
    next(error);
  }
});

export default router;
