import { Router } from 'express';
import type { Request, Response, NextFunction } from 'express';
import * as authService from '../services/auth-service.js';
import { LoginSchema, RegisterSchema } from '../schemas/auth.js';
import { validate } from '../utils/validation.js';

const router = Router();

/**
 * POST /auth/register
 * Register a new user
 * Request body: { username: string, email: string, password: string }
 * Response: { id, username, email, created_at }
 */
router.post('/register', async (req: Request, res: Response, next: NextFunction) => {
  try {
    const input = validate(RegisterSchema, req.body);
    const user = await authService.register(input);

    res.status(200).json(user);
  } catch (error) {
    next(error);
  }
});

/**
 * POST /auth/login
 * Exchange username and password for a bearer token
 * Request body: { username: string, password: string }
 * Response: { access_token: string, token_type: 'bearer' }
 */
router.post('/login', async (req: Request, res: Response, next: NextFunction) => {
  try {
    const input = validate(LoginSchema, req.body);
    const token = await authService.login(input);

    res.status(200).json(token);
  } catch (error) {
    next(error);
  }
});

export default router;
