import { Router } from 'express';
import type { Request, Response } from 'express';
import { requireAuth } from '../middleware/auth-middleware.js';

const router = Router();

/**
 * GET /users/me
 * Profile of the authenticated user
 * Requires: bearer token
 */
router.get('/me', requireAuth, (req: Request, res: Response) => {
  // req.user is set by requireAuth middleware
  res.status(200).json(req.user);
});

export default router;
