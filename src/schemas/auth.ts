/**
 * Request body schemas for registration and login
 */

import { z } from 'zod';

export const RegisterSchema = z.object({
  username: z.string().min(3).max(32),
  email: z.string().email('Invalid email address'),
  password: z.string().min(6).max(128),
});

export const LoginSchema = z.object({
  username: z.string().min(1, 'Username is required'),
  password: z.string().min(6).max(128),
});

export type RegisterInput = z.infer<typeof RegisterSchema>;
export type LoginInput = z.infer<typeof LoginSchema>;
