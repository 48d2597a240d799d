// Express application setup

import express from 'express';
import cors from 'cors';
import authRoutes from './routes/auth-routes.js';
import userRoutes from './routes/user-routes.js';
import taskRoutes from './routes/task-routes.js';
import { errorHandler, notFoundHandler } from './middleware/error-handler.js';
import { getCorsOrigins } from './config.js';

export function createApp(): express.Application {
  const app = express();

  // An empty allow-list reflects the caller's origin
  const origins = getCorsOrigins();
  app.use(cors({
    origin: origins.length > 0 ? origins : true,
    credentials: true,
    methods: ['GET', 'POST', 'PUT', 'DELETE', 'OPTIONS'],
    allowedHeaders: ['Content-Type', 'Authorization']
  }));
  app.use(express.json());

  // Health check endpoint
  app.get('/', (_req, res) => {
    res.json({ message: 'Healthy' });
  });

  app.use('/auth', authRoutes);
  app.use('/users', userRoutes);
  app.use('/tasks', taskRoutes);

  app.use(notFoundHandler);
  app.use(errorHandler);

  return app;
}
