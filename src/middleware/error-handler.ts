import Database from 'better-sqlite3';
import { STATUS_CODES } from 'node:http';
import type { Request, Response, NextFunction } from 'express';
import { AppError, createUnavailableError } from '../utils/errors.js';
import { isProduction } from '../config.js';
import { createLogger } from '../utils/logger.js';

const log = createLogger('http');

// SQLite result codes that mean the store could not serve the request right now
const UNAVAILABLE_CODES = ['SQLITE_BUSY', 'SQLITE_LOCKED', 'SQLITE_IOERR', 'SQLITE_CANTOPEN', 'SQLITE_FULL'];

const isStoreUnavailable = (err: Error): boolean => {
  if (!(err instanceof Database.SqliteError)) {
    return false;
  }
  const { code } = err;
  return UNAVAILABLE_CODES.some((prefix) => code === prefix || code.startsWith(`${prefix}_`));
};

// body-parser reports malformed or oversized bodies as errors carrying a 4xx status
const clientErrorStatus = (err: Error): number | null => {
  if ('status' in err && typeof err.status === 'number' && err.status >= 400 && err.status < 500) {
    return err.status;
  }
  return null;
};

const sendAppError = (res: Response, err: AppError): void => {
  res.status(err.statusCode).json({
    error: err.message,
    message: err.message,
    ...(err.details !== undefined && { details: err.details })
  });
};

/**
 * 404 handler - must come after all other routes
 */
export const notFoundHandler = (_req: Request, res: Response): void => {
  res.status(404).json({
    error: 'Not Found',
    message: 'The requested resource was not found'
  });
};

/**
 * Global error handling middleware
 * AppError keeps its status, store outages become 503, anything else is a 500
 */
export const errorHandler = (err: Error, req: Request, res: Response, _next: NextFunction): void => {
  if (err instanceof AppError) {
    sendAppError(res, err);
    return;
  }

  if (isStoreUnavailable(err)) {
    log.error(`Store unavailable during ${req.method} ${req.path}: ${err.message}`);
    sendAppError(res, createUnavailableError('The data store is temporarily unavailable'));
    return;
  }

  const status = clientErrorStatus(err);
  if (status !== null) {
    res.status(status).json({
      error: STATUS_CODES[status] ?? 'Bad Request',
      message: err.message
    });
    return;
  }

  log.error(`Unhandled error during ${req.method} ${req.path}: ${err.message}`, { stack: err.stack });

  res.status(500).json({
    error: 'Internal Server Error',
    message: isProduction()
      ? 'An unexpected error occurred'
      : err.message
  });
};
