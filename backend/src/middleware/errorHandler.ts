import { Request, Response, NextFunction } from 'express';
import { env } from '../config/env.js';

export interface ApiError extends Error {
  statusCode?: number;
  // body-parser and other connect-style middleware report `status`
  status?: number;
  expose?: boolean;
}

export function errorHandler(
  err: ApiError,
  req: Request,
  res: Response,
  _next: NextFunction
): void {
  const statusCode = err.statusCode || err.status || 500;

  if (statusCode >= 500) {
    console.error(`Error handling ${req.method} ${req.originalUrl}:`, err);
  } else {
    console.warn(`${req.method} ${req.originalUrl} rejected with ${statusCode}: ${err.message}`);
  }

  // Don't leak internals of unexpected failures
  const message = statusCode < 500 || err.expose ? err.message : 'Internal Server Error';

  res.status(statusCode).json({
    error: message || 'Internal Server Error',
    ...(env.NODE_ENV === 'development' && { stack: err.stack }),
  });
}

export function notFoundHandler(req: Request, res: Response): void {
  res.status(404).json({ error: 'Not Found', path: req.path });
}
