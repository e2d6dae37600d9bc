import express, { type Express } from 'express';
import cors from 'cors';
import { env } from './config/env.js';
import { errorHandler, notFoundHandler } from './middleware/errorHandler.js';
import { createApiLimiter } from './middleware/rateLimit.js';
import healthRouter from './routes/health.js';
import './types/http.js';

export interface AppOptions {
  lambda?: boolean;
  /** Requests per minute per client when running outside Lambda. */
  rateLimitPerMinute?: number;
}

export function createApp({
  lambda = !!process.env.AWS_LAMBDA_FUNCTION_NAME,
  rateLimitPerMinute = env.RATE_LIMIT_PER_MINUTE,
}: AppOptions = {}): Express {
  const app = express();

  // API Gateway always sits in front in Lambda; locally only a loopback dev proxy might
  app.set('trust proxy', lambda ? true : 'loopback');

  // In Lambda mode, allow all origins since API Gateway handles CORS
  app.use(cors({
    origin: lambda ? '*' : env.FRONTEND_URL,
    credentials: !lambda,
  }));

  app.use(express.json());

  // Rate limiting - skip in Lambda (API Gateway handles this)
  if (!lambda) {
    app.use('/api', createApiLimiter(rateLimitPerMinute));
  }

  // Routes
  app.use('/api/health', healthRouter);

  // Error handling
  app.use(notFoundHandler);
  app.use(errorHandler);

  return app;
}
