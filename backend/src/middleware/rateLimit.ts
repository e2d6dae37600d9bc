import rateLimit from 'express-rate-limit';
import { env } from '../config/env.js';

/**
 * Per-client limiter for the local server. Lambda deployments don't mount it:
 * API Gateway and Function URL concurrency limits do the throttling there, and
 * an in-memory store would be per execution environment anyway.
 *
 * Clients are keyed by `req.ip` (the library default), which follows the app's
 * `trust proxy` setting.
 */
export function createApiLimiter(limitPerMinute: number = env.RATE_LIMIT_PER_MINUTE) {
  return rateLimit({
    windowMs: 60 * 1000,
    limit: limitPerMinute,
    standardHeaders: 'draft-7',
    legacyHeaders: false,
    message: { error: 'Too many requests, please try again later.' },
  });
}
