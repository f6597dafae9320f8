import rateLimit, { RateLimitRequestHandler } from 'express-rate-limit';
import type { RateLimitConfig } from '../types/app.types';
import { TooManyRequestsError } from './error.middleware';

/**
 * Global rate limiter middleware (per-IP)
 */
export function createGlobalRateLimiter(options: RateLimitConfig): RateLimitRequestHandler {
  return rateLimit({
    windowMs: options.windowMs,
    limit: options.max,
    standardHeaders: true,
    legacyHeaders: false,
    handler: (_req, _res, next) => {
      next(new TooManyRequestsError('Rate limit exceeded. Please try again later.'));
    },
  });
}

/**
 * Stricter limiter for login and registration, to slow down password guessing
 */
export function createAuthRateLimiter(options: RateLimitConfig): RateLimitRequestHandler {
  return rateLimit({
    windowMs: options.windowMs,
    limit: options.authMax,
    standardHeaders: true,
    legacyHeaders: false,
    handler: (_req, _res, next) => {
      next(new TooManyRequestsError('Too many authentication attempts. Please slow down.'));
    },
  });
}
