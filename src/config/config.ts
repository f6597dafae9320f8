import dotenv from 'dotenv';
import type { AppConfig } from '../types/app.types';

// Load environment variables
dotenv.config();

const nodeEnv = process.env.NODE_ENV || 'development';

/**
 * Application configuration loaded from environment variables
 * with sensible defaults
 */
export const config: AppConfig = {
  port: parseInt(process.env.PORT || '3000', 10),
  nodeEnv,
  jsonBodyLimit: process.env.JSON_BODY_LIMIT || '100kb',

  logging: {
    level: process.env.LOG_LEVEL || 'info',
    file: process.env.LOG_FILE ?? (nodeEnv === 'test' ? '' : './logs/app.log'),
    silent: nodeEnv === 'test',
  },

  auth: {
    // No default: an HS512 key must be supplied explicitly
    jwtSecret: process.env.JWT_SECRET || '',
    tokenTtlSeconds: parseInt(process.env.TOKEN_TTL_SECONDS || '86400', 10), // 24 hours
  },

  rateLimit: {
    windowMs: parseInt(process.env.RATE_LIMIT_WINDOW_MS || '900000', 10), // 15 minutes
    max: parseInt(process.env.RATE_LIMIT_MAX || '300', 10),
    authMax: parseInt(process.env.AUTH_RATE_LIMIT_MAX || '20', 10),
  },
};

/**
 * Validate required configuration
 */
export function validateConfig(): void {
  const required = ['JWT_SECRET'];

  const missing = required.filter((key) => !process.env[key]);

  if (missing.length > 0) {
    console.warn(
      `Warning: Missing environment variables: ${missing.join(', ')}`
    );
    console.warn('Set these in .env file; the server refuses to start without a signing key.');
  }
}

// Validate on import
validateConfig();
