/**
 * Shared application types
 */

// ============================================
// Error Response Types
// ============================================

export interface ErrorResponse {
  error: string;
  message: string;
  statusCode: number;
  stack?: string;
}

// ============================================
// Configuration Types
// ============================================

export interface LoggingConfig {
  level: string;
  file: string;
  silent: boolean;
}

export interface AuthConfig {
  jwtSecret: string;
  tokenTtlSeconds: number;
}

export interface RateLimitConfig {
  windowMs: number;
  max: number;
  authMax: number;
}

export interface AppConfig {
  port: number;
  nodeEnv: string;
  jsonBodyLimit: string;
  logging: LoggingConfig;
  auth: AuthConfig;
  rateLimit: RateLimitConfig;
}
