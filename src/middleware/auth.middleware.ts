import type { Request, Response, NextFunction, RequestHandler } from 'express';
import { logger } from '../utils/logger';
import { TokenService } from '../services/token.service';
import { TokenRejectedError } from '../errors/auth.errors';

/**
 * Extended Request interface with user information
 */
export interface AuthenticatedRequest extends Request {
  user?: {
    username: string;
    expiresAt: Date;
  };
  token?: string;
}

/**
 * Pull the token out of Authorization or X-Authorization.
 * Accepts both "Bearer <token>" and a bare token.
 */
export function extractToken(req: Request): string | null {
  const header = req.get('Authorization') ?? req.get('X-Authorization');
  if (!header) {
    return null;
  }

  const token = header.toLowerCase().startsWith('bearer ')
    ? header.substring(7).trim()
    : header.trim();

  return token || null;
}

/**
 * Authentication middleware factory.
 * Validates the token's signature and expiry; no store lookup is made.
 */
export function createAuthenticate(tokens: TokenService): RequestHandler {
  return (req: Request, res: Response, next: NextFunction): void => {
    const authReq: AuthenticatedRequest = req;
    const token = extractToken(req);

    if (!token) {
      logger.warn('Authentication failed: Missing bearer token');
      next(new TokenRejectedError('malformed'));
      return;
    }

    try {
      const verified = tokens.verify(token);

      authReq.user = {
        username: verified.username,
        expiresAt: verified.expiresAt,
      };
      authReq.token = token;

      logger.debug('Authentication successful', { username: verified.username });
      next();
    } catch (error) {
      if (error instanceof TokenRejectedError) {
        logger.warn('Authentication failed:', { reason: error.reason });
      }
      next(error);
    }
  };
}
