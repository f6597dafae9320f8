import { RequestHandler, Router } from 'express';
import { AuthController } from '../controllers/auth.controller';
import { asyncHandler } from '../middleware/error.middleware';

/**
 * Auth routes
 */
export function createAuthRoutes(
  controller: AuthController,
  authenticate: RequestHandler,
  authRateLimiter: RequestHandler
): Router {
  const router = Router();

  /**
   * POST /auth/register
   * Create a user from { username, password }
   *
   * Response:
   * - 201: User created
   * - 400: Missing field(s)
   * - 409: Username taken
   */
  router.post(
    '/register',
    authRateLimiter,
    asyncHandler((req, res) => controller.register(req, res))
  );

  /**
   * POST /auth/login
   * Exchange { username, password } for a bearer token
   *
   * Response:
   * - 200: { token, tokenType, expiresIn }
   * - 400: Missing field(s)
   * - 401: Invalid username or password (indistinguishable)
   */
  router.post(
    '/login',
    authRateLimiter,
    asyncHandler((req, res) => controller.login(req, res))
  );

  /**
   * GET /auth/me
   * Identity carried by the presented token
   *
   * Response:
   * - 200: { username, expiresAt }
   * - 401: Missing, expired or forged token
   */
  router.get(
    '/me',
    authenticate,
    asyncHandler((req, res) => controller.me(req, res))
  );

  /**
   * GET /auth/users
   * Registered usernames, without credential material
   *
   * Response:
   * - 200: [{ username, createdAt }]
   * - 401: Missing, expired or forged token
   */
  router.get(
    '/users',
    authenticate,
    asyncHandler((req, res) => controller.listUsers(req, res))
  );

  return router;
}
