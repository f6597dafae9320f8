import type { Request, Response } from 'express';
import { AuthService } from '../services/auth.service';
import type { AuthenticatedRequest } from '../middleware/auth.middleware';
import { UnauthorizedError } from '../middleware/error.middleware';
import { parseCredentialRequest } from '../utils/request.utils';

/**
 * Auth Controller
 * Handles registration, login and identity lookups
 */
export class AuthController {
  constructor(private readonly authService: AuthService) {}

  /**
   * POST /auth/register
   *
   * Request body:
   * { "username": "alice", "password": "..." }
   *
   * Response: 201 { message, username }
   */
  async register(req: Request, res: Response): Promise<void> {
    const { username, password } = parseCredentialRequest(req.body);

    const user = await this.authService.register(username, password);

    res.status(201).json({
      message: 'User registered successfully.',
      username: user.username,
    });
  }

  /**
   * POST /auth/login
   *
   * Response: 200 { token, tokenType: "Bearer", expiresIn }
   * Unknown user and wrong password both yield the same 401.
   */
  async login(req: Request, res: Response): Promise<void> {
    const { username, password } = parseCredentialRequest(req.body);

    const result = await this.authService.login(username, password);

    res.status(200).json(result);
  }

  /**
   * GET /auth/me
   * Identity carried by the presented token
   */
  async me(req: AuthenticatedRequest, res: Response): Promise<void> {
    if (!req.user) {
      throw new UnauthorizedError();
    }

    res.status(200).json({
      username: req.user.username,
      expiresAt: req.user.expiresAt.toISOString(),
    });
  }

  /**
   * GET /auth/users
   */
  async listUsers(req: Request, res: Response): Promise<void> {
    const users = await this.authService.listUsers();
    res.status(200).json(
      users.map((user) => ({
        username: user.username,
        createdAt: user.createdAt.toISOString(),
      }))
    );
  }
}
