import { CredentialService } from './credential.service';
import { TokenService } from './token.service';
import type { UserStore } from '../stores/store.types';
import { InvalidCredentialsError } from '../errors/auth.errors';
import type { LoginResponse, PublicUser } from '../types/user.types';
import { logger } from '../utils/logger';

/**
 * Auth Service
 * Registration and login on top of the credential store, the credential
 * service and the token issuer.
 */
export class AuthService {
  // Verified against when the username is unknown, so both failure paths do the same work
  private readonly decoy: { digest: Buffer; salt: Buffer };

  constructor(
    private readonly users: UserStore,
    private readonly credentials: CredentialService,
    private readonly tokens: TokenService
  ) {
    this.decoy = credentials.derive('decoy-password');
  }

  /**
   * Register a new user
   *
   * @throws IdentityAlreadyExistsError if the username is taken
   */
  async register(username: string, password: string): Promise<PublicUser> {
    const { digest, salt } = this.credentials.derive(password);
    const createdAt = new Date();

    await this.users.insert({
      username,
      passwordHash: digest,
      passwordSalt: salt,
      createdAt,
    });

    logger.info(`User registered: ${username}`);
    return { username, createdAt };
  }

  /**
   * Verify credentials and issue a bearer token
   *
   * @throws InvalidCredentialsError for an unknown user or a wrong password
   * @throws InvalidCredentialDataError if the stored record is corrupt
   */
  async login(username: string, password: string): Promise<LoginResponse> {
    const user = await this.users.findByIdentity(username);

    if (!user) {
      this.credentials.verify(password, this.decoy.digest, this.decoy.salt);
      logger.warn('Login rejected: invalid credentials');
      throw new InvalidCredentialsError();
    }

    const isValid = this.credentials.verify(password, user.passwordHash, user.passwordSalt);
    if (!isValid) {
      logger.warn('Login rejected: invalid credentials');
      throw new InvalidCredentialsError();
    }

    const token = this.tokens.issue(user.username);
    logger.info(`User authenticated: ${user.username}`);

    return {
      token,
      tokenType: 'Bearer',
      expiresIn: this.tokens.tokenTtlSeconds,
    };
  }

  /**
   * List registered users without credential material
   */
  async listUsers(): Promise<PublicUser[]> {
    const users = await this.users.listAll();
    return users.map(({ username, createdAt }) => ({ username, createdAt }));
  }
}
