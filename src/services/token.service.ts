import jwt, { JwtPayload } from 'jsonwebtoken';
import {
  ConfigurationError,
  SigningKeyInvalidError,
  TokenRejectedError,
} from '../errors/auth.errors';
import type { TokenClaims, VerifiedToken } from '../types/user.types';

export const TOKEN_ALGORITHM = 'HS512';

/** Shortest accepted signing key, in bytes */
export const MIN_SIGNING_KEY_BYTES = 32;

export interface TokenServiceOptions {
  signingKey: string;
  ttlSeconds: number;
  /** Current time in milliseconds; replaced in tests */
  now?: () => number;
}

/**
 * Reject keys that are empty or too short. Keys are never padded or truncated.
 *
 * @throws SigningKeyInvalidError
 */
export function assertSigningKey(signingKey: string): void {
  if (!signingKey) {
    throw new SigningKeyInvalidError('Signing key is empty. Set JWT_SECRET.');
  }

  const length = Buffer.byteLength(signingKey, 'utf8');
  if (length < MIN_SIGNING_KEY_BYTES) {
    throw new SigningKeyInvalidError(
      `Signing key is ${length} bytes; at least ${MIN_SIGNING_KEY_BYTES} bytes are required.`
    );
  }
}

function isTokenClaims(payload: string | JwtPayload): payload is JwtPayload & TokenClaims {
  return (
    typeof payload !== 'string' &&
    typeof payload.sub === 'string' &&
    typeof payload.iat === 'number' &&
    typeof payload.exp === 'number'
  );
}

/**
 * Token Issuer
 * Mints HS512-signed JWTs binding a username to an expiry, and verifies them.
 * Holds no session state: a token is valid iff its signature and expiry check out.
 */
export class TokenService {
  private readonly signingKey: string;
  private readonly ttlSeconds: number;
  private readonly now: () => number;

  constructor(options: TokenServiceOptions) {
    assertSigningKey(options.signingKey);

    if (!Number.isInteger(options.ttlSeconds) || options.ttlSeconds <= 0) {
      throw new ConfigurationError(
        `Token TTL must be a positive number of seconds, got ${options.ttlSeconds}.`
      );
    }

    this.signingKey = options.signingKey;
    this.ttlSeconds = options.ttlSeconds;
    this.now = options.now ?? Date.now;
  }

  get tokenTtlSeconds(): number {
    return this.ttlSeconds;
  }

  /**
   * Issue a token for a verified identity, expiring ttlSeconds after issue time
   */
  issue(username: string): string {
    const iat = Math.floor(this.now() / 1000);
    const claims: TokenClaims = {
      sub: username,
      iat,
      exp: iat + this.ttlSeconds,
    };

    return jwt.sign(claims, this.signingKey, { algorithm: TOKEN_ALGORITHM });
  }

  /**
   * Verify signature and expiry. A token is rejected at exp and after.
   *
   * @throws TokenRejectedError
   */
  verify(token: string): VerifiedToken {
    let payload: string | JwtPayload;

    try {
      payload = jwt.verify(token, this.signingKey, {
        algorithms: [TOKEN_ALGORITHM],
        clockTimestamp: Math.floor(this.now() / 1000),
      });
    } catch (error) {
      if (error instanceof jwt.TokenExpiredError) {
        throw new TokenRejectedError('expired');
      }
      if (error instanceof jwt.JsonWebTokenError && error.message === 'invalid signature') {
        throw new TokenRejectedError('invalid-signature');
      }
      throw new TokenRejectedError('malformed');
    }

    if (!isTokenClaims(payload)) {
      throw new TokenRejectedError('malformed');
    }

    return {
      username: payload.sub,
      issuedAt: new Date(payload.iat * 1000),
      expiresAt: new Date(payload.exp * 1000),
    };
  }
}
