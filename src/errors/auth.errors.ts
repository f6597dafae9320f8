import {
  AppError,
  ConflictError,
  InternalServerError,
  UnauthorizedError,
} from '../middleware/error.middleware';

/**
 * Registration collision. Reported to the caller as 409.
 */
export class IdentityAlreadyExistsError extends ConflictError {
  constructor(username: string) {
    super(`User "${username}" already exists.`);
  }
}

/**
 * Unknown user and wrong password are both reported with this one error,
 * with the same message, so callers cannot enumerate registered identities.
 */
export class InvalidCredentialsError extends UnauthorizedError {
  constructor() {
    super('The username or password is invalid.');
  }
}

/**
 * A stored digest or salt is missing or has the wrong shape.
 * Indicates corrupted data, never a password mismatch.
 */
export class InvalidCredentialDataError extends InternalServerError {
  constructor(detail: string) {
    super(`Stored credential data is invalid: ${detail}`);
  }
}

export type TokenRejectionReason = 'expired' | 'invalid-signature' | 'malformed';

export class TokenRejectedError extends UnauthorizedError {
  readonly reason: TokenRejectionReason;

  constructor(reason: TokenRejectionReason) {
    super('Authentication failed due to invalid or missing token.');
    this.reason = reason;
  }
}

/**
 * Invalid startup configuration; not an operational error
 */
export class ConfigurationError extends AppError {
  constructor(message: string) {
    super(message, 500, false);
  }
}

/**
 * Signing key misconfiguration. Raised while building the token issuer at startup.
 */
export class SigningKeyInvalidError extends ConfigurationError {}
