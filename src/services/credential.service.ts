import crypto from 'crypto';
import { InvalidCredentialDataError } from '../errors/auth.errors';

/** Length of the random HMAC key generated per password */
export const SALT_BYTES = 64;

/** HMAC-SHA512 output length */
export const DIGEST_BYTES = 64;

export interface DerivedCredential {
  digest: Buffer;
  salt: Buffer;
}

/**
 * Credential Service
 * Derives a keyed hash from a plaintext password and verifies candidates against it.
 *
 * The salt is a fresh random HMAC key on every derive() call, so the same
 * password never produces the same stored pair twice.
 */
export class CredentialService {
  /**
   * Derive a digest and its salt from a plaintext password
   */
  derive(password: string): DerivedCredential {
    const salt = crypto.randomBytes(SALT_BYTES);
    return { digest: this.computeDigest(password, salt), salt };
  }

  /**
   * Check a candidate password against a stored digest/salt pair.
   * Comparison is constant-time over the digest bytes.
   *
   * @throws InvalidCredentialDataError if the stored pair is empty or malformed
   */
  verify(password: string, digest: Buffer | null | undefined, salt: Buffer | null | undefined): boolean {
    if (!salt || salt.length === 0) {
      throw new InvalidCredentialDataError('salt is empty');
    }
    if (!digest || digest.length === 0) {
      throw new InvalidCredentialDataError('digest is empty');
    }
    if (digest.length !== DIGEST_BYTES) {
      throw new InvalidCredentialDataError(
        `digest is ${digest.length} bytes, expected ${DIGEST_BYTES}`
      );
    }

    const candidate = this.computeDigest(password, salt);
    return crypto.timingSafeEqual(candidate, digest);
  }

  private computeDigest(password: string, salt: Buffer): Buffer {
    return crypto.createHmac('sha512', salt).update(password, 'utf8').digest();
  }
}
