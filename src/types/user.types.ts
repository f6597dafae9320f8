/**
 * Stored credential record. The password itself is never kept:
 * only the HMAC-SHA512 digest and the random key (salt) it was computed with.
 */
export interface User {
  username: string; // Unique identity
  passwordHash: Buffer;
  passwordSalt: Buffer;
  createdAt: Date;
}

export type PublicUser = Omit<User, 'passwordHash' | 'passwordSalt'>;

export interface CredentialRequest {
  username: string;
  password: string;
}

export interface LoginResponse {
  token: string;
  tokenType: 'Bearer';
  expiresIn: number; // seconds
}

/**
 * Claims carried by an issued token
 */
export interface TokenClaims {
  sub: string;
  iat: number;
  exp: number;
}

/**
 * Identity recovered from a verified token
 */
export interface VerifiedToken {
  username: string;
  issuedAt: Date;
  expiresAt: Date;
}
