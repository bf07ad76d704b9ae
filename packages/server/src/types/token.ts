import type { SigningAlgorithm } from '../crypto/jwt.js';
import type { CodeChallengeMethod } from '../crypto/pkce.js';

/**
 * Claims supplied by the caller when issuing an access token
 */
export type AccessTokenClaimsInput = {
  sub: string; // User ID
  tenant_id: string;
  unique_name: string;
  roles: string[];
  scope?: string;
  email?: string;
  given_name?: string;
  family_name?: string;
};

/**
 * JWT Access Token Payload
 * Standard claims from RFC 7519 plus identity claims
 */
export type AccessTokenClaims = AccessTokenClaimsInput & {
  iss: string; // Issuer
  aud: string | string[]; // Audience
  exp: number; // Expiration time
  iat: number; // Issued at
  jti: string; // JWT ID (unique identifier)
  user_id: string;
};

/**
 * The single active signing key
 */
export interface SigningKey {
  kid: string; // Key ID
  algorithm: SigningAlgorithm;
  publicKey: string; // PEM format
  privateKey: string; // PEM format
}

/**
 * Where a token was requested from, kept for audit
 */
export interface ClientMetadata {
  ipAddress?: string;
  userAgent?: string;
}

/**
 * Refresh Token (stored)
 */
export interface RefreshToken {
  id: string;
  userId: string;
  tenantId: string;
  tokenHash: string; // Keyed hash of the token value
  encryptedToken?: string; // AES-GCM copy for tamper detection
  issuedAt: Date;
  expiresAt: Date;
  usedAt?: Date;
  revokedAt?: Date;
  ipAddress?: string;
  userAgent?: string;
}

/**
 * Authorization Code (stored)
 */
export interface AuthorizationCode {
  id: string;
  codeHash: string;
  userId: string;
  tenantId: string;
  clientId: string;
  redirectUri: string;
  scope?: string;
  state?: string;
  codeChallenge?: string;
  codeChallengeMethod?: CodeChallengeMethod;
  issuedAt: Date;
  expiresAt: Date;
  usedAt?: Date;
  ipAddress?: string;
  userAgent?: string;
}

/**
 * MFA challenge token (stored): bridges a password login to second-factor verification
 */
export interface MfaChallengeToken {
  id: string;
  userId: string;
  tenantId: string;
  tokenHash: string;
  encryptedToken?: string;
  issuedAt: Date;
  expiresAt: Date;
  usedAt?: Date;
  ipAddress?: string;
  userAgent?: string;
}
