import { randomBytes, randomUUID } from 'node:crypto';
import {
  AUTHORIZATION_CODE_LENGTH,
  BACKUP_CODE_CHARSET,
  BACKUP_CODE_LENGTH,
  MFA_CHALLENGE_TOKEN_LENGTH,
  REFRESH_TOKEN_LENGTH,
} from '../config/constants.js';

/**
 * Generate cryptographically secure random bytes as base64url string
 */
export function generateRandomBase64Url(length: number): string {
  return randomBytes(length).toString('base64url');
}

/**
 * Generate a secure authorization code
 */
export function generateAuthorizationCode(length: number = AUTHORIZATION_CODE_LENGTH): string {
  return generateRandomBase64Url(length);
}

/**
 * Generate a secure refresh token
 */
export function generateRefreshToken(length: number = REFRESH_TOKEN_LENGTH): string {
  return generateRandomBase64Url(length);
}

/**
 * Generate an MFA challenge token
 */
export function generateMfaChallengeToken(length: number = MFA_CHALLENGE_TOKEN_LENGTH): string {
  return generateRandomBase64Url(length);
}

/**
 * Generate a backup code from an unambiguous charset
 */
export function generateBackupCode(length: number = BACKUP_CODE_LENGTH): string {
  const bytes = randomBytes(length);
  let code = '';

  for (const byte of bytes) {
    code += BACKUP_CODE_CHARSET.charAt(byte % BACKUP_CODE_CHARSET.length);
  }

  return code;
}

/**
 * Generate a unique JWT ID (jti)
 */
export function generateJti(): string {
  return generateRandomBase64Url(16);
}

/**
 * Generate a unique ID for database records
 */
export function generateId(): string {
  return randomUUID();
}
