/**
 * A user account as seen through the identity backend
 */
export interface Principal {
  id: string;
  tenantId: string;
  username: string;
  email?: string;
  firstName?: string;
  lastName?: string;
  isActive: boolean;
}

/**
 * Second-factor enrollment for a principal
 */
export interface MfaEnrollment {
  userId: string;
  tenantId: string;
  secret: string; // Base32 TOTP secret, AES-GCM encrypted when a key is configured
  isEnabled: boolean;
  backupCodeHashes: string[]; // SHA-256 of unredeemed codes
  createdAt: Date;
  enabledAt?: Date;
}

/**
 * User consent to a client's scopes
 */
export interface UserConsent {
  id: string;
  userId: string;
  tenantId: string;
  clientId: string;
  scope?: string; // Space-delimited
  grantedAt: Date;
  lastConfirmedAt: Date;
  expiresAt?: Date;
}
