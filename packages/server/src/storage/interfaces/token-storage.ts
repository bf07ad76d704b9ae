import type { RefreshToken, MfaChallengeToken } from '../../types/token.js';

export type CreateRefreshTokenInput = Omit<RefreshToken, 'id' | 'usedAt' | 'revokedAt'>;

export type CreateMfaChallengeInput = Omit<MfaChallengeToken, 'id' | 'usedAt'>;

/**
 * Storage interface for refresh token management
 */
export interface IRefreshTokenStorage {
  /**
   * Persist a refresh token record (the caller supplies the hash)
   */
  create(input: CreateRefreshTokenInput): Promise<RefreshToken>;

  /**
   * Find a refresh token by its hash
   */
  findByHash(tokenHash: string): Promise<RefreshToken | null>;

  /**
   * Record the last time a token was presented
   */
  markUsed(id: string, usedAt: Date): Promise<void>;

  /**
   * Revoke every non-revoked token
   */
  revokeAll(revokedAt: Date): Promise<number>;

  /**
   * Revoke every non-revoked token owned by a tenant
   */
  revokeByTenant(tenantId: string, revokedAt: Date): Promise<number>;

  /**
   * Revoke every non-revoked token owned by a user within a tenant
   */
  revokeByUser(tenantId: string, userId: string, revokedAt: Date): Promise<number>;
}

/**
 * Storage interface for MFA challenge tokens
 */
export interface IMfaChallengeStorage {
  /**
   * Persist a challenge (the caller supplies the hash)
   */
  create(input: CreateMfaChallengeInput): Promise<MfaChallengeToken>;

  /**
   * Find a challenge by its hash
   */
  findByHash(tokenHash: string): Promise<MfaChallengeToken | null>;

  /**
   * Set usedAt only if it is still unset.
   * Returns false when another caller got there first.
   */
  markUsed(id: string, usedAt: Date): Promise<boolean>;
}
