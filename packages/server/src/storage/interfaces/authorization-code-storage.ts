import type { AuthorizationCode } from '../../types/token.js';

export type CreateAuthorizationCodeInput = Omit<AuthorizationCode, 'id' | 'usedAt'>;

/**
 * Storage interface for authorization code management
 */
export interface IAuthorizationCodeStorage {
  /**
   * Persist an authorization code (the caller supplies the hash)
   */
  create(input: CreateAuthorizationCodeInput): Promise<AuthorizationCode>;

  /**
   * Find an authorization code by its hash
   */
  findByHash(codeHash: string): Promise<AuthorizationCode | null>;

  /**
   * Set usedAt only if it is still unset.
   * Returns false when another caller got there first.
   */
  markUsed(id: string, usedAt: Date): Promise<boolean>;
}
