import type { Principal, UserConsent, MfaEnrollment } from '../../types/user.js';
import type { Result } from '../../errors/result.js';

/**
 * Why a credential check failed. Callers map every kind to `invalid_grant`.
 */
export type CredentialFailure = 'invalid_credentials' | 'inactive' | 'locked_out';

/**
 * Pluggable identity backend
 *
 * The authorization server does NOT store passwords or roles itself. It delegates
 * to this interface, so any user store (a database, a directory, a managed identity
 * service) can sit behind it.
 *
 * ```typescript
 * class DirectoryIdentityBackend implements IIdentityBackend {
 *   async verifyCredential(tenantId: string, identifier: string, secret: string) {
 *     const entry = await this.directory.bind(tenantId, identifier, secret);
 *     return entry ? ok(toPrincipal(entry)) : fail('invalid_credentials');
 *   }
 *   // ...
 * }
 * ```
 */
export interface IIdentityBackend {
  /**
   * Check a username-or-email and secret within one tenant.
   * Inactive and locked-out accounts fail even with the right secret.
   */
  verifyCredential(
    tenantId: string,
    identifier: string,
    secret: string
  ): Promise<Result<Principal, CredentialFailure>>;

  /**
   * Role names held by the principal
   */
  getRoles(principal: Principal): Promise<string[]>;

  /**
   * Find a principal by ID (IDs are unique across tenants)
   */
  findById(userId: string): Promise<Principal | null>;

  /**
   * Find a principal by email or username within a tenant
   */
  findByIdentifier(tenantId: string, identifier: string): Promise<Principal | null>;
}

/**
 * Storage interface for user consent records
 */
export interface IConsentStorage {
  /**
   * Get consent for a user-client pair
   */
  find(userId: string, clientId: string): Promise<UserConsent | null>;

  /**
   * Insert or replace the consent for (userId, clientId)
   */
  save(consent: UserConsent): Promise<UserConsent>;
}

/**
 * Storage interface for second-factor enrollments
 */
export interface IMfaEnrollmentStorage {
  find(tenantId: string, userId: string): Promise<MfaEnrollment | null>;

  save(enrollment: MfaEnrollment): Promise<MfaEnrollment>;

  delete(tenantId: string, userId: string): Promise<void>;

  /**
   * Remove one backup code hash if present.
   * Returns false when the code was unknown or already redeemed.
   */
  redeemBackupCode(tenantId: string, userId: string, codeHash: string): Promise<boolean>;
}
