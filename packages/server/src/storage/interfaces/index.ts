export * from './tenant-storage.js';
export * from './client-storage.js';
export * from './token-storage.js';
export * from './authorization-code-storage.js';
export * from './user-storage.js';
export * from './rate-limit-storage.js';

import type { ITenantStorage } from './tenant-storage.js';
import type { IClientStorage } from './client-storage.js';
import type { IRefreshTokenStorage, IMfaChallengeStorage } from './token-storage.js';
import type { IAuthorizationCodeStorage } from './authorization-code-storage.js';
import type { IConsentStorage, IMfaEnrollmentStorage } from './user-storage.js';
import type { IRateLimitConfigStorage } from './rate-limit-storage.js';

/**
 * Complete storage interface for the authorization server
 */
export interface IStorage {
  tenants: ITenantStorage;
  clients: IClientStorage;
  refreshTokens: IRefreshTokenStorage;
  authorizationCodes: IAuthorizationCodeStorage;
  consents: IConsentStorage;
  mfaChallenges: IMfaChallengeStorage;
  mfaEnrollments: IMfaEnrollmentStorage;
  rateLimitConfigs: IRateLimitConfigStorage;
}
