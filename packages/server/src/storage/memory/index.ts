import type { IStorage } from '../interfaces/index.js';
import { MemoryTenantStorage } from './tenant-storage.js';
import { MemoryClientStorage } from './client-storage.js';
import { MemoryRefreshTokenStorage, MemoryMfaChallengeStorage } from './token-storage.js';
import { MemoryAuthorizationCodeStorage } from './authorization-code-storage.js';
import { MemoryConsentStorage, MemoryMfaEnrollmentStorage } from './user-storage.js';
import { MemoryRateLimitConfigStorage } from './rate-limit-storage.js';

export { MemoryTenantStorage } from './tenant-storage.js';
export { MemoryClientStorage } from './client-storage.js';
export { MemoryRefreshTokenStorage, MemoryMfaChallengeStorage } from './token-storage.js';
export { MemoryAuthorizationCodeStorage } from './authorization-code-storage.js';
export {
  MemoryIdentityBackend,
  MemoryConsentStorage,
  MemoryMfaEnrollmentStorage,
  type CreateUserInput,
} from './user-storage.js';
export { MemoryRateLimitConfigStorage } from './rate-limit-storage.js';

/**
 * Create a complete in-memory storage implementation
 */
export function createMemoryStorage(): IStorage {
  return {
    tenants: new MemoryTenantStorage(),
    clients: new MemoryClientStorage(),
    refreshTokens: new MemoryRefreshTokenStorage(),
    authorizationCodes: new MemoryAuthorizationCodeStorage(),
    consents: new MemoryConsentStorage(),
    mfaChallenges: new MemoryMfaChallengeStorage(),
    mfaEnrollments: new MemoryMfaEnrollmentStorage(),
    rateLimitConfigs: new MemoryRateLimitConfigStorage(),
  };
}
