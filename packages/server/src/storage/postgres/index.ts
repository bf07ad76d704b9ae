import type { IStorage } from '../interfaces/index.js';
import { initializePool } from './client.js';
import { PostgresTenantStorage } from './repositories/tenant-repository.js';
import { PostgresClientStorage } from './repositories/client-repository.js';
import { PostgresRefreshTokenStorage, PostgresMfaChallengeStorage } from './repositories/token-repository.js';
import { PostgresAuthorizationCodeStorage } from './repositories/authorization-code-repository.js';
import { PostgresConsentStorage, PostgresMfaEnrollmentStorage } from './repositories/user-repository.js';
import { PostgresRateLimitConfigStorage } from './repositories/rate-limit-repository.js';

export { initializePool, getPool, closePool, migrate } from './client.js';
export { PostgresTenantStorage } from './repositories/tenant-repository.js';
export { PostgresClientStorage } from './repositories/client-repository.js';
export { PostgresRefreshTokenStorage, PostgresMfaChallengeStorage } from './repositories/token-repository.js';
export { PostgresAuthorizationCodeStorage } from './repositories/authorization-code-repository.js';
export {
  PostgresIdentityBackend,
  PostgresConsentStorage,
  PostgresMfaEnrollmentStorage,
} from './repositories/user-repository.js';
export { PostgresRateLimitConfigStorage } from './repositories/rate-limit-repository.js';

/**
 * Create a complete PostgreSQL storage implementation
 */
export function createPostgresStorage(connectionString: string): IStorage {
  const pool = initializePool(connectionString);

  return {
    tenants: new PostgresTenantStorage(pool),
    clients: new PostgresClientStorage(pool),
    refreshTokens: new PostgresRefreshTokenStorage(pool),
    authorizationCodes: new PostgresAuthorizationCodeStorage(pool),
    consents: new PostgresConsentStorage(pool),
    mfaChallenges: new PostgresMfaChallengeStorage(pool),
    mfaEnrollments: new PostgresMfaEnrollmentStorage(pool),
    rateLimitConfigs: new PostgresRateLimitConfigStorage(pool),
  };
}
