import type { IStorage } from './storage/interfaces/index.js';
import type { IIdentityBackend } from './storage/interfaces/user-storage.js';
import type { SigningKey } from './types/token.js';
import type { GrantHandler } from './grants/types.js';
import { TenantResolver } from './services/tenant-resolver.js';
import { CredentialVerifier } from './services/credential-verifier.js';
import { TokenSigner } from './services/token-signer.js';
import { type TokenSecrets, RefreshTokenStore } from './services/refresh-token-store.js';
import { AuthorizationCodeStore } from './services/authorization-code-store.js';
import { ConsentStore } from './services/consent-store.js';
import { MfaChallengeStore } from './services/mfa-challenge-store.js';
import { MfaService } from './services/mfa-service.js';
import { TokenService } from './services/token-service.js';
import { IntrospectionService } from './services/introspection-service.js';
import { RateLimitConfigCache, RateLimitConfigService } from './services/rate-limit-config-service.js';
import { FederationMapper } from './services/federation-mapper.js';
import { type IEventPublisher, ConsoleEventPublisher } from './services/event-publisher.js';
import { GrantOrchestrator } from './grants/orchestrator.js';
import { createPasswordHandler } from './grants/password/handler.js';
import { createAuthorizationCodeHandler } from './grants/authorization-code/handler.js';
import { createRefreshTokenHandler } from './grants/refresh-token/handler.js';
import { type MfaCompletionHandler, createMfaCompletionHandler } from './grants/mfa/handler.js';
import { DEFAULT_ACCESS_TOKEN_TTL, RATE_LIMIT_CACHE_TTL_MS } from './config/constants.js';

export interface AuthServerDependencies {
  storage: IStorage;
  identity: IIdentityBackend;
  signingKey: SigningKey;
  issuer: string;
  audience: string;
  secrets: TokenSecrets;
  accessTokenTtlSeconds?: number;
  events?: IEventPublisher;
  rateLimitCacheTtlMs?: number;
  now?: () => Date;
}

/**
 * Every service the routes use, wired once per server
 */
export interface AuthServices {
  storage: IStorage;
  identity: IIdentityBackend;
  issuer: string;
  signer: TokenSigner;
  tenantResolver: TenantResolver;
  verifier: CredentialVerifier;
  refreshTokens: RefreshTokenStore;
  codes: AuthorizationCodeStore;
  consents: ConsentStore;
  mfaChallenges: MfaChallengeStore;
  mfa: MfaService;
  tokens: TokenService;
  introspection: IntrospectionService;
  rateLimits: RateLimitConfigService;
  federation: FederationMapper;
  events: IEventPublisher;
  grants: GrantOrchestrator;
  refreshGrant: GrantHandler;
  verifyTotp: MfaCompletionHandler;
  verifyBackupCode: MfaCompletionHandler;
  now: () => Date;
}

export function createAuthServices(deps: AuthServerDependencies): AuthServices {
  const { storage, identity, secrets } = deps;
  const now = deps.now ?? (() => new Date());
  const events = deps.events ?? new ConsoleEventPublisher();

  const signer = new TokenSigner(deps.signingKey, { issuer: deps.issuer, audience: deps.audience, now });
  const tenantResolver = new TenantResolver(storage.tenants);
  const verifier = new CredentialVerifier(tenantResolver, identity, storage.tenants);
  const refreshTokens = new RefreshTokenStore(storage.refreshTokens, storage.tenants, secrets, now);
  const codes = new AuthorizationCodeStore(storage.authorizationCodes, now);
  const consents = new ConsentStore(storage.consents);
  const mfaChallenges = new MfaChallengeStore(storage.mfaChallenges, secrets, now);
  const mfa = new MfaService(
    storage.mfaEnrollments,
    storage.tenants,
    { issuer: deps.issuer, encryptionKey: secrets.encryptionKey },
    now
  );
  const tokens = new TokenService(signer, refreshTokens, identity, {
    accessTokenTtlSeconds: deps.accessTokenTtlSeconds ?? DEFAULT_ACCESS_TOKEN_TTL,
  });
  const introspection = new IntrospectionService(signer, refreshTokens, identity);
  const rateLimits = new RateLimitConfigService(
    storage.rateLimitConfigs,
    new RateLimitConfigCache(deps.rateLimitCacheTtlMs ?? RATE_LIMIT_CACHE_TTL_MS)
  );
  const federation = new FederationMapper(storage.tenants, identity);

  const refreshGrant = createRefreshTokenHandler({ refreshTokens, identity, tokens });
  const grants = new GrantOrchestrator({
    password: createPasswordHandler({ verifier, mfa, mfaChallenges, tokens, events, now }),
    authorization_code: createAuthorizationCodeHandler({
      clients: storage.clients,
      codes,
      identity,
      tokens,
      events,
      now,
    }),
    refresh_token: refreshGrant,
  });

  const completion = { mfaChallenges, mfa, identity, tokens, events, now };

  return {
    storage,
    identity,
    issuer: deps.issuer,
    signer,
    tenantResolver,
    verifier,
    refreshTokens,
    codes,
    consents,
    mfaChallenges,
    mfa,
    tokens,
    introspection,
    rateLimits,
    federation,
    events,
    grants,
    refreshGrant,
    verifyTotp: createMfaCompletionHandler('totp', completion),
    verifyBackupCode: createMfaCompletionHandler('backup_code', completion),
    now,
  };
}
