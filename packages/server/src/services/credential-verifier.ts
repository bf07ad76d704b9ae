import type { Principal } from '../types/user.js';
import type { Tenant } from '../types/tenant.js';
import type { ITenantStorage } from '../storage/interfaces/tenant-storage.js';
import type { IIdentityBackend, CredentialFailure } from '../storage/interfaces/user-storage.js';
import type { TenantResolver } from './tenant-resolver.js';
import { type Result, ok, fail } from '../errors/result.js';
import { logger } from '../logger.js';

export interface CredentialRequest {
  identifier: string; // Username or email
  secret: string;
  tenantId?: string;
  host?: string;
}

export interface VerifiedCredential {
  principal: Principal;
  tenant: Tenant;
}

const FAILURE_MESSAGES: Record<CredentialFailure, string> = {
  invalid_credentials: 'Invalid username or password.',
  inactive: 'User account is inactive.',
  locked_out: 'User account is locked out.',
};

const HOST_UNRESOLVED =
  'Unable to resolve tenant from vanity URL hostname. Please specify tenant_id or ensure your vanity URL is configured.';
const EMAIL_UNRESOLVED =
  'Unable to resolve tenant from email domain. Please specify tenant_id or ensure your email domain is configured.';
const TENANT_REQUIRED =
  'Tenant ID is required when using username without vanity URL. Please specify tenant_id.';

/**
 * Picks the tenant for a login, then delegates the secret check to the identity backend.
 * Failures carry a human-readable description; callers map them to `invalid_grant`.
 */
export class CredentialVerifier {
  constructor(
    private readonly resolver: TenantResolver,
    private readonly identity: IIdentityBackend,
    private readonly tenants: ITenantStorage
  ) {}

  /**
   * Explicit tenant id, then vanity host, then email domain
   */
  async resolveTenantId(request: Omit<CredentialRequest, 'secret'>): Promise<Result<string, string>> {
    if (request.tenantId) {
      return ok(request.tenantId);
    }

    const host = request.host?.trim();
    if (host) {
      const resolved = await this.resolver.resolveFromHost(host);
      if (resolved.ok) return resolved;
    }

    const looksLikeEmail = request.identifier.includes('@');
    if (looksLikeEmail) {
      const resolved = await this.resolver.resolveFromEmail(request.identifier);
      if (resolved.ok) return resolved;
    }

    const messages: string[] = [];
    if (host) messages.push(HOST_UNRESOLVED);
    if (looksLikeEmail) messages.push(EMAIL_UNRESOLVED);
    if (!looksLikeEmail && !host) messages.push(TENANT_REQUIRED);

    return fail(messages.join(' '));
  }

  async verify(request: CredentialRequest): Promise<Result<VerifiedCredential, string>> {
    const tenantId = await this.resolveTenantId(request);
    if (!tenantId.ok) {
      return tenantId;
    }

    const tenant = await this.tenants.findById(tenantId.value);
    if (!tenant || !tenant.isActive) {
      return fail('Invalid or inactive tenant.');
    }

    const result = await this.identity.verifyCredential(tenant.id, request.identifier, request.secret);
    if (!result.ok) {
      logger.warn('login_failed', { tenantId: tenant.id, reason: result.error });
      return fail(FAILURE_MESSAGES[result.error]);
    }

    return ok({ principal: result.value, tenant });
  }
}
