import { z } from 'zod';
import type { Principal } from '../types/user.js';
import type { ITenantStorage } from '../storage/interfaces/tenant-storage.js';
import type { IIdentityBackend } from '../storage/interfaces/user-storage.js';
import { type Result, ok, fail } from '../errors/result.js';
import { SETTING_SAML_ATTRIBUTE_MAPPING } from '../config/constants.js';
import { logger } from '../logger.js';

/**
 * Attributes of an assertion whose signature the caller has already checked
 */
export interface VerifiedAssertion {
  nameId?: string;
  attributes: Record<string, string | string[]>;
}

export interface AttributeMapping {
  email: string;
  firstName: string;
  lastName: string;
  username: string;
}

export interface MappedAttributes {
  email?: string;
  firstName?: string;
  lastName?: string;
  username?: string;
}

export type FederationFailure = 'tenant_not_found' | 'missing_identifier' | 'user_not_found' | 'inactive';

const CLAIMS_NAMESPACE = 'http://schemas.xmlsoap.org/ws/2005/05/identity/claims';

export const DEFAULT_ATTRIBUTE_MAPPING: AttributeMapping = {
  email: `${CLAIMS_NAMESPACE}/emailaddress`,
  firstName: `${CLAIMS_NAMESPACE}/givenname`,
  lastName: `${CLAIMS_NAMESPACE}/surname`,
  username: `${CLAIMS_NAMESPACE}/name`,
};

const attributeMappingSchema = z
  .object({
    email: z.string().min(1),
    firstName: z.string().min(1),
    lastName: z.string().min(1),
    username: z.string().min(1),
  })
  .partial();

function firstValue(value: string | string[] | undefined): string | undefined {
  const first = Array.isArray(value) ? value[0] : value;
  const trimmed = first?.trim();
  return trimmed ? trimmed : undefined;
}

/**
 * Maps a federated assertion onto an existing local account.
 * Accounts are never created here.
 */
export class FederationMapper {
  constructor(
    private readonly tenants: ITenantStorage,
    private readonly identity: IIdentityBackend
  ) {}

  /**
   * The tenant's mapping merged over the defaults. Unreadable settings fall back to the defaults.
   */
  async attributeMapping(tenantId: string): Promise<AttributeMapping> {
    const tenant = await this.tenants.findById(tenantId);
    const raw = tenant?.settings[SETTING_SAML_ATTRIBUTE_MAPPING];
    if (!raw) return DEFAULT_ATTRIBUTE_MAPPING;

    let json: unknown;
    try {
      json = JSON.parse(raw);
    } catch (error) {
      logger.warn('saml_attribute_mapping_invalid', {
        tenantId,
        message: error instanceof Error ? error.message : String(error),
      });
      return DEFAULT_ATTRIBUTE_MAPPING;
    }

    const parsed = attributeMappingSchema.safeParse(json);
    if (!parsed.success) {
      logger.warn('saml_attribute_mapping_invalid', { tenantId, message: parsed.error.message });
      return DEFAULT_ATTRIBUTE_MAPPING;
    }

    return { ...DEFAULT_ATTRIBUTE_MAPPING, ...parsed.data };
  }

  mapAttributes(assertion: VerifiedAssertion, mapping: AttributeMapping): MappedAttributes {
    const read = (name: string) => firstValue(assertion.attributes[name]);
    return {
      email: read(mapping.email),
      firstName: read(mapping.firstName),
      lastName: read(mapping.lastName),
      username: read(mapping.username) ?? firstValue(assertion.nameId),
    };
  }

  async resolvePrincipal(
    tenantId: string,
    assertion: VerifiedAssertion
  ): Promise<Result<Principal, FederationFailure>> {
    const tenant = await this.tenants.findById(tenantId);
    if (!tenant || !tenant.isActive) {
      return fail('tenant_not_found');
    }

    const mapped = this.mapAttributes(assertion, await this.attributeMapping(tenantId));
    if (!mapped.email && !mapped.username) {
      return fail('missing_identifier');
    }

    let principal: Principal | null = null;
    if (mapped.email) {
      principal = await this.identity.findByIdentifier(tenantId, mapped.email);
    }
    if (!principal && mapped.username) {
      principal = await this.identity.findByIdentifier(tenantId, mapped.username);
    }

    if (!principal) return fail('user_not_found');
    if (!principal.isActive) return fail('inactive');

    return ok(principal);
  }
}
