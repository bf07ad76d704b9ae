import type { Tenant, EmailDomainMapping, VanityHostMapping } from '../../types/tenant.js';

export type CreateTenantInput = Pick<Tenant, 'name'> & Partial<Pick<Tenant, 'id' | 'isActive' | 'settings'>>;

export type CreateEmailDomainInput = Pick<EmailDomainMapping, 'tenantId' | 'domain'> &
  Partial<Pick<EmailDomainMapping, 'isActive'>>;

export type CreateVanityHostInput = Pick<VanityHostMapping, 'tenantId' | 'host'> &
  Partial<Pick<VanityHostMapping, 'isActive'>>;

/**
 * Storage interface for tenants and their domain/host mappings
 */
export interface ITenantStorage {
  /**
   * Create a new tenant
   */
  create(input: CreateTenantInput): Promise<Tenant>;

  /**
   * Find a tenant by ID
   */
  findById(id: string): Promise<Tenant | null>;

  /**
   * Find a tenant by name (case-insensitive)
   */
  findByName(name: string): Promise<Tenant | null>;

  /**
   * Register an email domain for a tenant
   */
  addEmailDomain(input: CreateEmailDomainInput): Promise<EmailDomainMapping>;

  /**
   * Register a vanity host for a tenant
   */
  addVanityHost(input: CreateVanityHostInput): Promise<VanityHostMapping>;

  /**
   * Active email-domain mappings whose domain equals one of the candidates
   */
  findActiveEmailDomains(candidates: string[]): Promise<EmailDomainMapping[]>;

  /**
   * Active vanity-host mappings whose host equals one of the candidates
   */
  findActiveVanityHosts(candidates: string[]): Promise<VanityHostMapping[]>;
}
