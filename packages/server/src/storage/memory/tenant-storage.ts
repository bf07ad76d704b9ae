import type { Tenant, EmailDomainMapping, VanityHostMapping } from '../../types/tenant.js';
import type {
  ITenantStorage,
  CreateTenantInput,
  CreateEmailDomainInput,
  CreateVanityHostInput,
} from '../interfaces/tenant-storage.js';
import { generateId } from '../../crypto/random.js';

/**
 * In-memory tenant storage implementation
 */
export class MemoryTenantStorage implements ITenantStorage {
  private tenants = new Map<string, Tenant>();
  private nameIndex = new Map<string, string>(); // lowercase name -> id
  private emailDomains: EmailDomainMapping[] = [];
  private vanityHosts: VanityHostMapping[] = [];

  async create(input: CreateTenantInput): Promise<Tenant> {
    const key = input.name.toLowerCase();
    if (this.nameIndex.has(key)) {
      throw new Error(`Tenant name already in use: ${input.name}`);
    }

    const tenant: Tenant = {
      id: input.id ?? generateId(),
      name: input.name,
      isActive: input.isActive ?? true,
      settings: input.settings ?? {},
      createdAt: new Date(),
    };

    this.tenants.set(tenant.id, tenant);
    this.nameIndex.set(key, tenant.id);

    return tenant;
  }

  async findById(id: string): Promise<Tenant | null> {
    return this.tenants.get(id) ?? null;
  }

  async findByName(name: string): Promise<Tenant | null> {
    const id = this.nameIndex.get(name.toLowerCase());
    if (!id) return null;
    return this.tenants.get(id) ?? null;
  }

  async addEmailDomain(input: CreateEmailDomainInput): Promise<EmailDomainMapping> {
    const mapping: EmailDomainMapping = {
      id: generateId(),
      tenantId: input.tenantId,
      domain: input.domain.trim().toLowerCase(),
      isActive: input.isActive ?? true,
    };
    this.emailDomains.push(mapping);
    return mapping;
  }

  async addVanityHost(input: CreateVanityHostInput): Promise<VanityHostMapping> {
    const mapping: VanityHostMapping = {
      id: generateId(),
      tenantId: input.tenantId,
      host: input.host.trim().toLowerCase(),
      isActive: input.isActive ?? true,
    };
    this.vanityHosts.push(mapping);
    return mapping;
  }

  async findActiveEmailDomains(candidates: string[]): Promise<EmailDomainMapping[]> {
    const wanted = new Set(candidates);
    return this.emailDomains.filter((mapping) => mapping.isActive && wanted.has(mapping.domain));
  }

  async findActiveVanityHosts(candidates: string[]): Promise<VanityHostMapping[]> {
    const wanted = new Set(candidates);
    return this.vanityHosts.filter((mapping) => mapping.isActive && wanted.has(mapping.host));
  }
}
