import type { Pool } from 'pg';
import type { Tenant, EmailDomainMapping, VanityHostMapping } from '../../../types/tenant.js';
import type {
  ITenantStorage,
  CreateTenantInput,
  CreateEmailDomainInput,
  CreateVanityHostInput,
} from '../../interfaces/tenant-storage.js';
import { generateId } from '../../../crypto/random.js';
import { requireRow } from '../client.js';

interface TenantRow {
  id: string;
  name: string;
  is_active: boolean;
  settings: Record<string, string>;
  created_at: Date;
}

interface EmailDomainRow {
  id: string;
  tenant_id: string;
  domain: string;
  is_active: boolean;
}

interface VanityHostRow {
  id: string;
  tenant_id: string;
  host: string;
  is_active: boolean;
}

function rowToTenant(row: TenantRow): Tenant {
  return {
    id: row.id,
    name: row.name,
    isActive: row.is_active,
    settings: row.settings,
    createdAt: row.created_at,
  };
}

function rowToEmailDomain(row: EmailDomainRow): EmailDomainMapping {
  return { id: row.id, tenantId: row.tenant_id, domain: row.domain, isActive: row.is_active };
}

function rowToVanityHost(row: VanityHostRow): VanityHostMapping {
  return { id: row.id, tenantId: row.tenant_id, host: row.host, isActive: row.is_active };
}

/**
 * PostgreSQL tenant storage implementation
 */
export class PostgresTenantStorage implements ITenantStorage {
  constructor(private readonly pool: Pool) {}

  async create(input: CreateTenantInput): Promise<Tenant> {
    const result = await this.pool.query<TenantRow>(
      `insert into tenants (id, name, is_active, settings)
       values ($1, $2, $3, $4::jsonb)
       returning id, name, is_active, settings, created_at`,
      [input.id ?? generateId(), input.name, input.isActive ?? true, JSON.stringify(input.settings ?? {})]
    );
    return rowToTenant(requireRow(result.rows));
  }

  async findById(id: string): Promise<Tenant | null> {
    const result = await this.pool.query<TenantRow>(
      'select id, name, is_active, settings, created_at from tenants where id = $1',
      [id]
    );
    const row = result.rows.at(0);
    return row ? rowToTenant(row) : null;
  }

  async findByName(name: string): Promise<Tenant | null> {
    const result = await this.pool.query<TenantRow>(
      'select id, name, is_active, settings, created_at from tenants where lower(name) = lower($1)',
      [name]
    );
    const row = result.rows.at(0);
    return row ? rowToTenant(row) : null;
  }

  async addEmailDomain(input: CreateEmailDomainInput): Promise<EmailDomainMapping> {
    const result = await this.pool.query<EmailDomainRow>(
      `insert into tenant_email_domains (id, tenant_id, domain, is_active)
       values ($1, $2, $3, $4)
       returning id, tenant_id, domain, is_active`,
      [generateId(), input.tenantId, input.domain.trim().toLowerCase(), input.isActive ?? true]
    );
    return rowToEmailDomain(requireRow(result.rows));
  }

  async addVanityHost(input: CreateVanityHostInput): Promise<VanityHostMapping> {
    const result = await this.pool.query<VanityHostRow>(
      `insert into tenant_vanity_hosts (id, tenant_id, host, is_active)
       values ($1, $2, $3, $4)
       returning id, tenant_id, host, is_active`,
      [generateId(), input.tenantId, input.host.trim().toLowerCase(), input.isActive ?? true]
    );
    return rowToVanityHost(requireRow(result.rows));
  }

  async findActiveEmailDomains(candidates: string[]): Promise<EmailDomainMapping[]> {
    if (candidates.length === 0) return [];
    const result = await this.pool.query<EmailDomainRow>(
      `select id, tenant_id, domain, is_active from tenant_email_domains
       where is_active and domain = any($1::text[])`,
      [candidates]
    );
    return result.rows.map(rowToEmailDomain);
  }

  async findActiveVanityHosts(candidates: string[]): Promise<VanityHostMapping[]> {
    if (candidates.length === 0) return [];
    const result = await this.pool.query<VanityHostRow>(
      `select id, tenant_id, host, is_active from tenant_vanity_hosts
       where is_active and host = any($1::text[])`,
      [candidates]
    );
    return result.rows.map(rowToVanityHost);
  }
}
