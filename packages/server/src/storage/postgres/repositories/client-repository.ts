import type { Pool } from 'pg';
import type { OAuthClient } from '../../../types/client.js';
import type { IClientStorage, CreateClientInput } from '../../interfaces/client-storage.js';
import { generateId } from '../../../crypto/random.js';
import { requireRow } from '../client.js';
import { hashSecret } from '../../../crypto/hash.js';

interface ClientRow {
  id: string;
  client_id: string;
  name: string;
  is_confidential: boolean;
  client_secret_hash: string | null;
  redirect_uris: string[];
  tenant_id: string | null;
  is_active: boolean;
  created_at: Date;
}

const CLIENT_COLUMNS =
  'id, client_id, name, is_confidential, client_secret_hash, redirect_uris, tenant_id, is_active, created_at';

function rowToClient(row: ClientRow): OAuthClient {
  return {
    id: row.id,
    clientId: row.client_id,
    name: row.name,
    isConfidential: row.is_confidential,
    clientSecretHash: row.client_secret_hash ?? undefined,
    redirectUris: row.redirect_uris,
    tenantId: row.tenant_id,
    isActive: row.is_active,
    createdAt: row.created_at,
  };
}

/**
 * PostgreSQL client storage implementation
 */
export class PostgresClientStorage implements IClientStorage {
  constructor(private readonly pool: Pool) {}

  async create(input: CreateClientInput): Promise<OAuthClient> {
    const secretHash = input.clientSecret !== undefined ? await hashSecret(input.clientSecret) : null;

    const result = await this.pool.query<ClientRow>(
      `insert into oauth_clients (id, client_id, name, is_confidential, client_secret_hash, redirect_uris, tenant_id, is_active)
       values ($1, $2, $3, $4, $5, $6::text[], $7, $8)
       returning ${CLIENT_COLUMNS}`,
      [
        input.id ?? generateId(),
        input.clientId,
        input.name,
        secretHash !== null,
        secretHash,
        input.redirectUris,
        input.tenantId ?? null,
        input.isActive ?? true,
      ]
    );
    return rowToClient(requireRow(result.rows));
  }

  async findByClientId(clientId: string): Promise<OAuthClient | null> {
    const result = await this.pool.query<ClientRow>(
      `select ${CLIENT_COLUMNS} from oauth_clients where client_id = $1`,
      [clientId]
    );
    const row = result.rows.at(0);
    return row ? rowToClient(row) : null;
  }
}
