import type { Pool } from 'pg';
import type { AuthorizationCode } from '../../../types/token.js';
import type {
  IAuthorizationCodeStorage,
  CreateAuthorizationCodeInput,
} from '../../interfaces/authorization-code-storage.js';
import { generateId } from '../../../crypto/random.js';
import { requireRow } from '../client.js';
import { isCodeChallengeMethod } from '../../../crypto/pkce.js';

interface AuthorizationCodeRow {
  id: string;
  code_hash: string;
  user_id: string;
  tenant_id: string;
  client_id: string;
  redirect_uri: string;
  scope: string | null;
  state: string | null;
  code_challenge: string | null;
  code_challenge_method: string | null;
  issued_at: Date;
  expires_at: Date;
  used_at: Date | null;
  ip_address: string | null;
  user_agent: string | null;
}

function rowToAuthorizationCode(row: AuthorizationCodeRow): AuthorizationCode {
  const method = row.code_challenge_method;
  return {
    id: row.id,
    codeHash: row.code_hash,
    userId: row.user_id,
    tenantId: row.tenant_id,
    clientId: row.client_id,
    redirectUri: row.redirect_uri,
    scope: row.scope ?? undefined,
    state: row.state ?? undefined,
    codeChallenge: row.code_challenge ?? undefined,
    codeChallengeMethod: method !== null && isCodeChallengeMethod(method) ? method : undefined,
    issuedAt: row.issued_at,
    expiresAt: row.expires_at,
    usedAt: row.used_at ?? undefined,
    ipAddress: row.ip_address ?? undefined,
    userAgent: row.user_agent ?? undefined,
  };
}

/**
 * PostgreSQL authorization code storage implementation
 */
export class PostgresAuthorizationCodeStorage implements IAuthorizationCodeStorage {
  constructor(private readonly pool: Pool) {}

  async create(input: CreateAuthorizationCodeInput): Promise<AuthorizationCode> {
    const result = await this.pool.query<AuthorizationCodeRow>(
      `insert into authorization_codes
         (id, code_hash, user_id, tenant_id, client_id, redirect_uri, scope, state,
          code_challenge, code_challenge_method, issued_at, expires_at, ip_address, user_agent)
       values ($1, $2, $3, $4, $5, $6, $7, $8, $9, $10, $11, $12, $13, $14)
       returning *`,
      [
        generateId(),
        input.codeHash,
        input.userId,
        input.tenantId,
        input.clientId,
        input.redirectUri,
        input.scope ?? null,
        input.state ?? null,
        input.codeChallenge ?? null,
        input.codeChallengeMethod ?? null,
        input.issuedAt,
        input.expiresAt,
        input.ipAddress ?? null,
        input.userAgent ?? null,
      ]
    );
    return rowToAuthorizationCode(requireRow(result.rows));
  }

  async findByHash(codeHash: string): Promise<AuthorizationCode | null> {
    const result = await this.pool.query<AuthorizationCodeRow>(
      'select * from authorization_codes where code_hash = $1',
      [codeHash]
    );
    const row = result.rows.at(0);
    return row ? rowToAuthorizationCode(row) : null;
  }

  async markUsed(id: string, usedAt: Date): Promise<boolean> {
    const result = await this.pool.query(
      'update authorization_codes set used_at = $2 where id = $1 and used_at is null',
      [id, usedAt]
    );
    return result.rowCount === 1;
  }
}
