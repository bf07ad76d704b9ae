import type { Pool } from 'pg';
import type { RefreshToken, MfaChallengeToken } from '../../../types/token.js';
import type {
  IRefreshTokenStorage,
  IMfaChallengeStorage,
  CreateRefreshTokenInput,
  CreateMfaChallengeInput,
} from '../../interfaces/token-storage.js';
import { generateId } from '../../../crypto/random.js';
import { requireRow } from '../client.js';

interface RefreshTokenRow {
  id: string;
  user_id: string;
  tenant_id: string;
  token_hash: string;
  encrypted_token: string | null;
  issued_at: Date;
  expires_at: Date;
  used_at: Date | null;
  revoked_at: Date | null;
  ip_address: string | null;
  user_agent: string | null;
}

type MfaChallengeRow = Omit<RefreshTokenRow, 'revoked_at'>;

function rowToRefreshToken(row: RefreshTokenRow): RefreshToken {
  return {
    id: row.id,
    userId: row.user_id,
    tenantId: row.tenant_id,
    tokenHash: row.token_hash,
    encryptedToken: row.encrypted_token ?? undefined,
    issuedAt: row.issued_at,
    expiresAt: row.expires_at,
    usedAt: row.used_at ?? undefined,
    revokedAt: row.revoked_at ?? undefined,
    ipAddress: row.ip_address ?? undefined,
    userAgent: row.user_agent ?? undefined,
  };
}

function rowToMfaChallenge(row: MfaChallengeRow): MfaChallengeToken {
  return {
    id: row.id,
    userId: row.user_id,
    tenantId: row.tenant_id,
    tokenHash: row.token_hash,
    encryptedToken: row.encrypted_token ?? undefined,
    issuedAt: row.issued_at,
    expiresAt: row.expires_at,
    usedAt: row.used_at ?? undefined,
    ipAddress: row.ip_address ?? undefined,
    userAgent: row.user_agent ?? undefined,
  };
}

/**
 * PostgreSQL refresh token storage implementation
 */
export class PostgresRefreshTokenStorage implements IRefreshTokenStorage {
  constructor(private readonly pool: Pool) {}

  async create(input: CreateRefreshTokenInput): Promise<RefreshToken> {
    const result = await this.pool.query<RefreshTokenRow>(
      `insert into refresh_tokens
         (id, user_id, tenant_id, token_hash, encrypted_token, issued_at, expires_at, ip_address, user_agent)
       values ($1, $2, $3, $4, $5, $6, $7, $8, $9)
       returning *`,
      [
        generateId(),
        input.userId,
        input.tenantId,
        input.tokenHash,
        input.encryptedToken ?? null,
        input.issuedAt,
        input.expiresAt,
        input.ipAddress ?? null,
        input.userAgent ?? null,
      ]
    );
    return rowToRefreshToken(requireRow(result.rows));
  }

  async findByHash(tokenHash: string): Promise<RefreshToken | null> {
    const result = await this.pool.query<RefreshTokenRow>(
      'select * from refresh_tokens where token_hash = $1',
      [tokenHash]
    );
    const row = result.rows.at(0);
    return row ? rowToRefreshToken(row) : null;
  }

  async markUsed(id: string, usedAt: Date): Promise<void> {
    await this.pool.query('update refresh_tokens set used_at = $2 where id = $1', [id, usedAt]);
  }

  async revokeAll(revokedAt: Date): Promise<number> {
    const result = await this.pool.query(
      'update refresh_tokens set revoked_at = $1 where revoked_at is null',
      [revokedAt]
    );
    return result.rowCount ?? 0;
  }

  async revokeByTenant(tenantId: string, revokedAt: Date): Promise<number> {
    const result = await this.pool.query(
      'update refresh_tokens set revoked_at = $2 where tenant_id = $1 and revoked_at is null',
      [tenantId, revokedAt]
    );
    return result.rowCount ?? 0;
  }

  async revokeByUser(tenantId: string, userId: string, revokedAt: Date): Promise<number> {
    const result = await this.pool.query(
      `update refresh_tokens set revoked_at = $3
       where tenant_id = $1 and user_id = $2 and revoked_at is null`,
      [tenantId, userId, revokedAt]
    );
    return result.rowCount ?? 0;
  }
}

/**
 * PostgreSQL MFA challenge storage implementation
 */
export class PostgresMfaChallengeStorage implements IMfaChallengeStorage {
  constructor(private readonly pool: Pool) {}

  async create(input: CreateMfaChallengeInput): Promise<MfaChallengeToken> {
    const result = await this.pool.query<MfaChallengeRow>(
      `insert into mfa_challenge_tokens
         (id, user_id, tenant_id, token_hash, encrypted_token, issued_at, expires_at, ip_address, user_agent)
       values ($1, $2, $3, $4, $5, $6, $7, $8, $9)
       returning *`,
      [
        generateId(),
        input.userId,
        input.tenantId,
        input.tokenHash,
        input.encryptedToken ?? null,
        input.issuedAt,
        input.expiresAt,
        input.ipAddress ?? null,
        input.userAgent ?? null,
      ]
    );
    return rowToMfaChallenge(requireRow(result.rows));
  }

  async findByHash(tokenHash: string): Promise<MfaChallengeToken | null> {
    const result = await this.pool.query<MfaChallengeRow>(
      'select * from mfa_challenge_tokens where token_hash = $1',
      [tokenHash]
    );
    const row = result.rows.at(0);
    return row ? rowToMfaChallenge(row) : null;
  }

  async markUsed(id: string, usedAt: Date): Promise<boolean> {
    const result = await this.pool.query(
      'update mfa_challenge_tokens set used_at = $2 where id = $1 and used_at is null',
      [id, usedAt]
    );
    return result.rowCount === 1;
  }
}
