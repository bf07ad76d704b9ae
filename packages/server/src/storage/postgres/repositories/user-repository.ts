import type { Pool } from 'pg';
import type { Principal, UserConsent, MfaEnrollment } from '../../../types/user.js';
import type {
  IIdentityBackend,
  IConsentStorage,
  IMfaEnrollmentStorage,
  CredentialFailure,
} from '../../interfaces/user-storage.js';
import { type Result, ok, fail } from '../../../errors/result.js';
import { verifySecret } from '../../../crypto/hash.js';
import { MAX_FAILED_LOGIN_ATTEMPTS, LOCKOUT_DURATION_SECONDS } from '../../../config/constants.js';
import { requireRow } from '../client.js';

interface UserRow {
  id: string;
  tenant_id: string;
  username: string;
  email: string | null;
  first_name: string | null;
  last_name: string | null;
  password_hash: string;
  is_active: boolean;
  lockout_end: Date | null;
}

interface ConsentRow {
  id: string;
  user_id: string;
  tenant_id: string;
  client_id: string;
  scope: string | null;
  granted_at: Date;
  last_confirmed_at: Date;
  expires_at: Date | null;
}

interface MfaEnrollmentRow {
  tenant_id: string;
  user_id: string;
  secret: string;
  is_enabled: boolean;
  backup_code_hashes: string[];
  created_at: Date;
  enabled_at: Date | null;
}

const USER_COLUMNS =
  'id, tenant_id, username, email, first_name, last_name, password_hash, is_active, lockout_end';

function rowToPrincipal(row: UserRow): Principal {
  return {
    id: row.id,
    tenantId: row.tenant_id,
    username: row.username,
    email: row.email ?? undefined,
    firstName: row.first_name ?? undefined,
    lastName: row.last_name ?? undefined,
    isActive: row.is_active,
  };
}

function rowToConsent(row: ConsentRow): UserConsent {
  return {
    id: row.id,
    userId: row.user_id,
    tenantId: row.tenant_id,
    clientId: row.client_id,
    scope: row.scope ?? undefined,
    grantedAt: row.granted_at,
    lastConfirmedAt: row.last_confirmed_at,
    expiresAt: row.expires_at ?? undefined,
  };
}

function rowToMfaEnrollment(row: MfaEnrollmentRow): MfaEnrollment {
  return {
    userId: row.user_id,
    tenantId: row.tenant_id,
    secret: row.secret,
    isEnabled: row.is_enabled,
    backupCodeHashes: row.backup_code_hashes,
    createdAt: row.created_at,
    enabledAt: row.enabled_at ?? undefined,
  };
}

/**
 * Identity backend over the `users` and `user_roles` tables
 */
export class PostgresIdentityBackend implements IIdentityBackend {
  constructor(
    private readonly pool: Pool,
    private readonly now: () => Date = () => new Date()
  ) {}

  async verifyCredential(
    tenantId: string,
    identifier: string,
    secret: string
  ): Promise<Result<Principal, CredentialFailure>> {
    const row = await this.findRow(tenantId, identifier);
    if (!row) {
      return fail('invalid_credentials');
    }

    if (!row.is_active) {
      return fail('inactive');
    }

    const now = this.now();
    if (row.lockout_end && row.lockout_end > now) {
      return fail('locked_out');
    }

    if (!(await verifySecret(secret, row.password_hash))) {
      const lockoutEnd = new Date(now.getTime() + LOCKOUT_DURATION_SECONDS * 1000);
      await this.pool.query(
        `update users set
           lockout_end = case when failed_attempts + 1 >= $2 then $3 else lockout_end end,
           failed_attempts = case when failed_attempts + 1 >= $2 then 0 else failed_attempts + 1 end
         where id = $1`,
        [row.id, MAX_FAILED_LOGIN_ATTEMPTS, lockoutEnd]
      );
      return fail('invalid_credentials');
    }

    await this.pool.query('update users set failed_attempts = 0, lockout_end = null where id = $1', [row.id]);

    return ok(rowToPrincipal(row));
  }

  async getRoles(principal: Principal): Promise<string[]> {
    const result = await this.pool.query<{ role_name: string }>(
      'select role_name from user_roles where user_id = $1 order by role_name',
      [principal.id]
    );
    return result.rows.map((row) => row.role_name);
  }

  async findById(userId: string): Promise<Principal | null> {
    const result = await this.pool.query<UserRow>(`select ${USER_COLUMNS} from users where id = $1`, [userId]);
    const row = result.rows.at(0);
    return row ? rowToPrincipal(row) : null;
  }

  async findByIdentifier(tenantId: string, identifier: string): Promise<Principal | null> {
    const row = await this.findRow(tenantId, identifier);
    return row ? rowToPrincipal(row) : null;
  }

  private async findRow(tenantId: string, identifier: string): Promise<UserRow | undefined> {
    const result = await this.pool.query<UserRow>(
      `select ${USER_COLUMNS} from users
       where tenant_id = $1 and (lower(username) = lower($2) or lower(email) = lower($2))
       order by lower(username) = lower($2) desc
       limit 1`,
      [tenantId, identifier.trim()]
    );
    return result.rows.at(0);
  }
}

/**
 * PostgreSQL consent storage implementation
 */
export class PostgresConsentStorage implements IConsentStorage {
  constructor(private readonly pool: Pool) {}

  async find(userId: string, clientId: string): Promise<UserConsent | null> {
    const result = await this.pool.query<ConsentRow>(
      'select * from user_consents where user_id = $1 and client_id = $2',
      [userId, clientId]
    );
    const row = result.rows.at(0);
    return row ? rowToConsent(row) : null;
  }

  async save(consent: UserConsent): Promise<UserConsent> {
    const result = await this.pool.query<ConsentRow>(
      `insert into user_consents (id, user_id, tenant_id, client_id, scope, granted_at, last_confirmed_at, expires_at)
       values ($1, $2, $3, $4, $5, $6, $7, $8)
       on conflict (user_id, client_id) do update set
         scope = excluded.scope,
         last_confirmed_at = excluded.last_confirmed_at,
         expires_at = excluded.expires_at
       returning *`,
      [
        consent.id,
        consent.userId,
        consent.tenantId,
        consent.clientId,
        consent.scope ?? null,
        consent.grantedAt,
        consent.lastConfirmedAt,
        consent.expiresAt ?? null,
      ]
    );
    return rowToConsent(requireRow(result.rows));
  }
}

/**
 * PostgreSQL MFA enrollment storage implementation
 */
export class PostgresMfaEnrollmentStorage implements IMfaEnrollmentStorage {
  constructor(private readonly pool: Pool) {}

  async find(tenantId: string, userId: string): Promise<MfaEnrollment | null> {
    const result = await this.pool.query<MfaEnrollmentRow>(
      'select * from mfa_enrollments where tenant_id = $1 and user_id = $2',
      [tenantId, userId]
    );
    const row = result.rows.at(0);
    return row ? rowToMfaEnrollment(row) : null;
  }

  async save(enrollment: MfaEnrollment): Promise<MfaEnrollment> {
    const result = await this.pool.query<MfaEnrollmentRow>(
      `insert into mfa_enrollments (tenant_id, user_id, secret, is_enabled, backup_code_hashes, created_at, enabled_at)
       values ($1, $2, $3, $4, $5::text[], $6, $7)
       on conflict (tenant_id, user_id) do update set
         secret = excluded.secret,
         is_enabled = excluded.is_enabled,
         backup_code_hashes = excluded.backup_code_hashes,
         enabled_at = excluded.enabled_at
       returning *`,
      [
        enrollment.tenantId,
        enrollment.userId,
        enrollment.secret,
        enrollment.isEnabled,
        enrollment.backupCodeHashes,
        enrollment.createdAt,
        enrollment.enabledAt ?? null,
      ]
    );
    return rowToMfaEnrollment(requireRow(result.rows));
  }

  async delete(tenantId: string, userId: string): Promise<void> {
    await this.pool.query('delete from mfa_enrollments where tenant_id = $1 and user_id = $2', [tenantId, userId]);
  }

  async redeemBackupCode(tenantId: string, userId: string, codeHash: string): Promise<boolean> {
    const result = await this.pool.query(
      `update mfa_enrollments set backup_code_hashes = array_remove(backup_code_hashes, $3)
       where tenant_id = $1 and user_id = $2 and $3 = any(backup_code_hashes)`,
      [tenantId, userId, codeHash]
    );
    return result.rowCount === 1;
  }
}
