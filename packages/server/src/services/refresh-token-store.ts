import type { RefreshToken, ClientMetadata } from '../types/token.js';
import type { IRefreshTokenStorage } from '../storage/interfaces/token-storage.js';
import type { ITenantStorage } from '../storage/interfaces/tenant-storage.js';
import { generateRefreshToken } from '../crypto/random.js';
import { hashToken } from '../crypto/hash.js';
import { encrypt, matchesEncrypted } from '../crypto/encrypt.js';
import { type Result, ok, fail } from '../errors/result.js';
import {
  DEFAULT_REFRESH_TOKEN_TTL_DAYS,
  MIN_REFRESH_TOKEN_TTL_DAYS,
  MAX_REFRESH_TOKEN_TTL_DAYS,
  SETTING_REFRESH_TOKEN_EXPIRATION_DAYS,
} from '../config/constants.js';

export type RefreshTokenFailure = 'not_found' | 'revoked' | 'expired' | 'mismatch';

export interface TokenSecrets {
  pepper: string; // HMAC key for lookup hashes
  encryptionKey?: string; // Enables the encrypted copy
}

const DAY_MS = 24 * 60 * 60 * 1000;

/**
 * Refresh token lifetime for a tenant, in days
 */
export function refreshTokenTtlDays(settings: Record<string, string> | undefined): number {
  const raw = settings?.[SETTING_REFRESH_TOKEN_EXPIRATION_DAYS];
  if (raw === undefined || !/^\d+$/.test(raw.trim())) {
    return DEFAULT_REFRESH_TOKEN_TTL_DAYS;
  }

  const days = parseInt(raw, 10);
  if (days < MIN_REFRESH_TOKEN_TTL_DAYS || days > MAX_REFRESH_TOKEN_TTL_DAYS) {
    return DEFAULT_REFRESH_TOKEN_TTL_DAYS;
  }
  return days;
}

/**
 * Opaque refresh tokens. The plaintext leaves this class once, from `create`.
 * Tokens are not rotated: a refresh hands back the same value until it expires or is revoked.
 */
export class RefreshTokenStore {
  constructor(
    private readonly storage: IRefreshTokenStorage,
    private readonly tenants: ITenantStorage,
    private readonly secrets: TokenSecrets,
    private readonly now: () => Date = () => new Date()
  ) {}

  async create(userId: string, tenantId: string, metadata: ClientMetadata = {}): Promise<string> {
    const value = generateRefreshToken();
    const tenant = await this.tenants.findById(tenantId);
    const issuedAt = this.now();

    await this.storage.create({
      userId,
      tenantId,
      tokenHash: hashToken(value, this.secrets.pepper),
      encryptedToken: this.secrets.encryptionKey ? encrypt(value, this.secrets.encryptionKey) : undefined,
      issuedAt,
      expiresAt: new Date(issuedAt.getTime() + refreshTokenTtlDays(tenant?.settings) * DAY_MS),
      ipAddress: metadata.ipAddress,
      userAgent: metadata.userAgent,
    });

    return value;
  }

  async validate(value: string): Promise<Result<RefreshToken, RefreshTokenFailure>> {
    if (!value) {
      return fail('not_found');
    }

    const token = await this.storage.findByHash(hashToken(value, this.secrets.pepper));
    if (!token) {
      return fail('not_found');
    }
    if (token.revokedAt) {
      return fail('revoked');
    }

    const now = this.now();
    if (token.expiresAt <= now) {
      return fail('expired');
    }

    if (
      token.encryptedToken &&
      this.secrets.encryptionKey &&
      !matchesEncrypted(value, token.encryptedToken, this.secrets.encryptionKey)
    ) {
      return fail('mismatch');
    }

    await this.storage.markUsed(token.id, now);
    return ok({ ...token, usedAt: now });
  }

  async revokeAll(): Promise<number> {
    return this.storage.revokeAll(this.now());
  }

  async revokeForTenant(tenantId: string): Promise<number> {
    return this.storage.revokeByTenant(tenantId, this.now());
  }

  async revokeForUser(userId: string, tenantId: string): Promise<number> {
    return this.storage.revokeByUser(tenantId, userId, this.now());
  }
}
