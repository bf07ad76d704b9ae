import type { UserConsent } from '../types/user.js';
import type { IConsentStorage } from '../storage/interfaces/user-storage.js';
import { generateId } from '../crypto/random.js';
import { CONSENT_VALIDITY_DAYS } from '../config/constants.js';

const CONSENT_VALIDITY_MS = CONSENT_VALIDITY_DAYS * 24 * 60 * 60 * 1000;

function splitScopes(scope: string | undefined): string[] {
  return (scope ?? '')
    .split(/\s+/)
    .map((s) => s.trim().toLowerCase())
    .filter(Boolean);
}

/**
 * Whether a stored consent already covers the requested scopes.
 * Nothing requested is always covered; an empty consent covers nothing else.
 */
export function coversScopes(consent: Pick<UserConsent, 'scope'>, requested: string | undefined): boolean {
  const wanted = splitScopes(requested);
  if (wanted.length === 0) return true;

  const granted = new Set(splitScopes(consent.scope));
  if (granted.size === 0) return false;

  return wanted.every((scope) => granted.has(scope));
}

export class ConsentStore {
  constructor(private readonly storage: IConsentStorage) {}

  async findValid(userId: string, clientId: string, scope: string | undefined, now: Date): Promise<UserConsent | null> {
    const consent = await this.storage.find(userId, clientId);
    if (!consent) return null;

    if (consent.expiresAt && consent.expiresAt <= now) return null;
    if (consent.lastConfirmedAt.getTime() + CONSENT_VALIDITY_MS <= now.getTime()) return null;
    if (!coversScopes(consent, scope)) return null;

    return consent;
  }

  async upsert(
    userId: string,
    tenantId: string,
    clientId: string,
    scope: string | undefined,
    now: Date
  ): Promise<UserConsent> {
    const expiresAt = new Date(now.getTime() + CONSENT_VALIDITY_MS);
    const existing = await this.storage.find(userId, clientId);

    if (existing) {
      return this.storage.save({
        ...existing,
        scope: scope ?? existing.scope,
        lastConfirmedAt: now,
        // Never shortens a longer expiry already on record
        expiresAt: existing.expiresAt && existing.expiresAt > expiresAt ? existing.expiresAt : expiresAt,
      });
    }

    return this.storage.save({
      id: generateId(),
      userId,
      tenantId,
      clientId,
      scope,
      grantedAt: now,
      lastConfirmedAt: now,
      expiresAt,
    });
  }
}
