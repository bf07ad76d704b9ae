import type { ClientMetadata } from '../types/token.js';
import type { IMfaChallengeStorage } from '../storage/interfaces/token-storage.js';
import type { TokenSecrets } from './refresh-token-store.js';
import { generateMfaChallengeToken } from '../crypto/random.js';
import { hashToken } from '../crypto/hash.js';
import { encrypt, matchesEncrypted } from '../crypto/encrypt.js';
import { type Result, ok, fail } from '../errors/result.js';
import { DEFAULT_MFA_CHALLENGE_TTL } from '../config/constants.js';

export type MfaChallengeFailure = 'not_found' | 'already_used' | 'expired' | 'mismatch';

export interface MfaChallengeSubject {
  userId: string;
  tenantId: string;
}

/**
 * Short-lived tokens bridging a correct password to the second-factor check
 */
export class MfaChallengeStore {
  constructor(
    private readonly storage: IMfaChallengeStorage,
    private readonly secrets: TokenSecrets,
    private readonly now: () => Date = () => new Date()
  ) {}

  async create(userId: string, tenantId: string, metadata: ClientMetadata = {}): Promise<string> {
    const value = generateMfaChallengeToken();
    const issuedAt = this.now();

    await this.storage.create({
      userId,
      tenantId,
      tokenHash: hashToken(value, this.secrets.pepper),
      encryptedToken: this.secrets.encryptionKey ? encrypt(value, this.secrets.encryptionKey) : undefined,
      issuedAt,
      expiresAt: new Date(issuedAt.getTime() + DEFAULT_MFA_CHALLENGE_TTL * 1000),
      ipAddress: metadata.ipAddress,
      userAgent: metadata.userAgent,
    });

    return value;
  }

  async validateAndConsume(value: string): Promise<Result<MfaChallengeSubject, MfaChallengeFailure>> {
    if (!value) return fail('not_found');

    const challenge = await this.storage.findByHash(hashToken(value, this.secrets.pepper));
    if (!challenge) return fail('not_found');
    if (challenge.usedAt) return fail('already_used');

    const now = this.now();
    if (challenge.expiresAt <= now) return fail('expired');

    if (
      challenge.encryptedToken &&
      this.secrets.encryptionKey &&
      !matchesEncrypted(value, challenge.encryptedToken, this.secrets.encryptionKey)
    ) {
      return fail('mismatch');
    }

    if (!(await this.storage.markUsed(challenge.id, now))) {
      return fail('already_used');
    }

    return ok({ userId: challenge.userId, tenantId: challenge.tenantId });
  }
}
