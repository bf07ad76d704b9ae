import type { RefreshToken, MfaChallengeToken } from '../../types/token.js';
import type {
  IRefreshTokenStorage,
  IMfaChallengeStorage,
  CreateRefreshTokenInput,
  CreateMfaChallengeInput,
} from '../interfaces/token-storage.js';
import { generateId } from '../../crypto/random.js';

/**
 * In-memory refresh token storage implementation
 */
export class MemoryRefreshTokenStorage implements IRefreshTokenStorage {
  private tokens = new Map<string, RefreshToken>();
  private hashIndex = new Map<string, string>(); // hash -> id

  async create(input: CreateRefreshTokenInput): Promise<RefreshToken> {
    const token: RefreshToken = { ...input, id: generateId() };

    this.tokens.set(token.id, token);
    this.hashIndex.set(token.tokenHash, token.id);

    return token;
  }

  async findByHash(tokenHash: string): Promise<RefreshToken | null> {
    const id = this.hashIndex.get(tokenHash);
    if (!id) return null;
    return this.tokens.get(id) ?? null;
  }

  async markUsed(id: string, usedAt: Date): Promise<void> {
    const token = this.tokens.get(id);
    if (token) {
      this.tokens.set(id, { ...token, usedAt });
    }
  }

  async revokeAll(revokedAt: Date): Promise<number> {
    return this.revokeWhere(() => true, revokedAt);
  }

  async revokeByTenant(tenantId: string, revokedAt: Date): Promise<number> {
    return this.revokeWhere((token) => token.tenantId === tenantId, revokedAt);
  }

  async revokeByUser(tenantId: string, userId: string, revokedAt: Date): Promise<number> {
    return this.revokeWhere(
      (token) => token.tenantId === tenantId && token.userId === userId,
      revokedAt
    );
  }

  private revokeWhere(matches: (token: RefreshToken) => boolean, revokedAt: Date): number {
    let count = 0;
    for (const [id, token] of this.tokens) {
      if (!token.revokedAt && matches(token)) {
        this.tokens.set(id, { ...token, revokedAt });
        count++;
      }
    }
    return count;
  }
}

/**
 * In-memory MFA challenge storage implementation
 */
export class MemoryMfaChallengeStorage implements IMfaChallengeStorage {
  private challenges = new Map<string, MfaChallengeToken>();
  private hashIndex = new Map<string, string>(); // hash -> id

  async create(input: CreateMfaChallengeInput): Promise<MfaChallengeToken> {
    const challenge: MfaChallengeToken = { ...input, id: generateId() };

    this.challenges.set(challenge.id, challenge);
    this.hashIndex.set(challenge.tokenHash, challenge.id);

    return challenge;
  }

  async findByHash(tokenHash: string): Promise<MfaChallengeToken | null> {
    const id = this.hashIndex.get(tokenHash);
    if (!id) return null;
    return this.challenges.get(id) ?? null;
  }

  async markUsed(id: string, usedAt: Date): Promise<boolean> {
    // Check-and-set runs without an await in between
    const challenge = this.challenges.get(id);
    if (!challenge || challenge.usedAt) {
      return false;
    }
    this.challenges.set(id, { ...challenge, usedAt });
    return true;
  }
}
