import type { AuthorizationCode, ClientMetadata } from '../types/token.js';
import type { IAuthorizationCodeStorage } from '../storage/interfaces/authorization-code-storage.js';
import type { CodeChallengeMethod } from '../crypto/pkce.js';
import { verifyCodeChallenge } from '../crypto/pkce.js';
import { generateAuthorizationCode } from '../crypto/random.js';
import { sha256 } from '../crypto/hash.js';
import { type Result, ok, fail } from '../errors/result.js';
import { DEFAULT_AUTHORIZATION_CODE_TTL } from '../config/constants.js';

export type AuthorizationCodeFailure =
  | 'not_found'
  | 'already_used'
  | 'expired'
  | 'client_mismatch'
  | 'redirect_uri_mismatch'
  | 'pkce_failed';

export interface CreateCodeRequest extends ClientMetadata {
  userId: string;
  tenantId: string;
  clientId: string;
  redirectUri: string;
  scope?: string;
  state?: string;
  codeChallenge?: string;
  codeChallengeMethod?: CodeChallengeMethod;
}

/**
 * Single-use authorization codes bound to client, redirect URI and PKCE challenge
 */
export class AuthorizationCodeStore {
  constructor(
    private readonly storage: IAuthorizationCodeStorage,
    private readonly now: () => Date = () => new Date()
  ) {}

  async create(request: CreateCodeRequest): Promise<string> {
    const code = generateAuthorizationCode();
    const issuedAt = this.now();

    await this.storage.create({
      ...request,
      codeHash: sha256(code),
      issuedAt,
      expiresAt: new Date(issuedAt.getTime() + DEFAULT_AUTHORIZATION_CODE_TTL * 1000),
    });

    return code;
  }

  /**
   * Every check runs before the code is consumed, so a rejected attempt leaves it redeemable.
   * Of N concurrent correct redemptions exactly one wins the compare-and-set.
   */
  async validateAndConsume(
    code: string,
    clientId: string,
    redirectUri: string,
    codeVerifier?: string
  ): Promise<Result<AuthorizationCode, AuthorizationCodeFailure>> {
    const stored = await this.storage.findByHash(sha256(code));
    if (!stored) return fail('not_found');
    if (stored.usedAt) return fail('already_used');

    const now = this.now();
    if (stored.expiresAt <= now) return fail('expired');
    if (stored.clientId !== clientId) return fail('client_mismatch');
    if (stored.redirectUri !== redirectUri) return fail('redirect_uri_mismatch');

    if (stored.codeChallenge) {
      if (!codeVerifier || !verifyCodeChallenge(codeVerifier, stored.codeChallenge, stored.codeChallengeMethod)) {
        return fail('pkce_failed');
      }
    }

    const won = await this.storage.markUsed(stored.id, now);
    if (!won) return fail('already_used');

    return ok({ ...stored, usedAt: now });
  }
}
