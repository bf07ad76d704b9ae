import type { IntrospectionResponse } from '../types/index.js';
import type { IIdentityBackend } from '../storage/interfaces/user-storage.js';
import type { TokenSigner } from './token-signer.js';
import type { RefreshTokenStore } from './refresh-token-store.js';
import { TOKEN_TYPE_BEARER, TOKEN_TYPE_HINT_REFRESH } from '../config/constants.js';

const INACTIVE: IntrospectionResponse = { active: false };

/**
 * RFC 7662 introspection. Any failure, whatever its cause, is reported as `{ active: false }`.
 */
export class IntrospectionService {
  constructor(
    private readonly signer: TokenSigner,
    private readonly refreshTokens: RefreshTokenStore,
    private readonly identity: IIdentityBackend
  ) {}

  async introspect(token: string, tokenTypeHint?: string): Promise<IntrospectionResponse> {
    const value = token.trim();
    const hint = tokenTypeHint?.trim().toLowerCase() || undefined;
    if (!value) return INACTIVE;

    if (hint !== TOKEN_TYPE_HINT_REFRESH) {
      const access = await this.introspectAccessToken(value);
      if (access.active) return access;
    }

    if (hint === undefined || hint === TOKEN_TYPE_HINT_REFRESH) {
      return this.introspectRefreshToken(value);
    }

    return INACTIVE;
  }

  private async introspectAccessToken(token: string): Promise<IntrospectionResponse> {
    const result = await this.signer.validate(token, { checkSignature: true });
    if (!result.ok || result.value.expired) {
      return INACTIVE;
    }

    const { claims } = result.value;
    return {
      active: true,
      token_type: TOKEN_TYPE_BEARER,
      scope: claims.scope,
      sub: claims.sub,
      username: claims.unique_name,
      tenant_id: claims.tenant_id,
      exp: claims.exp,
      iat: claims.iat,
    };
  }

  private async introspectRefreshToken(token: string): Promise<IntrospectionResponse> {
    // Refresh tokens are base64url and never contain dots
    if (token.includes('.')) return INACTIVE;

    const result = await this.refreshTokens.validate(token);
    if (!result.ok) return INACTIVE;

    const refreshToken = result.value;
    const principal = await this.identity.findById(refreshToken.userId);

    return {
      active: true,
      token_type: 'refresh_token',
      sub: refreshToken.userId,
      username: principal?.username,
      tenant_id: refreshToken.tenantId,
      exp: Math.floor(refreshToken.expiresAt.getTime() / 1000),
      iat: Math.floor(refreshToken.issuedAt.getTime() / 1000),
    };
  }
}
