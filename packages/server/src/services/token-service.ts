import type { Principal } from '../types/user.js';
import type { ClientMetadata } from '../types/token.js';
import type { TokenResponse } from '../types/index.js';
import type { IIdentityBackend } from '../storage/interfaces/user-storage.js';
import type { TokenSigner } from './token-signer.js';
import type { RefreshTokenStore } from './refresh-token-store.js';
import { TOKEN_TYPE_BEARER } from '../config/constants.js';

export interface TokenServiceOptions {
  accessTokenTtlSeconds: number;
}

/**
 * The one issuance path every grant ends in
 */
export class TokenService {
  constructor(
    private readonly signer: TokenSigner,
    private readonly refreshTokens: RefreshTokenStore,
    private readonly identity: IIdentityBackend,
    private readonly options: TokenServiceOptions
  ) {}

  /**
   * Access token plus a newly created refresh token
   */
  async issueTokens(principal: Principal, scope?: string, metadata?: ClientMetadata): Promise<TokenResponse> {
    const accessToken = await this.issueAccessToken(principal, scope);
    const refreshToken = await this.refreshTokens.create(principal.id, principal.tenantId, metadata);

    return this.buildResponse(accessToken, refreshToken, scope);
  }

  /**
   * New access token; the presented refresh token is handed back unchanged
   */
  async reissue(principal: Principal, refreshToken: string): Promise<TokenResponse> {
    const accessToken = await this.issueAccessToken(principal);
    return this.buildResponse(accessToken, refreshToken);
  }

  async issueAccessToken(principal: Principal, scope?: string): Promise<string> {
    const roles = await this.identity.getRoles(principal);

    return this.signer.issue(
      {
        sub: principal.id,
        tenant_id: principal.tenantId,
        unique_name: principal.username,
        roles,
        scope: scope || undefined,
        email: principal.email,
        given_name: principal.firstName,
        family_name: principal.lastName,
      },
      this.options.accessTokenTtlSeconds
    );
  }

  private buildResponse(accessToken: string, refreshToken: string, scope?: string): TokenResponse {
    const response: TokenResponse = {
      access_token: accessToken,
      token_type: TOKEN_TYPE_BEARER,
      expires_in: this.options.accessTokenTtlSeconds,
      refresh_token: refreshToken,
    };

    if (scope) {
      response.scope = scope;
    }

    return response;
  }
}
