import type { IIdentityBackend } from '../../storage/interfaces/user-storage.js';
import type { RefreshTokenStore } from '../../services/refresh-token-store.js';
import type { TokenService } from '../../services/token-service.js';
import { type GrantHandler, grantFailure } from '../types.js';
import { ok } from '../../errors/result.js';
import { ERROR_INVALID_GRANT, ERROR_INVALID_REQUEST } from '../../errors/error-codes.js';
import { logger } from '../../logger.js';

export interface RefreshTokenHandlerOptions {
  refreshTokens: RefreshTokenStore;
  identity: IIdentityBackend;
  tokens: TokenService;
}

/**
 * Handle refresh token grant
 *
 * RFC 6749 Section 6
 *
 * Refresh tokens are not rotated: the response carries a fresh access token
 * and the same refresh token, which stays valid until it expires or is revoked.
 */
export function createRefreshTokenHandler(options: RefreshTokenHandlerOptions): GrantHandler {
  const { refreshTokens, identity, tokens } = options;

  return async (params) => {
    const value = params.refresh_token?.trim();
    if (!value) {
      return grantFailure(ERROR_INVALID_REQUEST, 'Refresh token is required');
    }

    const validated = await refreshTokens.validate(value);
    if (!validated.ok) {
      logger.info('refresh_token_rejected', { reason: validated.error });
      return grantFailure(ERROR_INVALID_GRANT, 'Invalid or expired refresh token', 401);
    }

    const principal = await identity.findById(validated.value.userId);
    if (!principal) {
      return grantFailure(ERROR_INVALID_GRANT, 'User not found', 401);
    }
    if (!principal.isActive) {
      return grantFailure(ERROR_INVALID_GRANT, 'User account is inactive', 401);
    }

    const response = await tokens.reissue(principal, value);
    return ok({ kind: 'tokens', response });
  };
}
