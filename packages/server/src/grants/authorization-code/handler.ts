import type { IClientStorage } from '../../storage/interfaces/client-storage.js';
import type { IIdentityBackend } from '../../storage/interfaces/user-storage.js';
import type { AuthorizationCodeStore } from '../../services/authorization-code-store.js';
import type { TokenService } from '../../services/token-service.js';
import { type IEventPublisher, publishInBackground } from '../../services/event-publisher.js';
import { type GrantHandler, grantFailure, metadataOf } from '../types.js';
import { verifySecret } from '../../crypto/hash.js';
import { ok } from '../../errors/result.js';
import { ERROR_INVALID_CLIENT, ERROR_INVALID_GRANT, ERROR_INVALID_REQUEST } from '../../errors/error-codes.js';
import { GRANT_TYPE_AUTHORIZATION_CODE } from '../../config/constants.js';
import { logger } from '../../logger.js';

export interface AuthorizationCodeHandlerOptions {
  clients: IClientStorage;
  codes: AuthorizationCodeStore;
  identity: IIdentityBackend;
  tokens: TokenService;
  events: IEventPublisher;
  now?: () => Date;
}

const INVALID_CLIENT = 'Invalid or inactive client_id';
const INVALID_CODE = 'Invalid, expired, or already used authorization code';

/**
 * Authorization Code grant (RFC 6749 Section 4.1.3), with PKCE when the code carries a challenge
 */
export function createAuthorizationCodeHandler(options: AuthorizationCodeHandlerOptions): GrantHandler {
  const { clients, codes, identity, tokens, events } = options;
  const now = options.now ?? (() => new Date());

  return async (params, context) => {
    const { code, redirect_uri: redirectUri, client_id: clientId } = params;

    if (!code || !redirectUri || !clientId) {
      return grantFailure(ERROR_INVALID_REQUEST, 'code, redirect_uri, and client_id are required');
    }

    const client = await clients.findByClientId(clientId);
    if (!client || !client.isActive) {
      return grantFailure(ERROR_INVALID_CLIENT, INVALID_CLIENT, 401);
    }

    if (client.isConfidential) {
      if (!params.client_secret) {
        return grantFailure(ERROR_INVALID_CLIENT, 'client_secret is required for confidential clients', 401);
      }

      const secretValid =
        client.clientSecretHash !== undefined && (await verifySecret(params.client_secret, client.clientSecretHash));
      if (!secretValid) {
        return grantFailure(ERROR_INVALID_CLIENT, 'Invalid client_secret', 401);
      }
    }

    const redeemed = await codes.validateAndConsume(code, clientId, redirectUri, params.code_verifier);
    if (!redeemed.ok) {
      logger.warn('authorization_code_rejected', { clientId, reason: redeemed.error });
      return grantFailure(ERROR_INVALID_GRANT, INVALID_CODE);
    }

    const authorizationCode = redeemed.value;

    // A tenant-bound client never receives tokens for another tenant's principal
    if (client.tenantId !== null && client.tenantId !== authorizationCode.tenantId) {
      return grantFailure(ERROR_INVALID_CLIENT, INVALID_CLIENT, 401);
    }

    const principal = await identity.findById(authorizationCode.userId);
    if (!principal || !principal.isActive || principal.tenantId !== authorizationCode.tenantId) {
      return grantFailure(ERROR_INVALID_GRANT, 'User not found or inactive');
    }

    const response = await tokens.issueTokens(principal, authorizationCode.scope, metadataOf(context));
    publishInBackground(events, {
      type: 'user.login_succeeded',
      tenantId: principal.tenantId,
      userId: principal.id,
      grantType: GRANT_TYPE_AUTHORIZATION_CODE,
      occurredAt: now(),
    });

    return ok({ kind: 'tokens', response });
  };
}
