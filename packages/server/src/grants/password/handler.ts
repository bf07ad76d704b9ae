import type { CredentialVerifier } from '../../services/credential-verifier.js';
import type { MfaService } from '../../services/mfa-service.js';
import type { MfaChallengeStore } from '../../services/mfa-challenge-store.js';
import type { TokenService } from '../../services/token-service.js';
import { type IEventPublisher, publishInBackground } from '../../services/event-publisher.js';
import { type GrantHandler, grantFailure, metadataOf } from '../types.js';
import { ok } from '../../errors/result.js';
import { ERROR_INVALID_GRANT, ERROR_INVALID_REQUEST } from '../../errors/error-codes.js';
import { GRANT_TYPE_PASSWORD } from '../../config/constants.js';

export interface PasswordHandlerOptions {
  verifier: CredentialVerifier;
  mfa: MfaService;
  mfaChallenges: MfaChallengeStore;
  tokens: TokenService;
  events: IEventPublisher;
  now?: () => Date;
}

/**
 * Resource Owner Password Credentials grant
 *
 * A correct password for a principal with an enabled second factor yields an
 * MFA challenge instead of tokens.
 */
export function createPasswordHandler(options: PasswordHandlerOptions): GrantHandler {
  const { verifier, mfa, mfaChallenges, tokens, events } = options;
  const now = options.now ?? (() => new Date());

  return async (params, context) => {
    const username = params.username?.trim();
    const password = params.password;

    if (!username || !password) {
      return grantFailure(ERROR_INVALID_REQUEST, 'Username and password are required');
    }

    const verified = await verifier.verify({
      identifier: username,
      secret: password,
      tenantId: params.tenant_id?.trim() || undefined,
      host: context.host,
    });

    if (!verified.ok) {
      publishInBackground(events, {
        type: 'user.login_failed',
        tenantId: params.tenant_id || undefined,
        reason: verified.error,
        occurredAt: now(),
      });
      return grantFailure(ERROR_INVALID_GRANT, verified.error, 401);
    }

    const { principal, tenant } = verified.value;

    if (await mfa.isEnabled(tenant.id, principal.id)) {
      const challengeToken = await mfaChallenges.create(principal.id, tenant.id, metadataOf(context));
      publishInBackground(events, {
        type: 'mfa.challenge_issued',
        tenantId: tenant.id,
        userId: principal.id,
        occurredAt: now(),
      });
      return ok({ kind: 'mfa_required', challengeToken });
    }

    const response = await tokens.issueTokens(principal, params.scope, metadataOf(context));
    publishInBackground(events, {
      type: 'user.login_succeeded',
      tenantId: tenant.id,
      userId: principal.id,
      grantType: GRANT_TYPE_PASSWORD,
      occurredAt: now(),
    });

    return ok({ kind: 'tokens', response });
  };
}
