import type { TokenResponse } from '../../types/index.js';
import type { IIdentityBackend } from '../../storage/interfaces/user-storage.js';
import type { MfaChallengeStore } from '../../services/mfa-challenge-store.js';
import type { MfaService } from '../../services/mfa-service.js';
import type { TokenService } from '../../services/token-service.js';
import type { OAuthFailure } from '../../errors/oauth-error.js';
import { type IEventPublisher, publishInBackground } from '../../services/event-publisher.js';
import { type GrantContext, grantFailure, metadataOf } from '../types.js';
import { type Result, ok } from '../../errors/result.js';
import { ERROR_INVALID_GRANT, ERROR_INVALID_REQUEST } from '../../errors/error-codes.js';
import { logger } from '../../logger.js';

export type MfaMethod = 'totp' | 'backup_code';

export interface MfaCompletionRequest {
  challengeToken?: string;
  code?: string;
}

export interface MfaCompletionHandlerOptions {
  mfaChallenges: MfaChallengeStore;
  mfa: MfaService;
  identity: IIdentityBackend;
  tokens: TokenService;
  events: IEventPublisher;
  now?: () => Date;
}

export type MfaCompletionHandler = (
  request: MfaCompletionRequest,
  context: GrantContext
) => Promise<Result<TokenResponse, OAuthFailure>>;

const CODE_REQUIRED: Record<MfaMethod, string> = {
  totp: 'Code is required',
  backup_code: 'Backup code is required',
};

const REJECTED: Record<MfaMethod, string> = {
  totp: 'Invalid MFA code',
  backup_code: 'Invalid backup code',
};

/**
 * Second half of an interrupted password login.
 * The challenge is spent before the code is checked, so a wrong code means logging in again.
 */
export function createMfaCompletionHandler(
  method: MfaMethod,
  options: MfaCompletionHandlerOptions
): MfaCompletionHandler {
  const { mfaChallenges, mfa, identity, tokens, events } = options;
  const now = options.now ?? (() => new Date());

  return async (request, context) => {
    const challengeToken = request.challengeToken?.trim();
    const code = request.code?.trim();

    if (!challengeToken) {
      return grantFailure(ERROR_INVALID_REQUEST, 'Challenge token is required');
    }
    if (!code) {
      return grantFailure(ERROR_INVALID_REQUEST, CODE_REQUIRED[method]);
    }

    const challenge = await mfaChallenges.validateAndConsume(challengeToken);
    if (!challenge.ok) {
      return grantFailure(ERROR_INVALID_GRANT, 'Invalid or expired challenge token', 401);
    }

    const { userId, tenantId } = challenge.value;
    const principal = await identity.findById(userId);
    if (!principal || principal.tenantId !== tenantId) {
      return grantFailure(ERROR_INVALID_GRANT, 'User not found', 401);
    }
    if (!principal.isActive) {
      return grantFailure(ERROR_INVALID_GRANT, 'User account is inactive', 401);
    }

    const accepted =
      method === 'totp'
        ? await mfa.verifyCode(tenantId, userId, code)
        : await mfa.redeemBackupCode(tenantId, userId, code);

    if (!accepted) {
      logger.warn('mfa_verification_failed', { tenantId, userId, method });
      return grantFailure(ERROR_INVALID_GRANT, REJECTED[method], 401);
    }

    const response = await tokens.issueTokens(principal, undefined, metadataOf(context));
    publishInBackground(events, { type: 'mfa.verified', tenantId, userId, method, occurredAt: now() });

    return ok(response);
  };
}
