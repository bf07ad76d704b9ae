import { Hono, type Context } from 'hono';
import { z } from 'zod';
import { zValidator } from '@hono/zod-validator';
import type { AuthEnv } from '../../types/hono.js';
import type { Principal } from '../../types/user.js';
import type { MfaBackupCodesResponse } from '../../types/index.js';
import type { AuthServices } from '../../container.js';
import type { MfaManagementFailure } from '../../services/mfa-service.js';
import { OAuthError } from '../../errors/oauth-error.js';
import { bearerAuth } from '../../middleware/bearer-auth.js';
import { grantContextOf } from '../../middleware/request-params.js';
import { ERROR_INVALID_REQUEST } from '../../errors/error-codes.js';

export interface MfaRouteOptions {
  services: AuthServices;
}

const verifySchema = z.object({
  challengeToken: z.string().optional(),
  code: z.string().optional(),
});

const backupCodeSchema = z.object({
  challengeToken: z.string().optional(),
  backupCode: z.string().optional(),
});

const enableSchema = z.object({
  code: z.string().optional(),
});

const MANAGEMENT_MESSAGES: Record<MfaManagementFailure, string> = {
  not_set_up: 'MFA setup has not been started',
  not_enabled: 'MFA is not enabled',
  invalid_code: 'Invalid verification code',
  required_by_tenant: 'MFA is required by your tenant and cannot be disabled',
};

function invalidBody(result: { success: boolean }, c: Context) {
  if (!result.success) {
    return c.json({ error: ERROR_INVALID_REQUEST, error_description: 'Invalid request body' }, 400);
  }
}

/**
 * Second-factor endpoints under /api/mfa
 *
 * `verify` and `verify-backup-code` complete an interrupted password login and
 * need no bearer token. Everything else manages the caller's own enrollment.
 */
export function createMfaRoutes(options: MfaRouteOptions) {
  const { services } = options;

  const router = new Hono<AuthEnv>();

  async function currentPrincipal(c: Context<AuthEnv>): Promise<Principal> {
    const claims = c.get('accessToken');
    const principal = await services.identity.findById(claims.sub);
    if (!principal || principal.tenantId !== claims.tenant_id) {
      throw OAuthError.invalidToken('Invalid or missing user ID');
    }
    return principal;
  }

  router.post('/verify', zValidator('json', verifySchema, invalidBody), async (c) => {
    const body = c.req.valid('json');
    const result = await services.verifyTotp(
      { challengeToken: body.challengeToken, code: body.code },
      grantContextOf(c)
    );
    if (!result.ok) throw OAuthError.fromFailure(result.error);
    return c.json(result.value);
  });

  router.post('/verify-backup-code', zValidator('json', backupCodeSchema, invalidBody), async (c) => {
    const body = c.req.valid('json');
    const result = await services.verifyBackupCode(
      { challengeToken: body.challengeToken, code: body.backupCode },
      grantContextOf(c)
    );
    if (!result.ok) throw OAuthError.fromFailure(result.error);
    return c.json(result.value);
  });

  const requireBearer = bearerAuth({ signer: services.signer });

  router.get('/status', requireBearer, async (c) => {
    const principal = await currentPrincipal(c);
    return c.json(await services.mfa.getStatus(principal));
  });

  router.post('/setup', requireBearer, async (c) => {
    const principal = await currentPrincipal(c);
    if (await services.mfa.isEnabled(principal.tenantId, principal.id)) {
      return c.json({ error: ERROR_INVALID_REQUEST, error_description: 'MFA is already enabled' }, 400);
    }
    return c.json(await services.mfa.beginSetup(principal));
  });

  router.post('/enable', requireBearer, zValidator('json', enableSchema, invalidBody), async (c) => {
    const principal = await currentPrincipal(c);
    const code = c.req.valid('json').code?.trim();
    if (!code) {
      return c.json({ error: ERROR_INVALID_REQUEST, error_description: 'Code is required' }, 400);
    }

    const result = await services.mfa.enable(principal, code);
    if (!result.ok) {
      const error = result.error === 'invalid_code' ? 'invalid_code' : ERROR_INVALID_REQUEST;
      return c.json({ error, error_description: MANAGEMENT_MESSAGES[result.error] }, 400);
    }

    const body: MfaBackupCodesResponse = { backupCodes: result.value };
    return c.json(body);
  });

  router.post('/disable', requireBearer, async (c) => {
    const principal = await currentPrincipal(c);
    const result = await services.mfa.disable(principal);
    if (!result.ok) {
      return c.json({ error: ERROR_INVALID_REQUEST, error_description: MANAGEMENT_MESSAGES[result.error] }, 400);
    }
    return c.json({ message: 'MFA disabled successfully' });
  });

  router.post('/backup-codes', requireBearer, async (c) => {
    const principal = await currentPrincipal(c);
    const result = await services.mfa.regenerateBackupCodes(principal);
    if (!result.ok) {
      return c.json({ error: ERROR_INVALID_REQUEST, error_description: MANAGEMENT_MESSAGES[result.error] }, 400);
    }

    const body: MfaBackupCodesResponse = { backupCodes: result.value };
    return c.json(body);
  });

  return router;
}
