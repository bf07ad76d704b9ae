import { Hono } from 'hono';
import type { AuthEnv } from '../../types/hono.js';
import type { RevocationResponse, ApiErrorResponse } from '../../types/index.js';
import type { AuthServices } from '../../container.js';
import { bearerAuth, canManageTenant, isServiceAdministrator } from '../../middleware/bearer-auth.js';
import { publishInBackground } from '../../services/event-publisher.js';
import { logger } from '../../logger.js';

export interface RefreshTokenRouteOptions {
  services: AuthServices;
}

/**
 * Bulk refresh token revocation under /api/refresh-tokens
 *
 * Service administrators may revoke anything. Tenant administrators may revoke
 * within their own tenant only.
 */
export function createRefreshTokenRoutes(options: RefreshTokenRouteOptions) {
  const { services } = options;

  const router = new Hono<AuthEnv>();

  router.use('*', bearerAuth({ signer: services.signer }));

  router.post('/revoke-all', async (c) => {
    const caller = c.get('accessToken');
    if (!isServiceAdministrator(caller)) {
      const body: ApiErrorResponse = {
        error: 'forbidden',
        error_description: 'Service Administrator role is required',
      };
      return c.json(body, 403);
    }

    const revokedCount = await services.refreshTokens.revokeAll();
    logger.warn('refresh_tokens_revoked', { scope: 'service', revokedCount, revokedBy: caller.sub });
    publishInBackground(services.events, {
      type: 'refresh_tokens.revoked',
      tenantId: caller.tenant_id,
      scope: 'service',
      revokedCount,
      actorId: caller.sub,
      occurredAt: services.now(),
    });

    const body: RevocationResponse = { revokedCount, scope: 'service' };
    return c.json(body);
  });

  router.post('/revoke-for-tenant/:tenantId', async (c) => {
    const caller = c.get('accessToken');
    const tenantId = c.req.param('tenantId');

    if (!canManageTenant(caller, tenantId)) {
      logger.warn('refresh_token_revocation_forbidden', { scope: 'tenant', tenantId, callerId: caller.sub });
      const body: ApiErrorResponse = {
        error: 'forbidden',
        error_description: 'You may only revoke refresh tokens for your own tenant',
      };
      return c.json(body, 403);
    }

    const tenant = await services.storage.tenants.findById(tenantId);
    if (!tenant) {
      const body: ApiErrorResponse = { error: 'tenant_not_found', tenantId };
      return c.json(body, 404);
    }

    const revokedCount = await services.refreshTokens.revokeForTenant(tenant.id);
    logger.info('refresh_tokens_revoked', { scope: 'tenant', tenantId, revokedCount, revokedBy: caller.sub });
    publishInBackground(services.events, {
      type: 'refresh_tokens.revoked',
      tenantId: tenant.id,
      scope: 'tenant',
      revokedCount,
      actorId: caller.sub,
      occurredAt: services.now(),
    });

    const body: RevocationResponse = { revokedCount, scope: 'tenant', tenantId: tenant.id };
    return c.json(body);
  });

  router.post('/revoke-for-user/:userId', async (c) => {
    const caller = c.get('accessToken');
    const userId = c.req.param('userId');

    const user = await services.identity.findById(userId);
    if (!user) {
      const body: ApiErrorResponse = { error: 'user_not_found', userId };
      return c.json(body, 404);
    }

    if (!canManageTenant(caller, user.tenantId)) {
      logger.warn('refresh_token_revocation_forbidden', { scope: 'user', userId, callerId: caller.sub });
      const body: ApiErrorResponse = {
        error: 'forbidden',
        error_description: 'You may only revoke refresh tokens for users in your own tenant',
      };
      return c.json(body, 403);
    }

    const revokedCount = await services.refreshTokens.revokeForUser(user.id, user.tenantId);
    logger.info('refresh_tokens_revoked', {
      scope: 'user',
      userId: user.id,
      tenantId: user.tenantId,
      revokedCount,
      revokedBy: caller.sub,
    });
    publishInBackground(services.events, {
      type: 'refresh_tokens.revoked',
      tenantId: user.tenantId,
      scope: 'user',
      userId: user.id,
      revokedCount,
      actorId: caller.sub,
      occurredAt: services.now(),
    });

    const body: RevocationResponse = { revokedCount, scope: 'user', userId: user.id, tenantId: user.tenantId };
    return c.json(body);
  });

  return router;
}
