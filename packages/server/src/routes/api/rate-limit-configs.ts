import { Hono } from 'hono';
import { z } from 'zod';
import { zValidator } from '@hono/zod-validator';
import type { AuthEnv } from '../../types/hono.js';
import type { ApiErrorResponse } from '../../types/index.js';
import type { AuthServices } from '../../container.js';
import type { RateLimitUpdateFailure } from '../../services/rate-limit-config-service.js';
import { bearerAuth, isServiceAdministrator } from '../../middleware/bearer-auth.js';
import { ERROR_INVALID_REQUEST } from '../../errors/error-codes.js';
import {
  RATE_LIMIT_MAX_PERMITTED_REQUESTS,
  RATE_LIMIT_MAX_WINDOW_SECONDS,
  RATE_LIMIT_MIN_PERMITTED_REQUESTS,
  RATE_LIMIT_MIN_WINDOW_SECONDS,
} from '../../config/constants.js';

export interface RateLimitConfigRouteOptions {
  services: AuthServices;
}

const updateSchema = z.object({
  permittedRequests: z.number().optional(),
  windowSeconds: z.number().optional(),
  isEnabled: z.boolean().optional(),
});

const UPDATE_MESSAGES: Record<RateLimitUpdateFailure, string> = {
  not_found: 'No rate limit configuration exists for this endpoint',
  invalid_permitted_requests: `permittedRequests must be between ${RATE_LIMIT_MIN_PERMITTED_REQUESTS} and ${RATE_LIMIT_MAX_PERMITTED_REQUESTS}`,
  invalid_window_seconds: `windowSeconds must be between ${RATE_LIMIT_MIN_WINDOW_SECONDS} and ${RATE_LIMIT_MAX_WINDOW_SECONDS}`,
};

/**
 * Service administrator view of the per-endpoint rate limits
 */
export function createRateLimitConfigRoutes(options: RateLimitConfigRouteOptions) {
  const { services } = options;

  const router = new Hono<AuthEnv>();

  router.use('*', bearerAuth({ signer: services.signer }));

  router.use('*', async (c, next) => {
    if (!isServiceAdministrator(c.get('accessToken'))) {
      const body: ApiErrorResponse = { error: 'forbidden', error_description: 'Service Administrator role is required' };
      return c.json(body, 403);
    }
    await next();
  });

  router.get('/', async (c) => c.json(await services.rateLimits.list()));

  // Endpoint keys contain a slash, e.g. PUT /api/rate-limit-configs/oauth/token
  router.put(
    '/:endpointKey{.+}',
    zValidator('json', updateSchema, (result, c) => {
      if (!result.success) {
        return c.json({ error: ERROR_INVALID_REQUEST, error_description: 'Invalid request body' }, 400);
      }
    }),
    async (c) => {
      const result = await services.rateLimits.update(c.req.param('endpointKey'), c.req.valid('json'));
      if (!result.ok) {
        const status = result.error === 'not_found' ? 404 : 400;
        const error = result.error === 'not_found' ? 'not_found' : ERROR_INVALID_REQUEST;
        return c.json({ error, error_description: UPDATE_MESSAGES[result.error] }, status);
      }
      return c.json(result.value);
    }
  );

  return router;
}
