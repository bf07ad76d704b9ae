import { Hono } from 'hono';
import { z } from 'zod';
import type { AuthServices } from '../../container.js';
import { OAuthError } from '../../errors/oauth-error.js';
import { readParams } from '../../middleware/request-params.js';
import { HEADER_CACHE_CONTROL, TOKEN_CACHE_CONTROL } from '../../config/constants.js';

export interface IntrospectRouteOptions {
  services: AuthServices;
}

const introspectRequestSchema = z.object({
  token: z.string().optional(),
  token_type_hint: z.string().optional(),
});

/**
 * Create token introspection endpoint routes
 *
 * RFC 7662. Apart from a missing token the answer is always 200; an
 * unusable token of any kind is `{ active: false }`.
 */
export function createIntrospectRoutes(options: IntrospectRouteOptions) {
  const { services } = options;

  const router = new Hono();

  router.post('/', async (c) => {
    const params = introspectRequestSchema.parse(await readParams(c));
    const token = params.token?.trim();

    if (!token) {
      throw OAuthError.invalidRequest('token parameter is required');
    }

    c.header(HEADER_CACHE_CONTROL, TOKEN_CACHE_CONTROL);
    return c.json(await services.introspection.introspect(token, params.token_type_hint));
  });

  return router;
}
