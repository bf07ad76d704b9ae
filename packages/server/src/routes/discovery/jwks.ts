import { Hono } from 'hono';
import type { TokenSigner } from '../../services/token-signer.js';

export interface JWKSRouteOptions {
  signer: TokenSigner;
}

/**
 * Create JWKS endpoint
 *
 * GET /.well-known/jwks.json
 */
export function createJWKSRoutes(options: JWKSRouteOptions) {
  const { signer } = options;

  const router = new Hono();

  router.get('/', async (c) => {
    const response = await signer.jwks();

    // Cache for 1 hour
    c.header('Cache-Control', 'public, max-age=3600');

    return c.json(response);
  });

  return router;
}
