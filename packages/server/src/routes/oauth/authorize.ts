import { Hono } from 'hono';
import type { AuthServices } from '../../container.js';
import { createAuthorizeHandlers } from '../../grants/authorization-code/authorize.js';

export interface AuthorizeRouteOptions {
  services: AuthServices;
}

/**
 * Create authorization endpoint routes
 */
export function createAuthorizeRoutes(options: AuthorizeRouteOptions) {
  const { services } = options;

  const router = new Hono();

  const { handleGet, handlePost } = createAuthorizeHandlers({
    clients: services.storage.clients,
    codes: services.codes,
    consents: services.consents,
    verifier: services.verifier,
    identity: services.identity,
    signer: services.signer,
    now: services.now,
  });

  // GET /authorize - Initial authorization request
  router.get('/', handleGet);

  // POST /authorize - Login and consent form submission
  router.post('/', handlePost);

  return router;
}
