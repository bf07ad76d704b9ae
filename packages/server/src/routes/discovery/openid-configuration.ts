import { Hono } from 'hono';
import type { OpenIDConfiguration } from '../../types/index.js';
import type { TokenSigner } from '../../services/token-signer.js';
import {
  RESPONSE_TYPE_CODE,
  SUPPORTED_CODE_CHALLENGE_METHODS,
  SUPPORTED_GRANT_TYPES,
  SUPPORTED_SCOPES,
} from '../../config/constants.js';

export interface OpenIDConfigurationRouteOptions {
  issuer: string;
  signer: TokenSigner;
}

/**
 * Create OpenID Connect discovery endpoint
 *
 * GET /.well-known/openid-configuration
 */
export function createOpenIDConfigurationRoutes(options: OpenIDConfigurationRouteOptions) {
  const { signer } = options;
  const baseUrl = options.issuer.replace(/\/+$/, '');

  const router = new Hono();

  router.get('/', (c) => {
    const config: OpenIDConfiguration = {
      issuer: baseUrl,
      authorization_endpoint: `${baseUrl}/oauth/authorize`,
      token_endpoint: `${baseUrl}/oauth/token`,
      introspection_endpoint: `${baseUrl}/oauth/introspect`,
      jwks_uri: `${baseUrl}/.well-known/jwks.json`,
      response_types_supported: [RESPONSE_TYPE_CODE],
      grant_types_supported: [...SUPPORTED_GRANT_TYPES],
      subject_types_supported: ['public'],
      id_token_signing_alg_values_supported: [signer.algorithm],
      code_challenge_methods_supported: [...SUPPORTED_CODE_CHALLENGE_METHODS],
      scopes_supported: [...SUPPORTED_SCOPES],
    };

    // Cache for 1 hour
    c.header('Cache-Control', 'public, max-age=3600');

    return c.json(config);
  });

  return router;
}
