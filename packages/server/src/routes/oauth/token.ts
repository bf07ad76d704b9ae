import { Hono, type Context } from 'hono';
import { z } from 'zod';
import type { MfaRequiredResponse } from '../../types/index.js';
import type { AuthServices } from '../../container.js';
import type { GrantResult } from '../../grants/types.js';
import { OAuthError } from '../../errors/oauth-error.js';
import { ERROR_MFA_REQUIRED } from '../../errors/error-codes.js';
import { grantContextOf, readParams } from '../../middleware/request-params.js';
import {
  TOKEN_CACHE_CONTROL,
  TOKEN_PRAGMA,
  HEADER_CACHE_CONTROL,
  HEADER_PRAGMA,
  GRANT_TYPE_REFRESH_TOKEN,
  MFA_VERIFICATION_URL,
} from '../../config/constants.js';

export interface TokenRouteOptions {
  services: AuthServices;
}

const tokenRequestSchema = z.object({
  grant_type: z.string().optional(),
  username: z.string().optional(),
  password: z.string().optional(),
  tenant_id: z.string().optional(),
  scope: z.string().optional(),
  code: z.string().optional(),
  redirect_uri: z.string().optional(),
  client_id: z.string().optional(),
  client_secret: z.string().optional(),
  code_verifier: z.string().optional(),
  refresh_token: z.string().optional(),
});

/**
 * Token responses must never be cached (RFC 6749 Section 5.1)
 */
function noStore(c: Context): void {
  c.header(HEADER_CACHE_CONTROL, TOKEN_CACHE_CONTROL);
  c.header(HEADER_PRAGMA, TOKEN_PRAGMA);
}

export function renderGrantResult(c: Context, result: GrantResult) {
  if (!result.ok) {
    throw OAuthError.fromFailure(result.error);
  }

  if (result.value.kind === 'mfa_required') {
    const body: MfaRequiredResponse = {
      error: ERROR_MFA_REQUIRED,
      error_description: 'Multi-factor authentication is required',
      mfa_challenge_token: result.value.challengeToken,
      mfa_verification_url: MFA_VERIFICATION_URL,
    };
    return c.json(body, 401);
  }

  return c.json(result.value.response);
}

/**
 * POST /oauth/token and POST /oauth/refresh
 */
export function createTokenRoutes(options: TokenRouteOptions) {
  const { services } = options;

  const router = new Hono();

  router.post('/token', async (c) => {
    noStore(c);

    const params = tokenRequestSchema.parse(await readParams(c));
    const result = await services.grants.dispatch(params, grantContextOf(c));

    return renderGrantResult(c, result);
  });

  router.post('/refresh', async (c) => {
    noStore(c);

    const params = tokenRequestSchema.parse(await readParams(c));
    if (params.grant_type !== GRANT_TYPE_REFRESH_TOKEN) {
      throw OAuthError.unsupportedGrantType("Grant type must be 'refresh_token'");
    }

    const result = await services.refreshGrant(params, grantContextOf(c));
    return renderGrantResult(c, result);
  });

  return router;
}
