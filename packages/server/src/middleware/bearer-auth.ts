import type { MiddlewareHandler } from 'hono';
import type { AuthEnv } from '../types/hono.js';
import type { AccessTokenClaims } from '../types/token.js';
import type { TokenSigner } from '../services/token-signer.js';
import { OAuthError } from '../errors/oauth-error.js';
import {
  HEADER_AUTHORIZATION,
  HEADER_WWW_AUTHENTICATE,
  ROLE_SERVICE_ADMINISTRATOR,
  ROLE_TENANT_ADMINISTRATOR,
} from '../config/constants.js';

export interface BearerAuthOptions {
  signer: TokenSigner;
}

/**
 * Extract bearer token from Authorization header
 */
export function extractBearerToken(authHeader: string | undefined): string | null {
  if (!authHeader?.startsWith('Bearer ')) {
    return null;
  }
  const token = authHeader.slice(7).trim();
  return token || null;
}

/**
 * Claims of a signed, unexpired access token; null otherwise
 */
export async function authenticateBearer(
  signer: TokenSigner,
  authHeader: string | undefined
): Promise<AccessTokenClaims | null> {
  const token = extractBearerToken(authHeader);
  if (!token) {
    return null;
  }

  const result = await signer.validate(token, { checkSignature: true });
  if (!result.ok || result.value.expired) {
    return null;
  }
  return result.value.claims;
}

/**
 * Middleware to validate bearer tokens (JWT access tokens)
 *
 * Sets `accessToken` in context variables on success
 */
export function bearerAuth(options: BearerAuthOptions): MiddlewareHandler<AuthEnv> {
  const { signer } = options;

  return async (c, next) => {
    const authHeader = c.req.header(HEADER_AUTHORIZATION);

    if (!authHeader) {
      c.header(HEADER_WWW_AUTHENTICATE, 'Bearer');
      throw OAuthError.invalidToken('Missing authorization header');
    }

    const token = extractBearerToken(authHeader);
    if (!token) {
      c.header(HEADER_WWW_AUTHENTICATE, 'Bearer error="invalid_request"');
      throw OAuthError.invalidToken('Invalid authorization header format');
    }

    const result = await signer.validate(token, { checkSignature: true });
    if (!result.ok) {
      c.header(HEADER_WWW_AUTHENTICATE, 'Bearer error="invalid_token"');
      throw OAuthError.invalidToken('Token verification failed');
    }
    if (result.value.expired) {
      c.header(HEADER_WWW_AUTHENTICATE, 'Bearer error="invalid_token"');
      throw OAuthError.invalidToken('Token has expired');
    }

    c.set('accessToken', result.value.claims);

    await next();
  };
}

export function hasRole(claims: AccessTokenClaims, role: string): boolean {
  return claims.roles.includes(role);
}

export function isServiceAdministrator(claims: AccessTokenClaims): boolean {
  return hasRole(claims, ROLE_SERVICE_ADMINISTRATOR);
}

/**
 * Service administrators manage every tenant; tenant administrators only their own
 */
export function canManageTenant(claims: AccessTokenClaims, tenantId: string): boolean {
  return (
    isServiceAdministrator(claims) ||
    (hasRole(claims, ROLE_TENANT_ADMINISTRATOR) && claims.tenant_id === tenantId)
  );
}
