import type { AccessTokenClaims } from './token.js';

/**
 * Extended Hono context variables
 */
export interface AuthVariables {
  accessToken: AccessTokenClaims;
}

/**
 * Auth-aware Hono environment
 */
export type AuthEnv = { Variables: AuthVariables };
