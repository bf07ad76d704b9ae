import type { ContentfulStatusCode } from 'hono/utils/http-status';
import type { TokenResponse } from '../types/index.js';
import type { ClientMetadata } from '../types/token.js';
import type { OAuthErrorCode } from '../errors/error-codes.js';
import type { OAuthFailure } from '../errors/oauth-error.js';
import { type Result, fail } from '../errors/result.js';

/**
 * Token endpoint parameters after body parsing (form or JSON)
 */
export interface TokenRequestParams {
  grant_type?: string;
  username?: string;
  password?: string;
  tenant_id?: string;
  scope?: string;
  code?: string;
  redirect_uri?: string;
  client_id?: string;
  client_secret?: string;
  code_verifier?: string;
  refresh_token?: string;
}

/**
 * Transport facts a grant may use: the Host header for tenant resolution, and audit metadata
 */
export interface GrantContext extends ClientMetadata {
  host?: string;
}

export type GrantOutcome =
  | { kind: 'tokens'; response: TokenResponse }
  | { kind: 'mfa_required'; challengeToken: string };

export type GrantResult = Result<GrantOutcome, OAuthFailure>;

export type GrantHandler = (params: TokenRequestParams, context: GrantContext) => Promise<GrantResult>;

export function grantFailure(
  error: OAuthErrorCode,
  description: string,
  status?: ContentfulStatusCode
): { ok: false; error: OAuthFailure } {
  return fail({ error, description, status });
}

export function metadataOf(context: GrantContext): ClientMetadata {
  return { ipAddress: context.ipAddress, userAgent: context.userAgent };
}
