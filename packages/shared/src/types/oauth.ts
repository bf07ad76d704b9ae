/**
 * OAuth 2.0 Grant Types accepted at the token endpoint
 */
export type GrantType = 'password' | 'authorization_code' | 'refresh_token';

/**
 * Response types for authorization endpoint
 */
export type ResponseType = 'code';

/**
 * PKCE Code Challenge Methods
 * RFC 7636 Section 4.2
 */
export type CodeChallengeMethod = 'S256' | 'plain';

/**
 * Token types
 */
export type TokenType = 'Bearer';

/**
 * Token Response
 * RFC 6749 Section 5.1
 */
export interface TokenResponse {
  access_token: string;
  token_type: TokenType;
  expires_in: number;
  refresh_token: string;
  scope?: string;
}

/**
 * Returned with HTTP 401 when the password was right but a second factor is pending
 */
export interface MfaRequiredResponse {
  error: 'mfa_required';
  error_description: string;
  mfa_challenge_token: string;
  mfa_verification_url: string;
}

/**
 * Token Introspection Response
 * RFC 7662 Section 2.2
 *
 * An inactive token is reported as `{ active: false }` and nothing else.
 */
export type IntrospectionResponse =
  | { active: false }
  | {
      active: true;
      token_type: TokenType | 'refresh_token';
      sub: string;
      username?: string;
      tenant_id: string;
      exp: number;
      iat: number;
      scope?: string;
    };

/**
 * POST /jwt/validate response; never carries claims
 */
export interface JwtValidationResponse {
  valid: boolean;
  expired: boolean;
}

/**
 * OpenID Connect Discovery Response
 * Based on OpenID Connect Discovery 1.0
 */
export interface OpenIDConfiguration {
  issuer: string;
  authorization_endpoint: string;
  token_endpoint: string;
  introspection_endpoint: string;
  jwks_uri: string;
  response_types_supported: ResponseType[];
  grant_types_supported: GrantType[];
  subject_types_supported: string[];
  id_token_signing_alg_values_supported: string[];
  code_challenge_methods_supported: CodeChallengeMethod[];
  scopes_supported: string[];
}

/**
 * JWKS Response
 */
export interface JWKSResponse {
  keys: JsonWebKey[];
}

export interface JsonWebKey {
  kty: string;
  use?: string;
  alg?: string;
  kid?: string;
  // RSA specific
  n?: string;
  e?: string;
  // EC specific
  crv?: string;
  x?: string;
  y?: string;
}
