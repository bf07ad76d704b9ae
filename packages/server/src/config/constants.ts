/**
 * OAuth 2.0 Constants
 */

// Grant types
export const GRANT_TYPE_PASSWORD = 'password' as const;
export const GRANT_TYPE_AUTHORIZATION_CODE = 'authorization_code' as const;
export const GRANT_TYPE_REFRESH_TOKEN = 'refresh_token' as const;

// All supported grant types
export const SUPPORTED_GRANT_TYPES = [
  GRANT_TYPE_PASSWORD,
  GRANT_TYPE_AUTHORIZATION_CODE,
  GRANT_TYPE_REFRESH_TOKEN,
] as const;

// Response types
export const RESPONSE_TYPE_CODE = 'code' as const;

// Code challenge methods
export const CODE_CHALLENGE_METHOD_S256 = 'S256' as const;
export const CODE_CHALLENGE_METHOD_PLAIN = 'plain' as const;
export const SUPPORTED_CODE_CHALLENGE_METHODS = [
  CODE_CHALLENGE_METHOD_S256,
  CODE_CHALLENGE_METHOD_PLAIN,
] as const;

// Token types
export const TOKEN_TYPE_BEARER = 'Bearer' as const;
export const TOKEN_TYPE_HINT_REFRESH = 'refresh_token' as const;

// Signing algorithms
export const SIGNING_ALGORITHM_RS256 = 'RS256' as const;
export const SIGNING_ALGORITHM_RS384 = 'RS384' as const;
export const SIGNING_ALGORITHM_RS512 = 'RS512' as const;
export const SIGNING_ALGORITHM_ES256 = 'ES256' as const;
export const SIGNING_ALGORITHM_ES384 = 'ES384' as const;
export const SIGNING_ALGORITHM_ES512 = 'ES512' as const;

export const SUPPORTED_SIGNING_ALGORITHMS = [
  SIGNING_ALGORITHM_RS256,
  SIGNING_ALGORITHM_RS384,
  SIGNING_ALGORITHM_RS512,
  SIGNING_ALGORITHM_ES256,
  SIGNING_ALGORITHM_ES384,
  SIGNING_ALGORITHM_ES512,
] as const;

export const DEFAULT_KEY_ID = 'auth-key-1';

// Default TTLs (in seconds)
export const DEFAULT_ACCESS_TOKEN_TTL = 3600; // 1 hour
export const DEFAULT_REFRESH_TOKEN_TTL_DAYS = 30;
export const MIN_REFRESH_TOKEN_TTL_DAYS = 1;
export const MAX_REFRESH_TOKEN_TTL_DAYS = 365;
export const DEFAULT_AUTHORIZATION_CODE_TTL = 600; // 10 minutes
export const DEFAULT_MFA_CHALLENGE_TTL = 600; // 10 minutes
export const CONSENT_VALIDITY_DAYS = 90;

// Token/code lengths
export const AUTHORIZATION_CODE_LENGTH = 32; // bytes
export const REFRESH_TOKEN_LENGTH = 64; // bytes
export const MFA_CHALLENGE_TOKEN_LENGTH = 64; // bytes

// MFA
export const BACKUP_CODE_COUNT = 10;
export const BACKUP_CODE_LENGTH = 8; // characters
export const BACKUP_CODE_CHARSET = 'ABCDEFGHJKLMNPQRSTUVWXYZ23456789';
export const MFA_VERIFICATION_URL = '/api/mfa/verify';

// Tenant settings
export const SETTING_REFRESH_TOKEN_EXPIRATION_DAYS = 'RefreshToken.ExpirationDays';
export const SETTING_MFA_REQUIRED = 'Mfa.Required';
export const SETTING_SAML_ATTRIBUTE_MAPPING = 'saml2.attributeMapping';

// Login lockout
export const MAX_FAILED_LOGIN_ATTEMPTS = 5;
export const LOCKOUT_DURATION_SECONDS = 900; // 15 minutes

// Rate limiting
export const RATE_LIMIT_CACHE_TTL_MS = 30000; // 30 seconds
export const RATE_LIMIT_MIN_PERMITTED_REQUESTS = 1;
export const RATE_LIMIT_MAX_PERMITTED_REQUESTS = 10000;
export const RATE_LIMIT_MIN_WINDOW_SECONDS = 1;
export const RATE_LIMIT_MAX_WINDOW_SECONDS = 3600;

export const ENDPOINT_TOKEN = 'oauth/token' as const;
export const ENDPOINT_JWT_VALIDATE = 'jwt/validate' as const;
export const ENDPOINT_AUTHORIZE = 'oauth/authorize' as const;

export const RATE_LIMITED_ENDPOINTS = [ENDPOINT_TOKEN, ENDPOINT_JWT_VALIDATE, ENDPOINT_AUTHORIZE] as const;

export const DEFAULT_RATE_LIMITS = [
  { endpointKey: ENDPOINT_TOKEN, permittedRequests: 60, windowSeconds: 60 },
  { endpointKey: ENDPOINT_JWT_VALIDATE, permittedRequests: 60, windowSeconds: 60 },
  { endpointKey: ENDPOINT_AUTHORIZE, permittedRequests: 120, windowSeconds: 60 },
] as const;

// Scopes advertised in discovery
export const OPENID_SCOPE = 'openid' as const;
export const PROFILE_SCOPE = 'profile' as const;
export const EMAIL_SCOPE = 'email' as const;
export const API_READ_SCOPE = 'api.read' as const;
export const API_WRITE_SCOPE = 'api.write' as const;

export const SUPPORTED_SCOPES = [
  OPENID_SCOPE,
  PROFILE_SCOPE,
  EMAIL_SCOPE,
  API_READ_SCOPE,
  API_WRITE_SCOPE,
] as const;

// Roles
export const ROLE_SERVICE_ADMINISTRATOR = 'Service Administrator';
export const ROLE_TENANT_ADMINISTRATOR = 'Tenant Administrator';

// HTTP headers
export const HEADER_AUTHORIZATION = 'Authorization';
export const HEADER_WWW_AUTHENTICATE = 'WWW-Authenticate';
export const HEADER_CACHE_CONTROL = 'Cache-Control';
export const HEADER_PRAGMA = 'Pragma';
export const HEADER_FORWARDED_FOR = 'X-Forwarded-For';
export const HEADER_USER_AGENT = 'User-Agent';

// Cache control for token responses
export const TOKEN_CACHE_CONTROL = 'no-store';
export const TOKEN_PRAGMA = 'no-cache';
