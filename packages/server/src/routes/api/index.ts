export { createMfaRoutes, type MfaRouteOptions } from './mfa.js';
export { createRefreshTokenRoutes, type RefreshTokenRouteOptions } from './refresh-tokens.js';
export { createRateLimitConfigRoutes, type RateLimitConfigRouteOptions } from './rate-limit-configs.js';
