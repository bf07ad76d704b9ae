export { createJWKSRoutes, type JWKSRouteOptions } from './jwks.js';
export { createOpenIDConfigurationRoutes, type OpenIDConfigurationRouteOptions } from './openid-configuration.js';
