export { createAuthorizeRoutes, type AuthorizeRouteOptions } from './authorize.js';
export { createTokenRoutes, type TokenRouteOptions } from './token.js';
export { createIntrospectRoutes, type IntrospectRouteOptions } from './introspect.js';
