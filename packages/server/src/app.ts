import { Hono } from 'hono';
import { cors } from 'hono/cors';
import { type AuthServerDependencies, type AuthServices, createAuthServices } from './container.js';
import { oauthErrorHandler, securityHeaders, requestLogger } from './middleware/error-handler.js';
import { rateLimiter } from './middleware/rate-limiter.js';
import { createAuthorizeRoutes, createTokenRoutes, createIntrospectRoutes } from './routes/oauth/index.js';
import { createOpenIDConfigurationRoutes, createJWKSRoutes } from './routes/discovery/index.js';
import { createMfaRoutes, createRefreshTokenRoutes, createRateLimitConfigRoutes } from './routes/api/index.js';
import { createJwtValidateRoutes } from './routes/jwt/validate.js';
import { RATE_LIMITED_ENDPOINTS } from './config/constants.js';

export interface AuthServerOptions extends AuthServerDependencies {
  enableCors?: boolean;
  enableLogging?: boolean;
}

export interface AuthServer {
  app: Hono;
  services: AuthServices;
}

/**
 * Create the authorization server application
 */
export function createAuthServer(options: AuthServerOptions): AuthServer {
  const { enableCors = true, enableLogging = true } = options;

  const services = createAuthServices(options);
  const app = new Hono();

  // Global error handler
  app.onError(oauthErrorHandler);

  // Security headers
  app.use('*', securityHeaders());

  // Logging
  if (enableLogging) {
    app.use('*', requestLogger());
  }

  // CORS (needed for token endpoint from SPAs)
  if (enableCors) {
    app.use(
      '*',
      cors({
        origin: '*',
        allowMethods: ['GET', 'POST', 'PUT', 'OPTIONS'],
        allowHeaders: ['Authorization', 'Content-Type'],
        exposeHeaders: ['WWW-Authenticate'],
        maxAge: 86400,
      })
    );
  }

  // Rate limiting, per endpoint, from stored settings
  for (const endpointKey of RATE_LIMITED_ENDPOINTS) {
    app.use(`/${endpointKey}`, rateLimiter({ endpointKey, configs: services.rateLimits }));
  }

  app.get('/health', (c) => c.json({ status: 'ok' }));

  // OAuth endpoints
  app.route('/oauth', createTokenRoutes({ services }));
  app.route('/oauth/authorize', createAuthorizeRoutes({ services }));
  app.route('/oauth/introspect', createIntrospectRoutes({ services }));
  app.route('/jwt', createJwtValidateRoutes({ services }));

  // Discovery endpoints
  app.route(
    '/.well-known/openid-configuration',
    createOpenIDConfigurationRoutes({ issuer: services.issuer, signer: services.signer })
  );
  app.route('/.well-known/jwks.json', createJWKSRoutes({ signer: services.signer }));

  // JSON API
  app.route('/api/mfa', createMfaRoutes({ services }));
  app.route('/api/refresh-tokens', createRefreshTokenRoutes({ services }));
  app.route('/api/rate-limit-configs', createRateLimitConfigRoutes({ services }));

  return { app, services };
}
