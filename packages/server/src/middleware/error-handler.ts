import type { ErrorHandler, MiddlewareHandler } from 'hono';
import { HTTPException } from 'hono/http-exception';
import { ZodError } from 'zod';
import { OAuthError } from '../errors/oauth-error.js';
import { getConfig } from '../config/index.js';
import { logger } from '../logger.js';
import { TOKEN_CACHE_CONTROL, TOKEN_PRAGMA, HEADER_CACHE_CONTROL, HEADER_PRAGMA } from '../config/constants.js';

function isProduction(): boolean {
  return getConfig().server.nodeEnv === 'production';
}

/**
 * Global error handler for OAuth errors
 *
 * Transforms errors into RFC-compliant OAuth error responses
 */
export const oauthErrorHandler: ErrorHandler = (err, c) => {
  // Set no-cache headers for error responses
  c.header(HEADER_CACHE_CONTROL, TOKEN_CACHE_CONTROL);
  c.header(HEADER_PRAGMA, TOKEN_PRAGMA);

  if (err instanceof OAuthError) {
    logger.info('oauth_error', { path: c.req.path, error: err.code, status: err.statusCode });
    return c.json(err.toJSON(), err.statusCode);
  }

  if (err instanceof ZodError) {
    const messages = err.issues.map((issue) => issue.message).join(', ');
    return c.json(OAuthError.invalidRequest(messages || 'Validation failed').toJSON(), 400);
  }

  if (err instanceof HTTPException) {
    return err.getResponse();
  }

  logger.error('unhandled_error', {
    path: c.req.path,
    message: err.message,
    stack: isProduction() ? undefined : err.stack,
  });

  const serverError = OAuthError.serverError(isProduction() ? 'An unexpected error occurred' : err.message);

  return c.json(serverError.toJSON(), 500);
};

/**
 * Security headers middleware
 */
export function securityHeaders(): MiddlewareHandler {
  return async (c, next) => {
    await next();

    // Prevent clickjacking
    c.header('X-Frame-Options', 'DENY');

    // Prevent MIME type sniffing
    c.header('X-Content-Type-Options', 'nosniff');

    // Referrer policy
    c.header('Referrer-Policy', 'strict-origin-when-cross-origin');

    // Content Security Policy for the consent page
    if (c.req.path.startsWith('/oauth/authorize')) {
      c.header('Content-Security-Policy', "default-src 'self'; style-src 'unsafe-inline'; frame-ancestors 'none'; form-action 'self'");
    }

    if (isProduction()) {
      c.header('Strict-Transport-Security', 'max-age=31536000; includeSubDomains');
    }
  };
}

/**
 * Request logging middleware
 */
export function requestLogger(): MiddlewareHandler {
  return async (c, next) => {
    const start = Date.now();

    await next();

    // Never the query string: it may carry codes or state
    logger.info('request', {
      method: c.req.method,
      path: c.req.path,
      status: c.res.status,
      duration: Date.now() - start,
    });
  };
}
