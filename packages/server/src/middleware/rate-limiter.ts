import type { MiddlewareHandler } from 'hono';
import type { RateLimitConfigService } from '../services/rate-limit-config-service.js';
import { OAuthError } from '../errors/oauth-error.js';
import { clientIp } from './request-params.js';
import { logger } from '../logger.js';

export interface RateLimiterOptions {
  endpointKey: string; // e.g. `oauth/token`
  configs: RateLimitConfigService;
  now?: () => number;
}

interface RateLimitEntry {
  count: number;
  resetAt: number;
}

const CLEANUP_INTERVAL_MS = 60_000;

/**
 * Fixed-window limiter per `{endpoint}:{client ip}`.
 * Limits come from the endpoint's stored config; a missing or disabled config lets everything through.
 */
export function rateLimiter(options: RateLimiterOptions): MiddlewareHandler {
  const { endpointKey, configs } = options;
  const now = options.now ?? Date.now;

  const store = new Map<string, RateLimitEntry>();

  // Cleanup expired entries periodically
  const cleanupInterval = setInterval(() => {
    const current = now();
    for (const [key, entry] of store) {
      if (entry.resetAt <= current) {
        store.delete(key);
      }
    }
  }, CLEANUP_INTERVAL_MS);

  // Prevent the interval from keeping the process alive
  cleanupInterval.unref();

  return async (c, next) => {
    const config = await configs.getForEndpoint(endpointKey);
    if (!config) {
      await next();
      return;
    }

    const key = `${endpointKey}:${clientIp(c)}`;
    const current = now();

    let entry = store.get(key);

    // Create new entry if doesn't exist or window has passed
    if (!entry || entry.resetAt <= current) {
      entry = { count: 0, resetAt: current + config.windowSeconds * 1000 };
      store.set(key, entry);
    }

    c.header('X-RateLimit-Limit', String(config.permittedRequests));
    c.header('X-RateLimit-Reset', String(Math.ceil(entry.resetAt / 1000)));

    if (entry.count >= config.permittedRequests) {
      c.header('X-RateLimit-Remaining', '0');
      c.header('Retry-After', String(Math.ceil((entry.resetAt - current) / 1000)));
      logger.warn('rate_limit_exceeded', { key, limit: config.permittedRequests });

      throw OAuthError.tooManyRequests(`Rate limit exceeded. Try again in ${config.windowSeconds} seconds.`);
    }

    entry.count++;
    c.header('X-RateLimit-Remaining', String(config.permittedRequests - entry.count));

    await next();
  };
}
