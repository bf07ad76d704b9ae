import { describe, it, expect, beforeEach } from 'vitest';
import {
  setupTestContext,
  accessTokenFor,
  bearer,
  readJson,
  type TestContext,
} from './test-setup.js';
import type { ApiErrorResponse } from '../../types/index.js';
import type { RateLimitConfig } from '../../types/rate-limit.js';

describe('Rate Limiting', () => {
  let ctx: TestContext;

  function validate(ip = '203.0.113.10') {
    return ctx.app.request('/jwt/validate', {
      method: 'POST',
      headers: { 'Content-Type': 'application/json', 'X-Forwarded-For': ip },
      body: JSON.stringify({ token: 'not-a-jwt' }),
    });
  }

  beforeEach(async () => {
    ctx = await setupTestContext();
    await ctx.storage.rateLimitConfigs.create({ endpointKey: 'jwt/validate', permittedRequests: 2, windowSeconds: 60 });
  });

  describe('Limiter', () => {
    it('should count requests per client address', async () => {
      const first = await validate();
      expect(first.status).toBe(200);
      expect(first.headers.get('X-RateLimit-Limit')).toBe('2');
      expect(first.headers.get('X-RateLimit-Remaining')).toBe('1');

      const second = await validate();
      expect(second.headers.get('X-RateLimit-Remaining')).toBe('0');

      const third = await validate();
      expect(third.status).toBe(429);
      const error = await readJson<ApiErrorResponse>(third);
      expect(error.error).toBe('too_many_requests');
      expect(error.error_description).toBe('Rate limit exceeded. Try again in 60 seconds.');
    });

    it('should keep separate windows for separate addresses', async () => {
      await validate('203.0.113.10');
      await validate('203.0.113.10');

      const other = await validate('203.0.113.20');
      expect(other.status).toBe(200);
    });

    it('should leave endpoints without settings unlimited', async () => {
      const res = await ctx.app.request('/oauth/introspect', {
        method: 'POST',
        body: new URLSearchParams({ token: 'garbage' }),
      });

      expect(res.status).toBe(200);
      expect(res.headers.get('X-RateLimit-Limit')).toBeNull();
    });

    it('should stop limiting once disabled', async () => {
      await ctx.services.rateLimits.update('jwt/validate', { isEnabled: false });

      for (let i = 0; i < 3; i++) {
        expect((await validate()).status).toBe(200);
      }
    });
  });

  describe('GET/PUT /api/rate-limit-configs', () => {
    it('should list the settings for a service administrator', async () => {
      const res = await ctx.app.request('/api/rate-limit-configs', {
        headers: bearer(await accessTokenFor(ctx, ctx.root)),
      });

      expect(res.status).toBe(200);
      const configs = await readJson<RateLimitConfig[]>(res);
      expect(configs.map((config) => config.endpointKey)).toEqual(['jwt/validate']);
      expect(configs.at(0)).toMatchObject({ permittedRequests: 2, windowSeconds: 60, isEnabled: true });
    });

    it('should forbid anyone else', async () => {
      const res = await ctx.app.request('/api/rate-limit-configs', {
        headers: bearer(await accessTokenFor(ctx, ctx.tenantAdmin)),
      });

      expect(res.status).toBe(403);
      expect((await readJson<ApiErrorResponse>(res)).error).toBe('forbidden');
    });

    it('should apply an update at once', async () => {
      await validate();
      await validate();

      const res = await ctx.app.request('/api/rate-limit-configs/jwt/validate', {
        method: 'PUT',
        headers: { 'Content-Type': 'application/json', ...bearer(await accessTokenFor(ctx, ctx.root)) },
        body: JSON.stringify({ permittedRequests: 3 }),
      });

      expect(res.status).toBe(200);
      expect(await readJson<RateLimitConfig>(res)).toMatchObject({ endpointKey: 'jwt/validate', permittedRequests: 3 });
      expect((await validate()).status).toBe(200);
      expect((await validate()).status).toBe(429);
    });

    it('should reject out-of-range values', async () => {
      const res = await ctx.app.request('/api/rate-limit-configs/jwt/validate', {
        method: 'PUT',
        headers: { 'Content-Type': 'application/json', ...bearer(await accessTokenFor(ctx, ctx.root)) },
        body: JSON.stringify({ permittedRequests: 0 }),
      });

      expect(res.status).toBe(400);
      expect((await readJson<ApiErrorResponse>(res)).error_description).toBe(
        'permittedRequests must be between 1 and 10000'
      );
    });

    it('should report an unknown endpoint', async () => {
      const res = await ctx.app.request('/api/rate-limit-configs/oauth/unknown', {
        method: 'PUT',
        headers: { 'Content-Type': 'application/json', ...bearer(await accessTokenFor(ctx, ctx.root)) },
        body: JSON.stringify({ windowSeconds: 30 }),
      });

      expect(res.status).toBe(404);
      expect((await readJson<ApiErrorResponse>(res)).error).toBe('not_found');
    });
  });
});
