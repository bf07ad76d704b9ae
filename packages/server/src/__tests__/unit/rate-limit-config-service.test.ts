import { describe, it, expect, beforeEach } from 'vitest';
import { RateLimitConfigCache, RateLimitConfigService } from '../../services/rate-limit-config-service.js';
import { MemoryRateLimitConfigStorage } from '../../storage/memory/index.js';
import type { RateLimitConfig } from '../../types/rate-limit.js';

class CountingStorage extends MemoryRateLimitConfigStorage {
  lookups = 0;

  override async findByEndpoint(endpointKey: string): Promise<RateLimitConfig | null> {
    this.lookups++;
    return super.findByEndpoint(endpointKey);
  }
}

describe('RateLimitConfigCache', () => {
  it('should share one load between concurrent misses', async () => {
    const cache = new RateLimitConfigCache();
    let loads = 0;
    const load = async () => {
      loads++;
      return null;
    };

    await Promise.all([cache.getOrLoad('oauth/token', load), cache.getOrLoad('OAuth/Token', load)]);

    expect(loads).toBe(1);
  });

  it('should remember an absent config until the entry expires', async () => {
    let now = 1_000;
    const cache = new RateLimitConfigCache(30_000, () => now);
    let loads = 0;
    const load = async () => {
      loads++;
      return null;
    };

    await cache.getOrLoad('jwt/validate', load);
    now += 29_999;
    await cache.getOrLoad('jwt/validate', load);
    expect(loads).toBe(1);

    now += 1;
    await cache.getOrLoad('jwt/validate', load);
    expect(loads).toBe(2);
  });

  it('should not cache a failed load', async () => {
    const cache = new RateLimitConfigCache();

    await expect(cache.getOrLoad('oauth/token', () => Promise.reject(new Error('db down')))).rejects.toThrow(
      'db down'
    );

    expect(await cache.getOrLoad('oauth/token', async () => null)).toBeNull();
  });

  it('should not keep a load that was in flight when the cache was cleared', async () => {
    const cache = new RateLimitConfigCache();
    let release: (config: RateLimitConfig | null) => void = () => undefined;
    const stale = cache.getOrLoad(
      'oauth/token',
      () =>
        new Promise<RateLimitConfig | null>((resolve) => {
          release = resolve;
        })
    );

    cache.clear();
    release(null);
    expect(await stale).toBeNull();

    let loads = 0;
    await cache.getOrLoad('oauth/token', async () => {
      loads++;
      return null;
    });
    expect(loads).toBe(1);
  });
});

describe('RateLimitConfigService', () => {
  let storage: CountingStorage;
  let service: RateLimitConfigService;

  beforeEach(() => {
    storage = new CountingStorage();
    service = new RateLimitConfigService(storage, new RateLimitConfigCache());
  });

  it('should seed the three defaults once', async () => {
    expect(await service.seedDefaults()).toBe(3);
    expect(await service.seedDefaults()).toBe(0);

    const configs = await service.list();
    expect(configs.map((config) => [config.endpointKey, config.permittedRequests, config.windowSeconds])).toEqual([
      ['jwt/validate', 60, 60],
      ['oauth/authorize', 120, 60],
      ['oauth/token', 60, 60],
    ]);
  });

  it('should leave an existing row untouched when seeding', async () => {
    await storage.create({ endpointKey: 'oauth/token', permittedRequests: 5, windowSeconds: 10 });

    expect(await service.seedDefaults()).toBe(2);
    expect(await service.getForEndpoint('oauth/token')).toMatchObject({ permittedRequests: 5, windowSeconds: 10 });
  });

  it('should read through the cache', async () => {
    await service.seedDefaults();
    const before = storage.lookups;

    await service.getForEndpoint('oauth/token');
    await service.getForEndpoint('oauth/token');

    expect(storage.lookups - before).toBe(1);
  });

  it('should hide disabled and blank endpoints', async () => {
    await storage.create({ endpointKey: 'oauth/token', permittedRequests: 5, windowSeconds: 10, isEnabled: false });

    expect(await service.getForEndpoint('oauth/token')).toBeNull();
    expect(await service.getForEndpoint('  ')).toBeNull();
  });

  it('should apply an update without waiting for the cache to expire', async () => {
    await service.seedDefaults();
    await service.getForEndpoint('oauth/token');

    const result = await service.update('oauth/token', { permittedRequests: 10 });

    expect(result.ok && result.value.permittedRequests).toBe(10);
    expect(await service.getForEndpoint('oauth/token')).toMatchObject({ permittedRequests: 10, windowSeconds: 60 });
  });

  it('should validate the ranges', async () => {
    await service.seedDefaults();

    expect(await service.update('oauth/token', { permittedRequests: 0 })).toEqual({
      ok: false,
      error: 'invalid_permitted_requests',
    });
    expect(await service.update('oauth/token', { permittedRequests: 10001 })).toEqual({
      ok: false,
      error: 'invalid_permitted_requests',
    });
    expect(await service.update('oauth/token', { permittedRequests: 1.5 })).toEqual({
      ok: false,
      error: 'invalid_permitted_requests',
    });
    expect(await service.update('oauth/token', { windowSeconds: 3601 })).toEqual({
      ok: false,
      error: 'invalid_window_seconds',
    });
    expect((await service.update('oauth/token', { permittedRequests: 10000, windowSeconds: 3600 })).ok).toBe(true);
  });

  it('should report an unknown endpoint', async () => {
    expect(await service.update('oauth/unknown', { isEnabled: false })).toEqual({ ok: false, error: 'not_found' });
  });
});
