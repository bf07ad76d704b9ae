import type { RateLimitConfig } from '../types/rate-limit.js';
import type { IRateLimitConfigStorage, UpdateRateLimitConfigInput } from '../storage/interfaces/rate-limit-storage.js';
import { type Result, ok, fail } from '../errors/result.js';
import {
  DEFAULT_RATE_LIMITS,
  RATE_LIMIT_CACHE_TTL_MS,
  RATE_LIMIT_MIN_PERMITTED_REQUESTS,
  RATE_LIMIT_MAX_PERMITTED_REQUESTS,
  RATE_LIMIT_MIN_WINDOW_SECONDS,
  RATE_LIMIT_MAX_WINDOW_SECONDS,
} from '../config/constants.js';
import { logger } from '../logger.js';

export type RateLimitUpdateFailure = 'not_found' | 'invalid_permitted_requests' | 'invalid_window_seconds';

interface CacheEntry {
  config: RateLimitConfig | null;
  expiresAt: number;
}

/**
 * TTL cache for rate limit settings. Concurrent misses on one key share a single load.
 */
export class RateLimitConfigCache {
  private entries = new Map<string, CacheEntry>();
  private inFlight = new Map<string, Promise<RateLimitConfig | null>>();
  // Bumped by clear(); loads started under an older generation are not cached
  private generation = 0;

  constructor(
    private readonly ttlMs: number = RATE_LIMIT_CACHE_TTL_MS,
    private readonly now: () => number = Date.now
  ) {}

  async getOrLoad(
    endpointKey: string,
    load: () => Promise<RateLimitConfig | null>
  ): Promise<RateLimitConfig | null> {
    const key = endpointKey.toLowerCase();
    const cached = this.entries.get(key);
    if (cached && cached.expiresAt > this.now()) {
      return cached.config;
    }

    const pending = this.inFlight.get(key);
    if (pending) {
      return pending;
    }

    const generation = this.generation;
    const loading = load()
      .then((config) => {
        if (generation === this.generation) {
          this.entries.set(key, { config, expiresAt: this.now() + this.ttlMs });
        }
        return config;
      })
      .finally(() => {
        if (this.inFlight.get(key) === loading) {
          this.inFlight.delete(key);
        }
      });

    this.inFlight.set(key, loading);
    return loading;
  }

  clear(): void {
    this.generation++;
    this.entries.clear();
    this.inFlight.clear();
  }
}

/**
 * Per-endpoint rate limit settings, read through an injected cache
 */
export class RateLimitConfigService {
  constructor(
    private readonly storage: IRateLimitConfigStorage,
    private readonly cache: RateLimitConfigCache
  ) {}

  async list(): Promise<RateLimitConfig[]> {
    return this.storage.list();
  }

  /**
   * Active settings for an endpoint, or null when none exist or they are disabled
   */
  async getForEndpoint(endpointKey: string): Promise<RateLimitConfig | null> {
    if (!endpointKey.trim()) return null;

    const config = await this.cache.getOrLoad(endpointKey, () => this.storage.findByEndpoint(endpointKey));
    return config?.isEnabled ? config : null;
  }

  /**
   * Create any default row that is missing; existing rows are left alone
   */
  async seedDefaults(): Promise<number> {
    let created = 0;
    for (const defaults of DEFAULT_RATE_LIMITS) {
      if (!(await this.storage.findByEndpoint(defaults.endpointKey))) {
        await this.storage.create({ ...defaults });
        created++;
      }
    }
    if (created > 0) {
      this.cache.clear();
    }
    return created;
  }

  async update(
    endpointKey: string,
    input: UpdateRateLimitConfigInput
  ): Promise<Result<RateLimitConfig, RateLimitUpdateFailure>> {
    const { permittedRequests, windowSeconds } = input;

    if (
      permittedRequests !== undefined &&
      (!Number.isInteger(permittedRequests) ||
        permittedRequests < RATE_LIMIT_MIN_PERMITTED_REQUESTS ||
        permittedRequests > RATE_LIMIT_MAX_PERMITTED_REQUESTS)
    ) {
      return fail('invalid_permitted_requests');
    }

    if (
      windowSeconds !== undefined &&
      (!Number.isInteger(windowSeconds) ||
        windowSeconds < RATE_LIMIT_MIN_WINDOW_SECONDS ||
        windowSeconds > RATE_LIMIT_MAX_WINDOW_SECONDS)
    ) {
      return fail('invalid_window_seconds');
    }

    const updated = await this.storage.update(endpointKey, input);
    if (!updated) {
      return fail('not_found');
    }

    this.cache.clear();
    logger.info('rate_limit_config_updated', {
      endpointKey: updated.endpointKey,
      permittedRequests: updated.permittedRequests,
      windowSeconds: updated.windowSeconds,
      isEnabled: updated.isEnabled,
    });

    return ok(updated);
  }

  invalidateCache(): void {
    this.cache.clear();
  }
}
