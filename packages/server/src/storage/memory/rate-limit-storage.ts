import type { RateLimitConfig } from '../../types/rate-limit.js';
import type {
  IRateLimitConfigStorage,
  CreateRateLimitConfigInput,
  UpdateRateLimitConfigInput,
} from '../interfaces/rate-limit-storage.js';
import { generateId } from '../../crypto/random.js';

/**
 * In-memory rate limit config storage implementation
 */
export class MemoryRateLimitConfigStorage implements IRateLimitConfigStorage {
  private configs = new Map<string, RateLimitConfig>(); // lowercase endpoint key -> config

  async list(): Promise<RateLimitConfig[]> {
    return [...this.configs.values()].sort((a, b) => a.endpointKey.localeCompare(b.endpointKey));
  }

  async findByEndpoint(endpointKey: string): Promise<RateLimitConfig | null> {
    return this.configs.get(endpointKey.toLowerCase()) ?? null;
  }

  async create(input: CreateRateLimitConfigInput): Promise<RateLimitConfig> {
    const config: RateLimitConfig = {
      id: generateId(),
      endpointKey: input.endpointKey,
      permittedRequests: input.permittedRequests,
      windowSeconds: input.windowSeconds,
      isEnabled: input.isEnabled ?? true,
      createdAt: new Date(),
    };
    this.configs.set(input.endpointKey.toLowerCase(), config);
    return config;
  }

  async update(endpointKey: string, input: UpdateRateLimitConfigInput): Promise<RateLimitConfig | null> {
    const key = endpointKey.toLowerCase();
    const existing = this.configs.get(key);
    if (!existing) return null;

    const updated: RateLimitConfig = { ...existing, ...input, updatedAt: new Date() };
    this.configs.set(key, updated);
    return updated;
  }
}
