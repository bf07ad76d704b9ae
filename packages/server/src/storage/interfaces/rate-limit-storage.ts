import type { RateLimitConfig } from '../../types/rate-limit.js';

export type CreateRateLimitConfigInput = Pick<RateLimitConfig, 'endpointKey' | 'permittedRequests' | 'windowSeconds'> &
  Partial<Pick<RateLimitConfig, 'isEnabled'>>;

export type UpdateRateLimitConfigInput = Partial<
  Pick<RateLimitConfig, 'permittedRequests' | 'windowSeconds' | 'isEnabled'>
>;

/**
 * Storage interface for per-endpoint rate limit settings
 */
export interface IRateLimitConfigStorage {
  list(): Promise<RateLimitConfig[]>;

  findByEndpoint(endpointKey: string): Promise<RateLimitConfig | null>;

  create(input: CreateRateLimitConfigInput): Promise<RateLimitConfig>;

  update(endpointKey: string, input: UpdateRateLimitConfigInput): Promise<RateLimitConfig | null>;
}
