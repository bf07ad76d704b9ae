/**
 * Per-endpoint rate limit settings
 */
export interface RateLimitConfig {
  id: string;
  endpointKey: string;
  permittedRequests: number;
  windowSeconds: number;
  isEnabled: boolean;
  createdAt: Date;
  updatedAt?: Date;
}
