import type { Pool } from 'pg';
import type { RateLimitConfig } from '../../../types/rate-limit.js';
import type {
  IRateLimitConfigStorage,
  CreateRateLimitConfigInput,
  UpdateRateLimitConfigInput,
} from '../../interfaces/rate-limit-storage.js';
import { generateId } from '../../../crypto/random.js';
import { requireRow } from '../client.js';

interface RateLimitConfigRow {
  id: string;
  endpoint_key: string;
  permitted_requests: number;
  window_seconds: number;
  is_enabled: boolean;
  created_at: Date;
  updated_at: Date | null;
}

function rowToRateLimitConfig(row: RateLimitConfigRow): RateLimitConfig {
  return {
    id: row.id,
    endpointKey: row.endpoint_key,
    permittedRequests: row.permitted_requests,
    windowSeconds: row.window_seconds,
    isEnabled: row.is_enabled,
    createdAt: row.created_at,
    updatedAt: row.updated_at ?? undefined,
  };
}

/**
 * PostgreSQL rate limit config storage implementation
 */
export class PostgresRateLimitConfigStorage implements IRateLimitConfigStorage {
  constructor(private readonly pool: Pool) {}

  async list(): Promise<RateLimitConfig[]> {
    const result = await this.pool.query<RateLimitConfigRow>(
      'select * from rate_limit_configs order by endpoint_key'
    );
    return result.rows.map(rowToRateLimitConfig);
  }

  async findByEndpoint(endpointKey: string): Promise<RateLimitConfig | null> {
    const result = await this.pool.query<RateLimitConfigRow>(
      'select * from rate_limit_configs where lower(endpoint_key) = lower($1)',
      [endpointKey]
    );
    const row = result.rows.at(0);
    return row ? rowToRateLimitConfig(row) : null;
  }

  async create(input: CreateRateLimitConfigInput): Promise<RateLimitConfig> {
    const result = await this.pool.query<RateLimitConfigRow>(
      `insert into rate_limit_configs (id, endpoint_key, permitted_requests, window_seconds, is_enabled)
       values ($1, $2, $3, $4, $5)
       returning *`,
      [generateId(), input.endpointKey, input.permittedRequests, input.windowSeconds, input.isEnabled ?? true]
    );
    return rowToRateLimitConfig(requireRow(result.rows));
  }

  async update(endpointKey: string, input: UpdateRateLimitConfigInput): Promise<RateLimitConfig | null> {
    const result = await this.pool.query<RateLimitConfigRow>(
      `update rate_limit_configs set
         permitted_requests = coalesce($2, permitted_requests),
         window_seconds = coalesce($3, window_seconds),
         is_enabled = coalesce($4, is_enabled),
         updated_at = now()
       where lower(endpoint_key) = lower($1)
       returning *`,
      [endpointKey, input.permittedRequests ?? null, input.windowSeconds ?? null, input.isEnabled ?? null]
    );
    const row = result.rows.at(0);
    return row ? rowToRateLimitConfig(row) : null;
  }
}
