import type { Context } from 'hono';
import type { GrantContext } from '../grants/types.js';
import { OAuthError } from '../errors/oauth-error.js';
import { HEADER_FORWARDED_FOR, HEADER_USER_AGENT } from '../config/constants.js';

function toStringRecord(value: unknown): Record<string, string> {
  const params: Record<string, string> = {};
  if (typeof value !== 'object' || value === null || Array.isArray(value)) {
    return params;
  }

  for (const [key, entry] of Object.entries(value)) {
    if (typeof entry === 'string') {
      params[key] = entry;
    } else if (typeof entry === 'number' || typeof entry === 'boolean') {
      params[key] = String(entry);
    }
  }

  return params;
}

/**
 * Read a request body sent either as JSON or as a form.
 * Only scalar fields are kept; files and nested objects are dropped.
 */
export async function readParams(c: Context): Promise<Record<string, string>> {
  const contentType = c.req.header('Content-Type') ?? '';

  if (contentType.includes('application/json')) {
    let body: unknown;
    try {
      body = await c.req.json();
    } catch {
      throw OAuthError.invalidRequest('Invalid request body');
    }
    return toStringRecord(body);
  }

  return toStringRecord(await c.req.parseBody());
}

/**
 * First X-Forwarded-For entry, else `unknown`
 */
export function clientIp(c: Context): string {
  const forwarded = c.req.header(HEADER_FORWARDED_FOR)?.split(',').at(0)?.trim();
  return forwarded || 'unknown';
}

/**
 * Host header and audit metadata for the grant handlers
 */
export function grantContextOf(c: Context): GrantContext {
  const ip = clientIp(c);
  return {
    host: c.req.header('Host'),
    ipAddress: ip === 'unknown' ? undefined : ip,
    userAgent: c.req.header(HEADER_USER_AGENT),
  };
}
