import { isIP } from 'node:net';
import type { ITenantStorage } from '../storage/interfaces/tenant-storage.js';
import { type Result, ok, fail } from '../errors/result.js';

export type TenantResolutionFailure = 'invalid_input' | 'not_found';

interface ParsedHost {
  host: string;
  port?: string;
}

const PORT_PATTERN = /^\d{1,5}$/;

/**
 * The name itself, then each parent formed by dropping the leftmost label,
 * down to the last label.
 */
export function domainCandidates(name: string): string[] {
  const labels = name.split('.').filter(Boolean);
  const candidates = [name];

  for (let i = 1; i < labels.length; i++) {
    candidates.push(labels.slice(i).join('.'));
  }

  return candidates;
}

/**
 * Split `host`, `host:port`, `[v6]`, `[v6]:port` or a bare IPv6 literal
 */
export function parseHost(value: string): ParsedHost | null {
  const normalized = value.trim().toLowerCase();
  if (!normalized) return null;

  if (normalized.startsWith('[')) {
    const close = normalized.indexOf(']');
    if (close <= 1) return null;

    const host = normalized.slice(1, close);
    const rest = normalized.slice(close + 1);
    if (rest === '') return { host };
    if (!rest.startsWith(':') || !PORT_PATTERN.test(rest.slice(1))) return null;
    return { host, port: rest.slice(1) };
  }

  const colons = normalized.split(':').length - 1;
  if (colons === 0) return { host: normalized };
  if (colons > 1) return { host: normalized }; // bare IPv6, no port

  const [host = '', port = ''] = normalized.split(':');
  if (!host || !PORT_PATTERN.test(port)) return null;
  return { host, port };
}

/**
 * Resolves a tenant from an email domain or a vanity host.
 * Among active mappings the longest (most specific) match wins.
 */
export class TenantResolver {
  constructor(private readonly tenants: ITenantStorage) {}

  async resolveFromEmail(email: string): Promise<Result<string, TenantResolutionFailure>> {
    const parts = email.trim().split('@');
    const [local, domain] = parts;
    if (parts.length !== 2 || !local || !domain) {
      return fail('invalid_input');
    }

    const candidates = domainCandidates(domain.toLowerCase());
    const mappings = await this.tenants.findActiveEmailDomains(candidates);

    return pickLongest(mappings.map((m) => ({ key: m.domain, tenantId: m.tenantId })));
  }

  async resolveFromHost(value: string): Promise<Result<string, TenantResolutionFailure>> {
    const parsed = parseHost(value);
    if (!parsed) {
      return fail('invalid_input');
    }

    const ipVersion = isIP(parsed.host);

    if (parsed.port) {
      const withPort = ipVersion === 6 ? `[${parsed.host}]:${parsed.port}` : `${parsed.host}:${parsed.port}`;
      const exact = await this.tenants.findActiveVanityHosts([withPort]);
      const match = pickLongest(exact.map((m) => ({ key: m.host, tenantId: m.tenantId })));
      if (match.ok) return match;
    }

    // IP literals are matched exactly, never walked
    const candidates = ipVersion !== 0 ? [parsed.host] : domainCandidates(parsed.host);
    const mappings = await this.tenants.findActiveVanityHosts(candidates);

    return pickLongest(mappings.map((m) => ({ key: m.host, tenantId: m.tenantId })));
  }
}

function pickLongest(matches: { key: string; tenantId: string }[]): Result<string, TenantResolutionFailure> {
  let best: { key: string; tenantId: string } | undefined;
  for (const match of matches) {
    if (!best || match.key.length > best.key.length) {
      best = match;
    }
  }
  return best ? ok(best.tenantId) : fail('not_found');
}
