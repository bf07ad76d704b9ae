import { describe, it, expect, beforeEach } from 'vitest';
import { TenantResolver, domainCandidates, parseHost } from '../../services/tenant-resolver.js';
import { MemoryTenantStorage } from '../../storage/memory/index.js';

describe('TenantResolver', () => {
  let tenants: MemoryTenantStorage;
  let resolver: TenantResolver;
  let parentId: string;
  let childId: string;

  beforeEach(async () => {
    tenants = new MemoryTenantStorage();
    resolver = new TenantResolver(tenants);

    parentId = (await tenants.create({ name: 'Parent' })).id;
    childId = (await tenants.create({ name: 'Child' })).id;

    await tenants.addEmailDomain({ tenantId: parentId, domain: 'example.test' });
    await tenants.addEmailDomain({ tenantId: childId, domain: 'EU.Example.test' });
  });

  describe('domainCandidates', () => {
    it('should walk up to the last label', () => {
      expect(domainCandidates('mail.eu.example.test')).toEqual([
        'mail.eu.example.test',
        'eu.example.test',
        'example.test',
        'test',
      ]);
    });

    it('should return a single label unchanged', () => {
      expect(domainCandidates('localhost')).toEqual(['localhost']);
    });
  });

  describe('parseHost', () => {
    it('should split host and port', () => {
      expect(parseHost('Login.Example.test:8443')).toEqual({ host: 'login.example.test', port: '8443' });
    });

    it('should read bracketed and bare IPv6 literals', () => {
      expect(parseHost('[::1]:8080')).toEqual({ host: '::1', port: '8080' });
      expect(parseHost('[::1]')).toEqual({ host: '::1' });
      expect(parseHost('fe80::1')).toEqual({ host: 'fe80::1' });
    });

    it('should refuse malformed input', () => {
      expect(parseHost('')).toBeNull();
      expect(parseHost('example.test:http')).toBeNull();
      expect(parseHost('[::1')).toBeNull();
      expect(parseHost(':8080')).toBeNull();
    });
  });

  describe('resolveFromEmail', () => {
    it('should prefer the most specific domain', async () => {
      expect(await resolver.resolveFromEmail('ana@mail.eu.example.test')).toEqual({ ok: true, value: childId });
      expect(await resolver.resolveFromEmail('ana@eu.example.test')).toEqual({ ok: true, value: childId });
      expect(await resolver.resolveFromEmail('ana@us.example.test')).toEqual({ ok: true, value: parentId });
    });

    it('should ignore case', async () => {
      expect(await resolver.resolveFromEmail('Ana@EXAMPLE.TEST')).toEqual({ ok: true, value: parentId });
    });

    it('should skip inactive mappings', async () => {
      const other = await tenants.create({ name: 'Other' });
      await tenants.addEmailDomain({ tenantId: other.id, domain: 'inactive.test', isActive: false });

      expect(await resolver.resolveFromEmail('ana@inactive.test')).toEqual({ ok: false, error: 'not_found' });
    });

    it('should reach a single-label domain from a subdomain', async () => {
      const corp = await tenants.create({ name: 'Corp' });
      await tenants.addEmailDomain({ tenantId: corp.id, domain: 'corp' });

      expect(await resolver.resolveFromEmail('ana@mail.corp')).toEqual({ ok: true, value: corp.id });
      expect(await resolver.resolveFromEmail('ana@corp')).toEqual({ ok: true, value: corp.id });
    });

    it('should reject anything that is not a single address', async () => {
      for (const input of ['no-at-sign', '@example.test', 'ana@', 'a@b@example.test']) {
        expect(await resolver.resolveFromEmail(input)).toEqual({ ok: false, error: 'invalid_input' });
      }
    });
  });

  describe('resolveFromHost', () => {
    beforeEach(async () => {
      await tenants.addVanityHost({ tenantId: parentId, host: 'example.test' });
      await tenants.addVanityHost({ tenantId: childId, host: 'login.example.test:8443' });
    });

    it('should match an exact host and port first', async () => {
      expect(await resolver.resolveFromHost('login.example.test:8443')).toEqual({ ok: true, value: childId });
    });

    it('should fall back to the host walk when the port does not match', async () => {
      expect(await resolver.resolveFromHost('login.example.test:9000')).toEqual({ ok: true, value: parentId });
      expect(await resolver.resolveFromHost('login.example.test')).toEqual({ ok: true, value: parentId });
    });

    it('should reach a single-label vanity host', async () => {
      const corp = await tenants.create({ name: 'Corp' });
      await tenants.addVanityHost({ tenantId: corp.id, host: 'corp' });

      expect(await resolver.resolveFromHost('login.corp')).toEqual({ ok: true, value: corp.id });
      expect(await resolver.resolveFromHost('login.corp:8080')).toEqual({ ok: true, value: corp.id });
    });

    it('should match IP literals exactly', async () => {
      await tenants.addVanityHost({ tenantId: childId, host: '10.0.0.5' });

      expect(await resolver.resolveFromHost('10.0.0.5:3000')).toEqual({ ok: true, value: childId });
      expect(await resolver.resolveFromHost('10.0.0.6')).toEqual({ ok: false, error: 'not_found' });
    });

    it('should report malformed hosts', async () => {
      expect(await resolver.resolveFromHost('example.test:port')).toEqual({ ok: false, error: 'invalid_input' });
    });
  });
});
