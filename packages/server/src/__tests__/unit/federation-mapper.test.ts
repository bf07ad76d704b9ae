import { describe, it, expect, beforeEach } from 'vitest';
import { FederationMapper, DEFAULT_ATTRIBUTE_MAPPING } from '../../services/federation-mapper.js';
import { MemoryTenantStorage, MemoryIdentityBackend } from '../../storage/memory/index.js';

const EMAIL = 'http://schemas.xmlsoap.org/ws/2005/05/identity/claims/emailaddress';
const NAME = 'http://schemas.xmlsoap.org/ws/2005/05/identity/claims/name';

describe('FederationMapper', () => {
  let tenants: MemoryTenantStorage;
  let identity: MemoryIdentityBackend;
  let mapper: FederationMapper;
  let tenantId: string;

  beforeEach(async () => {
    tenants = new MemoryTenantStorage();
    identity = new MemoryIdentityBackend();
    mapper = new FederationMapper(tenants, identity);

    tenantId = (await tenants.create({ name: 'Acme' })).id;
    await identity.addUser({ tenantId, username: 'dana', email: 'dana@acme.test', password: 'test-password' });
  });

  describe('attributeMapping', () => {
    it('should use the defaults without a tenant setting', async () => {
      expect(await mapper.attributeMapping(tenantId)).toEqual(DEFAULT_ATTRIBUTE_MAPPING);
    });

    it('should merge a tenant mapping over the defaults', async () => {
      const custom = await tenants.create({
        name: 'Custom',
        settings: { 'saml2.attributeMapping': JSON.stringify({ email: 'mail' }) },
      });

      expect(await mapper.attributeMapping(custom.id)).toEqual({ ...DEFAULT_ATTRIBUTE_MAPPING, email: 'mail' });
    });

    it('should fall back to the defaults on unreadable settings', async () => {
      const broken = await tenants.create({ name: 'Broken', settings: { 'saml2.attributeMapping': '{not json' } });
      const wrongShape = await tenants.create({
        name: 'WrongShape',
        settings: { 'saml2.attributeMapping': JSON.stringify({ email: 42 }) },
      });

      expect(await mapper.attributeMapping(broken.id)).toEqual(DEFAULT_ATTRIBUTE_MAPPING);
      expect(await mapper.attributeMapping(wrongShape.id)).toEqual(DEFAULT_ATTRIBUTE_MAPPING);
    });
  });

  describe('mapAttributes', () => {
    it('should take the first non-blank value and fall back to the name id', () => {
      const mapped = mapper.mapAttributes(
        { nameId: ' dana ', attributes: { [EMAIL]: ['dana@acme.test', 'other@acme.test'], [NAME]: '  ' } },
        DEFAULT_ATTRIBUTE_MAPPING
      );

      expect(mapped).toEqual({ email: 'dana@acme.test', firstName: undefined, lastName: undefined, username: 'dana' });
    });
  });

  describe('resolvePrincipal', () => {
    it('should match by email first', async () => {
      const result = await mapper.resolvePrincipal(tenantId, { attributes: { [EMAIL]: 'DANA@acme.test' } });

      expect(result.ok && result.value.username).toBe('dana');
    });

    it('should fall back to the username', async () => {
      const result = await mapper.resolvePrincipal(tenantId, {
        nameId: 'dana',
        attributes: { [EMAIL]: 'unknown@acme.test' },
      });

      expect(result.ok && result.value.username).toBe('dana');
    });

    it('should never create an account', async () => {
      expect(await mapper.resolvePrincipal(tenantId, { nameId: 'newcomer', attributes: {} })).toEqual({
        ok: false,
        error: 'user_not_found',
      });
    });

    it('should require some identifier', async () => {
      expect(await mapper.resolvePrincipal(tenantId, { attributes: {} })).toEqual({
        ok: false,
        error: 'missing_identifier',
      });
    });

    it('should refuse an unknown or inactive tenant', async () => {
      const closed = await tenants.create({ name: 'Closed', isActive: false });

      expect(await mapper.resolvePrincipal('missing', { nameId: 'dana', attributes: {} })).toEqual({
        ok: false,
        error: 'tenant_not_found',
      });
      expect(await mapper.resolvePrincipal(closed.id, { nameId: 'dana', attributes: {} })).toEqual({
        ok: false,
        error: 'tenant_not_found',
      });
    });

    it('should refuse an inactive account', async () => {
      await identity.addUser({ tenantId, username: 'eve', password: 'test-password', isActive: false });

      expect(await mapper.resolvePrincipal(tenantId, { nameId: 'eve', attributes: {} })).toEqual({
        ok: false,
        error: 'inactive',
      });
    });
  });
});
