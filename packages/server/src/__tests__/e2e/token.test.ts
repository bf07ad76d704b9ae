import { describe, it, expect, beforeAll } from 'vitest';
import * as jose from 'jose';
import {
  setupTestContext,
  passwordLogin,
  readJson,
  requireValue,
  PASSWORDS,
  ISSUER,
  AUDIENCE,
  type TestContext,
} from './test-setup.js';
import type { TokenResponse, ApiErrorResponse } from '../../types/index.js';

describe('Token Endpoint', () => {
  let ctx: TestContext;

  beforeAll(async () => {
    ctx = await setupTestContext();
  });

  describe('Password Grant', () => {
    it('should issue tokens for a username with an explicit tenant', async () => {
      const res = await passwordLogin(ctx, 'alice', PASSWORDS.alice, { tenant_id: ctx.tenantId });

      expect(res.status).toBe(200);
      expect(res.headers.get('Cache-Control')).toBe('no-store');
      expect(res.headers.get('Pragma')).toBe('no-cache');

      const tokens = await readJson<TokenResponse>(res);
      expect(tokens.token_type).toBe('Bearer');
      expect(tokens.expires_in).toBe(3600);
      expect(tokens.refresh_token).toMatch(/^[A-Za-z0-9_-]{86}$/);
      expect(tokens.scope).toBeUndefined();

      const claims = jose.decodeJwt(tokens.access_token);
      expect(claims.sub).toBe(ctx.alice.id);
      expect(claims['user_id']).toBe(ctx.alice.id);
      expect(claims['tenant_id']).toBe(ctx.tenantId);
      expect(claims['unique_name']).toBe('alice');
      expect(claims['email']).toBe('alice@acme.test');
      expect(claims['given_name']).toBe('Alice');
      expect(claims['family_name']).toBe('Anders');
      expect(claims['roles']).toEqual([]);
      expect(claims.iss).toBe(ISSUER);
      expect(claims.aud).toBe(AUDIENCE);
      expect(requireValue(claims.exp, 'exp') - requireValue(claims.iat, 'iat')).toBe(3600);
      expect(claims.jti).toBeDefined();
    });

    it('should sign with the configured key id', async () => {
      const res = await passwordLogin(ctx, 'alice', PASSWORDS.alice, { tenant_id: ctx.tenantId });
      const tokens = await readJson<TokenResponse>(res);

      const header = jose.decodeProtectedHeader(tokens.access_token);
      expect(header.alg).toBe('RS256');
      expect(header.kid).toBe('test-key');
      expect(header.typ).toBe('at+jwt');
    });

    it('should resolve the tenant from the email domain', async () => {
      const res = await passwordLogin(ctx, 'alice@acme.test', PASSWORDS.alice);

      expect(res.status).toBe(200);
      const tokens = await readJson<TokenResponse>(res);
      expect(jose.decodeJwt(tokens.access_token)['tenant_id']).toBe(ctx.tenantId);
    });

    it('should echo the requested scope', async () => {
      const res = await passwordLogin(ctx, 'alice', PASSWORDS.alice, {
        tenant_id: ctx.tenantId,
        scope: 'openid profile',
      });

      const tokens = await readJson<TokenResponse>(res);
      expect(tokens.scope).toBe('openid profile');
      expect(jose.decodeJwt(tokens.access_token)['scope']).toBe('openid profile');
    });

    it('should accept a JSON body', async () => {
      const res = await ctx.app.request('/oauth/token', {
        method: 'POST',
        headers: { 'Content-Type': 'application/json' },
        body: JSON.stringify({
          grant_type: 'password',
          username: 'alice@acme.test',
          password: PASSWORDS.alice,
        }),
      });

      expect(res.status).toBe(200);
    });

    it('should include the principal roles', async () => {
      const res = await passwordLogin(ctx, 'root', PASSWORDS.root, { tenant_id: ctx.otherTenantId });
      const tokens = await readJson<TokenResponse>(res);

      expect(jose.decodeJwt(tokens.access_token)['roles']).toEqual(['Service Administrator']);
    });

    it('should reject a wrong password', async () => {
      const res = await passwordLogin(ctx, 'alice', 'wrong-password', { tenant_id: ctx.tenantId });

      expect(res.status).toBe(401);
      const error = await readJson<ApiErrorResponse>(res);
      expect(error.error).toBe('invalid_grant');
      expect(error.error_description).toBe('Invalid username or password.');
    });

    it('should not find a user under another tenant', async () => {
      const res = await passwordLogin(ctx, 'alice', PASSWORDS.alice, { tenant_id: ctx.otherTenantId });

      expect(res.status).toBe(401);
      const error = await readJson<ApiErrorResponse>(res);
      expect(error.error_description).toBe('Invalid username or password.');
    });

    it('should require a tenant for a bare username', async () => {
      const res = await passwordLogin(ctx, 'alice', PASSWORDS.alice);

      expect(res.status).toBe(401);
      const error = await readJson<ApiErrorResponse>(res);
      expect(error.error).toBe('invalid_grant');
      expect(error.error_description).toBe(
        'Tenant ID is required when using username without vanity URL. Please specify tenant_id.'
      );
    });

    it('should report an unmapped email domain', async () => {
      const res = await passwordLogin(ctx, 'carol@unknown.test', 'any-password');

      expect(res.status).toBe(401);
      const error = await readJson<ApiErrorResponse>(res);
      expect(error.error_description).toBe(
        'Unable to resolve tenant from email domain. Please specify tenant_id or ensure your email domain is configured.'
      );
    });

    it('should reject an unknown tenant id', async () => {
      const res = await passwordLogin(ctx, 'alice', PASSWORDS.alice, { tenant_id: 'no-such-tenant' });

      expect(res.status).toBe(401);
      const error = await readJson<ApiErrorResponse>(res);
      expect(error.error_description).toBe('Invalid or inactive tenant.');
    });

    it('should require username and password', async () => {
      const res = await ctx.app.request('/oauth/token', {
        method: 'POST',
        body: new URLSearchParams({ grant_type: 'password', username: 'alice' }),
      });

      expect(res.status).toBe(400);
      const error = await readJson<ApiErrorResponse>(res);
      expect(error.error).toBe('invalid_request');
      expect(error.error_description).toBe('Username and password are required');
    });

    it('should lock the account after repeated failures', async () => {
      const user = await ctx.identity.addUser({
        tenantId: ctx.tenantId,
        username: 'lockout-target',
        password: 'lockout-password',
      });

      for (let attempt = 0; attempt < 5; attempt++) {
        const res = await passwordLogin(ctx, user.username, 'wrong-password', { tenant_id: ctx.tenantId });
        expect(res.status).toBe(401);
      }

      const res = await passwordLogin(ctx, user.username, 'lockout-password', { tenant_id: ctx.tenantId });
      expect(res.status).toBe(401);
      const error = await readJson<ApiErrorResponse>(res);
      expect(error.error_description).toBe('User account is locked out.');
    });

    it('should reject an inactive account', async () => {
      const user = await ctx.identity.addUser({
        tenantId: ctx.tenantId,
        username: 'inactive-user',
        password: 'inactive-password',
        isActive: false,
      });

      const res = await passwordLogin(ctx, user.username, 'inactive-password', { tenant_id: ctx.tenantId });
      expect(res.status).toBe(401);
      const error = await readJson<ApiErrorResponse>(res);
      expect(error.error_description).toBe('User account is inactive.');
    });
  });

  describe('Request Validation', () => {
    it('should require grant_type', async () => {
      const res = await ctx.app.request('/oauth/token', {
        method: 'POST',
        body: new URLSearchParams({ username: 'alice' }),
      });

      expect(res.status).toBe(400);
      const error = await readJson<ApiErrorResponse>(res);
      expect(error.error).toBe('invalid_request');
      expect(error.error_description).toBe('grant_type is required');
    });

    it('should reject unsupported grant types', async () => {
      const res = await ctx.app.request('/oauth/token', {
        method: 'POST',
        body: new URLSearchParams({ grant_type: 'client_credentials' }),
      });

      expect(res.status).toBe(400);
      const error = await readJson<ApiErrorResponse>(res);
      expect(error.error).toBe('unsupported_grant_type');
      expect(error.error_description).toBe(
        "Grant type 'client_credentials' is not supported. Supported types: 'password', 'authorization_code', 'refresh_token'"
      );
    });

    it('should reject malformed JSON', async () => {
      const res = await ctx.app.request('/oauth/token', {
        method: 'POST',
        headers: { 'Content-Type': 'application/json' },
        body: '{"grant_type":',
      });

      expect(res.status).toBe(400);
      const error = await readJson<ApiErrorResponse>(res);
      expect(error.error).toBe('invalid_request');
      expect(error.error_description).toBe('Invalid request body');
    });
  });
});
