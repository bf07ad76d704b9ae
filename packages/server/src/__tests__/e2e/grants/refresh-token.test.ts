import { describe, it, expect, beforeAll, beforeEach } from 'vitest';
import * as jose from 'jose';
import {
  setupTestContext,
  passwordLogin,
  readJson,
  requireValue,
  PASSWORDS,
  type TestContext,
} from '../test-setup.js';
import type { TokenResponse, ApiErrorResponse } from '../../../types/index.js';

describe('Refresh Token Grant', () => {
  let ctx: TestContext;
  let refreshToken: string;

  function refresh(path: string, params: Record<string, string>) {
    return ctx.app.request(path, {
      method: 'POST',
      headers: { 'Content-Type': 'application/x-www-form-urlencoded' },
      body: new URLSearchParams(params),
    });
  }

  beforeAll(async () => {
    ctx = await setupTestContext();
  });

  beforeEach(async () => {
    const res = await passwordLogin(ctx, 'alice@acme.test', PASSWORDS.alice);
    const tokens = await readJson<TokenResponse>(res);
    refreshToken = requireValue(tokens.refresh_token, 'refresh_token');
  });

  it('should issue a new access token and hand back the same refresh token', async () => {
    const res = await refresh('/oauth/token', { grant_type: 'refresh_token', refresh_token: refreshToken });

    expect(res.status).toBe(200);
    const tokens = await readJson<TokenResponse>(res);
    expect(tokens.refresh_token).toBe(refreshToken);
    expect(tokens.token_type).toBe('Bearer');

    const claims = jose.decodeJwt(tokens.access_token);
    expect(claims.sub).toBe(ctx.alice.id);
    expect(claims['tenant_id']).toBe(ctx.tenantId);
  });

  it('should accept the same refresh token more than once', async () => {
    const first = await refresh('/oauth/token', { grant_type: 'refresh_token', refresh_token: refreshToken });
    const second = await refresh('/oauth/token', { grant_type: 'refresh_token', refresh_token: refreshToken });

    expect(first.status).toBe(200);
    expect(second.status).toBe(200);
  });

  it('should serve the dedicated refresh endpoint', async () => {
    const res = await refresh('/oauth/refresh', { grant_type: 'refresh_token', refresh_token: refreshToken });

    expect(res.status).toBe(200);
    expect(res.headers.get('Cache-Control')).toBe('no-store');
    const tokens = await readJson<TokenResponse>(res);
    expect(tokens.refresh_token).toBe(refreshToken);
  });

  it('should refuse other grant types on the refresh endpoint', async () => {
    const res = await refresh('/oauth/refresh', { grant_type: 'password', refresh_token: refreshToken });

    expect(res.status).toBe(400);
    const error = await readJson<ApiErrorResponse>(res);
    expect(error.error).toBe('unsupported_grant_type');
    expect(error.error_description).toBe("Grant type must be 'refresh_token'");
  });

  it('should reject a token revoked between uses', async () => {
    const first = await refresh('/oauth/token', { grant_type: 'refresh_token', refresh_token: refreshToken });
    expect(first.status).toBe(200);

    await ctx.services.refreshTokens.revokeForUser(ctx.alice.id, ctx.tenantId);

    const second = await refresh('/oauth/token', { grant_type: 'refresh_token', refresh_token: refreshToken });
    expect(second.status).toBe(401);
    const error = await readJson<ApiErrorResponse>(second);
    expect(error.error).toBe('invalid_grant');
    expect(error.error_description).toBe('Invalid or expired refresh token');
  });

  it('should reject an unknown refresh token', async () => {
    const res = await refresh('/oauth/token', { grant_type: 'refresh_token', refresh_token: 'not-a-real-token' });

    expect(res.status).toBe(401);
    const error = await readJson<ApiErrorResponse>(res);
    expect(error.error_description).toBe('Invalid or expired refresh token');
  });

  it('should require the refresh token', async () => {
    const res = await refresh('/oauth/token', { grant_type: 'refresh_token' });

    expect(res.status).toBe(400);
    const error = await readJson<ApiErrorResponse>(res);
    expect(error.error).toBe('invalid_request');
    expect(error.error_description).toBe('Refresh token is required');
  });

  it('should stop refreshing once the user is deactivated', async () => {
    const user = await ctx.identity.addUser({
      tenantId: ctx.tenantId,
      username: 'soon-inactive',
      password: 'soon-inactive-password',
    });
    const login = await passwordLogin(ctx, user.username, 'soon-inactive-password', { tenant_id: ctx.tenantId });
    const tokens = await readJson<TokenResponse>(login);

    await ctx.identity.setActive(user.id, false);

    const res = await refresh('/oauth/token', {
      grant_type: 'refresh_token',
      refresh_token: requireValue(tokens.refresh_token, 'refresh_token'),
    });
    expect(res.status).toBe(401);
    const error = await readJson<ApiErrorResponse>(res);
    expect(error.error_description).toBe('User account is inactive');
  });
});
