import { describe, it, expect, beforeAll, beforeEach } from 'vitest';
import otplib from 'otplib';
import * as jose from 'jose';
import {
  setupTestContext,
  accessTokenFor,
  bearer,
  passwordLogin,
  readJson,
  type TestContext,
} from './test-setup.js';
import type { Principal } from '../../types/user.js';
import type {
  TokenResponse,
  ApiErrorResponse,
  MfaRequiredResponse,
  MfaSetupResponse,
  MfaStatusResponse,
  MfaBackupCodesResponse,
} from '../../types/index.js';

const PASSWORD = 'mfa-user-password';

describe('Multi-Factor Authentication', () => {
  let ctx: TestContext;
  let user: Principal;
  let token: string;
  let userCount = 0;

  function api(path: string, accessToken: string | null, body?: Record<string, string>) {
    return ctx.app.request(`/api/mfa${path}`, {
      method: body === undefined && path === '/status' ? 'GET' : 'POST',
      headers: {
        'Content-Type': 'application/json',
        ...(accessToken ? bearer(accessToken) : {}),
      },
      body: body === undefined ? undefined : JSON.stringify(body),
    });
  }

  async function setUp(): Promise<string> {
    const res = await api('/setup', token);
    expect(res.status).toBe(200);
    const setup = await readJson<MfaSetupResponse>(res);
    return setup.secret.replace(/\s/g, '');
  }

  /**
   * Enroll the current user and return the secret and first backup codes
   */
  async function enroll(): Promise<{ secret: string; backupCodes: string[] }> {
    const secret = await setUp();
    const res = await api('/enable', token, { code: otplib.authenticator.generate(secret) });
    expect(res.status).toBe(200);
    const { backupCodes } = await readJson<MfaBackupCodesResponse>(res);
    return { secret, backupCodes };
  }

  async function challenge(): Promise<string> {
    const res = await passwordLogin(ctx, user.username, PASSWORD, { tenant_id: ctx.tenantId });
    expect(res.status).toBe(401);
    const body = await readJson<MfaRequiredResponse>(res);
    return body.mfa_challenge_token;
  }

  beforeAll(async () => {
    ctx = await setupTestContext();
  });

  beforeEach(async () => {
    userCount++;
    user = await ctx.identity.addUser({
      tenantId: ctx.tenantId,
      username: `mfa-user-${userCount}`,
      password: PASSWORD,
    });
    token = await accessTokenFor(ctx, user);
  });

  describe('Enrollment', () => {
    it('should report MFA as off for a new user', async () => {
      const res = await api('/status', token);

      expect(res.status).toBe(200);
      expect(await readJson<MfaStatusResponse>(res)).toEqual({
        isEnabled: false,
        isRequired: false,
        backupCodesRemaining: 0,
      });
    });

    it('should return a grouped secret and an otpauth URI', async () => {
      const res = await api('/setup', token);
      const setup = await readJson<MfaSetupResponse>(res);

      expect(setup.secret).toMatch(/^[A-Z2-7]{4}( [A-Z2-7]{1,4})+$/);
      const secret = setup.secret.replace(/\s/g, '');
      expect(setup.qrCodeUri).toBe(
        `otpauth://totp/http%3A%2F%2Flocalhost%3A3000:${user.username}?secret=${secret}&issuer=http%3A%2F%2Flocalhost%3A3000`
      );
    });

    it('should keep MFA off until a code confirms the secret', async () => {
      await setUp();

      const status = await readJson<MfaStatusResponse>(await api('/status', token));
      expect(status.isEnabled).toBe(false);

      const login = await passwordLogin(ctx, user.username, PASSWORD, { tenant_id: ctx.tenantId });
      expect(login.status).toBe(200);
    });

    it('should enable MFA and hand out ten backup codes', async () => {
      const { backupCodes } = await enroll();

      expect(backupCodes).toHaveLength(10);
      for (const code of backupCodes) {
        expect(code).toMatch(/^[A-HJ-NP-Z2-9]{8}$/);
      }

      const status = await readJson<MfaStatusResponse>(await api('/status', token));
      expect(status).toEqual({ isEnabled: true, isRequired: false, backupCodesRemaining: 10 });
    });

    it('should reject an invalid confirmation code', async () => {
      await setUp();

      const res = await api('/enable', token, { code: '12345' });
      expect(res.status).toBe(400);
      const error = await readJson<ApiErrorResponse>(res);
      expect(error.error).toBe('invalid_code');
      expect(error.error_description).toBe('Invalid verification code');
    });

    it('should require setup before enabling', async () => {
      const res = await api('/enable', token, { code: '123456' });

      expect(res.status).toBe(400);
      expect((await readJson<ApiErrorResponse>(res)).error_description).toBe('MFA setup has not been started');
    });

    it('should require a code to enable', async () => {
      await setUp();

      const res = await api('/enable', token, {});
      expect(res.status).toBe(400);
      expect((await readJson<ApiErrorResponse>(res)).error_description).toBe('Code is required');
    });

    it('should refuse a second setup once enabled', async () => {
      await enroll();

      const res = await api('/setup', token);
      expect(res.status).toBe(400);
      expect((await readJson<ApiErrorResponse>(res)).error_description).toBe('MFA is already enabled');
    });

    it('should disable MFA', async () => {
      await enroll();

      const res = await api('/disable', token);
      expect(res.status).toBe(200);
      expect(await res.json()).toEqual({ message: 'MFA disabled successfully' });

      const login = await passwordLogin(ctx, user.username, PASSWORD, { tenant_id: ctx.tenantId });
      expect(login.status).toBe(200);
    });

    it('should refuse to disable MFA that is not enabled', async () => {
      const res = await api('/disable', token);

      expect(res.status).toBe(400);
      expect((await readJson<ApiErrorResponse>(res)).error_description).toBe('MFA is not enabled');
    });

    it('should keep MFA on when the tenant requires it', async () => {
      const tenant = await ctx.storage.tenants.create({ name: 'Initech', settings: { 'Mfa.Required': 'true' } });
      user = await ctx.identity.addUser({ tenantId: tenant.id, username: 'required-mfa', password: PASSWORD });
      token = await accessTokenFor(ctx, user);
      await enroll();

      const status = await readJson<MfaStatusResponse>(await api('/status', token));
      expect(status.isRequired).toBe(true);

      const res = await api('/disable', token);
      expect(res.status).toBe(400);
      expect((await readJson<ApiErrorResponse>(res)).error_description).toBe(
        'MFA is required by your tenant and cannot be disabled'
      );
    });

    it('should replace every backup code on regeneration', async () => {
      const { backupCodes } = await enroll();

      const res = await api('/backup-codes', token);
      expect(res.status).toBe(200);
      const regenerated = await readJson<MfaBackupCodesResponse>(res);
      expect(regenerated.backupCodes).toHaveLength(10);

      const challengeToken = await challenge();
      const old = await api('/verify-backup-code', null, { challengeToken, backupCode: backupCodes[0] ?? '' });
      expect(old.status).toBe(401);
    });

    it('should require a bearer token for management', async () => {
      const res = await api('/status', null);

      expect(res.status).toBe(401);
      const error = await readJson<ApiErrorResponse>(res);
      expect(error.error).toBe('invalid_token');
      expect(error.error_description).toBe('Missing authorization header');
    });
  });

  describe('Login interrupt', () => {
    it('should answer a correct password with an MFA challenge', async () => {
      await enroll();

      const res = await passwordLogin(ctx, user.username, PASSWORD, { tenant_id: ctx.tenantId });

      expect(res.status).toBe(401);
      const body = await readJson<MfaRequiredResponse>(res);
      expect(body.error).toBe('mfa_required');
      expect(body.error_description).toBe('Multi-factor authentication is required');
      expect(body.mfa_verification_url).toBe('/api/mfa/verify');
      expect(body.mfa_challenge_token).toMatch(/^[A-Za-z0-9_-]{86}$/);
      expect(body).not.toHaveProperty('access_token');
    });

    it('should issue tokens for a valid TOTP code', async () => {
      const { secret } = await enroll();
      const challengeToken = await challenge();

      const res = await api('/verify', null, { challengeToken, code: otplib.authenticator.generate(secret) });

      expect(res.status).toBe(200);
      const tokens = await readJson<TokenResponse>(res);
      expect(tokens.token_type).toBe('Bearer');
      expect(tokens.refresh_token).toBeDefined();
      expect(jose.decodeJwt(tokens.access_token).sub).toBe(user.id);
    });

    it('should redeem a challenge only once', async () => {
      const { secret } = await enroll();
      const challengeToken = await challenge();
      const code = otplib.authenticator.generate(secret);

      const first = await api('/verify', null, { challengeToken, code });
      const second = await api('/verify', null, { challengeToken, code });

      expect(first.status).toBe(200);
      expect(second.status).toBe(401);
      const error = await readJson<ApiErrorResponse>(second);
      expect(error.error).toBe('invalid_grant');
      expect(error.error_description).toBe('Invalid or expired challenge token');
    });

    it('should spend the challenge on a wrong code', async () => {
      const { secret } = await enroll();
      const challengeToken = await challenge();

      const wrong = await api('/verify', null, { challengeToken, code: '12345' });
      expect(wrong.status).toBe(401);
      expect((await readJson<ApiErrorResponse>(wrong)).error_description).toBe('Invalid MFA code');

      const retry = await api('/verify', null, { challengeToken, code: otplib.authenticator.generate(secret) });
      expect(retry.status).toBe(401);
      expect((await readJson<ApiErrorResponse>(retry)).error_description).toBe('Invalid or expired challenge token');
    });

    it('should reject an unknown challenge', async () => {
      const res = await api('/verify', null, { challengeToken: 'not-a-challenge', code: '123456' });

      expect(res.status).toBe(401);
      expect((await readJson<ApiErrorResponse>(res)).error_description).toBe('Invalid or expired challenge token');
    });

    it('should require the challenge token and the code', async () => {
      const noChallenge = await api('/verify', null, { code: '123456' });
      expect(noChallenge.status).toBe(400);
      expect((await readJson<ApiErrorResponse>(noChallenge)).error_description).toBe('Challenge token is required');

      const noCode = await api('/verify', null, { challengeToken: 'some-challenge' });
      expect(noCode.status).toBe(400);
      expect((await readJson<ApiErrorResponse>(noCode)).error_description).toBe('Code is required');

      const noBackupCode = await api('/verify-backup-code', null, { challengeToken: 'some-challenge' });
      expect(noBackupCode.status).toBe(400);
      expect((await readJson<ApiErrorResponse>(noBackupCode)).error_description).toBe('Backup code is required');
    });

    it('should accept each backup code once, in any case and grouping', async () => {
      const { backupCodes } = await enroll();
      const backupCode = backupCodes[0] ?? '';
      const grouped = `${backupCode.slice(0, 4)}-${backupCode.slice(4)}`.toLowerCase();

      const first = await api('/verify-backup-code', null, { challengeToken: await challenge(), backupCode: grouped });
      expect(first.status).toBe(200);

      const status = await readJson<MfaStatusResponse>(await api('/status', token));
      expect(status.backupCodesRemaining).toBe(9);

      const second = await api('/verify-backup-code', null, { challengeToken: await challenge(), backupCode });
      expect(second.status).toBe(401);
      expect((await readJson<ApiErrorResponse>(second)).error_description).toBe('Invalid backup code');
    });
  });
});
