import { describe, it, expect, beforeEach } from 'vitest';
import { AuthorizationCodeStore, type CreateCodeRequest } from '../../services/authorization-code-store.js';
import { MemoryAuthorizationCodeStorage } from '../../storage/memory/index.js';
import { generateCodeChallenge } from '../../crypto/pkce.js';

const REDIRECT = 'https://app.test/callback';
const VERIFIER = 'a'.repeat(43);

describe('AuthorizationCodeStore', () => {
  let clock: Date;
  let store: AuthorizationCodeStore;

  function request(overrides: Partial<CreateCodeRequest> = {}): CreateCodeRequest {
    return {
      userId: 'user-1',
      tenantId: 'tenant-1',
      clientId: 'client-1',
      redirectUri: REDIRECT,
      scope: 'openid',
      codeChallenge: generateCodeChallenge(VERIFIER),
      codeChallengeMethod: 'S256',
      ...overrides,
    };
  }

  beforeEach(() => {
    clock = new Date('2026-03-01T12:00:00Z');
    store = new AuthorizationCodeStore(new MemoryAuthorizationCodeStorage(), () => clock);
  });

  it('should issue a 43 character base64url code', async () => {
    const code = await store.create(request());

    expect(code).toMatch(/^[A-Za-z0-9_-]{43}$/);
  });

  it('should return the bound grant on redemption', async () => {
    const code = await store.create(request());

    const result = await store.validateAndConsume(code, 'client-1', REDIRECT, VERIFIER);

    expect(result.ok).toBe(true);
    if (!result.ok) return;
    expect(result.value).toMatchObject({
      userId: 'user-1',
      tenantId: 'tenant-1',
      clientId: 'client-1',
      scope: 'openid',
      usedAt: clock,
    });
  });

  it('should report an unknown code', async () => {
    expect(await store.validateAndConsume('missing', 'client-1', REDIRECT, VERIFIER)).toEqual({
      ok: false,
      error: 'not_found',
    });
  });

  it('should refuse a second redemption', async () => {
    const code = await store.create(request());
    await store.validateAndConsume(code, 'client-1', REDIRECT, VERIFIER);

    expect(await store.validateAndConsume(code, 'client-1', REDIRECT, VERIFIER)).toEqual({
      ok: false,
      error: 'already_used',
    });
  });

  it('should expire after ten minutes', async () => {
    const code = await store.create(request());
    clock = new Date(clock.getTime() + 600 * 1000);

    expect(await store.validateAndConsume(code, 'client-1', REDIRECT, VERIFIER)).toEqual({
      ok: false,
      error: 'expired',
    });
  });

  it('should keep the code redeemable after a rejected attempt', async () => {
    const code = await store.create(request());

    expect((await store.validateAndConsume(code, 'client-2', REDIRECT, VERIFIER)).ok).toBe(false);
    expect((await store.validateAndConsume(code, 'client-1', `${REDIRECT}/other`, VERIFIER)).ok).toBe(false);
    expect((await store.validateAndConsume(code, 'client-1', REDIRECT, 'b'.repeat(43))).ok).toBe(false);
    expect((await store.validateAndConsume(code, 'client-1', REDIRECT)).ok).toBe(false);

    expect((await store.validateAndConsume(code, 'client-1', REDIRECT, VERIFIER)).ok).toBe(true);
  });

  it('should name each mismatch', async () => {
    const code = await store.create(request());

    expect(await store.validateAndConsume(code, 'client-2', REDIRECT, VERIFIER)).toEqual({
      ok: false,
      error: 'client_mismatch',
    });
    expect(await store.validateAndConsume(code, 'client-1', 'https://APP.test/callback', VERIFIER)).toEqual({
      ok: false,
      error: 'redirect_uri_mismatch',
    });
    expect(await store.validateAndConsume(code, 'client-1', REDIRECT, 'wrong')).toEqual({
      ok: false,
      error: 'pkce_failed',
    });
  });

  it('should accept a plain challenge', async () => {
    const code = await store.create(request({ codeChallenge: VERIFIER, codeChallengeMethod: 'plain' }));

    expect((await store.validateAndConsume(code, 'client-1', REDIRECT, VERIFIER)).ok).toBe(true);
  });

  it('should not require a verifier when no challenge was bound', async () => {
    const code = await store.create(request({ codeChallenge: undefined, codeChallengeMethod: undefined }));

    expect((await store.validateAndConsume(code, 'client-1', REDIRECT)).ok).toBe(true);
  });

  it('should let exactly one of many concurrent redemptions win', async () => {
    const code = await store.create(request());

    const results = await Promise.all(
      Array.from({ length: 10 }, () => store.validateAndConsume(code, 'client-1', REDIRECT, VERIFIER))
    );

    expect(results.filter((result) => result.ok)).toHaveLength(1);
    expect(results.filter((result) => !result.ok && result.error === 'already_used')).toHaveLength(9);
  });
});
