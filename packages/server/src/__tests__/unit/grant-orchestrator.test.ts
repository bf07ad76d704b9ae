import { describe, it, expect, vi } from 'vitest';
import { GrantOrchestrator, type GrantHandlers } from '../../grants/orchestrator.js';
import type { GrantHandler } from '../../grants/types.js';
import { ok } from '../../errors/result.js';
import { setupTestContext, PASSWORDS } from '../e2e/test-setup.js';

function stubHandlers(): GrantHandlers {
  const handler = (): GrantHandler =>
    vi.fn<GrantHandler>(async () => ok({ kind: 'mfa_required', challengeToken: 'test-challenge' }));
  return { password: handler(), authorization_code: handler(), refresh_token: handler() };
}

describe('GrantOrchestrator', () => {
  it('should route to the handler named by grant_type', async () => {
    const handlers = stubHandlers();
    const orchestrator = new GrantOrchestrator(handlers);

    const result = await orchestrator.dispatch({ grant_type: ' refresh_token ' }, { ipAddress: '203.0.113.1' });

    expect(result).toEqual({ ok: true, value: { kind: 'mfa_required', challengeToken: 'test-challenge' } });
    expect(handlers.refresh_token).toHaveBeenCalledWith({ grant_type: ' refresh_token ' }, { ipAddress: '203.0.113.1' });
    expect(handlers.password).not.toHaveBeenCalled();
  });

  it('should require a grant type', async () => {
    const orchestrator = new GrantOrchestrator(stubHandlers());

    expect(await orchestrator.dispatch({})).toEqual({
      ok: false,
      error: { error: 'invalid_request', description: 'grant_type is required', status: undefined },
    });
  });

  it('should refuse an unsupported grant without calling any handler', async () => {
    const handlers = stubHandlers();
    const orchestrator = new GrantOrchestrator(handlers);

    const result = await orchestrator.dispatch({ grant_type: 'client_credentials' });

    expect(result).toEqual({
      ok: false,
      error: {
        error: 'unsupported_grant_type',
        description:
          "Grant type 'client_credentials' is not supported. Supported types: 'password', 'authorization_code', 'refresh_token'",
        status: undefined,
      },
    });
    expect(handlers.password).not.toHaveBeenCalled();
    expect(handlers.authorization_code).not.toHaveBeenCalled();
    expect(handlers.refresh_token).not.toHaveBeenCalled();
  });

  it('should resolve the tenant from the host passed by the transport', async () => {
    const ctx = await setupTestContext();
    await ctx.storage.tenants.addVanityHost({ tenantId: ctx.otherTenantId, host: 'login.globex.test' });

    const result = await ctx.services.grants.dispatch(
      { grant_type: 'password', username: 'bob', password: PASSWORDS.bob },
      { host: 'login.globex.test:443' }
    );

    expect(result.ok && result.value.kind).toBe('tokens');
  });

  it('should reject a bare username without a tenant or a known host', async () => {
    const ctx = await setupTestContext();

    const result = await ctx.services.grants.dispatch(
      { grant_type: 'password', username: 'bob', password: PASSWORDS.bob },
      {}
    );

    expect(result).toEqual({
      ok: false,
      error: {
        error: 'invalid_grant',
        description: 'Tenant ID is required when using username without vanity URL. Please specify tenant_id.',
        status: 401,
      },
    });
  });
});
