import type { Context } from 'hono';
import { z } from 'zod';
import type { OAuthClient } from '../../types/client.js';
import type { Principal } from '../../types/user.js';
import type { IClientStorage } from '../../storage/interfaces/client-storage.js';
import type { IIdentityBackend } from '../../storage/interfaces/user-storage.js';
import type { AuthorizationCodeStore } from '../../services/authorization-code-store.js';
import type { ConsentStore } from '../../services/consent-store.js';
import type { CredentialVerifier } from '../../services/credential-verifier.js';
import type { TokenSigner } from '../../services/token-signer.js';
import { renderConsentPage } from './consent-page.js';
import { authenticateBearer } from '../../middleware/bearer-auth.js';
import { grantContextOf, readParams } from '../../middleware/request-params.js';
import { isCodeChallengeMethod } from '../../crypto/pkce.js';
import {
  ERROR_ACCESS_DENIED,
  ERROR_INVALID_CLIENT,
  ERROR_INVALID_REQUEST,
  ERROR_UNSUPPORTED_RESPONSE_TYPE,
} from '../../errors/error-codes.js';
import { HEADER_AUTHORIZATION, RESPONSE_TYPE_CODE } from '../../config/constants.js';
import { logger } from '../../logger.js';

export interface AuthorizeHandlerOptions {
  clients: IClientStorage;
  codes: AuthorizationCodeStore;
  consents: ConsentStore;
  verifier: CredentialVerifier;
  identity: IIdentityBackend;
  signer: TokenSigner;
  now?: () => Date;
}

const optionalParam = z
  .string()
  .optional()
  .transform((value) => value?.trim() || undefined);

const authorizeRequestSchema = z.object({
  response_type: optionalParam,
  client_id: optionalParam,
  redirect_uri: optionalParam,
  scope: optionalParam,
  state: optionalParam,
  code_challenge: optionalParam,
  code_challenge_method: optionalParam,
  action: optionalParam,
  username: optionalParam,
  password: z.string().optional(),
  tenant_id: optionalParam,
});

type AuthorizeRequest = z.infer<typeof authorizeRequestSchema>;

const LOGIN_FAILED = 'Invalid username, password, or tenant ID';

function buildRedirect(redirectUri: string, params: Record<string, string | undefined>): string {
  const url = new URL(redirectUri);
  for (const [key, value] of Object.entries(params)) {
    if (value) {
      url.searchParams.set(key, value);
    }
  }
  return url.toString();
}

function servesTenant(client: OAuthClient, tenantId: string): boolean {
  return client.tenantId === null || client.tenantId === tenantId;
}

/**
 * Failure of the PKCE parameters, if any
 */
function pkceProblem(request: AuthorizeRequest): string | null {
  if (!request.code_challenge) return null;
  if (!request.code_challenge_method) {
    return 'code_challenge_method is required when code_challenge is provided';
  }
  if (!isCodeChallengeMethod(request.code_challenge_method)) {
    return "code_challenge_method must be 'S256' or 'plain'";
  }
  return null;
}

/**
 * Handle the authorization endpoint (GET/POST /oauth/authorize)
 *
 * GET validates the request and either redirects straight back with a code
 * (bearer-authenticated user with a standing consent) or renders the login and
 * consent form. POST is that form's submission.
 *
 * Error redirects only ever go to a redirect_uri registered for the client;
 * anything else is answered with JSON.
 */
export function createAuthorizeHandlers(options: AuthorizeHandlerOptions) {
  const { clients, codes, consents, verifier, identity, signer } = options;
  const now = options.now ?? (() => new Date());

  /**
   * Client and redirect URI checks shared by GET and POST.
   * Returns the response to send when the request cannot proceed.
   */
  async function checkClient(
    c: Context,
    request: AuthorizeRequest,
    clientId: string,
    redirectUri: string
  ): Promise<{ client: OAuthClient } | { response: Response }> {
    const client = await clients.findByClientId(clientId);
    const registered = client?.redirectUris.includes(redirectUri) ?? false;

    const reject = (error: string, description: string): Response =>
      registered
        ? c.redirect(buildRedirect(redirectUri, { error, error_description: description, state: request.state }))
        : c.json({ error, error_description: description }, 400);

    if (c.req.method === 'GET' && request.response_type !== RESPONSE_TYPE_CODE) {
      return {
        response: reject(
          ERROR_UNSUPPORTED_RESPONSE_TYPE,
          "Response type must be 'code' for Authorization Code Grant flow"
        ),
      };
    }

    const pkce = pkceProblem(request);
    if (pkce) {
      return { response: reject(ERROR_INVALID_REQUEST, pkce) };
    }

    if (!client || !client.isActive) {
      return { response: reject(ERROR_INVALID_CLIENT, 'Invalid or inactive client_id') };
    }

    if (!registered) {
      return {
        response: c.json(
          {
            error: ERROR_INVALID_REQUEST,
            error_description: 'redirect_uri does not match any registered redirect URIs for this client',
          },
          400
        ),
      };
    }

    return { client };
  }

  async function issueCode(
    c: Context,
    request: AuthorizeRequest,
    client: OAuthClient,
    redirectUri: string,
    principal: Principal
  ): Promise<Response> {
    const context = grantContextOf(c);
    const method = request.code_challenge_method;

    const code = await codes.create({
      userId: principal.id,
      tenantId: principal.tenantId,
      clientId: client.clientId,
      redirectUri,
      scope: request.scope,
      state: request.state,
      codeChallenge: request.code_challenge,
      codeChallengeMethod: request.code_challenge && method && isCodeChallengeMethod(method) ? method : undefined,
      ipAddress: context.ipAddress,
      userAgent: context.userAgent,
    });

    await consents.upsert(principal.id, principal.tenantId, client.clientId, request.scope, now());

    logger.info('authorization_code_issued', { userId: principal.id, clientId: client.clientId });

    return c.redirect(buildRedirect(redirectUri, { code, state: request.state }));
  }

  function showConsentPage(
    c: Context,
    request: AuthorizeRequest,
    client: OAuthClient,
    redirectUri: string,
    errorMessage?: string
  ) {
    return c.html(
      renderConsentPage({
        clientId: client.clientId,
        clientName: client.name,
        redirectUri,
        scope: request.scope,
        state: request.state,
        codeChallenge: request.code_challenge,
        codeChallengeMethod: request.code_challenge_method,
        errorMessage,
      })
    );
  }

  /**
   * Active principal behind a valid bearer token, if the client serves its tenant
   */
  async function bearerPrincipal(c: Context, client: OAuthClient): Promise<Principal | null> {
    const claims = await authenticateBearer(signer, c.req.header(HEADER_AUTHORIZATION));
    if (!claims) return null;

    const principal = await identity.findById(claims.sub);
    if (!principal || !principal.isActive || !servesTenant(client, principal.tenantId)) {
      return null;
    }
    return principal;
  }

  const handleGet = async (c: Context) => {
    const request = authorizeRequestSchema.parse(c.req.query());
    const { client_id: clientId, redirect_uri: redirectUri } = request;

    if (!clientId || !redirectUri) {
      if (request.response_type !== RESPONSE_TYPE_CODE) {
        return c.json(
          {
            error: ERROR_UNSUPPORTED_RESPONSE_TYPE,
            error_description: "Response type must be 'code' for Authorization Code Grant flow",
          },
          400
        );
      }
      return c.json(
        {
          error: ERROR_INVALID_REQUEST,
          error_description: clientId ? 'redirect_uri is required' : 'client_id is required',
        },
        400
      );
    }

    const checked = await checkClient(c, request, clientId, redirectUri);
    if ('response' in checked) return checked.response;
    const { client } = checked;

    const principal = await bearerPrincipal(c, client);
    if (principal) {
      const consent = await consents.findValid(principal.id, client.clientId, request.scope, now());
      if (consent) {
        return issueCode(c, request, client, redirectUri, principal);
      }
    }

    return showConsentPage(c, request, client, redirectUri);
  };

  const handlePost = async (c: Context) => {
    const request = authorizeRequestSchema.parse(await readParams(c));
    const { client_id: clientId, redirect_uri: redirectUri } = request;

    if (!clientId || !redirectUri) {
      return c.json(
        { error: ERROR_INVALID_REQUEST, error_description: 'client_id and redirect_uri are required' },
        400
      );
    }

    const checked = await checkClient(c, request, clientId, redirectUri);
    if ('response' in checked) return checked.response;
    const { client } = checked;

    let principal: Principal | null = null;

    if (request.username && request.password) {
      const verified = await verifier.verify({
        identifier: request.username,
        secret: request.password,
        tenantId: request.tenant_id,
        host: c.req.header('Host'),
      });

      if (verified.ok && servesTenant(client, verified.value.tenant.id)) {
        principal = verified.value.principal;
      } else {
        logger.warn('authorize_login_failed', { clientId: client.clientId, tenantId: request.tenant_id });
      }
    } else {
      principal = await bearerPrincipal(c, client);
    }

    if (!principal) {
      return showConsentPage(c, request, client, redirectUri, LOGIN_FAILED);
    }

    if (request.action === 'deny') {
      return c.redirect(
        buildRedirect(redirectUri, {
          error: ERROR_ACCESS_DENIED,
          error_description: 'User denied access',
          state: request.state,
        })
      );
    }

    return issueCode(c, request, client, redirectUri, principal);
  };

  return { handleGet, handlePost };
}
