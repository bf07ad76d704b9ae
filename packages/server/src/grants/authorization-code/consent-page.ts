import { html } from 'hono/html';

export interface ConsentPageModel {
  clientId: string;
  clientName: string;
  redirectUri: string;
  scope?: string;
  state?: string;
  codeChallenge?: string;
  codeChallengeMethod?: string;
  errorMessage?: string;
}

/**
 * Minimal login-and-consent form. Every interpolated value is escaped by `html`.
 */
export function renderConsentPage(model: ConsentPageModel) {
  const scopes = (model.scope ?? '').split(/\s+/).filter(Boolean);

  return html`<!DOCTYPE html>
<html>
<head>
  <meta charset="utf-8">
  <meta name="viewport" content="width=device-width, initial-scale=1">
  <title>Authorize Application - ${model.clientName}</title>
  <style>
    body { font-family: system-ui, sans-serif; background: #f5f5f5; margin: 0; }
    .container { max-width: 420px; margin: 4rem auto; padding: 2rem; background: white; border-radius: 8px; box-shadow: 0 2px 4px rgba(0,0,0,0.1); }
    .error { color: #b00020; margin-bottom: 1rem; }
    label { display: block; margin-top: 0.75rem; }
    input[type="text"], input[type="password"] { width: 100%; padding: 0.5rem; box-sizing: border-box; }
    .buttons { margin-top: 1.5rem; display: flex; gap: 0.5rem; }
  </style>
</head>
<body>
  <div class="container">
    <h1>Authorize Application</h1>
    ${model.errorMessage ? html`<div class="error">${model.errorMessage}</div>` : ''}
    <p><strong>${model.clientName}</strong> is requesting access to your account.</p>
    ${scopes.length > 0
      ? html`<ul>${scopes.map((scope) => html`<li>${scope}</li>`)}</ul>`
      : ''}
    <form method="post" action="/oauth/authorize">
      <input type="hidden" name="client_id" value="${model.clientId}">
      <input type="hidden" name="redirect_uri" value="${model.redirectUri}">
      <input type="hidden" name="scope" value="${model.scope ?? ''}">
      <input type="hidden" name="state" value="${model.state ?? ''}">
      <input type="hidden" name="code_challenge" value="${model.codeChallenge ?? ''}">
      <input type="hidden" name="code_challenge_method" value="${model.codeChallengeMethod ?? ''}">
      <label for="tenant_id">Tenant ID</label>
      <input type="text" id="tenant_id" name="tenant_id" placeholder="Optional when signing in with an email">
      <label for="username">Username or Email</label>
      <input type="text" id="username" name="username" required>
      <label for="password">Password</label>
      <input type="password" id="password" name="password" required>
      <div class="buttons">
        <button type="submit" name="action" value="allow">Allow</button>
        <button type="submit" name="action" value="deny">Deny</button>
      </div>
    </form>
  </div>
</body>
</html>`;
}
