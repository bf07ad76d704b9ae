/**
 * OAuth 2.0 Client
 */
export interface OAuthClient {
  id: string;
  clientId: string; // Public identifier, unique across the deployment
  name: string;
  isConfidential: boolean;
  clientSecretHash?: string; // scrypt hash, confidential clients only
  redirectUris: string[]; // Registered redirect URIs (exact match required)
  tenantId: string | null; // null = available to every tenant
  isActive: boolean;
  createdAt: Date;
}
