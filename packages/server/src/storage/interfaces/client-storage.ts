import type { OAuthClient } from '../../types/client.js';

export type CreateClientInput = Pick<OAuthClient, 'clientId' | 'name' | 'redirectUris'> &
  Partial<Pick<OAuthClient, 'id' | 'tenantId' | 'isActive'>> & {
    clientSecret?: string; // Plaintext; hashed before storage. Presence makes the client confidential.
  };

/**
 * Storage interface for OAuth client lookup
 */
export interface IClientStorage {
  /**
   * Register a client
   */
  create(input: CreateClientInput): Promise<OAuthClient>;

  /**
   * Find a client by its public identifier
   */
  findByClientId(clientId: string): Promise<OAuthClient | null>;
}
