import type { OAuthClient } from '../../types/client.js';
import type { IClientStorage, CreateClientInput } from '../interfaces/client-storage.js';
import { generateId } from '../../crypto/random.js';
import { hashSecret } from '../../crypto/hash.js';

/**
 * In-memory client storage implementation
 */
export class MemoryClientStorage implements IClientStorage {
  private clients = new Map<string, OAuthClient>(); // clientId -> client

  async create(input: CreateClientInput): Promise<OAuthClient> {
    if (this.clients.has(input.clientId)) {
      throw new Error(`Client already registered: ${input.clientId}`);
    }

    const client: OAuthClient = {
      id: input.id ?? generateId(),
      clientId: input.clientId,
      name: input.name,
      isConfidential: input.clientSecret !== undefined,
      clientSecretHash: input.clientSecret !== undefined ? await hashSecret(input.clientSecret) : undefined,
      redirectUris: input.redirectUris,
      tenantId: input.tenantId ?? null,
      isActive: input.isActive ?? true,
      createdAt: new Date(),
    };

    this.clients.set(client.clientId, client);
    return client;
  }

  async findByClientId(clientId: string): Promise<OAuthClient | null> {
    return this.clients.get(clientId) ?? null;
  }
}
