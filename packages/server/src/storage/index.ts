import type { IStorage, IIdentityBackend } from './interfaces/index.js';
import { createMemoryStorage, MemoryIdentityBackend } from './memory/index.js';
import { createPostgresStorage, PostgresIdentityBackend, getPool, closePool, migrate } from './postgres/index.js';

export type * from './interfaces/index.js';

export interface StorageBackend {
  storage: IStorage;
  identity: IIdentityBackend;
  close(): Promise<void>;
}

/**
 * PostgreSQL when a connection string is given, in-memory otherwise
 */
export async function createStorage(databaseUrl?: string): Promise<StorageBackend> {
  if (!databaseUrl) {
    return {
      storage: createMemoryStorage(),
      identity: new MemoryIdentityBackend(),
      close: async () => {},
    };
  }

  const storage = createPostgresStorage(databaseUrl);
  const pool = getPool();
  await migrate(pool);

  return {
    storage,
    identity: new PostgresIdentityBackend(pool),
    close: closePool,
  };
}
