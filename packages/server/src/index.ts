import { serve } from '@hono/node-server';
import { createAuthServer } from './app.js';
import { createStorage } from './storage/index.js';
import { getConfig } from './config/index.js';
import { generateSigningKeyPair } from './crypto/jwt.js';
import type { SigningKey } from './types/token.js';
import { logger } from './logger.js';

// Load configuration
const config = getConfig();
const isProduction = config.server.nodeEnv === 'production';

/**
 * The configured PEM pair, or a throwaway pair outside production
 */
async function loadSigningKey(): Promise<SigningKey> {
  const { privateKey, publicKey, keyId, algorithm } = config.jwt;

  if (privateKey && publicKey) {
    return { kid: keyId, algorithm, privateKey, publicKey };
  }

  if (isProduction) {
    throw new Error('JWT_PRIVATE_KEY and JWT_PUBLIC_KEY are required in production');
  }

  logger.warn('signing_key_generated', { keyId, algorithm, note: 'tokens will not survive a restart' });
  return { kid: keyId, algorithm, ...(await generateSigningKeyPair(algorithm)) };
}

function loadPepper(): string {
  const pepper = config.secrets.tokenPepper;
  if (pepper) {
    return pepper;
  }
  if (isProduction) {
    throw new Error('TOKEN_PEPPER is required in production');
  }

  logger.warn('token_pepper_missing', { note: 'using the development pepper' });
  return 'development-pepper';
}

async function main(): Promise<void> {
  const backend = await createStorage(config.database.url);
  logger.info('storage_ready', { backend: config.database.url ? 'postgres' : 'memory' });

  const { app, services } = createAuthServer({
    storage: backend.storage,
    identity: backend.identity,
    signingKey: await loadSigningKey(),
    issuer: config.jwt.issuer,
    audience: config.jwt.audience,
    accessTokenTtlSeconds: config.jwt.expirationMinutes * 60,
    secrets: { pepper: loadPepper(), encryptionKey: config.secrets.encryptionKey },
    rateLimitCacheTtlMs: config.rateLimit.cacheTtlMs,
    enableLogging: config.server.nodeEnv !== 'test',
  });

  const seeded = await services.rateLimits.seedDefaults();
  if (seeded > 0) {
    logger.info('rate_limit_defaults_seeded', { count: seeded });
  }

  const server = serve(
    {
      fetch: app.fetch,
      port: config.server.port,
      hostname: config.server.host,
    },
    (info) => {
      logger.info('server_started', { address: info.address, port: info.port, issuer: config.jwt.issuer });
    }
  );

  const shutdown = (signal: string) => {
    logger.info('server_stopping', { signal });
    server.close(() => {
      backend
        .close()
        .then(() => process.exit(0))
        .catch((error: unknown) => {
          logger.error('shutdown_failed', { message: error instanceof Error ? error.message : String(error) });
          process.exit(1);
        });
    });
  };

  process.on('SIGINT', () => shutdown('SIGINT'));
  process.on('SIGTERM', () => shutdown('SIGTERM'));
}

main().catch((error: unknown) => {
  logger.error('startup_failed', { message: error instanceof Error ? error.message : String(error) });
  process.exit(1);
});
