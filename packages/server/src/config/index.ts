import { readFileSync, existsSync } from 'node:fs';
import * as constants from './constants.js';
import { isSigningAlgorithm, type SigningAlgorithm } from '../crypto/jwt.js';

/**
 * Read a secret from file (Docker secrets) or environment variable
 * Supports both `VAR_FILE` (path to file) and `VAR` (direct value) patterns
 */
function readSecret(envVar: string): string | undefined {
  // Check for file-based secret first (Docker secrets pattern)
  const fileEnvVar = `${envVar}_FILE`;
  const filePath = process.env[fileEnvVar];

  if (filePath && existsSync(filePath)) {
    try {
      return readFileSync(filePath, 'utf-8').trim();
    } catch (error) {
      console.warn(`Warning: Could not read secret from ${filePath}`, error);
    }
  }

  // Fall back to direct environment variable
  return process.env[envVar];
}

function readInt(envVar: string, fallback: number): number {
  const parsed = parseInt(process.env[envVar] ?? String(fallback), 10);
  return Number.isNaN(parsed) ? fallback : parsed;
}

function readAlgorithm(envVar: string): SigningAlgorithm {
  const value = process.env[envVar];
  if (value === undefined) {
    return constants.SIGNING_ALGORITHM_RS256;
  }
  if (!isSigningAlgorithm(value)) {
    throw new Error(`${envVar} must be one of ${constants.SUPPORTED_SIGNING_ALGORITHMS.join(', ')}`);
  }
  return value;
}

/**
 * Application configuration loaded from environment
 */
export interface Config {
  server: {
    port: number;
    host: string;
    nodeEnv: string;
  };
  database: {
    url: string | undefined;
  };
  jwt: {
    issuer: string;
    audience: string;
    expirationMinutes: number;
    algorithm: SigningAlgorithm;
    keyId: string;
    privateKey: string | undefined;
    publicKey: string | undefined;
  };
  secrets: {
    encryptionKey: string | undefined;
    tokenPepper: string | undefined;
  };
  logging: {
    level: string;
  };
  rateLimit: {
    cacheTtlMs: number;
  };
}

/**
 * Load configuration from environment variables
 */
export function loadConfig(): Config {
  const port = readInt('PORT', 3000);

  return {
    server: {
      port,
      host: process.env['HOST'] ?? '0.0.0.0',
      nodeEnv: process.env['NODE_ENV'] ?? 'development',
    },
    database: {
      url: process.env['DATABASE_URL'],
    },
    jwt: {
      issuer: process.env['JWT_ISSUER'] ?? `http://localhost:${port}`,
      audience: process.env['JWT_AUDIENCE'] ?? 'api',
      expirationMinutes: readInt('JWT_EXPIRATION_MINUTES', constants.DEFAULT_ACCESS_TOKEN_TTL / 60),
      algorithm: readAlgorithm('JWT_ALGORITHM'),
      keyId: process.env['JWT_KEY_ID'] ?? constants.DEFAULT_KEY_ID,
      privateKey: readSecret('JWT_PRIVATE_KEY'),
      publicKey: readSecret('JWT_PUBLIC_KEY'),
    },
    secrets: {
      encryptionKey: readSecret('ENCRYPTION_KEY'),
      tokenPepper: readSecret('TOKEN_PEPPER'),
    },
    logging: {
      level: process.env['LOG_LEVEL'] ?? 'info',
    },
    rateLimit: {
      cacheTtlMs: readInt('RATE_LIMIT_CACHE_TTL_MS', constants.RATE_LIMIT_CACHE_TTL_MS),
    },
  };
}

// Singleton config instance
let config: Config | null = null;

/**
 * Get the current configuration (loads if not already loaded)
 */
export function getConfig(): Config {
  if (!config) {
    config = loadConfig();
  }
  return config;
}

/**
 * Reset configuration (useful for testing)
 */
export function resetConfig(): void {
  config = null;
}

// Re-export constants
export { constants };
