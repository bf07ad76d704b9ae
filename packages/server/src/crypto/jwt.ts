import * as jose from 'jose';
import { SUPPORTED_SIGNING_ALGORITHMS } from '../config/constants.js';

/**
 * JWT signing and verification utilities using jose library
 */

export type SigningAlgorithm = (typeof SUPPORTED_SIGNING_ALGORITHMS)[number];

export function isSigningAlgorithm(value: string): value is SigningAlgorithm {
  return SUPPORTED_SIGNING_ALGORITHMS.some((algorithm) => algorithm === value);
}

/**
 * Import a private key from PEM format
 */
export async function importPrivateKey(
  pem: string,
  algorithm: SigningAlgorithm
): Promise<jose.KeyLike> {
  return jose.importPKCS8(pem, algorithm);
}

/**
 * Import a public key from PEM format
 */
export async function importPublicKey(
  pem: string,
  algorithm: SigningAlgorithm
): Promise<jose.KeyLike> {
  return jose.importSPKI(pem, algorithm);
}

/**
 * Sign a JWT with the given header values
 */
export async function signJwt(
  payload: jose.JWTPayload,
  privateKey: jose.KeyLike,
  header: { alg: SigningAlgorithm; kid: string; typ: string }
): Promise<string> {
  return new jose.SignJWT(payload).setProtectedHeader(header).sign(privateKey);
}

/**
 * Get the JWT header without verification
 */
export function getJwtHeader(token: string): jose.ProtectedHeaderParameters | null {
  try {
    return jose.decodeProtectedHeader(token);
  } catch {
    return null;
  }
}

/**
 * Decode a JWT without verification
 * WARNING: Only use this when the signature is checked elsewhere or deliberately skipped
 */
export function decodeJwt(token: string): jose.JWTPayload | null {
  try {
    return jose.decodeJwt(token);
  } catch {
    return null;
  }
}

/**
 * Generate a new key pair for signing
 */
export async function generateSigningKeyPair(
  algorithm: SigningAlgorithm = 'RS256'
): Promise<{ publicKey: string; privateKey: string }> {
  const options: jose.GenerateKeyPairOptions = { extractable: true };
  if (algorithm.startsWith('RS')) {
    options.modulusLength = algorithm === 'RS512' ? 4096 : 2048;
  }

  const { publicKey, privateKey } = await jose.generateKeyPair(algorithm, options);

  return {
    publicKey: await jose.exportSPKI(publicKey),
    privateKey: await jose.exportPKCS8(privateKey),
  };
}

/**
 * Convert a PEM public key to JWK format (for JWKS endpoint)
 */
export async function publicKeyToJwk(
  publicKeyPem: string,
  kid: string,
  algorithm: SigningAlgorithm
): Promise<jose.JWK> {
  const publicKey = await importPublicKey(publicKeyPem, algorithm);
  const jwk = await jose.exportJWK(publicKey);

  return {
    ...jwk,
    kid,
    alg: algorithm,
    use: 'sig',
  };
}
