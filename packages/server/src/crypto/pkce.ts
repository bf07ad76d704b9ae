import { constantTimeCompare, sha256Base64Url } from './hash.js';
import {
  CODE_CHALLENGE_METHOD_PLAIN,
  CODE_CHALLENGE_METHOD_S256,
  SUPPORTED_CODE_CHALLENGE_METHODS,
} from '../config/constants.js';

export type CodeChallengeMethod = (typeof SUPPORTED_CODE_CHALLENGE_METHODS)[number];

export function isCodeChallengeMethod(value: string): value is CodeChallengeMethod {
  return SUPPORTED_CODE_CHALLENGE_METHODS.some((method) => method === value);
}

/**
 * Generate a code challenge from a code verifier using S256 method
 * RFC 7636 Section 4.2
 *
 * code_challenge = BASE64URL(SHA256(code_verifier))
 */
export function generateCodeChallenge(codeVerifier: string): string {
  return sha256Base64Url(codeVerifier);
}

/**
 * Verify a code verifier against a stored code challenge
 * RFC 7636 Section 4.6
 *
 * A missing method means `plain`. Unknown methods never verify.
 */
export function verifyCodeChallenge(
  codeVerifier: string,
  codeChallenge: string,
  method: string | undefined
): boolean {
  if (method === undefined || method === CODE_CHALLENGE_METHOD_PLAIN) {
    return constantTimeCompare(codeVerifier, codeChallenge);
  }

  if (method === CODE_CHALLENGE_METHOD_S256) {
    return constantTimeCompare(generateCodeChallenge(codeVerifier), codeChallenge);
  }

  return false;
}
