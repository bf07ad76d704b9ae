import * as jose from 'jose';
import { z } from 'zod';
import type { SigningKey, AccessTokenClaims, AccessTokenClaimsInput } from '../types/token.js';
import type { JWKSResponse } from '../types/index.js';
import { importPrivateKey, importPublicKey, signJwt, decodeJwt, getJwtHeader, publicKeyToJwk } from '../crypto/jwt.js';
import { generateJti } from '../crypto/random.js';
import { type Result, ok, fail } from '../errors/result.js';

export interface TokenSignerOptions {
  issuer: string;
  audience: string;
  clockTolerance?: number; // seconds
  now?: () => Date;
}

export type TokenValidationFailure = 'malformed' | 'signature' | 'issuer' | 'audience' | 'algorithm';

export interface ValidatedToken {
  claims: AccessTokenClaims;
  expired: boolean;
}

const accessTokenClaimsSchema = z.object({
  sub: z.string(),
  tenant_id: z.string(),
  unique_name: z.string(),
  user_id: z.string(),
  roles: z.array(z.string()).default([]),
  scope: z.string().optional(),
  email: z.string().optional(),
  given_name: z.string().optional(),
  family_name: z.string().optional(),
  iss: z.string(),
  aud: z.union([z.string(), z.array(z.string())]),
  exp: z.number(),
  iat: z.number(),
  jti: z.string(),
});

/**
 * Issues and validates access tokens with the one active signing key.
 *
 * Expiry never makes a token invalid here: `validate` reports it through
 * `expired` so callers can tell "genuine but stale" apart from "forged".
 */
export class TokenSigner {
  private readonly clockTolerance: number;
  private readonly now: () => Date;
  private privateKey?: Promise<jose.KeyLike>;
  private publicKey?: Promise<jose.KeyLike>;

  constructor(
    private readonly key: SigningKey,
    private readonly options: TokenSignerOptions
  ) {
    this.clockTolerance = options.clockTolerance ?? 5;
    this.now = options.now ?? (() => new Date());
  }

  get keyId(): string {
    return this.key.kid;
  }

  get algorithm(): SigningKey['algorithm'] {
    return this.key.algorithm;
  }

  async issue(claims: AccessTokenClaimsInput, ttlSeconds: number): Promise<string> {
    const iat = Math.floor(this.now().getTime() / 1000);

    const payload: AccessTokenClaims = {
      ...claims,
      user_id: claims.sub,
      iss: this.options.issuer,
      aud: this.options.audience,
      iat,
      exp: iat + ttlSeconds,
      jti: generateJti(),
    };

    return signJwt(payload, await this.getPrivateKey(), {
      alg: this.key.algorithm,
      kid: this.key.kid,
      typ: 'at+jwt',
    });
  }

  async validate(
    token: string,
    options: { checkSignature: boolean } = { checkSignature: true }
  ): Promise<Result<ValidatedToken, TokenValidationFailure>> {
    if (!token || token.split('.').length !== 3) {
      return fail('malformed');
    }

    if (!options.checkSignature) {
      return this.validateUnsigned(token);
    }

    try {
      const { payload } = await jose.jwtVerify(token, await this.getPublicKey(), {
        algorithms: [this.key.algorithm],
        issuer: this.options.issuer,
        audience: this.options.audience,
        currentDate: this.now(),
        clockTolerance: this.clockTolerance,
      });
      return this.toValidated(payload, false);
    } catch (error) {
      if (error instanceof jose.errors.JWTExpired) {
        // Signature already verified; the expired payload still has to name us
        const claimFailure = this.checkIssuerAndAudience(error.payload);
        if (claimFailure) return fail(claimFailure);
        return this.toValidated(error.payload, true);
      }
      return fail(mapVerifyError(error));
    }
  }

  /**
   * Public half of the active key, JWKS-shaped
   */
  async jwks(): Promise<JWKSResponse> {
    const jwk = await publicKeyToJwk(this.key.publicKey, this.key.kid, this.key.algorithm);
    return { keys: [jwk] };
  }

  private validateUnsigned(token: string): Result<ValidatedToken, TokenValidationFailure> {
    const header = getJwtHeader(token);
    const payload = decodeJwt(token);
    if (!header || !payload) {
      return fail('malformed');
    }

    const claimFailure = this.checkIssuerAndAudience(payload);
    if (claimFailure) return fail(claimFailure);

    const nowSeconds = Math.floor(this.now().getTime() / 1000);
    const expired = typeof payload.exp === 'number' && payload.exp <= nowSeconds - this.clockTolerance;

    return this.toValidated(payload, expired);
  }

  private checkIssuerAndAudience(payload: jose.JWTPayload): TokenValidationFailure | null {
    if (payload.iss !== this.options.issuer) {
      return 'issuer';
    }

    const audiences = Array.isArray(payload.aud) ? payload.aud : [payload.aud];
    if (!audiences.includes(this.options.audience)) {
      return 'audience';
    }

    return null;
  }

  private toValidated(payload: jose.JWTPayload, expired: boolean): Result<ValidatedToken, TokenValidationFailure> {
    const parsed = accessTokenClaimsSchema.safeParse(payload);
    if (!parsed.success) {
      return fail('malformed');
    }
    return ok({ claims: parsed.data, expired });
  }

  private getPrivateKey(): Promise<jose.KeyLike> {
    this.privateKey ??= importPrivateKey(this.key.privateKey, this.key.algorithm);
    return this.privateKey;
  }

  private getPublicKey(): Promise<jose.KeyLike> {
    this.publicKey ??= importPublicKey(this.key.publicKey, this.key.algorithm);
    return this.publicKey;
  }
}

function mapVerifyError(error: unknown): TokenValidationFailure {
  if (error instanceof jose.errors.JWSSignatureVerificationFailed) {
    return 'signature';
  }
  if (error instanceof jose.errors.JOSEAlgNotAllowed) {
    return 'algorithm';
  }
  if (error instanceof jose.errors.JWTClaimValidationFailed) {
    if (error.claim === 'iss') return 'issuer';
    if (error.claim === 'aud') return 'audience';
  }
  return 'malformed';
}
