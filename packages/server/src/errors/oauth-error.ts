import type { ContentfulStatusCode } from 'hono/utils/http-status';
import {
  type OAuthErrorCode,
  ERROR_STATUS_CODES,
  ERROR_DESCRIPTIONS,
  ERROR_INVALID_REQUEST,
  ERROR_UNSUPPORTED_GRANT_TYPE,
  ERROR_SERVER_ERROR,
  ERROR_INVALID_TOKEN,
  ERROR_TOO_MANY_REQUESTS,
} from './error-codes.js';

/**
 * Error body, RFC 6749 Section 5.2
 */
export interface OAuthErrorResponse {
  error: OAuthErrorCode;
  error_description?: string;
}

/**
 * Failure shape handed from the core to the HTTP layer
 */
export interface OAuthFailure {
  error: OAuthErrorCode;
  description: string;
  status?: ContentfulStatusCode;
}

/**
 * Thrown by route handlers and rendered by the global error handler.
 * Authorize-endpoint errors that go back to the client as a redirect never become one.
 */
export class OAuthError extends Error {
  public readonly code: OAuthErrorCode;
  public readonly statusCode: ContentfulStatusCode;
  public readonly description: string;

  constructor(
    code: OAuthErrorCode,
    description?: string,
    options?: { statusCode?: ContentfulStatusCode; cause?: Error }
  ) {
    const desc = description ?? ERROR_DESCRIPTIONS[code];
    super(desc, options?.cause ? { cause: options.cause } : undefined);
    this.name = 'OAuthError';
    this.code = code;
    this.statusCode = options?.statusCode ?? ERROR_STATUS_CODES[code];
    this.description = desc;
  }

  toJSON(): OAuthErrorResponse {
    return this.description ? { error: this.code, error_description: this.description } : { error: this.code };
  }

  static fromFailure(failure: OAuthFailure): OAuthError {
    return new OAuthError(failure.error, failure.description, { statusCode: failure.status });
  }

  static invalidRequest(description?: string): OAuthError {
    return new OAuthError(ERROR_INVALID_REQUEST, description);
  }

  static unsupportedGrantType(description?: string): OAuthError {
    return new OAuthError(ERROR_UNSUPPORTED_GRANT_TYPE, description);
  }

  static invalidToken(description?: string): OAuthError {
    return new OAuthError(ERROR_INVALID_TOKEN, description);
  }

  static tooManyRequests(description?: string): OAuthError {
    return new OAuthError(ERROR_TOO_MANY_REQUESTS, description);
  }

  static serverError(description?: string, cause?: Error): OAuthError {
    return new OAuthError(ERROR_SERVER_ERROR, description, { cause });
  }
}
