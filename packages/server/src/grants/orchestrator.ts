import type { GrantType } from '../types/index.js';
import type { GrantContext, GrantHandler, GrantResult, TokenRequestParams } from './types.js';
import { grantFailure } from './types.js';
import { ERROR_INVALID_REQUEST, ERROR_UNSUPPORTED_GRANT_TYPE } from '../errors/error-codes.js';
import { SUPPORTED_GRANT_TYPES } from '../config/constants.js';

export type GrantHandlers = Record<GrantType, GrantHandler>;

function isSupportedGrantType(value: string): value is GrantType {
  return SUPPORTED_GRANT_TYPES.some((type) => type === value);
}

const SUPPORTED_LIST = SUPPORTED_GRANT_TYPES.map((type) => `'${type}'`).join(', ');

/**
 * Token endpoint state machine: picks the grant path from `grant_type`.
 * An unknown grant fails before any store is touched.
 */
export class GrantOrchestrator {
  constructor(private readonly handlers: GrantHandlers) {}

  async dispatch(params: TokenRequestParams, context: GrantContext = {}): Promise<GrantResult> {
    const grantType = params.grant_type?.trim();

    if (!grantType) {
      return grantFailure(ERROR_INVALID_REQUEST, 'grant_type is required');
    }

    if (!isSupportedGrantType(grantType)) {
      return grantFailure(
        ERROR_UNSUPPORTED_GRANT_TYPE,
        `Grant type '${grantType}' is not supported. Supported types: ${SUPPORTED_LIST}`
      );
    }

    return this.handlers[grantType](params, context);
  }
}
