/**
 * Bodies of the non-OAuth JSON endpoints
 */

export interface MfaVerifyRequest {
  challengeToken: string;
  code: string;
}

export interface MfaBackupCodeVerifyRequest {
  challengeToken: string;
  backupCode: string;
}

export interface MfaStatusResponse {
  isEnabled: boolean;
  isRequired: boolean;
  backupCodesRemaining: number;
}

export interface MfaSetupResponse {
  secret: string;
  qrCodeUri: string;
}

export interface MfaBackupCodesResponse {
  backupCodes: string[];
}

export type RevocationScope = 'service' | 'tenant' | 'user';

export type RevocationResponse =
  | { revokedCount: number; scope: 'service' }
  | { revokedCount: number; scope: 'tenant'; tenantId: string }
  | { revokedCount: number; scope: 'user'; userId: string; tenantId: string };

export interface ApiErrorResponse {
  error: string;
  error_description?: string;
  tenantId?: string;
  userId?: string;
}
