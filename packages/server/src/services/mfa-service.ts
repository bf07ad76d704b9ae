import otplib from 'otplib';
import type { Principal, MfaEnrollment } from '../types/user.js';
import type { MfaStatusResponse, MfaSetupResponse } from '../types/index.js';
import type { IMfaEnrollmentStorage } from '../storage/interfaces/user-storage.js';
import type { ITenantStorage } from '../storage/interfaces/tenant-storage.js';
import { encrypt, decrypt } from '../crypto/encrypt.js';
import { sha256 } from '../crypto/hash.js';
import { generateBackupCode } from '../crypto/random.js';
import { type Result, ok, fail } from '../errors/result.js';
import { BACKUP_CODE_COUNT, SETTING_MFA_REQUIRED } from '../config/constants.js';
import { logger } from '../logger.js';

export type MfaManagementFailure = 'not_set_up' | 'not_enabled' | 'invalid_code' | 'required_by_tenant';

export interface MfaServiceOptions {
  issuer: string; // Shown in authenticator apps
  encryptionKey?: string;
}

// One step of clock drift either side
const totp = otplib.authenticator.clone({ window: 1 });

/**
 * Backup codes compare case-insensitively and ignore spaces and dashes
 */
export function normalizeBackupCode(code: string): string {
  return code.replace(/[\s-]/g, '').toUpperCase();
}

export function formatSecretForManualEntry(secret: string): string {
  return secret.match(/.{1,4}/g)?.join(' ') ?? '';
}

export function buildOtpAuthUri(issuer: string, account: string, secret: string): string {
  const encodedIssuer = encodeURIComponent(issuer);
  const encodedAccount = encodeURIComponent(account);
  return `otpauth://totp/${encodedIssuer}:${encodedAccount}?secret=${secret}&issuer=${encodedIssuer}`;
}

/**
 * TOTP second factor and single-use backup codes
 */
export class MfaService {
  constructor(
    private readonly enrollments: IMfaEnrollmentStorage,
    private readonly tenants: ITenantStorage,
    private readonly options: MfaServiceOptions,
    private readonly now: () => Date = () => new Date()
  ) {}

  async isEnabled(tenantId: string, userId: string): Promise<boolean> {
    const enrollment = await this.enrollments.find(tenantId, userId);
    return enrollment?.isEnabled ?? false;
  }

  async isRequired(tenantId: string): Promise<boolean> {
    const tenant = await this.tenants.findById(tenantId);
    return tenant?.settings[SETTING_MFA_REQUIRED]?.trim().toLowerCase() === 'true';
  }

  async getStatus(principal: Principal): Promise<MfaStatusResponse> {
    const enrollment = await this.enrollments.find(principal.tenantId, principal.id);
    const isEnabled = enrollment?.isEnabled ?? false;

    return {
      isEnabled,
      isRequired: await this.isRequired(principal.tenantId),
      backupCodesRemaining: isEnabled && enrollment ? enrollment.backupCodeHashes.length : 0,
    };
  }

  /**
   * Start (or restart) enrollment with a fresh secret. The factor stays off until `enable`.
   */
  async beginSetup(principal: Principal): Promise<MfaSetupResponse> {
    const secret = totp.generateSecret();

    await this.enrollments.save({
      userId: principal.id,
      tenantId: principal.tenantId,
      secret: this.options.encryptionKey ? encrypt(secret, this.options.encryptionKey) : secret,
      isEnabled: false,
      backupCodeHashes: [],
      createdAt: this.now(),
    });

    const account = principal.email ?? principal.username;
    logger.info('mfa_setup_started', { tenantId: principal.tenantId, userId: principal.id });

    return {
      secret: formatSecretForManualEntry(secret),
      qrCodeUri: buildOtpAuthUri(this.options.issuer, account, secret),
    };
  }

  /**
   * Confirm the pending secret with a code; returns the first set of backup codes
   */
  async enable(principal: Principal, code: string): Promise<Result<string[], MfaManagementFailure>> {
    const enrollment = await this.enrollments.find(principal.tenantId, principal.id);
    if (!enrollment) {
      return fail('not_set_up');
    }
    if (!this.checkCode(enrollment, code)) {
      return fail('invalid_code');
    }

    const backupCodes = this.generateBackupCodes();
    await this.enrollments.save({
      ...enrollment,
      isEnabled: true,
      enabledAt: this.now(),
      backupCodeHashes: backupCodes.map((c) => sha256(normalizeBackupCode(c))),
    });

    logger.info('mfa_enabled', { tenantId: principal.tenantId, userId: principal.id });
    return ok(backupCodes);
  }

  async disable(principal: Principal): Promise<Result<void, MfaManagementFailure>> {
    if (await this.isRequired(principal.tenantId)) {
      return fail('required_by_tenant');
    }
    if (!(await this.isEnabled(principal.tenantId, principal.id))) {
      return fail('not_enabled');
    }

    await this.enrollments.delete(principal.tenantId, principal.id);
    logger.info('mfa_disabled', { tenantId: principal.tenantId, userId: principal.id });
    return ok(undefined);
  }

  /**
   * Replace every backup code; earlier codes stop working
   */
  async regenerateBackupCodes(principal: Principal): Promise<Result<string[], MfaManagementFailure>> {
    const enrollment = await this.enrollments.find(principal.tenantId, principal.id);
    if (!enrollment?.isEnabled) {
      return fail('not_enabled');
    }

    const backupCodes = this.generateBackupCodes();
    await this.enrollments.save({
      ...enrollment,
      backupCodeHashes: backupCodes.map((c) => sha256(normalizeBackupCode(c))),
    });

    return ok(backupCodes);
  }

  async verifyCode(tenantId: string, userId: string, code: string): Promise<boolean> {
    const enrollment = await this.enrollments.find(tenantId, userId);
    if (!enrollment?.isEnabled) {
      return false;
    }
    return this.checkCode(enrollment, code);
  }

  async redeemBackupCode(tenantId: string, userId: string, code: string): Promise<boolean> {
    if (!(await this.isEnabled(tenantId, userId))) {
      return false;
    }
    return this.enrollments.redeemBackupCode(tenantId, userId, sha256(normalizeBackupCode(code)));
  }

  private checkCode(enrollment: MfaEnrollment, code: string): boolean {
    const token = code.replace(/\s/g, '');
    if (!/^\d{6}$/.test(token)) {
      return false;
    }

    const secret = this.readSecret(enrollment);
    return secret !== null && totp.check(token, secret);
  }

  private readSecret(enrollment: MfaEnrollment): string | null {
    if (!this.options.encryptionKey) {
      return enrollment.secret;
    }
    try {
      return decrypt(enrollment.secret, this.options.encryptionKey);
    } catch (error) {
      logger.error('mfa_secret_unreadable', {
        tenantId: enrollment.tenantId,
        userId: enrollment.userId,
        message: error instanceof Error ? error.message : String(error),
      });
      return null;
    }
  }

  private generateBackupCodes(): string[] {
    return Array.from({ length: BACKUP_CODE_COUNT }, () => generateBackupCode());
  }
}
