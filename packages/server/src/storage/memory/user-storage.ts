import type { Principal, UserConsent, MfaEnrollment } from '../../types/user.js';
import type {
  IIdentityBackend,
  IConsentStorage,
  IMfaEnrollmentStorage,
  CredentialFailure,
} from '../interfaces/user-storage.js';
import { type Result, ok, fail } from '../../errors/result.js';
import { generateId } from '../../crypto/random.js';
import { hashSecret, verifySecret } from '../../crypto/hash.js';
import { MAX_FAILED_LOGIN_ATTEMPTS, LOCKOUT_DURATION_SECONDS } from '../../config/constants.js';

export interface CreateUserInput {
  id?: string;
  tenantId: string;
  username: string;
  password: string;
  email?: string;
  firstName?: string;
  lastName?: string;
  isActive?: boolean;
  roles?: string[];
}

interface StoredUser {
  principal: Principal;
  passwordHash: string;
  roles: string[];
  failedAttempts: number;
  lockoutEnd?: Date;
}

/**
 * In-memory identity backend with scrypt password hashes and lockout
 */
export class MemoryIdentityBackend implements IIdentityBackend {
  private users = new Map<string, StoredUser>();

  constructor(private readonly now: () => Date = () => new Date()) {}

  async addUser(input: CreateUserInput): Promise<Principal> {
    const principal: Principal = {
      id: input.id ?? generateId(),
      tenantId: input.tenantId,
      username: input.username,
      email: input.email,
      firstName: input.firstName,
      lastName: input.lastName,
      isActive: input.isActive ?? true,
    };

    this.users.set(principal.id, {
      principal,
      passwordHash: await hashSecret(input.password),
      roles: input.roles ?? [],
      failedAttempts: 0,
    });

    return principal;
  }

  async setActive(userId: string, isActive: boolean): Promise<void> {
    const user = this.users.get(userId);
    if (user) {
      user.principal = { ...user.principal, isActive };
    }
  }

  async verifyCredential(
    tenantId: string,
    identifier: string,
    secret: string
  ): Promise<Result<Principal, CredentialFailure>> {
    const user = this.findStored(tenantId, identifier);
    if (!user) {
      return fail('invalid_credentials');
    }

    if (!user.principal.isActive) {
      return fail('inactive');
    }

    const now = this.now();
    if (user.lockoutEnd && user.lockoutEnd > now) {
      return fail('locked_out');
    }

    if (!(await verifySecret(secret, user.passwordHash))) {
      user.failedAttempts++;
      if (user.failedAttempts >= MAX_FAILED_LOGIN_ATTEMPTS) {
        user.lockoutEnd = new Date(now.getTime() + LOCKOUT_DURATION_SECONDS * 1000);
        user.failedAttempts = 0;
      }
      return fail('invalid_credentials');
    }

    user.failedAttempts = 0;
    user.lockoutEnd = undefined;

    return ok(user.principal);
  }

  async getRoles(principal: Principal): Promise<string[]> {
    return [...(this.users.get(principal.id)?.roles ?? [])];
  }

  async findById(userId: string): Promise<Principal | null> {
    return this.users.get(userId)?.principal ?? null;
  }

  async findByIdentifier(tenantId: string, identifier: string): Promise<Principal | null> {
    return this.findStored(tenantId, identifier)?.principal ?? null;
  }

  private findStored(tenantId: string, identifier: string): StoredUser | undefined {
    const wanted = identifier.trim().toLowerCase();
    for (const user of this.users.values()) {
      const { principal } = user;
      if (principal.tenantId !== tenantId) continue;
      if (principal.username.toLowerCase() === wanted || principal.email?.toLowerCase() === wanted) {
        return user;
      }
    }
    return undefined;
  }
}

/**
 * In-memory consent storage implementation
 */
export class MemoryConsentStorage implements IConsentStorage {
  private consents = new Map<string, UserConsent>(); // `${userId}:${clientId}` -> consent

  async find(userId: string, clientId: string): Promise<UserConsent | null> {
    return this.consents.get(`${userId}:${clientId}`) ?? null;
  }

  async save(consent: UserConsent): Promise<UserConsent> {
    this.consents.set(`${consent.userId}:${consent.clientId}`, consent);
    return consent;
  }
}

/**
 * In-memory MFA enrollment storage implementation
 */
export class MemoryMfaEnrollmentStorage implements IMfaEnrollmentStorage {
  private enrollments = new Map<string, MfaEnrollment>(); // `${tenantId}:${userId}` -> enrollment

  async find(tenantId: string, userId: string): Promise<MfaEnrollment | null> {
    return this.enrollments.get(`${tenantId}:${userId}`) ?? null;
  }

  async save(enrollment: MfaEnrollment): Promise<MfaEnrollment> {
    this.enrollments.set(`${enrollment.tenantId}:${enrollment.userId}`, enrollment);
    return enrollment;
  }

  async delete(tenantId: string, userId: string): Promise<void> {
    this.enrollments.delete(`${tenantId}:${userId}`);
  }

  async redeemBackupCode(tenantId: string, userId: string, codeHash: string): Promise<boolean> {
    const key = `${tenantId}:${userId}`;
    const enrollment = this.enrollments.get(key);
    if (!enrollment || !enrollment.backupCodeHashes.includes(codeHash)) {
      return false;
    }

    this.enrollments.set(key, {
      ...enrollment,
      backupCodeHashes: enrollment.backupCodeHashes.filter((hash) => hash !== codeHash),
    });
    return true;
  }
}
