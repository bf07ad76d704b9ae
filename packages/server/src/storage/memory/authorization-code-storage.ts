import type { AuthorizationCode } from '../../types/token.js';
import type {
  IAuthorizationCodeStorage,
  CreateAuthorizationCodeInput,
} from '../interfaces/authorization-code-storage.js';
import { generateId } from '../../crypto/random.js';

/**
 * In-memory authorization code storage implementation
 */
export class MemoryAuthorizationCodeStorage implements IAuthorizationCodeStorage {
  private codes = new Map<string, AuthorizationCode>();
  private hashIndex = new Map<string, string>(); // hash -> id

  async create(input: CreateAuthorizationCodeInput): Promise<AuthorizationCode> {
    const code: AuthorizationCode = { ...input, id: generateId() };

    this.codes.set(code.id, code);
    this.hashIndex.set(code.codeHash, code.id);

    return code;
  }

  async findByHash(codeHash: string): Promise<AuthorizationCode | null> {
    const id = this.hashIndex.get(codeHash);
    if (!id) return null;
    return this.codes.get(id) ?? null;
  }

  async markUsed(id: string, usedAt: Date): Promise<boolean> {
    // Check-and-set runs without an await in between
    const code = this.codes.get(id);
    if (!code || code.usedAt) {
      return false;
    }
    this.codes.set(id, { ...code, usedAt });
    return true;
  }
}
