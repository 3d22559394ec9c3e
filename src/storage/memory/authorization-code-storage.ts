import type { AuthorizationCode, CreateAuthorizationCodeInput } from '../../types/token.js';
import type { IAuthorizationCodeStorage } from '../interfaces/authorization-code-storage.js';
import { UniqueConstraintError } from '../../errors/storage-error.js';
import { generateId } from '../../crypto/random.js';
import { JournaledMap, type UndoJournal } from './journal.js';

/**
 * In-memory authorization code storage implementation
 */
export class MemoryAuthorizationCodeStorage implements IAuthorizationCodeStorage {
  private readonly codes: JournaledMap<string, AuthorizationCode>;
  private readonly hashIndex: JournaledMap<string, string>; // codeHash -> id

  constructor(journal: UndoJournal) {
    this.codes = new JournaledMap(journal);
    this.hashIndex = new JournaledMap(journal);
  }

  async create(input: CreateAuthorizationCodeInput): Promise<AuthorizationCode> {
    if (this.hashIndex.has(input.codeHash)) {
      throw new UniqueConstraintError('authorization_codes.code_hash');
    }

    const code: AuthorizationCode = {
      id: generateId(),
      codeHash: input.codeHash,
      clientId: input.clientId,
      userId: input.userId,
      scope: input.scope,
      redirectUri: input.redirectUri,
      expiresAt: input.expiresAt,
      issuedAt: new Date(),
    };

    this.codes.set(code.id, code);
    this.hashIndex.set(code.codeHash, code.id);

    return code;
  }

  async findByHash(codeHash: string): Promise<AuthorizationCode | null> {
    const id = this.hashIndex.get(codeHash);
    if (!id) return null;
    return this.codes.get(id) ?? null;
  }

  async consume(id: string, usedAt: Date): Promise<boolean> {
    const code = this.codes.get(id);
    if (!code || code.usedAt) {
      return false;
    }

    this.codes.set(id, { ...code, usedAt });
    return true;
  }

  async deleteExpired(now: Date): Promise<number> {
    let deleted = 0;

    for (const code of this.codes.values()) {
      if (code.expiresAt < now) {
        this.hashIndex.delete(code.codeHash);
        this.codes.delete(code.id);
        deleted++;
      }
    }

    return deleted;
  }
}
