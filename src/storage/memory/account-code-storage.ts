import type { AccountCode, CreateAccountCodeInput } from '../../types/account-code.js';
import type { IAccountCodeStorage } from '../interfaces/account-code-storage.js';
import { UniqueConstraintError } from '../../errors/storage-error.js';
import { generateId } from '../../crypto/random.js';
import { JournaledMap, type UndoJournal } from './journal.js';

/**
 * In-memory activation / reset code storage implementation
 */
export class MemoryAccountCodeStorage implements IAccountCodeStorage {
  private readonly codes: JournaledMap<string, AccountCode>;
  private readonly codeIndex: JournaledMap<string, string>; // code -> id

  constructor(journal: UndoJournal) {
    this.codes = new JournaledMap(journal);
    this.codeIndex = new JournaledMap(journal);
  }

  async create(input: CreateAccountCodeInput): Promise<AccountCode> {
    if (this.codeIndex.has(input.code)) {
      throw new UniqueConstraintError('account_codes.code');
    }

    const accountCode: AccountCode = {
      id: generateId(),
      userId: input.userId,
      purpose: input.purpose,
      code: input.code,
      expiresAt: input.expiresAt,
      createdAt: new Date(),
    };

    this.codes.set(accountCode.id, accountCode);
    this.codeIndex.set(accountCode.code, accountCode.id);

    return accountCode;
  }

  async findByCode(code: string): Promise<AccountCode | null> {
    const id = this.codeIndex.get(code);
    if (!id) return null;
    return this.codes.get(id) ?? null;
  }

  async delete(id: string): Promise<void> {
    const existing = this.codes.get(id);
    if (!existing) return;

    this.codeIndex.delete(existing.code);
    this.codes.delete(id);
  }
}
