import type { IStorage, StorageSession } from '../interfaces/index.js';
import { TransactionLock } from '../transaction-lock.js';
import { UndoJournal } from './journal.js';
import { MemoryUserStorage } from './user-storage.js';
import { MemoryAliasStorage } from './alias-storage.js';
import { MemoryClientStorage } from './client-storage.js';
import { MemoryBindingStorage } from './binding-storage.js';
import { MemoryAuthorizationCodeStorage } from './authorization-code-storage.js';
import { MemoryAccessTokenStorage } from './token-storage.js';
import { MemoryAccountCodeStorage } from './account-code-storage.js';

export { MemoryUserStorage } from './user-storage.js';
export { MemoryAliasStorage } from './alias-storage.js';
export { MemoryClientStorage } from './client-storage.js';
export { MemoryBindingStorage } from './binding-storage.js';
export { MemoryAuthorizationCodeStorage } from './authorization-code-storage.js';
export { MemoryAccessTokenStorage } from './token-storage.js';
export { MemoryAccountCodeStorage } from './account-code-storage.js';

/**
 * In-memory storage; rollback replays the undo journal
 */
export class MemoryStorage implements IStorage {
  private readonly lock = new TransactionLock();
  private readonly journal = new UndoJournal();
  private readonly session: StorageSession;

  constructor() {
    this.session = {
      users: new MemoryUserStorage(this.journal),
      aliases: new MemoryAliasStorage(this.journal),
      clients: new MemoryClientStorage(this.journal),
      bindings: new MemoryBindingStorage(this.journal),
      authorizationCodes: new MemoryAuthorizationCodeStorage(this.journal),
      accessTokens: new MemoryAccessTokenStorage(this.journal),
      accountCodes: new MemoryAccountCodeStorage(this.journal),
    };
  }

  transaction<T>(work: (session: StorageSession) => Promise<T>): Promise<T> {
    return this.lock.run(async () => {
      this.journal.begin();
      try {
        const result = await work(this.session);
        this.journal.commit();
        return result;
      } catch (error) {
        this.journal.rollback();
        throw error;
      }
    });
  }

  async close(): Promise<void> {
    // Nothing to release
  }
}

/**
 * Create in-memory storage (development and tests)
 */
export function createMemoryStorage(): IStorage {
  return new MemoryStorage();
}
