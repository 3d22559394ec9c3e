import Database from 'better-sqlite3';
import type { IStorage, StorageSession } from '../interfaces/index.js';
import { TransactionLock } from '../transaction-lock.js';
import { applySchema } from './schema.js';
import { SqliteUserStorage } from './repositories/user-repository.js';
import { SqliteAliasStorage } from './repositories/alias-repository.js';
import { SqliteClientStorage } from './repositories/client-repository.js';
import { SqliteBindingStorage } from './repositories/binding-repository.js';
import { SqliteAuthorizationCodeStorage } from './repositories/authorization-code-repository.js';
import { SqliteAccessTokenStorage } from './repositories/token-repository.js';
import { SqliteAccountCodeStorage } from './repositories/account-code-repository.js';

/**
 * SQLite storage backed by better-sqlite3
 *
 * Each unit of work runs inside BEGIN IMMEDIATE ... COMMIT, and the
 * transaction lock keeps async work from interleaving on the shared
 * connection.
 */
export class SqliteStorage implements IStorage {
  private readonly lock = new TransactionLock();
  private readonly session: StorageSession;

  constructor(private readonly db: Database.Database) {
    this.session = {
      users: new SqliteUserStorage(db),
      aliases: new SqliteAliasStorage(db),
      clients: new SqliteClientStorage(db),
      bindings: new SqliteBindingStorage(db),
      authorizationCodes: new SqliteAuthorizationCodeStorage(db),
      accessTokens: new SqliteAccessTokenStorage(db),
      accountCodes: new SqliteAccountCodeStorage(db),
    };
  }

  transaction<T>(work: (session: StorageSession) => Promise<T>): Promise<T> {
    return this.lock.run(async () => {
      this.db.exec('BEGIN IMMEDIATE');
      try {
        const result = await work(this.session);
        this.db.exec('COMMIT');
        return result;
      } catch (error) {
        if (this.db.inTransaction) {
          this.db.exec('ROLLBACK');
        }
        throw error;
      }
    });
  }

  async close(): Promise<void> {
    this.db.close();
  }
}

/**
 * Open (or create) the database at `path` and apply the schema.
 * Pass ':memory:' for a throwaway database.
 */
export function createSqliteStorage(path: string): IStorage {
  const db = new Database(path);
  if (path !== ':memory:') {
    db.pragma('journal_mode = WAL');
  }
  db.pragma('foreign_keys = ON');
  applySchema(db);

  return new SqliteStorage(db);
}
