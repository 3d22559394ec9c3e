import type Database from 'better-sqlite3';
import { z } from 'zod';
import type { AccountCode, CreateAccountCodeInput } from '../../../types/account-code.js';
import type { IAccountCodeStorage } from '../../interfaces/account-code-storage.js';
import { generateId } from '../../../crypto/random.js';
import { withUniqueGuard } from '../mapping.js';

interface AccountCodeRow {
  id: string;
  user_id: string;
  purpose: string;
  code: string;
  expires_at: number;
  created_at: number;
}

const purposeSchema = z.enum(['activation', 'reset_password']);

function rowToAccountCode(row: AccountCodeRow): AccountCode {
  return {
    id: row.id,
    userId: row.user_id,
    purpose: purposeSchema.parse(row.purpose),
    code: row.code,
    expiresAt: new Date(row.expires_at),
    createdAt: new Date(row.created_at),
  };
}

/**
 * SQLite activation / reset code storage implementation
 */
export class SqliteAccountCodeStorage implements IAccountCodeStorage {
  constructor(private readonly db: Database.Database) {}

  async create(input: CreateAccountCodeInput): Promise<AccountCode> {
    const row: AccountCodeRow = {
      id: generateId(),
      user_id: input.userId,
      purpose: input.purpose,
      code: input.code,
      expires_at: input.expiresAt.getTime(),
      created_at: Date.now(),
    };

    withUniqueGuard(() =>
      this.db
        .prepare<[AccountCodeRow]>(
          `INSERT INTO account_codes (id, user_id, purpose, code, expires_at, created_at)
           VALUES (@id, @user_id, @purpose, @code, @expires_at, @created_at)`
        )
        .run(row)
    );

    return rowToAccountCode(row);
  }

  async findByCode(code: string): Promise<AccountCode | null> {
    const row = this.db
      .prepare<[string], AccountCodeRow>('SELECT * FROM account_codes WHERE code = ?')
      .get(code);
    return row ? rowToAccountCode(row) : null;
  }

  async delete(id: string): Promise<void> {
    this.db.prepare<[string]>('DELETE FROM account_codes WHERE id = ?').run(id);
  }
}
