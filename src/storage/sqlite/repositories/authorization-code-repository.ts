import type Database from 'better-sqlite3';
import type { AuthorizationCode, CreateAuthorizationCodeInput } from '../../../types/token.js';
import type { IAuthorizationCodeStorage } from '../../interfaces/authorization-code-storage.js';
import { generateId } from '../../../crypto/random.js';
import { withUniqueGuard, fromTimestamp } from '../mapping.js';

interface AuthorizationCodeRow {
  id: string;
  code_hash: string;
  client_id: string;
  user_id: string;
  scope: string;
  redirect_uri: string;
  expires_at: number;
  issued_at: number;
  used_at: number | null;
}

function rowToAuthorizationCode(row: AuthorizationCodeRow): AuthorizationCode {
  return {
    id: row.id,
    codeHash: row.code_hash,
    clientId: row.client_id,
    userId: row.user_id,
    scope: row.scope,
    redirectUri: row.redirect_uri,
    expiresAt: new Date(row.expires_at),
    issuedAt: new Date(row.issued_at),
    usedAt: fromTimestamp(row.used_at),
  };
}

/**
 * SQLite authorization code storage implementation
 */
export class SqliteAuthorizationCodeStorage implements IAuthorizationCodeStorage {
  constructor(private readonly db: Database.Database) {}

  async create(input: CreateAuthorizationCodeInput): Promise<AuthorizationCode> {
    const row: AuthorizationCodeRow = {
      id: generateId(),
      code_hash: input.codeHash,
      client_id: input.clientId,
      user_id: input.userId,
      scope: input.scope,
      redirect_uri: input.redirectUri,
      expires_at: input.expiresAt.getTime(),
      issued_at: Date.now(),
      used_at: null,
    };

    withUniqueGuard(() =>
      this.db
        .prepare<[AuthorizationCodeRow]>(
          `INSERT INTO authorization_codes (id, code_hash, client_id, user_id, scope, redirect_uri,
             expires_at, issued_at, used_at)
           VALUES (@id, @code_hash, @client_id, @user_id, @scope, @redirect_uri,
             @expires_at, @issued_at, @used_at)`
        )
        .run(row)
    );

    return rowToAuthorizationCode(row);
  }

  async findByHash(codeHash: string): Promise<AuthorizationCode | null> {
    const row = this.db
      .prepare<[string], AuthorizationCodeRow>('SELECT * FROM authorization_codes WHERE code_hash = ?')
      .get(codeHash);
    return row ? rowToAuthorizationCode(row) : null;
  }

  async consume(id: string, usedAt: Date): Promise<boolean> {
    const result = this.db
      .prepare<[number, string]>(
        'UPDATE authorization_codes SET used_at = ? WHERE id = ? AND used_at IS NULL'
      )
      .run(usedAt.getTime(), id);
    return result.changes === 1;
  }

  async deleteExpired(now: Date): Promise<number> {
    return this.db
      .prepare<[number]>('DELETE FROM authorization_codes WHERE expires_at < ?')
      .run(now.getTime()).changes;
  }
}
