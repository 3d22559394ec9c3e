import type Database from 'better-sqlite3';
import type { AccessToken, CreateAccessTokenInput } from '../../../types/token.js';
import type { IAccessTokenStorage } from '../../interfaces/token-storage.js';
import { generateId } from '../../../crypto/random.js';
import { withUniqueGuard, fromTimestamp } from '../mapping.js';

interface AccessTokenRow {
  id: string;
  token_hash: string;
  client_id: string;
  user_id: string;
  scope: string;
  redirect_uri: string;
  expires_at: number;
  issued_at: number;
  revoked_at: number | null;
}

function rowToAccessToken(row: AccessTokenRow): AccessToken {
  return {
    id: row.id,
    tokenHash: row.token_hash,
    clientId: row.client_id,
    userId: row.user_id,
    scope: row.scope,
    redirectUri: row.redirect_uri,
    expiresAt: new Date(row.expires_at),
    issuedAt: new Date(row.issued_at),
    revokedAt: fromTimestamp(row.revoked_at),
  };
}

/**
 * SQLite access token storage implementation
 */
export class SqliteAccessTokenStorage implements IAccessTokenStorage {
  constructor(private readonly db: Database.Database) {}

  async create(input: CreateAccessTokenInput): Promise<AccessToken> {
    const row: AccessTokenRow = {
      id: generateId(),
      token_hash: input.tokenHash,
      client_id: input.clientId,
      user_id: input.userId,
      scope: input.scope,
      redirect_uri: input.redirectUri,
      expires_at: input.expiresAt.getTime(),
      issued_at: Date.now(),
      revoked_at: null,
    };

    withUniqueGuard(() =>
      this.db
        .prepare<[AccessTokenRow]>(
          `INSERT INTO access_tokens (id, token_hash, client_id, user_id, scope, redirect_uri,
             expires_at, issued_at, revoked_at)
           VALUES (@id, @token_hash, @client_id, @user_id, @scope, @redirect_uri,
             @expires_at, @issued_at, @revoked_at)`
        )
        .run(row)
    );

    return rowToAccessToken(row);
  }

  async findByHash(tokenHash: string): Promise<AccessToken | null> {
    const row = this.db
      .prepare<[string], AccessTokenRow>('SELECT * FROM access_tokens WHERE token_hash = ?')
      .get(tokenHash);
    return row ? rowToAccessToken(row) : null;
  }

  async revoke(id: string, revokedAt: Date): Promise<boolean> {
    const result = this.db
      .prepare<[number, string]>(
        'UPDATE access_tokens SET revoked_at = ? WHERE id = ? AND revoked_at IS NULL'
      )
      .run(revokedAt.getTime(), id);
    return result.changes === 1;
  }

  async deleteExpired(now: Date): Promise<number> {
    return this.db
      .prepare<[number]>('DELETE FROM access_tokens WHERE expires_at < ?')
      .run(now.getTime()).changes;
  }
}
