import type Database from 'better-sqlite3';
import type { Alias, CreateAliasInput } from '../../../types/alias.js';
import type { IAliasStorage } from '../../interfaces/alias-storage.js';
import { generateId } from '../../../crypto/random.js';
import { withUniqueGuard } from '../mapping.js';

interface AliasRow {
  id: string;
  user_id: string;
  email: string;
  enabled: number;
  created_at: number;
}

function rowToAlias(row: AliasRow): Alias {
  return {
    id: row.id,
    userId: row.user_id,
    email: row.email,
    enabled: row.enabled === 1,
    createdAt: new Date(row.created_at),
  };
}

/**
 * SQLite alias storage implementation
 */
export class SqliteAliasStorage implements IAliasStorage {
  constructor(private readonly db: Database.Database) {}

  async create(input: CreateAliasInput): Promise<Alias> {
    const alias: Alias = {
      id: generateId(),
      userId: input.userId,
      email: input.email,
      enabled: true,
      createdAt: new Date(),
    };

    withUniqueGuard(() =>
      this.db
        .prepare<[string, string, string, number]>(
          'INSERT INTO aliases (id, user_id, email, enabled, created_at) VALUES (?, ?, ?, 1, ?)'
        )
        .run(alias.id, alias.userId, alias.email, alias.createdAt.getTime())
    );

    return alias;
  }

  async findById(id: string): Promise<Alias | null> {
    const row = this.db.prepare<[string], AliasRow>('SELECT * FROM aliases WHERE id = ?').get(id);
    return row ? rowToAlias(row) : null;
  }

  async findByEmail(email: string): Promise<Alias | null> {
    const row = this.db.prepare<[string], AliasRow>('SELECT * FROM aliases WHERE email = ?').get(email);
    return row ? rowToAlias(row) : null;
  }

  async existsByEmail(email: string): Promise<boolean> {
    const row = this.db
      .prepare<[string], { found: number }>('SELECT 1 AS found FROM aliases WHERE email = ?')
      .get(email);
    return row !== undefined;
  }

  async listByUser(userId: string): Promise<Alias[]> {
    return this.db
      .prepare<[string], AliasRow>('SELECT * FROM aliases WHERE user_id = ? ORDER BY created_at, rowid')
      .all(userId)
      .map(rowToAlias);
  }

  async countByUser(userId: string): Promise<number> {
    const row = this.db
      .prepare<[string], { total: number }>('SELECT COUNT(*) AS total FROM aliases WHERE user_id = ?')
      .get(userId);
    return row?.total ?? 0;
  }

  async setEnabled(id: string, enabled: boolean): Promise<Alias | null> {
    const result = this.db
      .prepare<[number, string]>('UPDATE aliases SET enabled = ? WHERE id = ?')
      .run(enabled ? 1 : 0, id);
    if (result.changes === 0) return null;
    return this.findById(id);
  }
}
