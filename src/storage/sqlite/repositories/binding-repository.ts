import type Database from 'better-sqlite3';
import type { Binding, CreateBindingInput, DisclosureChannel } from '../../../types/binding.js';
import type { IBindingStorage } from '../../interfaces/binding-storage.js';
import { generateId } from '../../../crypto/random.js';
import { withUniqueGuard } from '../mapping.js';

interface BindingRow {
  id: string;
  client_id: string;
  user_id: string;
  alias_id: string | null;
  created_at: number;
}

function rowToBinding(row: BindingRow): Binding {
  const channel: DisclosureChannel =
    row.alias_id === null ? { kind: 'real_email' } : { kind: 'alias', aliasId: row.alias_id };

  return {
    id: row.id,
    clientId: row.client_id,
    userId: row.user_id,
    channel,
    createdAt: new Date(row.created_at),
  };
}

/**
 * SQLite consent binding storage implementation
 * A NULL alias_id column is the real-email channel
 */
export class SqliteBindingStorage implements IBindingStorage {
  constructor(private readonly db: Database.Database) {}

  async create(input: CreateBindingInput): Promise<Binding> {
    const row: BindingRow = {
      id: generateId(),
      client_id: input.clientId,
      user_id: input.userId,
      alias_id: input.channel.kind === 'alias' ? input.channel.aliasId : null,
      created_at: Date.now(),
    };

    withUniqueGuard(() =>
      this.db
        .prepare<[BindingRow]>(
          `INSERT INTO bindings (id, client_id, user_id, alias_id, created_at)
           VALUES (@id, @client_id, @user_id, @alias_id, @created_at)`
        )
        .run(row)
    );

    return rowToBinding(row);
  }

  async findById(id: string): Promise<Binding | null> {
    const row = this.db.prepare<[string], BindingRow>('SELECT * FROM bindings WHERE id = ?').get(id);
    return row ? rowToBinding(row) : null;
  }

  async find(clientId: string, userId: string): Promise<Binding | null> {
    const row = this.db
      .prepare<[string, string], BindingRow>('SELECT * FROM bindings WHERE client_id = ? AND user_id = ?')
      .get(clientId, userId);
    return row ? rowToBinding(row) : null;
  }

  async countByClient(clientId: string): Promise<number> {
    const row = this.db
      .prepare<[string], { total: number }>('SELECT COUNT(*) AS total FROM bindings WHERE client_id = ?')
      .get(clientId);
    return row?.total ?? 0;
  }
}
