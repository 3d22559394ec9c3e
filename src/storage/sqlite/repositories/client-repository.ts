import type Database from 'better-sqlite3';
import type { Client, CreateClientInput } from '../../../types/client.js';
import type { IClientStorage } from '../../interfaces/client-storage.js';
import { generateId } from '../../../crypto/random.js';
import { withUniqueGuard } from '../mapping.js';

interface ClientRow {
  id: string;
  client_id: string;
  client_secret_hash: string;
  name: string;
  home_url: string | null;
  published: number;
  owner_id: string;
  icon_path: string | null;
  created_at: number;
  updated_at: number;
}

function rowToClient(row: ClientRow, redirectUris: string[]): Client {
  return {
    id: row.id,
    clientId: row.client_id,
    clientSecretHash: row.client_secret_hash,
    name: row.name,
    homeUrl: row.home_url ?? undefined,
    published: row.published === 1,
    ownerId: row.owner_id,
    iconPath: row.icon_path ?? undefined,
    redirectUris,
    createdAt: new Date(row.created_at),
    updatedAt: new Date(row.updated_at),
  };
}

/**
 * SQLite client storage implementation
 * Redirect URIs live in their own table, ordered by registration
 */
export class SqliteClientStorage implements IClientStorage {
  constructor(private readonly db: Database.Database) {}

  async create(input: CreateClientInput): Promise<Client> {
    const now = new Date();
    const id = generateId();
    const redirectUris = [...new Set(input.redirectUris ?? [])];

    withUniqueGuard(() =>
      this.db
        .prepare<[string, string, string, string, string | null, number, string, string | null, number, number]>(
          `INSERT INTO clients (id, client_id, client_secret_hash, name, home_url, published, owner_id,
             icon_path, created_at, updated_at)
           VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?)`
        )
        .run(
          id,
          input.clientId,
          input.clientSecretHash,
          input.name,
          input.homeUrl ?? null,
          input.published ? 1 : 0,
          input.ownerId,
          input.iconPath ?? null,
          now.getTime(),
          now.getTime()
        )
    );

    redirectUris.forEach((uri, position) => this.insertRedirectUri(id, uri, position));

    return rowToClient(
      {
        id,
        client_id: input.clientId,
        client_secret_hash: input.clientSecretHash,
        name: input.name,
        home_url: input.homeUrl ?? null,
        published: input.published ? 1 : 0,
        owner_id: input.ownerId,
        icon_path: input.iconPath ?? null,
        created_at: now.getTime(),
        updated_at: now.getTime(),
      },
      redirectUris
    );
  }

  async findById(id: string): Promise<Client | null> {
    const row = this.db.prepare<[string], ClientRow>('SELECT * FROM clients WHERE id = ?').get(id);
    return row ? rowToClient(row, this.redirectUrisOf(row.id)) : null;
  }

  async findByClientId(clientId: string): Promise<Client | null> {
    const row = this.db
      .prepare<[string], ClientRow>('SELECT * FROM clients WHERE client_id = ?')
      .get(clientId);
    return row ? rowToClient(row, this.redirectUrisOf(row.id)) : null;
  }

  async existsByClientId(clientId: string): Promise<boolean> {
    const row = this.db
      .prepare<[string], { found: number }>('SELECT 1 AS found FROM clients WHERE client_id = ?')
      .get(clientId);
    return row !== undefined;
  }

  async addRedirectUri(id: string, uri: string): Promise<Client | null> {
    const client = await this.findById(id);
    if (!client) return null;
    if (client.redirectUris.includes(uri)) return client;

    this.insertRedirectUri(id, uri, client.redirectUris.length);
    this.db
      .prepare<[number, string]>('UPDATE clients SET updated_at = ? WHERE id = ?')
      .run(Date.now(), id);

    return this.findById(id);
  }

  private insertRedirectUri(clientId: string, uri: string, position: number): void {
    this.db
      .prepare<[string, string, number]>(
        'INSERT INTO redirect_uris (client_id, uri, position) VALUES (?, ?, ?)'
      )
      .run(clientId, uri, position);
  }

  private redirectUrisOf(clientId: string): string[] {
    return this.db
      .prepare<[string], { uri: string }>(
        'SELECT uri FROM redirect_uris WHERE client_id = ? ORDER BY position'
      )
      .all(clientId)
      .map((row) => row.uri);
  }
}
