import type { Client, CreateClientInput } from '../../types/client.js';
import type { IClientStorage } from '../interfaces/client-storage.js';
import { UniqueConstraintError } from '../../errors/storage-error.js';
import { generateId } from '../../crypto/random.js';
import { JournaledMap, type UndoJournal } from './journal.js';

/**
 * In-memory client storage implementation
 */
export class MemoryClientStorage implements IClientStorage {
  private readonly clients: JournaledMap<string, Client>;
  private readonly clientIdIndex: JournaledMap<string, string>; // clientId -> id

  constructor(journal: UndoJournal) {
    this.clients = new JournaledMap(journal);
    this.clientIdIndex = new JournaledMap(journal);
  }

  async create(input: CreateClientInput): Promise<Client> {
    if (this.clientIdIndex.has(input.clientId)) {
      throw new UniqueConstraintError('clients.client_id');
    }

    const now = new Date();
    const client: Client = {
      id: generateId(),
      clientId: input.clientId,
      clientSecretHash: input.clientSecretHash,
      name: input.name,
      homeUrl: input.homeUrl,
      published: input.published ?? false,
      ownerId: input.ownerId,
      iconPath: input.iconPath,
      redirectUris: [...(input.redirectUris ?? [])],
      createdAt: now,
      updatedAt: now,
    };

    this.clients.set(client.id, client);
    this.clientIdIndex.set(client.clientId, client.id);

    return client;
  }

  async findById(id: string): Promise<Client | null> {
    return this.clients.get(id) ?? null;
  }

  async findByClientId(clientId: string): Promise<Client | null> {
    const id = this.clientIdIndex.get(clientId);
    if (!id) return null;
    return this.clients.get(id) ?? null;
  }

  async existsByClientId(clientId: string): Promise<boolean> {
    return this.clientIdIndex.has(clientId);
  }

  async addRedirectUri(id: string, uri: string): Promise<Client | null> {
    const existing = this.clients.get(id);
    if (!existing) return null;
    if (existing.redirectUris.includes(uri)) return existing;

    const updated: Client = {
      ...existing,
      redirectUris: [...existing.redirectUris, uri],
      updatedAt: new Date(),
    };
    this.clients.set(id, updated);

    return updated;
  }
}
