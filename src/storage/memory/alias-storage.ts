import type { Alias, CreateAliasInput } from '../../types/alias.js';
import type { IAliasStorage } from '../interfaces/alias-storage.js';
import { UniqueConstraintError } from '../../errors/storage-error.js';
import { generateId } from '../../crypto/random.js';
import { JournaledMap, type UndoJournal } from './journal.js';

/**
 * In-memory alias storage implementation
 */
export class MemoryAliasStorage implements IAliasStorage {
  private readonly aliases: JournaledMap<string, Alias>;
  private readonly emailIndex: JournaledMap<string, string>; // email -> id

  constructor(journal: UndoJournal) {
    this.aliases = new JournaledMap(journal);
    this.emailIndex = new JournaledMap(journal);
  }

  async create(input: CreateAliasInput): Promise<Alias> {
    if (this.emailIndex.has(input.email)) {
      throw new UniqueConstraintError('aliases.email');
    }

    const alias: Alias = {
      id: generateId(),
      userId: input.userId,
      email: input.email,
      enabled: true,
      createdAt: new Date(),
    };

    this.aliases.set(alias.id, alias);
    this.emailIndex.set(alias.email, alias.id);

    return alias;
  }

  async findById(id: string): Promise<Alias | null> {
    return this.aliases.get(id) ?? null;
  }

  async findByEmail(email: string): Promise<Alias | null> {
    const id = this.emailIndex.get(email);
    if (!id) return null;
    return this.aliases.get(id) ?? null;
  }

  async existsByEmail(email: string): Promise<boolean> {
    return this.emailIndex.has(email);
  }

  async listByUser(userId: string): Promise<Alias[]> {
    return this.aliases
      .values()
      .filter((alias) => alias.userId === userId)
      .sort((a, b) => a.createdAt.getTime() - b.createdAt.getTime());
  }

  async countByUser(userId: string): Promise<number> {
    return this.aliases.values().filter((alias) => alias.userId === userId).length;
  }

  async setEnabled(id: string, enabled: boolean): Promise<Alias | null> {
    const existing = this.aliases.get(id);
    if (!existing) return null;

    const updated: Alias = { ...existing, enabled };
    this.aliases.set(id, updated);

    return updated;
  }
}
