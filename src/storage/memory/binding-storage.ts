import type { Binding, CreateBindingInput } from '../../types/binding.js';
import type { IBindingStorage } from '../interfaces/binding-storage.js';
import { UniqueConstraintError } from '../../errors/storage-error.js';
import { generateId } from '../../crypto/random.js';
import { JournaledMap, type UndoJournal } from './journal.js';

/**
 * In-memory consent binding storage implementation
 */
export class MemoryBindingStorage implements IBindingStorage {
  private readonly bindings: JournaledMap<string, Binding>;
  private readonly pairIndex: JournaledMap<string, string>; // `${clientId}:${userId}` -> id

  constructor(journal: UndoJournal) {
    this.bindings = new JournaledMap(journal);
    this.pairIndex = new JournaledMap(journal);
  }

  async create(input: CreateBindingInput): Promise<Binding> {
    const key = `${input.clientId}:${input.userId}`;
    if (this.pairIndex.has(key)) {
      throw new UniqueConstraintError('bindings.client_id_user_id');
    }

    const binding: Binding = {
      id: generateId(),
      clientId: input.clientId,
      userId: input.userId,
      channel: input.channel,
      createdAt: new Date(),
    };

    this.bindings.set(binding.id, binding);
    this.pairIndex.set(key, binding.id);

    return binding;
  }

  async findById(id: string): Promise<Binding | null> {
    return this.bindings.get(id) ?? null;
  }

  async find(clientId: string, userId: string): Promise<Binding | null> {
    const id = this.pairIndex.get(`${clientId}:${userId}`);
    if (!id) return null;
    return this.bindings.get(id) ?? null;
  }

  async countByClient(clientId: string): Promise<number> {
    return this.bindings.values().filter((binding) => binding.clientId === clientId).length;
  }
}
