import type { User, CreateUserInput, UpdateUserInput } from '../../types/user.js';
import type { IUserStorage } from '../interfaces/user-storage.js';
import { UniqueConstraintError } from '../../errors/storage-error.js';
import { generateId } from '../../crypto/random.js';
import { JournaledMap, type UndoJournal } from './journal.js';

/**
 * In-memory user storage implementation
 */
export class MemoryUserStorage implements IUserStorage {
  private readonly users: JournaledMap<string, User>;
  private readonly emailIndex: JournaledMap<string, string>; // lowercased email -> id

  constructor(journal: UndoJournal) {
    this.users = new JournaledMap(journal);
    this.emailIndex = new JournaledMap(journal);
  }

  async create(input: CreateUserInput): Promise<User> {
    const emailKey = input.email.toLowerCase();
    if (this.emailIndex.has(emailKey)) {
      throw new UniqueConstraintError('users.email');
    }

    const now = new Date();
    const user: User = {
      id: generateId(),
      email: input.email,
      name: input.name,
      passwordHash: input.passwordHash,
      isAdmin: input.isAdmin ?? false,
      activated: input.activated ?? false,
      plan: input.plan ?? { plan: 'free' },
      profilePicturePath: input.profilePicturePath,
      isDeveloper: input.isDeveloper ?? false,
      promoCodes: [],
      createdAt: now,
      updatedAt: now,
    };

    this.users.set(user.id, user);
    this.emailIndex.set(emailKey, user.id);

    return user;
  }

  async findById(id: string): Promise<User | null> {
    return this.users.get(id) ?? null;
  }

  async findByEmail(email: string): Promise<User | null> {
    const id = this.emailIndex.get(email.toLowerCase());
    if (!id) return null;
    return this.users.get(id) ?? null;
  }

  async update(id: string, input: UpdateUserInput): Promise<User | null> {
    const existing = this.users.get(id);
    if (!existing) return null;

    const updated: User = {
      ...existing,
      ...input,
      updatedAt: new Date(),
    };
    this.users.set(id, updated);

    return updated;
  }
}
