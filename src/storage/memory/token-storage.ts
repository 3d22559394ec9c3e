import type { AccessToken, CreateAccessTokenInput } from '../../types/token.js';
import type { IAccessTokenStorage } from '../interfaces/token-storage.js';
import { UniqueConstraintError } from '../../errors/storage-error.js';
import { generateId } from '../../crypto/random.js';
import { JournaledMap, type UndoJournal } from './journal.js';

/**
 * In-memory access token storage implementation
 */
export class MemoryAccessTokenStorage implements IAccessTokenStorage {
  private readonly tokens: JournaledMap<string, AccessToken>;
  private readonly hashIndex: JournaledMap<string, string>; // tokenHash -> id

  constructor(journal: UndoJournal) {
    this.tokens = new JournaledMap(journal);
    this.hashIndex = new JournaledMap(journal);
  }

  async create(input: CreateAccessTokenInput): Promise<AccessToken> {
    if (this.hashIndex.has(input.tokenHash)) {
      throw new UniqueConstraintError('access_tokens.token_hash');
    }

    const token: AccessToken = {
      id: generateId(),
      tokenHash: input.tokenHash,
      clientId: input.clientId,
      userId: input.userId,
      scope: input.scope,
      redirectUri: input.redirectUri,
      expiresAt: input.expiresAt,
      issuedAt: new Date(),
    };

    this.tokens.set(token.id, token);
    this.hashIndex.set(token.tokenHash, token.id);

    return token;
  }

  async findByHash(tokenHash: string): Promise<AccessToken | null> {
    const id = this.hashIndex.get(tokenHash);
    if (!id) return null;
    return this.tokens.get(id) ?? null;
  }

  async revoke(id: string, revokedAt: Date): Promise<boolean> {
    const token = this.tokens.get(id);
    if (!token || token.revokedAt) {
      return false;
    }

    this.tokens.set(id, { ...token, revokedAt });
    return true;
  }

  async deleteExpired(now: Date): Promise<number> {
    let deleted = 0;

    for (const token of this.tokens.values()) {
      if (token.expiresAt < now) {
        this.hashIndex.delete(token.tokenHash);
        this.tokens.delete(token.id);
        deleted++;
      }
    }

    return deleted;
  }
}
