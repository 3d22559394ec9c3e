import { describe, it, expect, vi, beforeEach } from 'vitest';
import { IdentifierGenerator, toIdentifierSlug } from '../../services/identifier-generator.js';
import { GenerationExhaustedError } from '../../errors/broker-error.js';
import { UniqueConstraintError } from '../../errors/storage-error.js';
import { createMemoryStorage } from '../../storage/memory/index.js';
import { hashToken } from '../../crypto/hash.js';
import type { IStorage } from '../../storage/interfaces/index.js';
import type { Client } from '../../types/client.js';
import type { User } from '../../types/user.js';

describe('IdentifierGenerator', () => {
  const generator = new IdentifierGenerator({ emailDomain: 'sl.test', words: ['apple', 'river'] });

  describe('candidate', () => {
    it('builds aliases from two words and a four letter suffix', () => {
      expect(generator.candidate('alias')).toMatch(/^(apple|river)_(apple|river)_[a-z]{4}@sl\.test$/);
    });

    it('prefixes client ids with the slug of the application name', () => {
      expect(generator.candidate('client_id', 'Café Démo!')).toMatch(/^cafe-demo-[a-z]{10}$/);
    });

    it('produces 40 character client secrets', () => {
      expect(generator.candidate('client_secret')).toMatch(/^[A-Za-z0-9_-]{40}$/);
    });

    it('produces 43 character codes and tokens', () => {
      expect(generator.candidate('auth_code')).toMatch(/^[A-Za-z0-9_-]{43}$/);
      expect(generator.candidate('access_token')).toMatch(/^[A-Za-z0-9_-]{43}$/);
    });

    it('produces 32 lowercase letter account codes', () => {
      expect(generator.candidate('account_code')).toMatch(/^[a-z]{32}$/);
    });

    it('uses the bundled word list by default', () => {
      const defaultGenerator = new IdentifierGenerator({ emailDomain: 'sl.test' });
      expect(defaultGenerator.candidate('alias')).toMatch(/^[a-z]+_[a-z]+_[a-z]{4}@sl\.test$/);
    });
  });

  describe('generate', () => {
    it('returns the first candidate the authority reports unused', async () => {
      const exists = vi
        .fn<(candidate: string) => Promise<boolean>>()
        .mockResolvedValueOnce(true)
        .mockResolvedValueOnce(true)
        .mockResolvedValue(false);

      const value = await generator.generate('alias', { exists });

      expect(exists).toHaveBeenCalledTimes(3);
      expect(value).toBe(exists.mock.calls[2]?.[0]);
    });

    it('gives up after ten collisions', async () => {
      const exists = vi.fn<(candidate: string) => Promise<boolean>>().mockResolvedValue(true);

      await expect(generator.generate('alias', { exists })).rejects.toBeInstanceOf(GenerationExhaustedError);
      expect(exists).toHaveBeenCalledTimes(10);
    });

    it('honours a custom attempt budget', async () => {
      const limited = new IdentifierGenerator({ emailDomain: 'sl.test', maxAttempts: 3, words: ['apple'] });
      const exists = vi.fn<(candidate: string) => Promise<boolean>>().mockResolvedValue(true);

      await expect(limited.generate('client_id', { seed: 'Demo', exists })).rejects.toMatchObject({
        kind: 'client_id',
        attempts: 3,
        message: 'Could not generate a unique client_id after 3 attempts',
      });
      expect(exists).toHaveBeenCalledTimes(3);
    });
  });

  describe('allocate', () => {
    it('regenerates when the write loses a uniqueness race', async () => {
      const reserve = vi
        .fn<(candidate: string) => Promise<{ email: string }>>()
        .mockRejectedValueOnce(new UniqueConstraintError('aliases.email'))
        .mockImplementation(async (email) => ({ email }));

      const { value, record } = await generator.allocate('alias', {
        exists: async () => false,
        reserve,
      });

      expect(reserve).toHaveBeenCalledTimes(2);
      expect(record).toEqual({ email: value });
    });

    it('propagates errors other than uniqueness violations', async () => {
      const reserve = vi.fn<(candidate: string) => Promise<string>>().mockRejectedValue(new Error('disk full'));

      await expect(generator.allocate('alias', { exists: async () => false, reserve })).rejects.toThrow(
        'disk full'
      );
      expect(reserve).toHaveBeenCalledTimes(1);
    });

    it('counts lost races against the same attempt budget', async () => {
      const reserve = vi
        .fn<(candidate: string) => Promise<string>>()
        .mockRejectedValue(new UniqueConstraintError('aliases.email'));

      await expect(generator.allocate('alias', { exists: async () => false, reserve })).rejects.toBeInstanceOf(
        GenerationExhaustedError
      );
      expect(reserve).toHaveBeenCalledTimes(10);
    });

    it('allocates 10,000 distinct aliases concurrently', async () => {
      const defaultGenerator = new IdentifierGenerator({ emailDomain: 'sl.test' });
      const taken = new Set<string>();

      const allocations = await Promise.all(
        Array.from({ length: 10_000 }, () =>
          defaultGenerator.allocate('alias', {
            exists: async (email) => taken.has(email),
            reserve: async (email) => {
              if (taken.has(email)) {
                throw new UniqueConstraintError('aliases.email');
              }
              taken.add(email);
              return email;
            },
          })
        )
      );

      expect(new Set(allocations.map((allocation) => allocation.value)).size).toBe(10_000);
    });
  });
});

describe('IdentifierGenerator against memory storage', () => {
  const generator = new IdentifierGenerator({ emailDomain: 'sl.test' });
  const count = 10_000;
  const expiresAt = new Date('2026-03-01T13:00:00Z');
  let storage: IStorage;
  let user: User;
  let client: Client;

  beforeEach(async () => {
    storage = createMemoryStorage();
    ({ user, client } = await storage.transaction(async (session) => {
      const owner = await session.users.create({ email: 'ada@example.com', name: 'Ada Lovelace' });
      return {
        user: owner,
        client: await session.clients.create({
          clientId: 'demo-app-abcdefghij',
          clientSecretHash: 'hash',
          name: 'Demo App',
          ownerId: owner.id,
          redirectUris: ['https://app.test/callback'],
        }),
      };
    }));
  });

  it('allocates 10,000 distinct client ids concurrently', async () => {
    const allocations = await Promise.all(
      Array.from({ length: count }, () =>
        storage.transaction((session) =>
          generator.allocate('client_id', {
            seed: 'Demo App',
            exists: (value) => session.clients.existsByClientId(value),
            reserve: (value) =>
              session.clients.create({
                clientId: value,
                clientSecretHash: 'hash',
                name: 'Demo App',
                ownerId: user.id,
              }),
          })
        )
      )
    );

    expect(new Set(allocations.map((allocation) => allocation.value)).size).toBe(count);
    expect(new Set(allocations.map((allocation) => allocation.record.id)).size).toBe(count);
  });

  it('allocates 10,000 distinct authorization codes concurrently', async () => {
    const allocations = await Promise.all(
      Array.from({ length: count }, () =>
        storage.transaction((session) =>
          generator.allocate('auth_code', {
            exists: async (value) => (await session.authorizationCodes.findByHash(hashToken(value))) !== null,
            reserve: (value) =>
              session.authorizationCodes.create({
                codeHash: hashToken(value),
                clientId: client.id,
                userId: user.id,
                scope: 'email',
                redirectUri: 'https://app.test/callback',
                expiresAt,
              }),
          })
        )
      )
    );

    expect(new Set(allocations.map((allocation) => allocation.value)).size).toBe(count);
    expect(new Set(allocations.map((allocation) => allocation.record.codeHash)).size).toBe(count);
  });

  it('allocates 10,000 distinct access tokens concurrently', async () => {
    const allocations = await Promise.all(
      Array.from({ length: count }, () =>
        storage.transaction((session) =>
          generator.allocate('access_token', {
            exists: async (value) => (await session.accessTokens.findByHash(hashToken(value))) !== null,
            reserve: (value) =>
              session.accessTokens.create({
                tokenHash: hashToken(value),
                clientId: client.id,
                userId: user.id,
                scope: 'email',
                redirectUri: 'https://app.test/callback',
                expiresAt,
              }),
          })
        )
      )
    );

    expect(new Set(allocations.map((allocation) => allocation.value)).size).toBe(count);
    expect(new Set(allocations.map((allocation) => allocation.record.tokenHash)).size).toBe(count);
  });
});

describe('toIdentifierSlug', () => {
  it('lowercases and hyphenates', () => {
    expect(toIdentifierSlug('  My App 2 ')).toBe('my-app-2');
  });

  it('strips accents', () => {
    expect(toIdentifierSlug('Crème Brûlée')).toBe('creme-brulee');
  });

  it('falls back when nothing is left', () => {
    expect(toIdentifierSlug('!!!')).toBe('client');
  });
});
