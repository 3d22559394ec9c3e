import { describe, it, expect, beforeEach } from 'vitest';
import { createTestBroker, createTestUser, type TestBroker } from '../fixtures.js';
import { NotFoundError, QuotaExceededError } from '../../errors/broker-error.js';
import type { User } from '../../types/user.js';

const now = new Date('2026-03-01T12:00:00Z');

describe('AliasService', () => {
  let broker: TestBroker;
  let user: User;

  beforeEach(async () => {
    broker = createTestBroker();
    user = await createTestUser(broker.services);
  });

  it('creates aliases up to the free plan ceiling', async () => {
    for (let i = 0; i < 3; i++) {
      await broker.services.aliases.createAlias(user, now);
    }

    const error = await broker.services.aliases.createAlias(user, now).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(QuotaExceededError);
    expect(error).toMatchObject({ limit: 3, statusCode: 403 });
    expect(error instanceof QuotaExceededError && error.toJSON()).toEqual({
      error: 'quota_exceeded',
      error_description: 'Alias limit of 3 reached on the free plan',
      upgrade_required: true,
    });
    expect(await broker.services.aliases.listAliases(user.id)).toHaveLength(3);
  });

  it('has no ceiling during a trial', async () => {
    const trialUser = await createTestUser(broker.services, {
      email: 'trial@example.com',
      plan: { plan: 'trial', expiresAt: new Date('2026-03-20T00:00:00Z') },
    });

    for (let i = 0; i < 5; i++) {
      await broker.services.aliases.createAlias(trialUser, now);
    }

    expect(await broker.services.aliases.listAliases(trialUser.id)).toHaveLength(5);
  });

  it('toggles an alias', async () => {
    const alias = await broker.services.aliases.createAlias(user, now);

    const disabled = await broker.services.aliases.toggle(user.id, alias.id);
    const enabled = await broker.services.aliases.toggle(user.id, alias.id);

    expect(disabled.enabled).toBe(false);
    expect(enabled.enabled).toBe(true);
  });

  it('applies every concurrent toggle', async () => {
    const alias = await broker.services.aliases.createAlias(user, now);

    const results = await Promise.all([
      broker.services.aliases.toggle(user.id, alias.id),
      broker.services.aliases.toggle(user.id, alias.id),
      broker.services.aliases.toggle(user.id, alias.id),
    ]);
    const [current] = await broker.services.aliases.listAliases(user.id);

    expect(results.map((result) => result.enabled)).toEqual([false, true, false]);
    expect(current?.enabled).toBe(false);
  });

  it("refuses to touch another user's alias", async () => {
    const alias = await broker.services.aliases.createAlias(user, now);
    const other = await createTestUser(broker.services, { email: 'grace@example.com' });

    await expect(broker.services.aliases.setEnabled(other.id, alias.id, false)).rejects.toBeInstanceOf(
      NotFoundError
    );
  });
});
