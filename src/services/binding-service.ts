import type { Binding, DisclosureChannel } from '../types/binding.js';
import type { Client } from '../types/client.js';
import type { User } from '../types/user.js';
import type { Scope } from '../types/scope.js';
import type { IStorage, StorageSession } from '../storage/interfaces/index.js';
import type { DisclosurePolicy } from '../config/index.js';
import type { AliasService } from './alias-service.js';
import type { PlanService } from './plan-service.js';
import { disclosedEmail } from './scope-projector.js';
import { BindingConflictError } from '../errors/broker-error.js';
import { UniqueConstraintError } from '../errors/storage-error.js';
import { createLogger } from '../logging/logger.js';

const logger = createLogger('binding');

export interface BindingServiceOptions {
  storage: IStorage;
  aliases: AliasService;
  plans: PlanService;
  disclosurePolicy?: DisclosurePolicy;
}

/**
 * Consent binding store: which address each client sees for each user
 */
export class BindingService {
  private readonly storage: IStorage;
  private readonly aliases: AliasService;
  private readonly plans: PlanService;
  private readonly disclosurePolicy: DisclosurePolicy;

  constructor(options: BindingServiceOptions) {
    this.storage = options.storage;
    this.aliases = options.aliases;
    this.plans = options.plans;
    this.disclosurePolicy = options.disclosurePolicy ?? 'always_alias';
  }

  async findBinding(client: Client, user: User): Promise<Binding | null> {
    return this.storage.transaction((session) => session.bindings.find(client.id, user.id));
  }

  /**
   * Return the binding for (client, user), creating it on first authorization.
   *
   * Concurrent first authorizations race on the (client, user) uniqueness
   * constraint; the loser's unit of work rolls back, discarding any alias it
   * allocated, and the winner's binding is returned instead. Quota denial
   * falls back to the real email and never fails the authorization.
   */
  async getOrCreateBinding(
    client: Client,
    user: User,
    grantedScopes: readonly Scope[],
    now: Date = new Date()
  ): Promise<Binding> {
    const existing = await this.findBinding(client, user);
    if (existing) {
      return existing;
    }

    try {
      return await this.storage.transaction(async (session) => {
        const channel = await this.chooseChannel(session, user, grantedScopes, now);
        return this.insertBinding(session, client, user, channel);
      });
    } catch (error) {
      if (!(error instanceof BindingConflictError)) {
        throw error;
      }

      logger.info('Binding created concurrently, using existing one', {
        clientId: client.id,
        userId: user.id,
      });

      const winner = await this.findBinding(client, user);
      if (!winner) {
        throw error;
      }
      return winner;
    }
  }

  /**
   * Number of users who have authorized the client
   */
  async countUsers(client: Client): Promise<number> {
    return this.storage.transaction((session) => session.bindings.countByClient(client.id));
  }

  /**
   * Address the binding discloses, loading its alias when it has one
   */
  async resolveDisclosedEmail(binding: Binding, user: User): Promise<string> {
    const { channel } = binding;
    if (channel.kind === 'real_email') {
      return user.email;
    }

    const alias = await this.storage.transaction((session) => session.aliases.findById(channel.aliasId));
    return disclosedEmail({ binding, user, alias });
  }

  private async chooseChannel(
    session: StorageSession,
    user: User,
    grantedScopes: readonly Scope[],
    now: Date
  ): Promise<DisclosureChannel> {
    if (!grantedScopes.includes('email') || !this.wantsAlias(user, now)) {
      return { kind: 'real_email' };
    }

    const alias = await this.aliases.reserveAlias(session, user, now);
    if (!alias) {
      logger.warn('Alias quota reached, disclosing real email', { userId: user.id });
      return { kind: 'real_email' };
    }

    return { kind: 'alias', aliasId: alias.id };
  }

  private wantsAlias(user: User, now: Date): boolean {
    switch (this.disclosurePolicy) {
      case 'always_alias':
        return true;
      case 'premium_alias':
        return this.plans.isPremium(user) || this.plans.isTrialActive(user, now);
      case 'always_real_email':
        return false;
    }
  }

  private async insertBinding(
    session: StorageSession,
    client: Client,
    user: User,
    channel: DisclosureChannel
  ): Promise<Binding> {
    try {
      const binding = await session.bindings.create({ clientId: client.id, userId: user.id, channel });
      logger.info('Binding created', {
        bindingId: binding.id,
        clientId: client.id,
        userId: user.id,
        channel: channel.kind,
      });
      return binding;
    } catch (error) {
      if (error instanceof UniqueConstraintError) {
        throw new BindingConflictError(client.id, user.id, { cause: error });
      }
      throw error;
    }
  }
}
