import type { Alias } from '../types/alias.js';
import type { User } from '../types/user.js';
import type { IStorage, StorageSession } from '../storage/interfaces/index.js';
import type { IdentifierGenerator } from './identifier-generator.js';
import type { PlanService } from './plan-service.js';
import { NotFoundError, QuotaExceededError } from '../errors/broker-error.js';
import { createLogger } from '../logging/logger.js';

const logger = createLogger('alias');

export interface AliasServiceOptions {
  storage: IStorage;
  generator: IdentifierGenerator;
  plans: PlanService;
}

/**
 * Creates and manages a user's generated email aliases
 */
export class AliasService {
  private readonly storage: IStorage;
  private readonly generator: IdentifierGenerator;
  private readonly plans: PlanService;

  constructor(options: AliasServiceOptions) {
    this.storage = options.storage;
    this.generator = options.generator;
    this.plans = options.plans;
  }

  /**
   * Allocate a new alias inside the caller's unit of work.
   * Returns null when the user's plan does not allow another alias.
   */
  async reserveAlias(session: StorageSession, user: User, now: Date = new Date()): Promise<Alias | null> {
    const count = await session.aliases.countByUser(user.id);
    if (!this.plans.canCreateAlias(user, count, now)) {
      logger.info('Alias quota reached', { userId: user.id, count, plan: user.plan.plan });
      return null;
    }

    const { record } = await this.generator.allocate('alias', {
      exists: (email) => session.aliases.existsByEmail(email),
      reserve: (email) => session.aliases.create({ userId: user.id, email }),
    });

    logger.info('Alias created', { userId: user.id, aliasId: record.id });
    return record;
  }

  /**
   * @throws QuotaExceededError when the plan ceiling is reached
   */
  async createAlias(user: User, now: Date = new Date()): Promise<Alias> {
    return this.storage.transaction(async (session) => {
      const alias = await this.reserveAlias(session, user, now);
      if (!alias) {
        throw new QuotaExceededError(user.id, this.plans.maxAliasesOnFreePlan);
      }
      return alias;
    });
  }

  async listAliases(userId: string): Promise<Alias[]> {
    return this.storage.transaction((session) => session.aliases.listByUser(userId));
  }

  async setEnabled(userId: string, aliasId: string, enabled: boolean): Promise<Alias> {
    return this.storage.transaction((session) => this.updateEnabled(session, userId, aliasId, () => enabled));
  }

  /**
   * Flip the enabled flag
   */
  async toggle(userId: string, aliasId: string): Promise<Alias> {
    return this.storage.transaction((session) =>
      this.updateEnabled(session, userId, aliasId, (alias) => !alias.enabled)
    );
  }

  // Read and write share the caller's unit of work
  private async updateEnabled(
    session: StorageSession,
    userId: string,
    aliasId: string,
    next: (alias: Alias) => boolean
  ): Promise<Alias> {
    const alias = await session.aliases.findById(aliasId);
    if (!alias || alias.userId !== userId) {
      throw new NotFoundError(`Alias ${aliasId} not found`);
    }

    const updated = await session.aliases.setEnabled(aliasId, next(alias));
    if (!updated) {
      throw new NotFoundError(`Alias ${aliasId} not found`);
    }
    return updated;
  }
}
