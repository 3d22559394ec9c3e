import type { User, CreateUserInput, UpdateUserInput } from '../types/user.js';
import type { PlanState } from '../types/plan.js';
import type { AccountCode, AccountCodePurpose } from '../types/account-code.js';
import type { IStorage } from '../storage/interfaces/index.js';
import type { IObjectStorage } from '../integrations/object-storage.js';
import type { IBillingProvider } from '../integrations/billing.js';
import type { IdentifierGenerator } from './identifier-generator.js';
import { hashSecret, verifySecret, md5 } from '../crypto/hash.js';
import { InvalidAccountCodeError, InvalidPromoCodeError, NotFoundError } from '../errors/broker-error.js';
import { ACCOUNT_CODE_TTL, GRAVATAR_BASE_URL } from '../config/constants.js';
import { createLogger } from '../logging/logger.js';

const logger = createLogger('user');

export interface UserServiceOptions {
  storage: IStorage;
  generator: IdentifierGenerator;
  objectStorage: IObjectStorage;
  billing: IBillingProvider;
  accountCodeTtl?: number;
}

export interface RegisterUserInput extends Omit<CreateUserInput, 'passwordHash'> {
  password?: string;
}

/**
 * Account-level operations on users
 */
export class UserService {
  private readonly storage: IStorage;
  private readonly generator: IdentifierGenerator;
  private readonly objectStorage: IObjectStorage;
  private readonly billing: IBillingProvider;
  private readonly accountCodeTtl: number;

  constructor(options: UserServiceOptions) {
    this.storage = options.storage;
    this.generator = options.generator;
    this.objectStorage = options.objectStorage;
    this.billing = options.billing;
    this.accountCodeTtl = options.accountCodeTtl ?? ACCOUNT_CODE_TTL;
  }

  async register(input: RegisterUserInput): Promise<User> {
    const { password, ...rest } = input;
    const passwordHash = password === undefined ? undefined : await hashSecret(password);

    const user = await this.storage.transaction((session) =>
      session.users.create({ ...rest, passwordHash })
    );
    logger.info('User registered', { userId: user.id });

    return user;
  }

  async findById(userId: string): Promise<User | null> {
    return this.storage.transaction((session) => session.users.findById(userId));
  }

  async findByEmail(email: string): Promise<User | null> {
    return this.storage.transaction((session) => session.users.findByEmail(email));
  }

  async setPassword(userId: string, password: string): Promise<User> {
    const passwordHash = await hashSecret(password);
    return this.update(userId, { passwordHash });
  }

  async checkPassword(user: User, password: string): Promise<boolean> {
    if (!user.passwordHash) {
      return false;
    }
    return verifySecret(password, user.passwordHash);
  }

  /**
   * Uploaded picture, or the gravatar of the account email
   */
  profilePictureUrl(user: User): string {
    if (user.profilePicturePath) {
      return this.objectStorage.resolveUrl(user.profilePicturePath);
    }
    return `${GRAVATAR_BASE_URL}/${md5(user.email)}`;
  }

  /**
   * Uploaded picture only; what clients granted avatar_url receive
   */
  avatarUrl(user: User): string | null {
    return user.profilePicturePath ? this.objectStorage.resolveUrl(user.profilePicturePath) : null;
  }

  /**
   * End of the current paid period, or null when the user has no subscription
   */
  async planCurrentPeriodEnd(user: User): Promise<Date | null> {
    if (!user.stripeSubscriptionId) {
      logger.error('planCurrentPeriodEnd called for a user without a subscription', {
        userId: user.id,
      });
      return null;
    }

    return this.billing.fetchSubscriptionPeriodEnd(user.stripeSubscriptionId);
  }

  /**
   * Record a plan change, e.g. after checkout or a trial start
   */
  async changePlan(
    userId: string,
    plan: PlanState,
    subscription?: { customerId: string; subscriptionId: string }
  ): Promise<User> {
    const user = await this.update(userId, {
      plan,
      stripeCustomerId: subscription?.customerId,
      stripeSubscriptionId: subscription?.subscriptionId,
    });
    logger.info('Plan changed', { userId, plan: plan.plan });
    return user;
  }

  getPromoCodes(user: User): string[] {
    return [...user.promoCodes];
  }

  /**
   * Record a promo code on the account. Codes are stored comma-separated,
   * so a code may not contain a comma.
   */
  async saveNewPromoCode(userId: string, code: string): Promise<User> {
    if (code.length === 0 || code.includes(',')) {
      throw new InvalidPromoCodeError(`Invalid promo code: "${code}"`);
    }

    return this.storage.transaction(async (session) => {
      const user = await session.users.findById(userId);
      if (!user) {
        throw new NotFoundError(`User ${userId} not found`);
      }
      if (user.promoCodes.includes(code)) {
        return user;
      }

      const updated = await session.users.update(userId, { promoCodes: [...user.promoCodes, code] });
      if (!updated) {
        throw new NotFoundError(`User ${userId} not found`);
      }
      return updated;
    });
  }

  /**
   * Issue an activation or password-reset code valid for one hour
   */
  async createAccountCode(
    userId: string,
    purpose: AccountCodePurpose,
    now: Date = new Date()
  ): Promise<AccountCode> {
    const expiresAt = new Date(now.getTime() + this.accountCodeTtl * 1000);

    const { record } = await this.storage.transaction((session) =>
      this.generator.allocate('account_code', {
        exists: async (code) => (await session.accountCodes.findByCode(code)) !== null,
        reserve: (code) => session.accountCodes.create({ userId, purpose, code, expiresAt }),
      })
    );

    return record;
  }

  /**
   * Activate the account the code was sent to. The code is single use.
   */
  async activate(code: string, now: Date = new Date()): Promise<User> {
    return this.redeemAccountCode(code, 'activation', { activated: true }, now);
  }

  async resetPassword(code: string, password: string, now: Date = new Date()): Promise<User> {
    const passwordHash = await hashSecret(password);
    return this.redeemAccountCode(code, 'reset_password', { passwordHash }, now);
  }

  private async redeemAccountCode(
    code: string,
    purpose: AccountCodePurpose,
    patch: UpdateUserInput,
    now: Date
  ): Promise<User> {
    return this.storage.transaction(async (session) => {
      const accountCode = await session.accountCodes.findByCode(code);
      if (!accountCode || accountCode.purpose !== purpose) {
        throw new InvalidAccountCodeError('Unknown code');
      }
      if (accountCode.expiresAt <= now) {
        throw new InvalidAccountCodeError('Code has expired');
      }

      await session.accountCodes.delete(accountCode.id);
      const user = await session.users.update(accountCode.userId, patch);
      if (!user) {
        throw new NotFoundError(`User ${accountCode.userId} not found`);
      }

      logger.info('Account code redeemed', { userId: user.id, purpose });
      return user;
    });
  }

  private async update(userId: string, patch: UpdateUserInput): Promise<User> {
    return this.storage.transaction(async (session) => {
      const user = await session.users.update(userId, patch);
      if (!user) {
        throw new NotFoundError(`User ${userId} not found`);
      }
      return user;
    });
  }
}
