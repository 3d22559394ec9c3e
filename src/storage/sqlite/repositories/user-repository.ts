import type Database from 'better-sqlite3';
import { z } from 'zod';
import type { User, CreateUserInput, UpdateUserInput } from '../../../types/user.js';
import { PLAN_NAMES, type PlanState } from '../../../types/plan.js';
import type { IUserStorage } from '../../interfaces/user-storage.js';
import { generateId } from '../../../crypto/random.js';
import { withUniqueGuard } from '../mapping.js';

interface UserRow {
  id: string;
  email: string;
  name: string;
  password_hash: string | null;
  is_admin: number;
  activated: number;
  plan: string;
  plan_expiration: number | null;
  stripe_customer_id: string | null;
  stripe_subscription_id: string | null;
  profile_picture_path: string | null;
  is_developer: number;
  promo_codes: string | null;
  created_at: number;
  updated_at: number;
}

const planNameSchema = z.enum(PLAN_NAMES);

function rowToPlan(row: UserRow): PlanState {
  const plan = planNameSchema.parse(row.plan);
  switch (plan) {
    case 'trial':
      if (row.plan_expiration === null) {
        throw new Error(`User ${row.id} is on trial without an expiration`);
      }
      return { plan, expiresAt: new Date(row.plan_expiration) };
    case 'free':
      return { plan };
    case 'monthly':
    case 'yearly':
      return { plan };
  }
}

function rowToUser(row: UserRow): User {
  return {
    id: row.id,
    email: row.email,
    name: row.name,
    passwordHash: row.password_hash ?? undefined,
    isAdmin: row.is_admin === 1,
    activated: row.activated === 1,
    plan: rowToPlan(row),
    stripeCustomerId: row.stripe_customer_id ?? undefined,
    stripeSubscriptionId: row.stripe_subscription_id ?? undefined,
    profilePicturePath: row.profile_picture_path ?? undefined,
    isDeveloper: row.is_developer === 1,
    // stored comma separated
    promoCodes: row.promo_codes ? row.promo_codes.split(',') : [],
    createdAt: new Date(row.created_at),
    updatedAt: new Date(row.updated_at),
  };
}

function userToRow(user: User): UserRow {
  return {
    id: user.id,
    email: user.email,
    name: user.name,
    password_hash: user.passwordHash ?? null,
    is_admin: user.isAdmin ? 1 : 0,
    activated: user.activated ? 1 : 0,
    plan: user.plan.plan,
    plan_expiration: user.plan.plan === 'trial' ? user.plan.expiresAt.getTime() : null,
    stripe_customer_id: user.stripeCustomerId ?? null,
    stripe_subscription_id: user.stripeSubscriptionId ?? null,
    profile_picture_path: user.profilePicturePath ?? null,
    is_developer: user.isDeveloper ? 1 : 0,
    promo_codes: user.promoCodes.length > 0 ? user.promoCodes.join(',') : null,
    created_at: user.createdAt.getTime(),
    updated_at: user.updatedAt.getTime(),
  };
}

/**
 * SQLite user storage implementation
 */
export class SqliteUserStorage implements IUserStorage {
  constructor(private readonly db: Database.Database) {}

  async create(input: CreateUserInput): Promise<User> {
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

    withUniqueGuard(() =>
      this.db
        .prepare<[UserRow]>(
          `INSERT INTO users (id, email, name, password_hash, is_admin, activated, plan, plan_expiration,
             stripe_customer_id, stripe_subscription_id, profile_picture_path, is_developer, promo_codes,
             created_at, updated_at)
           VALUES (@id, @email, @name, @password_hash, @is_admin, @activated, @plan, @plan_expiration,
             @stripe_customer_id, @stripe_subscription_id, @profile_picture_path, @is_developer, @promo_codes,
             @created_at, @updated_at)`
        )
        .run(userToRow(user))
    );

    return user;
  }

  async findById(id: string): Promise<User | null> {
    const row = this.db.prepare<[string], UserRow>('SELECT * FROM users WHERE id = ?').get(id);
    return row ? rowToUser(row) : null;
  }

  async findByEmail(email: string): Promise<User | null> {
    const row = this.db.prepare<[string], UserRow>('SELECT * FROM users WHERE email = ?').get(email);
    return row ? rowToUser(row) : null;
  }

  async update(id: string, input: UpdateUserInput): Promise<User | null> {
    const existing = await this.findById(id);
    if (!existing) return null;

    const updated: User = { ...existing, ...input, updatedAt: new Date() };

    withUniqueGuard(() =>
      this.db
        .prepare<[UserRow]>(
          `UPDATE users SET name = @name, password_hash = @password_hash, activated = @activated,
             plan = @plan, plan_expiration = @plan_expiration, stripe_customer_id = @stripe_customer_id,
             stripe_subscription_id = @stripe_subscription_id, profile_picture_path = @profile_picture_path,
             is_developer = @is_developer, promo_codes = @promo_codes, updated_at = @updated_at
           WHERE id = @id`
        )
        .run(userToRow(updated))
    );

    return updated;
  }
}
