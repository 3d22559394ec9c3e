import type { PlanState } from './plan.js';

/**
 * Registered account. Users are never deleted, only deactivated.
 */
export interface User {
  id: string;
  email: string;
  name: string;
  passwordHash?: string;
  isAdmin: boolean;
  activated: boolean;
  plan: PlanState;
  stripeCustomerId?: string;
  stripeSubscriptionId?: string;
  profilePicturePath?: string;
  isDeveloper: boolean;
  promoCodes: string[];
  createdAt: Date;
  updatedAt: Date;
}

export interface CreateUserInput {
  email: string;
  name: string;
  passwordHash?: string;
  isAdmin?: boolean;
  activated?: boolean;
  plan?: PlanState;
  profilePicturePath?: string;
  isDeveloper?: boolean;
}

export type UpdateUserInput = Partial<
  Pick<
    User,
    | 'name'
    | 'passwordHash'
    | 'activated'
    | 'plan'
    | 'stripeCustomerId'
    | 'stripeSubscriptionId'
    | 'profilePicturePath'
    | 'isDeveloper'
    | 'promoCodes'
  >
>;
