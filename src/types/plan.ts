export const PLAN_NAMES = ['free', 'trial', 'monthly', 'yearly'] as const;
export type PlanName = (typeof PLAN_NAMES)[number];

export type PaidPlanName = 'monthly' | 'yearly';

/**
 * Subscription state. Only a trial carries an expiration.
 */
export type PlanState =
  | { plan: 'free' }
  | { plan: 'trial'; expiresAt: Date }
  | { plan: PaidPlanName };
