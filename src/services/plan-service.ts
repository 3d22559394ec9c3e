import type { User } from '../types/user.js';
import { DEFAULT_MAX_NB_EMAIL_FREE_PLAN, TRIAL_PROMPT_WINDOW_DAYS } from '../config/constants.js';

const DAY_MS = 24 * 60 * 60 * 1000;

export interface PlanLimits {
  maxAliasesOnFreePlan?: number;
  trialPromptWindowDays?: number;
}

type PlanHolder = Pick<User, 'plan'>;

/**
 * Plan and quota rules. Every method is a pure function of its arguments;
 * a lapsed trial is treated as free on each call rather than migrated.
 */
export class PlanService {
  readonly maxAliasesOnFreePlan: number;
  private readonly trialPromptWindowMs: number;

  constructor(limits: PlanLimits = {}) {
    this.maxAliasesOnFreePlan = limits.maxAliasesOnFreePlan ?? DEFAULT_MAX_NB_EMAIL_FREE_PLAN;
    this.trialPromptWindowMs = (limits.trialPromptWindowDays ?? TRIAL_PROMPT_WINDOW_DAYS) * DAY_MS;
  }

  isPremium(user: PlanHolder): boolean {
    return user.plan.plan === 'monthly' || user.plan.plan === 'yearly';
  }

  isTrialActive(user: PlanHolder, now: Date = new Date()): boolean {
    return user.plan.plan === 'trial' && user.plan.expiresAt > now;
  }

  /**
   * Free users, and trial users within a week of expiry, are invited to upgrade
   */
  shouldPromptUpgrade(user: PlanHolder, now: Date = new Date()): boolean {
    switch (user.plan.plan) {
      case 'free':
        return true;
      case 'trial':
        return user.plan.expiresAt.getTime() < now.getTime() + this.trialPromptWindowMs;
      case 'monthly':
      case 'yearly':
        return false;
    }
  }

  canCreateAlias(user: PlanHolder, currentAliasCount: number, now: Date = new Date()): boolean {
    if (this.isPremium(user) || this.isTrialActive(user, now)) {
      return true;
    }
    // free, or trial expired
    return currentAliasCount < this.maxAliasesOnFreePlan;
  }
}
