import { Hono } from 'hono';
import type { BrokerEnv } from '../../types/hono.js';
import type { UserService } from '../../services/user-service.js';
import type { PlanService } from '../../services/plan-service.js';
import { OAuthError } from '../../errors/oauth-error.js';

export interface AccountRoutesOptions {
  users: UserService;
  plans: PlanService;
}

/**
 * Profile and plan status of the signed-in user
 */
export function createAccountRoutes(options: AccountRoutesOptions) {
  const { users, plans } = options;
  const app = new Hono<BrokerEnv>();

  app.get('/', async (c) => {
    const user = c.get('user');
    if (!user) {
      throw OAuthError.serverError('User not resolved');
    }

    const now = new Date();
    return c.json({
      id: user.id,
      email: user.email,
      name: user.name,
      avatar_url: users.profilePictureUrl(user),
      plan: user.plan.plan,
      trial_expires_at: user.plan.plan === 'trial' ? user.plan.expiresAt.toISOString() : null,
      is_premium: plans.isPremium(user),
      should_upgrade: plans.shouldPromptUpgrade(user, now),
    });
  });

  return app;
}
