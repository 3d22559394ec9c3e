import { Hono } from 'hono';
import type { BrokerEnv, BrokerContext } from '../../types/hono.js';
import type { Alias } from '../../types/alias.js';
import type { User } from '../../types/user.js';
import type { AliasService } from '../../services/alias-service.js';
import type { PlanService } from '../../services/plan-service.js';
import { OAuthError } from '../../errors/oauth-error.js';

export interface AliasRoutesOptions {
  aliases: AliasService;
  plans: PlanService;
}

export function serializeAlias(alias: Alias) {
  return {
    id: alias.id,
    email: alias.email,
    enabled: alias.enabled,
    created_at: alias.createdAt.toISOString(),
  };
}

function signedInUser(c: BrokerContext): User {
  const user = c.get('user');
  if (!user) {
    throw OAuthError.serverError('User not resolved');
  }
  return user;
}

/**
 * Alias management for the signed-in user
 */
export function createAliasRoutes(options: AliasRoutesOptions) {
  const { aliases, plans } = options;
  const app = new Hono<BrokerEnv>();

  app.get('/', async (c) => {
    const user = signedInUser(c);
    const list = await aliases.listAliases(user.id);
    const now = new Date();

    return c.json({
      aliases: list.map(serializeAlias),
      can_create: plans.canCreateAlias(user, list.length, now),
      should_upgrade: plans.shouldPromptUpgrade(user, now),
    });
  });

  app.post('/', async (c) => {
    const alias = await aliases.createAlias(signedInUser(c));
    return c.json(serializeAlias(alias), 201);
  });

  app.post('/:id/toggle', async (c) => {
    const alias = await aliases.toggle(signedInUser(c).id, c.req.param('id'));
    return c.json(serializeAlias(alias));
  });

  return app;
}
