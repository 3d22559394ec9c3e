import { Hono } from 'hono';
import type { BrokerEnv } from '../../types/hono.js';
import type { IUserAuthenticator } from '../../storage/interfaces/user-storage.js';
import type { BrokerServices } from '../../services/index.js';
import { requireUser } from '../../middleware/user-session.js';
import { createAliasRoutes } from './aliases.js';
import { createClientRoutes } from './clients.js';
import { createAccountRoutes } from './account.js';

export interface ApiRoutesOptions {
  services: BrokerServices;
  userAuthenticator: IUserAuthenticator;
}

/**
 * Account APIs; every route requires a signed-in user
 */
export function createApiRoutes(options: ApiRoutesOptions) {
  const { services, userAuthenticator } = options;
  const app = new Hono<BrokerEnv>();

  app.use('*', requireUser({ userAuthenticator, users: services.users }));

  app.route('/account', createAccountRoutes({ users: services.users, plans: services.plans }));
  app.route('/aliases', createAliasRoutes({ aliases: services.aliases, plans: services.plans }));
  app.route('/clients', createClientRoutes({ clients: services.clients, bindings: services.bindings }));

  return app;
}
