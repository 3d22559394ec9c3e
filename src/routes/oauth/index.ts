import { Hono } from 'hono';
import type { BrokerEnv } from '../../types/hono.js';
import type { IUserAuthenticator } from '../../storage/interfaces/user-storage.js';
import type { BrokerServices } from '../../services/index.js';
import { createAuthorizeRoutes } from './authorize.js';
import { createTokenRoutes } from './token.js';
import { createUserInfoRoutes } from './user-info.js';
import { createRevokeRoutes } from './revoke.js';

export interface OAuthRouteOptions {
  services: BrokerServices;
  userAuthenticator: IUserAuthenticator;
}

/**
 * Mount the OAuth endpoints
 */
export function createOAuthRoutes(options: OAuthRouteOptions) {
  const { services, userAuthenticator } = options;
  const { authorization, clients } = services;

  const router = new Hono<BrokerEnv>();

  router.route('/authorize', createAuthorizeRoutes({ authorization, userAuthenticator }));
  router.route('/token', createTokenRoutes({ authorization, clients }));
  router.route('/user_info', createUserInfoRoutes({ authorization }));
  router.route('/revoke', createRevokeRoutes({ authorization, clients }));

  return router;
}
