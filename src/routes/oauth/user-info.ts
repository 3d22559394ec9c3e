import { Hono } from 'hono';
import type { BrokerEnv, BrokerContext } from '../../types/hono.js';
import type { AuthorizationService } from '../../services/authorization-service.js';
import { OAuthError } from '../../errors/oauth-error.js';
import { bearerAuth } from '../../middleware/bearer-auth.js';

export interface UserInfoRouteOptions {
  authorization: AuthorizationService;
}

/**
 * Create user_info endpoint routes (GET and POST)
 */
export function createUserInfoRoutes(options: UserInfoRouteOptions) {
  const { authorization } = options;

  const router = new Hono<BrokerEnv>();

  const handler = async (c: BrokerContext) => {
    const token = c.get('accessToken');
    if (!token) {
      throw OAuthError.serverError('Access token not resolved');
    }

    return c.json(await authorization.userInfo(token));
  };

  router.use('*', bearerAuth({ authorization }));
  router.get('/', handler);
  router.post('/', handler);

  return router;
}
