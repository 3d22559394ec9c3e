import { Hono } from 'hono';
import type { BrokerEnv } from '../../types/hono.js';
import type { AuthorizationService } from '../../services/authorization-service.js';
import type { ClientService } from '../../services/client-service.js';
import { OAuthError } from '../../errors/oauth-error.js';
import { clientAuthenticator } from '../../middleware/client-authenticator.js';

export interface RevokeRouteOptions {
  authorization: AuthorizationService;
  clients: ClientService;
}

/**
 * Create token revocation routes (RFC 7009)
 */
export function createRevokeRoutes(options: RevokeRouteOptions) {
  const { authorization, clients } = options;

  const router = new Hono<BrokerEnv>();

  router.post('/', clientAuthenticator({ clients }), async (c) => {
    const client = c.get('client');
    if (!client) {
      throw OAuthError.serverError('Client not resolved');
    }

    const body = await c.req.parseBody();
    const token = body['token'];

    if (typeof token !== 'string' || token === '') {
      throw OAuthError.invalidRequest('Missing token parameter');
    }

    await authorization.revokeAccessToken(token, client);

    // RFC 7009: respond 200 whether or not the token was known
    return c.body(null, 200);
  });

  return router;
}
