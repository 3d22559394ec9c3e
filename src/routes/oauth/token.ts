import { Hono } from 'hono';
import { z } from 'zod';
import type { BrokerEnv } from '../../types/hono.js';
import type { AuthorizationService } from '../../services/authorization-service.js';
import type { ClientService } from '../../services/client-service.js';
import { OAuthError } from '../../errors/oauth-error.js';
import { clientAuthenticator } from '../../middleware/client-authenticator.js';
import { describeIssues } from '../../middleware/error-handler.js';
import {
  TOKEN_CACHE_CONTROL,
  TOKEN_PRAGMA,
  HEADER_CACHE_CONTROL,
  HEADER_PRAGMA,
  GRANT_TYPE_AUTHORIZATION_CODE,
} from '../../config/constants.js';

export interface TokenRouteOptions {
  authorization: AuthorizationService;
  clients: ClientService;
}

const tokenRequestSchema = z.object({
  code: z.string({ required_error: 'Missing code parameter' }).min(1, 'Missing code parameter'),
  redirect_uri: z.string({ required_error: 'Missing redirect_uri parameter' }),
});

/**
 * Create token endpoint routes
 */
export function createTokenRoutes(options: TokenRouteOptions) {
  const { authorization, clients } = options;

  const router = new Hono<BrokerEnv>();

  // POST /token
  router.post('/', clientAuthenticator({ clients }), async (c) => {
    c.header(HEADER_CACHE_CONTROL, TOKEN_CACHE_CONTROL);
    c.header(HEADER_PRAGMA, TOKEN_PRAGMA);

    const client = c.get('client');
    if (!client) {
      throw OAuthError.serverError('Client not resolved');
    }

    const body = await c.req.parseBody();
    const grantType = body['grant_type'];

    if (typeof grantType !== 'string' || grantType === '') {
      throw OAuthError.invalidRequest('Missing grant_type parameter');
    }

    if (grantType !== GRANT_TYPE_AUTHORIZATION_CODE) {
      throw OAuthError.unsupportedGrantType(`Unsupported grant type: ${grantType}`);
    }

    const parsed = tokenRequestSchema.safeParse(body);
    if (!parsed.success) {
      throw OAuthError.invalidRequest(describeIssues(parsed.error.issues));
    }

    const response = await authorization.exchange({
      client,
      code: parsed.data.code,
      redirectUri: parsed.data.redirect_uri,
    });

    return c.json(response);
  });

  return router;
}
