import { Hono } from 'hono';
import { zValidator } from '@hono/zod-validator';
import { z } from 'zod';
import type { BrokerEnv } from '../../types/hono.js';
import type { IUserAuthenticator } from '../../storage/interfaces/user-storage.js';
import type { AuthorizationService } from '../../services/authorization-service.js';
import { OAuthError } from '../../errors/oauth-error.js';
import { rejectInvalid } from '../../middleware/error-handler.js';
import { RESPONSE_TYPE_CODE } from '../../config/constants.js';

export interface AuthorizeRouteOptions {
  authorization: AuthorizationService;
  userAuthenticator: IUserAuthenticator;
}

const authorizeQuerySchema = z.object({
  response_type: z.string().optional(),
  client_id: z.string().min(1, 'Missing client_id parameter'),
  redirect_uri: z.string().url('Missing or malformed redirect_uri parameter'),
  scope: z.string().optional(),
  state: z.string().optional(),
});

/**
 * Create authorization endpoint routes
 *
 * 1. Resolve the client and check the redirect_uri (errors are not redirected)
 * 2. Authenticate the user (redirect to login if needed)
 * 3. Bind the user to the client and issue a code
 * 4. Redirect to the client with the code
 */
export function createAuthorizeRoutes(options: AuthorizeRouteOptions) {
  const { authorization, userAuthenticator } = options;

  const router = new Hono<BrokerEnv>();

  router.get('/', zValidator('query', authorizeQuerySchema, rejectInvalid), async (c) => {
    const params = c.req.valid('query');
    const { redirect_uri: redirectUri, state } = params;

    await authorization.resolveClient(params.client_id, redirectUri, state);

    // Errors raised past this point carry the request state
    const redirectWithError = (error: OAuthError) => {
      const url = new URL(redirectUri);
      for (const [name, value] of new URLSearchParams(error.toQueryString())) {
        url.searchParams.set(name, value);
      }
      return c.redirect(url.toString());
    };

    if (params.response_type !== RESPONSE_TYPE_CODE) {
      return redirectWithError(
        OAuthError.unsupportedResponseType('Only "code" response type is supported', state)
      );
    }

    const authResult = await userAuthenticator.authenticate(c);
    if (!authResult.authenticated) {
      return c.redirect(authResult.redirectTo);
    }

    try {
      const result = await authorization.authorize({
        clientId: params.client_id,
        redirectUri,
        userId: authResult.userId,
        scope: params.scope,
        state,
      });
      return c.redirect(result.redirectTo);
    } catch (error) {
      // Client and redirect_uri are known good at this point
      if (error instanceof OAuthError && error.statusCode < 500) {
        return redirectWithError(error);
      }
      throw error;
    }
  });

  return router;
}
