import type { MiddlewareHandler } from 'hono';
import type { BrokerEnv } from '../types/hono.js';
import type { AuthorizationService } from '../services/authorization-service.js';
import { OAuthError } from '../errors/oauth-error.js';
import { HEADER_AUTHORIZATION, HEADER_WWW_AUTHENTICATE } from '../config/constants.js';

export interface BearerAuthOptions {
  authorization: AuthorizationService;
  realm?: string;
}

/**
 * Extract bearer token from Authorization header
 */
function extractBearerToken(authHeader: string): string | null {
  if (!authHeader.startsWith('Bearer ')) {
    return null;
  }
  return authHeader.slice(7);
}

/**
 * Middleware to validate opaque access tokens
 *
 * Sets `accessToken` in context variables on success
 */
export function bearerAuth(options: BearerAuthOptions): MiddlewareHandler<BrokerEnv> {
  const { authorization, realm = 'alias-broker' } = options;

  return async (c, next) => {
    const authHeader = c.req.header(HEADER_AUTHORIZATION);

    if (!authHeader) {
      c.header(HEADER_WWW_AUTHENTICATE, `Bearer realm="${realm}"`);
      throw OAuthError.invalidToken('Missing authorization header');
    }

    const value = extractBearerToken(authHeader);
    if (!value) {
      c.header(HEADER_WWW_AUTHENTICATE, `Bearer realm="${realm}", error="invalid_request"`);
      throw OAuthError.invalidToken('Invalid authorization header format');
    }

    try {
      const token = await authorization.authenticateAccessToken(value);
      c.set('accessToken', token);
    } catch (error) {
      if (error instanceof OAuthError) {
        c.header(HEADER_WWW_AUTHENTICATE, `Bearer realm="${realm}", error="invalid_token"`);
      }
      throw error;
    }

    await next();
  };
}
