import type { MiddlewareHandler } from 'hono';
import type { BrokerEnv } from '../types/hono.js';
import type { IUserAuthenticator } from '../storage/interfaces/user-storage.js';
import type { UserService } from '../services/user-service.js';
import { OAuthError } from '../errors/oauth-error.js';

export interface RequireUserOptions {
  userAuthenticator: IUserAuthenticator;
  users: UserService;
}

/**
 * Middleware for account APIs: resolves the signed-in user or rejects
 *
 * Sets `user` in context variables on success
 */
export function requireUser(options: RequireUserOptions): MiddlewareHandler<BrokerEnv> {
  const { userAuthenticator, users } = options;

  return async (c, next) => {
    const result = await userAuthenticator.authenticate(c);
    if (!result.authenticated) {
      throw OAuthError.accessDenied('Sign-in required');
    }

    const user = await users.findById(result.userId);
    if (!user) {
      throw OAuthError.accessDenied('Unknown user');
    }

    c.set('user', user);
    await next();
  };
}
