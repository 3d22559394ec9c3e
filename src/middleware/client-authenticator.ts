import type { Context, MiddlewareHandler } from 'hono';
import type { BrokerEnv } from '../types/hono.js';
import type { Client } from '../types/client.js';
import type { ClientService } from '../services/client-service.js';
import { OAuthError } from '../errors/oauth-error.js';
import { CONTENT_TYPE_FORM, HEADER_AUTHORIZATION } from '../config/constants.js';

export interface ClientAuthenticatorOptions {
  clients: ClientService;
}

/**
 * Extract client credentials from Basic auth header
 */
function extractBasicAuth(authHeader: string): { clientId: string; clientSecret: string } | null {
  if (!authHeader.startsWith('Basic ')) {
    return null;
  }

  const decoded = Buffer.from(authHeader.slice(6), 'base64').toString('utf-8');
  const colonIndex = decoded.indexOf(':');
  if (colonIndex === -1) {
    return null;
  }

  try {
    return {
      clientId: decodeURIComponent(decoded.slice(0, colonIndex)),
      clientSecret: decodeURIComponent(decoded.slice(colonIndex + 1)),
    };
  } catch (error) {
    throw OAuthError.invalidClient(
      `Malformed Basic credentials: ${error instanceof Error ? error.message : String(error)}`
    );
  }
}

/**
 * Extract client credentials from POST body
 */
async function extractPostAuth(c: Context): Promise<{ clientId: string; clientSecret: string } | null> {
  const contentType = c.req.header('content-type');
  if (!contentType?.includes(CONTENT_TYPE_FORM)) {
    return null;
  }

  const body = await c.req.parseBody();
  const clientId = body['client_id'];
  const clientSecret = body['client_secret'];

  if (typeof clientId !== 'string' || typeof clientSecret !== 'string') {
    return null;
  }

  return { clientId, clientSecret };
}

/**
 * Middleware to authenticate clients at the token and revocation endpoints
 *
 * Supports client_secret_basic and client_secret_post.
 * Sets `client` in context variables on success.
 */
export function clientAuthenticator(options: ClientAuthenticatorOptions): MiddlewareHandler<BrokerEnv> {
  const { clients } = options;

  return async (c, next) => {
    let credentials: { clientId: string; clientSecret: string } | null = null;

    const authHeader = c.req.header(HEADER_AUTHORIZATION);
    if (authHeader) {
      credentials = extractBasicAuth(authHeader);
    }

    if (!credentials) {
      credentials = await extractPostAuth(c);
    }

    if (!credentials) {
      throw OAuthError.invalidClient('Client authentication required');
    }

    const client: Client = await clients.verifyCredentials(credentials.clientId, credentials.clientSecret);
    c.set('client', client);

    await next();
  };
}
