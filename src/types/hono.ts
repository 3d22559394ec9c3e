import type { Context } from 'hono';
import type { Client } from './client.js';
import type { User } from './user.js';
import type { AccessToken } from './token.js';

/**
 * Extended Hono context variables for the broker
 */
export interface BrokerVariables {
  // Set by clientAuthenticator
  client?: Client;
  user?: User;
  accessToken?: AccessToken;
}

export type BrokerEnv = { Variables: BrokerVariables };

export type BrokerContext = Context<BrokerEnv>;
