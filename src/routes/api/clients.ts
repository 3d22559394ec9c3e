import { Hono } from 'hono';
import { zValidator } from '@hono/zod-validator';
import { z } from 'zod';
import type { BrokerEnv } from '../../types/hono.js';
import type { Client } from '../../types/client.js';
import type { ClientService } from '../../services/client-service.js';
import type { BindingService } from '../../services/binding-service.js';
import { OAuthError } from '../../errors/oauth-error.js';
import { NotFoundError } from '../../errors/broker-error.js';
import { rejectInvalid } from '../../middleware/error-handler.js';

const createClientSchema = z.object({
  name: z.string().min(1),
  redirect_uris: z.array(z.string().url()).default([]),
  home_url: z.string().url().optional(),
  published: z.boolean().optional(),
});

const addRedirectUriSchema = z.object({
  redirect_uri: z.string().url(),
});

export interface ClientRoutesOptions {
  clients: ClientService;
  bindings: BindingService;
}

/**
 * Developer-facing client registration
 */
export function createClientRoutes(options: ClientRoutesOptions) {
  const { clients, bindings } = options;
  const app = new Hono<BrokerEnv>();

  const serializeClient = async (client: Client) => ({
    client_id: client.clientId,
    name: client.name,
    home_url: client.homeUrl ?? null,
    icon_url: clients.iconUrl(client),
    published: client.published,
    redirect_uris: client.redirectUris,
    nb_users: await bindings.countUsers(client),
    created_at: client.createdAt.toISOString(),
  });

  // Owner-only lookup
  async function ownedClient(clientId: string, userId: string): Promise<Client> {
    const client = await clients.findByClientId(clientId);
    if (!client || client.ownerId !== userId) {
      throw new NotFoundError(`Client ${clientId} not found`);
    }
    return client;
  }

  app.post('/', zValidator('json', createClientSchema, rejectInvalid), async (c) => {
    const user = c.get('user');
    if (!user) {
      throw OAuthError.serverError('User not resolved');
    }

    const body = c.req.valid('json');
    const { client, clientSecret } = await clients.createClient({
      name: body.name,
      ownerId: user.id,
      redirectUris: body.redirect_uris,
      homeUrl: body.home_url,
      published: body.published,
    });

    // The secret is shown once
    return c.json({ ...(await serializeClient(client)), client_secret: clientSecret }, 201);
  });

  app.get('/:clientId', async (c) => {
    const user = c.get('user');
    if (!user) {
      throw OAuthError.serverError('User not resolved');
    }

    const client = await ownedClient(c.req.param('clientId'), user.id);
    return c.json(await serializeClient(client));
  });

  app.post('/:clientId/redirect_uris', zValidator('json', addRedirectUriSchema, rejectInvalid), async (c) => {
    const user = c.get('user');
    if (!user) {
      throw OAuthError.serverError('User not resolved');
    }

    const client = await ownedClient(c.req.param('clientId'), user.id);
    const updated = await clients.addRedirectUri(client.clientId, c.req.valid('json').redirect_uri);
    return c.json(await serializeClient(updated));
  });

  return app;
}
