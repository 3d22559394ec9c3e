import { describe, it, expect, beforeEach } from 'vitest';
import { z } from 'zod';
import { setupTestContext, obtainCode, type TestContext } from './test-setup.js';

const aliasSchema = z.object({ id: z.string(), email: z.string(), enabled: z.boolean(), created_at: z.string() });

describe('Account API', () => {
  let ctx: TestContext;

  beforeEach(async () => {
    ctx = await setupTestContext();
  });

  const post = (path: string, body?: unknown) =>
    ctx.app.request(path, {
      method: 'POST',
      headers: { 'Content-Type': 'application/json' },
      body: body === undefined ? undefined : JSON.stringify(body),
    });

  it('requires a signed-in user', async () => {
    ctx.userAuthenticator.currentUserId = null;

    const res = await ctx.app.request('/api/aliases');

    expect(res.status).toBe(403);
    expect(await res.json()).toEqual({ error: 'access_denied', error_description: 'Sign-in required' });
  });

  describe('/api/account', () => {
    it('describes the plan', async () => {
      const res = await ctx.app.request('/api/account');

      expect(res.status).toBe(200);
      expect(await res.json()).toEqual({
        id: ctx.user.id,
        email: 'ada@example.com',
        name: 'Ada Lovelace',
        avatar_url: 'https://www.gravatar.com/avatar/3e3417d7ef77d5932a6734b916515ed5',
        plan: 'free',
        trial_expires_at: null,
        is_premium: false,
        should_upgrade: true,
      });
    });
  });

  describe('/api/aliases', () => {
    it('creates aliases until the free plan ceiling', async () => {
      for (let i = 0; i < 3; i++) {
        const res = await post('/api/aliases');
        expect(res.status).toBe(201);
        expect(aliasSchema.parse(await res.json()).email).toMatch(/@sl\.test$/);
      }

      const res = await post('/api/aliases');

      expect(res.status).toBe(403);
      expect(await res.json()).toEqual({
        error: 'quota_exceeded',
        error_description: 'Alias limit of 3 reached on the free plan',
        upgrade_required: true,
      });
    });

    it('lists aliases with the quota state', async () => {
      await post('/api/aliases');

      const res = await ctx.app.request('/api/aliases');
      const body = z
        .object({ aliases: z.array(aliasSchema), can_create: z.boolean(), should_upgrade: z.boolean() })
        .parse(await res.json());

      expect(body.aliases).toHaveLength(1);
      expect(body.can_create).toBe(true);
      expect(body.should_upgrade).toBe(true);
    });

    it('toggles an alias', async () => {
      const created = aliasSchema.parse(await (await post('/api/aliases')).json());

      const first = aliasSchema.parse(await (await post(`/api/aliases/${created.id}/toggle`)).json());
      const second = aliasSchema.parse(await (await post(`/api/aliases/${created.id}/toggle`)).json());

      expect(created.enabled).toBe(true);
      expect(first.enabled).toBe(false);
      expect(second.enabled).toBe(true);
    });

    it('returns 404 for unknown aliases', async () => {
      const res = await post('/api/aliases/nope/toggle');

      expect(res.status).toBe(404);
      expect(await res.json()).toEqual({ error: 'not_found', error_description: 'Alias nope not found' });
    });
  });

  describe('/api/clients', () => {
    const clientSchema = z.object({
      client_id: z.string(),
      client_secret: z.string().optional(),
      icon_url: z.string(),
      nb_users: z.number(),
      redirect_uris: z.array(z.string()),
    });

    it('registers a client and shows the secret once', async () => {
      ctx.userAuthenticator.currentUserId = ctx.developer.id;

      const res = await post('/api/clients', { name: 'Notes', redirect_uris: ['https://notes.test/cb'] });
      const created = clientSchema.parse(await res.json());
      const fetched = clientSchema.parse(await (await ctx.app.request(`/api/clients/${created.client_id}`)).json());

      expect(res.status).toBe(201);
      expect(created.client_id).toMatch(/^notes-[a-z]{10}$/);
      expect(created.client_secret).toHaveLength(40);
      expect(created.icon_url).toBe('http://broker.test/static/default-icon.svg');
      expect(fetched.client_secret).toBeUndefined();
      expect(fetched.redirect_uris).toEqual(['https://notes.test/cb']);
    });

    it('validates the registration body', async () => {
      ctx.userAuthenticator.currentUserId = ctx.developer.id;

      const res = await post('/api/clients', { redirect_uris: [] });

      expect(res.status).toBe(400);
      expect(await res.json()).toEqual({ error: 'invalid_request', error_description: 'name: Required' });
    });

    it('counts authorized users', async () => {
      await obtainCode(ctx);
      ctx.userAuthenticator.currentUserId = ctx.developer.id;

      const res = await ctx.app.request(`/api/clients/${ctx.clientId}`);

      expect(clientSchema.parse(await res.json()).nb_users).toBe(1);
    });

    it("hides other developers' clients", async () => {
      const res = await ctx.app.request(`/api/clients/${ctx.clientId}`);

      expect(res.status).toBe(404);
    });

    it('adds redirect URIs', async () => {
      ctx.userAuthenticator.currentUserId = ctx.developer.id;

      const res = await post(`/api/clients/${ctx.clientId}/redirect_uris`, {
        redirect_uri: 'https://app.test/second',
      });

      expect(clientSchema.parse(await res.json()).redirect_uris).toEqual([
        'https://app.test/callback',
        'https://app.test/second',
      ]);
    });
  });
});
