import { describe, it, expect, beforeEach } from 'vitest';
import {
  createTestBroker,
  createTestClient,
  createTestUser,
  TEST_REDIRECT_URI,
  type TestBroker,
} from '../fixtures.js';
import {
  accessTokenState,
  authorizationCodeState,
} from '../../services/authorization-service.js';
import { RequestedScopeGrantPolicy } from '../../services/scope-service.js';
import { createSqliteStorage } from '../../storage/sqlite/index.js';
import { OAuthError } from '../../errors/oauth-error.js';
import type { Client } from '../../types/client.js';
import type { User } from '../../types/user.js';
import type { AccessToken, AuthorizationCode } from '../../types/token.js';

const now = new Date('2026-03-01T12:00:00Z');
const later = (seconds: number) => new Date(now.getTime() + seconds * 1000);

describe('AuthorizationService', () => {
  let broker: TestBroker;
  let user: User;
  let client: Client;

  beforeEach(async () => {
    broker = createTestBroker();
    const developer = await createTestUser(broker.services, { email: 'dev@example.com', name: 'Dev' });
    user = await createTestUser(broker.services);
    ({ client } = await createTestClient(broker.services, developer));
  });

  const authorize = (scope = 'name email', state?: string) =>
    broker.services.authorization.authorize(
      { clientId: client.clientId, redirectUri: TEST_REDIRECT_URI, userId: user.id, scope, state },
      now
    );

  describe('authorize', () => {
    it('redirects back with the code and state', async () => {
      const result = await authorize('name email', 'xyz');
      const url = new URL(result.redirectTo);

      expect(`${url.origin}${url.pathname}`).toBe(TEST_REDIRECT_URI);
      expect(url.searchParams.get('code')).toBe(result.code);
      expect(url.searchParams.get('state')).toBe('xyz');
      expect(result.code).toMatch(/^[A-Za-z0-9_-]{43}$/);
      expect(result.expiresAt).toEqual(later(600));
    });

    it('grants every declared scope by default', async () => {
      const result = await authorize('name');
      expect(result.scopes).toEqual(['name', 'email', 'avatar_url']);
    });

    it('rejects unknown clients', async () => {
      await expect(
        broker.services.authorization.authorize(
          { clientId: 'nope', redirectUri: TEST_REDIRECT_URI, userId: user.id },
          now
        )
      ).rejects.toMatchObject({ code: 'unauthorized_client', statusCode: 401 });
    });

    it('rejects unregistered redirect URIs', async () => {
      await expect(
        broker.services.authorization.authorize(
          { clientId: client.clientId, redirectUri: 'https://evil.test/callback', userId: user.id },
          now
        )
      ).rejects.toMatchObject({ code: 'invalid_request', description: 'Invalid redirect_uri' });
    });

    it('ignores scope names it does not know', async () => {
      const result = await authorize('openid profile');
      expect(result.scopes).toEqual(['name', 'email', 'avatar_url']);
    });
  });

  describe('exchange', () => {
    it('issues a token carrying the projected identity', async () => {
      const { code, binding } = await authorize();
      const [alias] = await broker.services.aliases.listAliases(user.id);

      const response = await broker.services.authorization.exchange(
        { client, code, redirectUri: TEST_REDIRECT_URI },
        now
      );

      expect(response.token_type).toBe('Bearer');
      expect(response.expires_in).toBe(3600);
      expect(response.scope).toBe('name email avatar_url');
      expect(response.access_token).toMatch(/^[A-Za-z0-9_-]{43}$/);
      expect(response.user).toStrictEqual({
        id: binding.id,
        client: 'Demo App',
        email_verified: true,
        name: 'Ada Lovelace',
        email: alias?.email,
        avatar_url: null,
      });
    });

    it('accepts a code only once', async () => {
      const { code } = await authorize();
      await broker.services.authorization.exchange({ client, code, redirectUri: TEST_REDIRECT_URI }, now);

      const replay = broker.services.authorization.exchange({ client, code, redirectUri: TEST_REDIRECT_URI }, now);

      await expect(replay).rejects.toBeInstanceOf(OAuthError);
      await expect(replay).rejects.toMatchObject({
        code: 'invalid_grant',
        description: 'Authorization code has already been used',
      });
    });

    it('lets exactly one of two concurrent exchanges win', async () => {
      const { code } = await authorize();

      const results = await Promise.allSettled([
        broker.services.authorization.exchange({ client, code, redirectUri: TEST_REDIRECT_URI }, now),
        broker.services.authorization.exchange({ client, code, redirectUri: TEST_REDIRECT_URI }, now),
      ]);

      expect(results.map((result) => result.status).sort()).toEqual(['fulfilled', 'rejected']);
    });

    it('rejects a mismatched redirect_uri and leaves the code usable', async () => {
      const { code } = await authorize();

      await expect(
        broker.services.authorization.exchange({ client, code, redirectUri: 'https://app.test/other' }, now)
      ).rejects.toMatchObject({
        code: 'invalid_grant',
        description: 'redirect_uri does not match the authorization request',
      });

      const response = await broker.services.authorization.exchange(
        { client, code, redirectUri: TEST_REDIRECT_URI },
        now
      );
      expect(response.token_type).toBe('Bearer');
    });

    it('reports expired codes', async () => {
      const { code } = await authorize();

      await expect(
        broker.services.authorization.exchange({ client, code, redirectUri: TEST_REDIRECT_URI }, later(601))
      ).rejects.toMatchObject({ code: 'invalid_grant', expired: true });
    });

    it('rejects codes issued to another client', async () => {
      const developer = await createTestUser(broker.services, { email: 'other-dev@example.com' });
      const { client: otherClient } = await createTestClient(broker.services, developer, 'Other App');
      const { code } = await authorize();

      await expect(
        broker.services.authorization.exchange(
          { client: otherClient, code, redirectUri: TEST_REDIRECT_URI },
          now
        )
      ).rejects.toMatchObject({
        code: 'invalid_grant',
        description: 'Authorization code was not issued to this client',
      });
    });

    it('rejects unknown codes', async () => {
      await expect(
        broker.services.authorization.exchange({ client, code: 'not-a-code', redirectUri: TEST_REDIRECT_URI }, now)
      ).rejects.toMatchObject({ code: 'invalid_grant', description: 'Invalid authorization code', expired: false });
    });
  });

  describe('access tokens', () => {
    it('serves user info for an active token', async () => {
      const { code } = await authorize();
      const response = await broker.services.authorization.exchange(
        { client, code, redirectUri: TEST_REDIRECT_URI },
        now
      );

      const token = await broker.services.authorization.authenticateAccessToken(response.access_token, now);

      expect(await broker.services.authorization.userInfo(token)).toStrictEqual(response.user);
    });

    it('rejects expired tokens', async () => {
      const { code } = await authorize();
      const { access_token } = await broker.services.authorization.exchange(
        { client, code, redirectUri: TEST_REDIRECT_URI },
        now
      );

      await expect(
        broker.services.authorization.authenticateAccessToken(access_token, later(3600))
      ).rejects.toMatchObject({ code: 'invalid_token', description: 'Access token has expired' });
    });

    it('revokes tokens for their own client only', async () => {
      const developer = await createTestUser(broker.services, { email: 'other-dev@example.com' });
      const { client: otherClient } = await createTestClient(broker.services, developer, 'Other App');
      const { code } = await authorize();
      const { access_token } = await broker.services.authorization.exchange(
        { client, code, redirectUri: TEST_REDIRECT_URI },
        now
      );

      await broker.services.authorization.revokeAccessToken(access_token, otherClient, now);
      await expect(broker.services.authorization.authenticateAccessToken(access_token, now)).resolves.toMatchObject({
        scope: 'name email avatar_url',
      });

      await broker.services.authorization.revokeAccessToken(access_token, client, now);
      await expect(broker.services.authorization.authenticateAccessToken(access_token, now)).rejects.toMatchObject({
        code: 'invalid_token',
        description: 'Access token has been revoked',
      });
    });

    it('purges expired codes and tokens', async () => {
      const { code } = await authorize();
      await broker.services.authorization.exchange({ client, code, redirectUri: TEST_REDIRECT_URI }, now);
      await authorize();

      expect(await broker.services.authorization.purgeExpired(later(601))).toEqual({
        authorizationCodes: 2,
        accessTokens: 0,
      });
      expect(await broker.services.authorization.purgeExpired(later(3601))).toEqual({
        authorizationCodes: 0,
        accessTokens: 1,
      });
    });

    it('ignores unknown tokens on revocation', async () => {
      await expect(
        broker.services.authorization.revokeAccessToken('unknown-token', client, now)
      ).resolves.toBeUndefined();
    });
  });
});

describe('AuthorizationService with requested scopes', () => {
  it('discloses only the requested attributes', async () => {
    const broker = createTestBroker({ scopePolicy: new RequestedScopeGrantPolicy() });
    const developer = await createTestUser(broker.services, { email: 'dev@example.com', name: 'Dev' });
    const user = await createTestUser(broker.services);
    const { client } = await createTestClient(broker.services, developer);

    const { code, binding } = await broker.services.authorization.authorize(
      { clientId: client.clientId, redirectUri: TEST_REDIRECT_URI, userId: user.id, scope: 'name' },
      now
    );
    const response = await broker.services.authorization.exchange(
      { client, code, redirectUri: TEST_REDIRECT_URI },
      now
    );

    expect(binding.channel).toEqual({ kind: 'real_email' });
    expect(response.scope).toBe('name');
    expect(response.user).toStrictEqual({
      id: binding.id,
      client: 'Demo App',
      email_verified: true,
      name: 'Ada Lovelace',
    });
  });

  it('rejects unknown scope names', async () => {
    const broker = createTestBroker({ scopePolicy: new RequestedScopeGrantPolicy() });
    const developer = await createTestUser(broker.services, { email: 'dev@example.com', name: 'Dev' });
    const user = await createTestUser(broker.services);
    const { client } = await createTestClient(broker.services, developer);

    await expect(
      broker.services.authorization.authorize(
        { clientId: client.clientId, redirectUri: TEST_REDIRECT_URI, userId: user.id, scope: 'name openid' },
        now
      )
    ).rejects.toMatchObject({ code: 'invalid_scope', description: 'Unknown scopes: openid' });
    expect(await broker.services.aliases.listAliases(user.id)).toHaveLength(0);
  });
});

describe('AuthorizationService on SQLite', () => {
  it('runs the full grant and refuses replay', async () => {
    const broker = createTestBroker({ storage: createSqliteStorage(':memory:') });
    const developer = await createTestUser(broker.services, { email: 'dev@example.com', name: 'Dev' });
    const user = await createTestUser(broker.services);
    const { client } = await createTestClient(broker.services, developer);

    const { code } = await broker.services.authorization.authorize(
      { clientId: client.clientId, redirectUri: TEST_REDIRECT_URI, userId: user.id },
      now
    );
    const response = await broker.services.authorization.exchange(
      { client, code, redirectUri: TEST_REDIRECT_URI },
      now
    );

    expect(response.user.email).toMatch(/@sl\.test$/);
    await expect(
      broker.services.authorization.exchange({ client, code, redirectUri: TEST_REDIRECT_URI }, now)
    ).rejects.toMatchObject({ code: 'invalid_grant' });

    await broker.storage.close();
  });
});

describe('grant states', () => {
  const code: AuthorizationCode = {
    id: 'code-1',
    codeHash: 'hash',
    clientId: 'client-1',
    userId: 'user-1',
    scope: 'email',
    redirectUri: TEST_REDIRECT_URI,
    expiresAt: later(600),
    issuedAt: now,
  };

  const token: AccessToken = {
    id: 'token-1',
    tokenHash: 'hash',
    clientId: 'client-1',
    userId: 'user-1',
    scope: 'email',
    redirectUri: TEST_REDIRECT_URI,
    expiresAt: later(3600),
    issuedAt: now,
  };

  it('tracks authorization codes', () => {
    expect(authorizationCodeState(code, now)).toBe('code_issued');
    expect(authorizationCodeState(code, later(600))).toBe('expired');
    expect(authorizationCodeState({ ...code, usedAt: now }, later(600))).toBe('exchanged');
  });

  it('tracks access tokens', () => {
    expect(accessTokenState(token, now)).toBe('active');
    expect(accessTokenState(token, later(3600))).toBe('expired');
    expect(accessTokenState({ ...token, revokedAt: now }, now)).toBe('revoked');
  });
});
