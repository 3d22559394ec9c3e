import { describe, it, expect } from 'vitest';
import {
  scopeService,
  DeclaredScopeGrantPolicy,
  RequestedScopeGrantPolicy,
} from '../../services/scope-service.js';
import { OAuthError } from '../../errors/oauth-error.js';
import type { Client } from '../../types/client.js';

const client: Client = {
  id: 'client-1',
  clientId: 'demo-app-abcdefghij',
  clientSecretHash: 'unused',
  name: 'Demo App',
  published: false,
  ownerId: 'user-1',
  redirectUris: ['https://app.test/callback'],
  createdAt: new Date('2026-01-01T00:00:00Z'),
  updatedAt: new Date('2026-01-01T00:00:00Z'),
};

describe('ScopeService', () => {
  it('parses and deduplicates scopes', () => {
    expect(scopeService.parseScopes('name  email name')).toEqual(['name', 'email']);
  });

  it('treats a missing scope string as empty', () => {
    expect(scopeService.parseScopes(undefined)).toEqual([]);
  });

  it('rejects unknown scopes', () => {
    let caught: unknown;
    try {
      scopeService.parseScopes('name openid', 'xyz');
    } catch (error) {
      caught = error;
    }

    expect(caught).toBeInstanceOf(OAuthError);
    expect(caught).toMatchObject({ code: 'invalid_scope', description: 'Unknown scopes: openid', state: 'xyz' });
  });

  it('formats scopes in canonical order', () => {
    expect(scopeService.formatScopes(['avatar_url', 'name'])).toBe('name avatar_url');
  });
});

describe('ScopeGrantPolicy', () => {
  it('grants every declared scope by default', () => {
    expect(new DeclaredScopeGrantPolicy().grantScopes(client, 'name')).toEqual(['name', 'email', 'avatar_url']);
  });

  it('does not read the requested names by default', () => {
    expect(new DeclaredScopeGrantPolicy().grantScopes(client, 'openid profile')).toEqual([
      'name',
      'email',
      'avatar_url',
    ]);
  });

  it('can grant only what was requested', () => {
    const policy = new RequestedScopeGrantPolicy();
    expect(policy.grantScopes(client, 'email')).toEqual(['email']);
    expect(policy.grantScopes(client, undefined)).toEqual(['name', 'email', 'avatar_url']);
  });

  it('rejects unknown names when granting what was requested', () => {
    let caught: unknown;
    try {
      new RequestedScopeGrantPolicy().grantScopes(client, 'email openid', 's1');
    } catch (error) {
      caught = error;
    }

    expect(caught).toBeInstanceOf(OAuthError);
    expect(caught).toMatchObject({ code: 'invalid_scope', description: 'Unknown scopes: openid', state: 's1' });
  });
});
