import { describe, it, expect } from 'vitest';
import { scopeProjector, disclosedEmail, type ProjectionSubject } from '../../services/scope-projector.js';
import type { Alias } from '../../types/alias.js';
import type { Binding } from '../../types/binding.js';

const createdAt = new Date('2026-01-01T00:00:00Z');

const alias: Alias = {
  id: 'alias-1',
  userId: 'user-1',
  email: 'apple_river_abcd@sl.test',
  enabled: true,
  createdAt,
};

const aliasBinding: Binding = {
  id: 'binding-1',
  clientId: 'client-1',
  userId: 'user-1',
  channel: { kind: 'alias', aliasId: 'alias-1' },
  createdAt,
};

const subject: ProjectionSubject = {
  binding: aliasBinding,
  client: { name: 'Demo App' },
  user: { name: 'Ada Lovelace', email: 'ada@example.com' },
  alias,
  avatarUrl: null,
};

describe('ScopeProjector', () => {
  it('projects exactly the granted attributes', () => {
    expect(scopeProjector.project(subject, ['name', 'email'])).toStrictEqual({
      id: 'binding-1',
      client: 'Demo App',
      email_verified: true,
      email: 'apple_river_abcd@sl.test',
      name: 'Ada Lovelace',
    });
  });

  it('always includes id, client and email_verified', () => {
    expect(scopeProjector.project(subject, [])).toStrictEqual({
      id: 'binding-1',
      client: 'Demo App',
      email_verified: true,
    });
  });

  it('keeps avatar_url present when the user has no picture', () => {
    const info = scopeProjector.project(subject, ['avatar_url']);

    expect(info).toStrictEqual({
      id: 'binding-1',
      client: 'Demo App',
      email_verified: true,
      avatar_url: null,
    });
    expect(Object.keys(info)).toContain('avatar_url');
  });

  it('passes the avatar url through', () => {
    const info = scopeProjector.project({ ...subject, avatarUrl: 'https://cdn.test/a.png' }, ['avatar_url']);
    expect(info.avatar_url).toBe('https://cdn.test/a.png');
  });

  it('discloses the real email over a real_email binding', () => {
    const realEmailSubject: ProjectionSubject = {
      ...subject,
      binding: { ...aliasBinding, channel: { kind: 'real_email' } },
      alias: null,
    };

    expect(scopeProjector.project(realEmailSubject, ['email'])).toStrictEqual({
      id: 'binding-1',
      client: 'Demo App',
      email_verified: true,
      email: 'ada@example.com',
    });
  });

  it('is deterministic', () => {
    expect(scopeProjector.project(subject, ['email', 'name'])).toStrictEqual(
      scopeProjector.project(subject, ['name', 'email'])
    );
  });
});

describe('disclosedEmail', () => {
  it('requires the bound alias to be loaded', () => {
    expect(() => disclosedEmail({ ...subject, alias: null })).toThrow(
      'Alias alias-1 of binding binding-1 was not loaded'
    );
  });
});
