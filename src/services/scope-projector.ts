import type { Alias } from '../types/alias.js';
import type { Binding, UserInfo } from '../types/binding.js';
import type { Client } from '../types/client.js';
import type { User } from '../types/user.js';
import { SCOPES, type Scope } from '../types/scope.js';

/**
 * Everything a projection reads. `alias` must be the binding's alias when
 * the binding discloses one; `avatarUrl` is null when the user has no picture.
 */
export interface ProjectionSubject {
  binding: Binding;
  client: Pick<Client, 'name'>;
  user: Pick<User, 'name' | 'email'>;
  alias: Alias | null;
  avatarUrl: string | null;
}

type ScopedAttributes = Pick<UserInfo, 'name' | 'email' | 'avatar_url'>;

/**
 * Address the binding discloses to its client
 */
export function disclosedEmail(subject: Pick<ProjectionSubject, 'binding' | 'user' | 'alias'>): string {
  const { channel } = subject.binding;
  switch (channel.kind) {
    case 'alias':
      if (!subject.alias || subject.alias.id !== channel.aliasId) {
        throw new Error(`Alias ${channel.aliasId} of binding ${subject.binding.id} was not loaded`);
      }
      return subject.alias.email;
    case 'real_email':
      return subject.user.email;
  }
}

const SCOPE_PROJECTIONS: Record<Scope, (subject: ProjectionSubject) => ScopedAttributes> = {
  name: (subject) => ({ name: subject.user.name }),
  email: (subject) => ({ email: disclosedEmail(subject) }),
  // key stays present when there is no picture
  avatar_url: (subject) => ({ avatar_url: subject.avatarUrl }),
};

/**
 * Renders the identity a client may see
 */
export class ScopeProjector {
  project(subject: ProjectionSubject, grantedScopes: readonly Scope[]): UserInfo {
    let info: UserInfo = {
      id: subject.binding.id,
      client: subject.client.name,
      email_verified: true,
    };

    for (const scope of SCOPES) {
      if (grantedScopes.includes(scope)) {
        info = { ...info, ...SCOPE_PROJECTIONS[scope](subject) };
      }
    }

    return info;
  }
}

export const scopeProjector = new ScopeProjector();
