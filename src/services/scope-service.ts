import type { Client } from '../types/client.js';
import { SCOPES, isScope, type Scope } from '../types/scope.js';
import { OAuthError } from '../errors/oauth-error.js';

/**
 * Service for scope parsing and formatting
 */
export class ScopeService {
  /**
   * Parse a space-delimited scope string
   *
   * @throws OAuthError invalid_scope for names outside the scope set
   */
  parseScopes(scopeString: string | undefined, state?: string): Scope[] {
    if (!scopeString) {
      return [];
    }

    const scopes: Scope[] = [];
    const unknown: string[] = [];

    for (const name of scopeString.split(' ')) {
      const trimmed = name.trim();
      if (trimmed.length === 0) continue;

      if (isScope(trimmed)) {
        if (!scopes.includes(trimmed)) scopes.push(trimmed);
      } else {
        unknown.push(trimmed);
      }
    }

    if (unknown.length > 0) {
      throw OAuthError.invalidScope(`Unknown scopes: ${unknown.join(', ')}`, state);
    }

    return scopes;
  }

  /**
   * Convert scopes to a space-delimited string in canonical order
   */
  formatScopes(scopes: readonly Scope[]): string {
    return SCOPES.filter((scope) => scopes.includes(scope)).join(' ');
  }

  /**
   * Scopes a client declares. Every client currently declares the full set.
   */
  declaredScopes(_client: Client): readonly Scope[] {
    return SCOPES;
  }
}

export const scopeService = new ScopeService();

/**
 * Decides which scopes an authorization grants from the raw `scope`
 * parameter. Policies that read the request reject unknown names.
 */
export interface ScopeGrantPolicy {
  grantScopes(client: Client, requested: string | undefined, state?: string): Scope[];
}

/**
 * Grants the client's full declared scope set; the request is not read
 */
export class DeclaredScopeGrantPolicy implements ScopeGrantPolicy {
  grantScopes(client: Client, _requested: string | undefined, _state?: string): Scope[] {
    return [...scopeService.declaredScopes(client)];
  }
}

/**
 * Grants what was requested within the declared set; nothing requested
 * means everything declared
 *
 * @throws OAuthError invalid_scope for names outside the scope set
 */
export class RequestedScopeGrantPolicy implements ScopeGrantPolicy {
  grantScopes(client: Client, requested: string | undefined, state?: string): Scope[] {
    const declared = scopeService.declaredScopes(client);
    const scopes = scopeService.parseScopes(requested, state);
    if (scopes.length === 0) {
      return [...declared];
    }
    return declared.filter((scope) => scopes.includes(scope));
  }
}
