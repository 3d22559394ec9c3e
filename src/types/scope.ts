export const SCOPE_NAME = 'name' as const;
export const SCOPE_EMAIL = 'email' as const;
export const SCOPE_AVATAR_URL = 'avatar_url' as const;

/**
 * Every scope a client can be granted
 */
export const SCOPES = [SCOPE_NAME, SCOPE_EMAIL, SCOPE_AVATAR_URL] as const;

export type Scope = (typeof SCOPES)[number];

export function isScope(value: string): value is Scope {
  return SCOPES.some((scope) => scope === value);
}
