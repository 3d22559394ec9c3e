/**
 * Which address a client sees for a user
 */
export type DisclosureChannel = { kind: 'alias'; aliasId: string } | { kind: 'real_email' };

/**
 * Consent binding between one client and one user, created once
 */
export interface Binding {
  id: string;
  clientId: string;
  userId: string;
  channel: DisclosureChannel;
  createdAt: Date;
}

export interface CreateBindingInput {
  clientId: string;
  userId: string;
  channel: DisclosureChannel;
}

/**
 * Identity attributes disclosed to a client
 */
export interface UserInfo {
  id: string;
  client: string;
  email_verified: true;
  email?: string;
  name?: string;
  avatar_url?: string | null;
}
