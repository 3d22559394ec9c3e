
/**
 * Relying party registered by a developer
 */
export interface Client {
  id: string;
  clientId: string;
  clientSecretHash: string;
  name: string;
  homeUrl?: string;
  published: boolean;
  ownerId: string;
  iconPath?: string;
  redirectUris: string[];
  createdAt: Date;
  updatedAt: Date;
}

export interface CreateClientInput {
  clientId: string;
  clientSecretHash: string;
  name: string;
  ownerId: string;
  homeUrl?: string;
  iconPath?: string;
  published?: boolean;
  redirectUris?: string[];
}

/**
 * Returned once at registration; the plaintext secret is never stored
 */
export interface RegisteredClient {
  client: Client;
  clientSecret: string;
}
