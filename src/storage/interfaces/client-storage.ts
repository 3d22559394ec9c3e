import type { Client, CreateClientInput } from '../../types/client.js';

/**
 * Client storage interface
 */
export interface IClientStorage {
  /**
   * Throws UniqueConstraintError when the client_id is already taken
   */
  create(input: CreateClientInput): Promise<Client>;

  findById(id: string): Promise<Client | null>;

  /**
   * Find client by its public client_id
   */
  findByClientId(clientId: string): Promise<Client | null>;

  existsByClientId(clientId: string): Promise<boolean>;

  addRedirectUri(id: string, uri: string): Promise<Client | null>;
}
