import type { Client, RegisteredClient } from '../types/client.js';
import type { IStorage } from '../storage/interfaces/index.js';
import type { IObjectStorage } from '../integrations/object-storage.js';
import type { IdentifierGenerator } from './identifier-generator.js';
import { hashSecret, verifySecret } from '../crypto/hash.js';
import { OAuthError } from '../errors/oauth-error.js';
import { NotFoundError } from '../errors/broker-error.js';
import { DEFAULT_CLIENT_ICON_PATH } from '../config/constants.js';
import { createLogger } from '../logging/logger.js';

const logger = createLogger('client');

export interface ClientServiceOptions {
  storage: IStorage;
  generator: IdentifierGenerator;
  objectStorage: IObjectStorage;
  publicUrl: string;
}

export interface CreateClientRequest {
  name: string;
  ownerId: string;
  redirectUris?: string[];
  homeUrl?: string;
  iconPath?: string;
  published?: boolean;
}

/**
 * Registration and authentication of relying parties
 */
export class ClientService {
  private readonly storage: IStorage;
  private readonly generator: IdentifierGenerator;
  private readonly objectStorage: IObjectStorage;
  private readonly publicUrl: string;

  constructor(options: ClientServiceOptions) {
    this.storage = options.storage;
    this.generator = options.generator;
    this.objectStorage = options.objectStorage;
    this.publicUrl = options.publicUrl.replace(/\/+$/, '');
  }

  /**
   * Register a client. The plaintext secret is returned here and never again.
   */
  async createClient(request: CreateClientRequest): Promise<RegisteredClient> {
    const clientSecret = this.generator.candidate('client_secret');
    const clientSecretHash = await hashSecret(clientSecret);

    const { record: client } = await this.storage.transaction((session) =>
      this.generator.allocate('client_id', {
        seed: request.name,
        exists: (clientId) => session.clients.existsByClientId(clientId),
        reserve: (clientId) =>
          session.clients.create({
            clientId,
            clientSecretHash,
            name: request.name,
            ownerId: request.ownerId,
            redirectUris: request.redirectUris,
            homeUrl: request.homeUrl,
            iconPath: request.iconPath,
            published: request.published,
          }),
      })
    );

    logger.info('Client registered', { clientId: client.clientId, ownerId: client.ownerId });
    return { client, clientSecret };
  }

  async findByClientId(clientId: string): Promise<Client | null> {
    return this.storage.transaction((session) => session.clients.findByClientId(clientId));
  }

  async addRedirectUri(clientId: string, uri: string): Promise<Client> {
    return this.storage.transaction(async (session) => {
      const client = await session.clients.findByClientId(clientId);
      if (!client) {
        throw new NotFoundError(`Client ${clientId} not found`);
      }

      const updated = await session.clients.addRedirectUri(client.id, uri);
      if (!updated) {
        throw new NotFoundError(`Client ${clientId} not found`);
      }
      return updated;
    });
  }

  iconUrl(client: Client): string {
    if (client.iconPath) {
      return this.objectStorage.resolveUrl(client.iconPath);
    }
    return `${this.publicUrl}${DEFAULT_CLIENT_ICON_PATH}`;
  }

  /**
   * Check a client_id / client_secret pair
   *
   * @throws OAuthError unauthorized_client for an unknown client_id
   * @throws OAuthError invalid_client for a wrong secret
   */
  async verifyCredentials(clientId: string, clientSecret: string): Promise<Client> {
    const client = await this.findByClientId(clientId);
    if (!client) {
      throw OAuthError.unauthorizedClient(`Unknown client: ${clientId}`);
    }

    const isValid = await verifySecret(clientSecret, client.clientSecretHash);
    if (!isValid) {
      logger.warn('Client authentication failed', { clientId });
      throw OAuthError.invalidClient('Invalid client credentials');
    }

    return client;
  }
}
