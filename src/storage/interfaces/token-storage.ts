import type { AccessToken, CreateAccessTokenInput } from '../../types/token.js';

/**
 * Access token storage interface
 */
export interface IAccessTokenStorage {
  /**
   * Throws UniqueConstraintError when the token hash already exists
   */
  create(input: CreateAccessTokenInput): Promise<AccessToken>;

  findByHash(tokenHash: string): Promise<AccessToken | null>;

  /**
   * Returns false if the token is unknown or already revoked
   */
  revoke(id: string, revokedAt: Date): Promise<boolean>;

  deleteExpired(now: Date): Promise<number>;
}
