import type { AuthorizationCode, CreateAuthorizationCodeInput } from '../../types/token.js';

/**
 * Authorization code storage interface
 */
export interface IAuthorizationCodeStorage {
  /**
   * Throws UniqueConstraintError when the code hash already exists
   */
  create(input: CreateAuthorizationCodeInput): Promise<AuthorizationCode>;

  findByHash(codeHash: string): Promise<AuthorizationCode | null>;

  /**
   * Mark a code as used if it has not been used yet.
   * Returns false when another exchange consumed it first.
   */
  consume(id: string, usedAt: Date): Promise<boolean>;

  /**
   * Delete codes that expired before `now`
   */
  deleteExpired(now: Date): Promise<number>;
}
