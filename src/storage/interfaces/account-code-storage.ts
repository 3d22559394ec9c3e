import type { AccountCode, CreateAccountCodeInput } from '../../types/account-code.js';

/**
 * Activation / reset-password code storage interface
 */
export interface IAccountCodeStorage {
  /**
   * Throws UniqueConstraintError when the code already exists
   */
  create(input: CreateAccountCodeInput): Promise<AccountCode>;

  findByCode(code: string): Promise<AccountCode | null>;

  delete(id: string): Promise<void>;
}
