import type { Alias, CreateAliasInput } from '../../types/alias.js';

/**
 * Alias storage interface
 */
export interface IAliasStorage {
  /**
   * Throws UniqueConstraintError when the address is already allocated
   */
  create(input: CreateAliasInput): Promise<Alias>;

  findById(id: string): Promise<Alias | null>;

  findByEmail(email: string): Promise<Alias | null>;

  existsByEmail(email: string): Promise<boolean>;

  listByUser(userId: string): Promise<Alias[]>;

  countByUser(userId: string): Promise<number>;

  setEnabled(id: string, enabled: boolean): Promise<Alias | null>;
}
