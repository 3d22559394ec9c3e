import type { Binding, CreateBindingInput } from '../../types/binding.js';

/**
 * Consent binding storage interface
 */
export interface IBindingStorage {
  /**
   * Throws UniqueConstraintError when (clientId, userId) is already bound
   */
  create(input: CreateBindingInput): Promise<Binding>;

  findById(id: string): Promise<Binding | null>;

  find(clientId: string, userId: string): Promise<Binding | null>;

  countByClient(clientId: string): Promise<number>;
}
