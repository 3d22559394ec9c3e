export * from './user-storage.js';
export * from './alias-storage.js';
export * from './client-storage.js';
export * from './binding-storage.js';
export * from './authorization-code-storage.js';
export * from './token-storage.js';
export * from './account-code-storage.js';

import type { IUserStorage } from './user-storage.js';
import type { IAliasStorage } from './alias-storage.js';
import type { IClientStorage } from './client-storage.js';
import type { IBindingStorage } from './binding-storage.js';
import type { IAuthorizationCodeStorage } from './authorization-code-storage.js';
import type { IAccessTokenStorage } from './token-storage.js';
import type { IAccountCodeStorage } from './account-code-storage.js';

/**
 * Repositories bound to one unit of work
 */
export interface StorageSession {
  users: IUserStorage;
  aliases: IAliasStorage;
  clients: IClientStorage;
  bindings: IBindingStorage;
  authorizationCodes: IAuthorizationCodeStorage;
  accessTokens: IAccessTokenStorage;
  accountCodes: IAccountCodeStorage;
}

/**
 * Complete storage interface for the broker
 *
 * All reads and writes go through `transaction`. The session handed to
 * `work` is committed when the returned promise resolves and rolled back
 * when it rejects. Units of work on the same storage never interleave, so
 * a session must not be used after its transaction settles and
 * `transaction` must not be called from inside `work`.
 */
export interface IStorage {
  transaction<T>(work: (session: StorageSession) => Promise<T>): Promise<T>;

  close(): Promise<void>;
}
