import type { Context } from 'hono';
import type { User, CreateUserInput, UpdateUserInput } from '../../types/user.js';

/**
 * User storage interface
 */
export interface IUserStorage {
  /**
   * Create a user. Throws UniqueConstraintError when the email is taken.
   */
  create(input: CreateUserInput): Promise<User>;

  findById(id: string): Promise<User | null>;

  findByEmail(email: string): Promise<User | null>;

  /**
   * Apply a partial update, returning null for an unknown id
   */
  update(id: string, input: UpdateUserInput): Promise<User | null>;
}

/**
 * Authentication result from the user authenticator
 */
export type AuthenticationResult =
  | { authenticated: true; userId: string }
  | { authenticated: false; redirectTo: string };

/**
 * Pluggable user authenticator
 *
 * The broker does not own login sessions; it asks this interface which
 * signed-in user (if any) is behind the current request. Implementations
 * typically read a session cookie and look the user up.
 */
export interface IUserAuthenticator {
  authenticate(ctx: Context): Promise<AuthenticationResult>;
}
