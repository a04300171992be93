import type { NewUser, User } from './user.js';

export type InsertResult =
  | { readonly status: 'created'; readonly user: User }
  | { readonly status: 'conflict' };

/**
 * Persistence for player accounts, keyed by email.
 *
 * Implementations must enforce email uniqueness themselves: `insert` reports
 * `conflict` rather than throwing when the email is taken. Transient failures
 * (timeouts, lost connections) are raised as `StoreUnavailableError`.
 */
export interface UserStore {
  findByEmail(email: string): Promise<User | null>;
  insert(user: NewUser): Promise<InsertResult>;
}
