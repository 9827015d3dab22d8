/**
 * Identity provider backed by the user directory.
 *
 * The acting user is either the one bound to the current async call chain
 * by {@link DirectoryIdentityProvider.runAs} (one per HTTP request) or, when
 * nothing is bound, the session user set by `signIn`.
 *
 * @module identity/directoryIdentityProvider
 */

import { AsyncLocalStorage } from 'node:async_hooks';

import type { AuthenticatedUser, IdentityProvider } from '../access/types.js';
import type { InMemoryUserDirectory } from './userDirectory.js';

interface IdentityScope {
  userId: string | null;
}

export class DirectoryIdentityProvider implements IdentityProvider {
  private readonly scope = new AsyncLocalStorage<IdentityScope>();
  private sessionUserId: string | null = null;

  constructor(private readonly directory: InMemoryUserDirectory) {}

  async currentUser(): Promise<AuthenticatedUser | null> {
    const bound = this.scope.getStore();
    const userId = bound ? bound.userId : this.sessionUserId;
    return userId === null ? null : this.directory.findUser(userId);
  }

  /**
   * Run `fn` as `userId`; `null` runs it anonymously. The binding follows
   * every await inside `fn` and overrides the session user.
   */
  runAs<T>(userId: string | null, fn: () => T): T {
    return this.scope.run({ userId }, fn);
  }

  signIn(userId: string): void {
    this.sessionUserId = userId;
  }

  signOut(): void {
    this.sessionUserId = null;
  }
}
