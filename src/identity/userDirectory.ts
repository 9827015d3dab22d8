/**
 * In-memory user directory.
 *
 * A user's effective roles are their standing roles plus the assigned
 * roles the role assignment manager last synced for them. An assigned role
 * drops out of every snapshot taken after its expiry, whether or not the
 * expiry sweep has run yet.
 *
 * @module identity/userDirectory
 */

import type {
  AssignedRoleGrant,
  AuthenticatedUser,
  Role,
  UserRoleSync,
} from '../access/types.js';

export interface DirectoryUserInput {
  id: string;
  name: string;
  /** Roles held independently of any assignment. */
  roles?: Role[];
  isActive?: boolean;
}

interface DirectoryRecord {
  id: string;
  name: string;
  isActive: boolean;
  standingRoles: Role[];
  assignedRoles: AssignedRoleGrant[];
}

export class InMemoryUserDirectory implements UserRoleSync {
  private readonly users = new Map<string, DirectoryRecord>();

  constructor(users: DirectoryUserInput[] = []) {
    for (const user of users) this.addUser(user);
  }

  /** Add or replace a user. Previously synced roles are kept. */
  addUser(input: DirectoryUserInput): AuthenticatedUser {
    const existing = this.users.get(input.id);
    this.users.set(input.id, {
      id: input.id,
      name: input.name,
      isActive: input.isActive ?? true,
      standingRoles: [...(input.roles ?? [])],
      assignedRoles: existing ? existing.assignedRoles : [],
    });
    return this.snapshot(input.id);
  }

  /** Snapshot of the user with the roles effective at `now`, or null when unknown. */
  findUser(userId: string, now: Date = new Date()): AuthenticatedUser | null {
    return this.users.has(userId) ? this.snapshot(userId, now) : null;
  }

  /** Returns false when the user is unknown. */
  setActive(userId: string, isActive: boolean): boolean {
    const record = this.users.get(userId);
    if (!record) return false;
    record.isActive = isActive;
    return true;
  }

  listUsers(): AuthenticatedUser[] {
    return [...this.users.keys()].map((id) => this.snapshot(id));
  }

  /**
   * Replace the assignment-derived roles. Unknown users are ignored; an
   * assignment can name a user the directory has not seen yet.
   */
  async syncAssignedRoles(userId: string, grants: AssignedRoleGrant[]): Promise<void> {
    const record = this.users.get(userId);
    if (record) record.assignedRoles = grants.map((grant) => ({ ...grant }));
  }

  private snapshot(userId: string, now: Date = new Date()): AuthenticatedUser {
    const record = this.users.get(userId);
    if (!record) throw new Error(`Unknown user: ${userId}`);

    const roles = [...record.standingRoles];
    // role → latest expiry among its valid grants; null when one never expires
    const lapses = new Map<Role, number | null>();
    for (const grant of record.assignedRoles) {
      const expiry = grant.expiresAt?.getTime() ?? null;
      if (expiry !== null && now.getTime() > expiry) continue;
      if (!roles.includes(grant.role)) roles.push(grant.role);
      if (record.standingRoles.includes(grant.role)) continue;

      const known = lapses.get(grant.role);
      if (known === undefined) lapses.set(grant.role, expiry);
      else if (known !== null && (expiry === null || expiry > known)) {
        lapses.set(grant.role, expiry);
      }
    }

    const user: AuthenticatedUser = {
      id: record.id,
      name: record.name,
      isActive: record.isActive,
      roles,
    };
    const bounded = [...lapses.values()].filter((expiry): expiry is number => expiry !== null);
    if (bounded.length > 0) user.rolesExpireAt = new Date(Math.min(...bounded));
    return user;
  }
}
