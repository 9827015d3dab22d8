/**
 * Type definitions for the Access Control module.
 */

import type { Permission, PermissionCategory } from './permissionCatalog.js';

export type { Permission, PermissionCategory };

export const ROLES = [
  'salesperson',
  'warehouse_keeper',
  'workshop_technician',
  'eva_granulation_technician',
  'workshop_manager',
  'administrator',
  'unauthorized',
] as const;

export type Role = (typeof ROLES)[number];

export function isRole(value: unknown): value is Role {
  return ROLES.some((role) => role === value);
}

// ─── Rules & Definitions ─────────────────────────────────────────────────────

export interface TimeConstraint {
  /** Inclusive lower bound of the absolute window. */
  startTime?: Date;
  /** Inclusive upper bound of the absolute window. */
  endTime?: Date;
  /** Allowed weekdays, 1 = Sunday … 7 = Saturday. */
  daysOfWeek?: number[];
  /** "HH:mm". A start later than the end spans midnight. */
  timeOfDayStart?: string;
  timeOfDayEnd?: string;
}

export interface ConditionalPermissionRule {
  permission: Permission;
  /** Every entry must match the context data exactly. */
  conditions: Record<string, string>;
  timeConstraint?: TimeConstraint;
  /** Informational only; rules are evaluated as any-match. */
  priority: number;
  description: string;
}

export interface RoleDefinition {
  role: Role;
  permissions: Permission[];
  conditionalRules: ConditionalPermissionRule[];
  inheritedRoles: Role[];
  /** Display/sort ordering only. */
  level: number;
}

// ─── Evaluation ──────────────────────────────────────────────────────────────

export type ContextValue = string | number | boolean | Date;

export type ContextData = Readonly<Record<string, ContextValue>>;

export interface PermissionContext {
  userId: string;
  targetEntityId?: string;
  targetEntityType?: string;
  data: ContextData;
  createdAt: Date;
}

export interface PermissionContextOptions {
  targetEntityId?: string;
  targetEntityType?: string;
  data?: Record<string, unknown>;
}

export interface PermissionResult {
  permission: Permission;
  granted: boolean;
  reason: string;
  context: PermissionContext;
  evaluatedAt: Date;
  /** Granting sources such as `role:workshop_manager` or `conditional:salesperson`. */
  grantedBy: string[];
}

// ─── Assignments & Elevation ─────────────────────────────────────────────────

export interface RoleAssignment {
  id: string;
  userId: string;
  role: Role;
  assignedBy: string;
  assignedAt: Date;
  expiresAt?: Date;
  conditions: Record<string, string>;
  active: boolean;
  reason: string;
}

export interface AssignRoleOptions {
  expiresAt?: Date;
  reason?: string;
  conditions?: Record<string, string>;
}

export type RoleChangeAction = 'assigned' | 'revoked' | 'expired' | 'modified';

export interface RoleChangeLogEntry {
  readonly id: string;
  readonly userId: string;
  readonly action: RoleChangeAction;
  readonly role: Role;
  readonly performedBy: string;
  readonly performedAt: Date;
  readonly reason: string;
  readonly previousRoles: readonly Role[];
  readonly newRoles: readonly Role[];
}

export type ElevationStatus = 'pending' | 'approved' | 'rejected' | 'expired';

export interface RoleElevationRequest {
  id: string;
  requesterId: string;
  requesterName: string;
  targetRole: Role;
  reason: string;
  requestedAt: Date;
  requestedDurationMs: number;
  status: ElevationStatus;
  reviewedBy?: string;
  reviewedAt?: Date;
  reviewNotes?: string;
  /** Set when an approval created a role assignment. */
  assignmentId?: string;
}

export interface CleanupSummary {
  expiredAssignments: number;
  removedAssignments: number;
  expiredRequests: number;
}

// ─── Collaborators ───────────────────────────────────────────────────────────

export interface AuthenticatedUser {
  id: string;
  name: string;
  isActive: boolean;
  roles: Role[];
  /**
   * Earliest expiry among the time-bounded assigned roles in `roles`.
   * Absent when none of them expires.
   */
  rolesExpireAt?: Date;
}

/** Who is acting right now. */
export interface IdentityProvider {
  currentUser(): Promise<AuthenticatedUser | null>;
}

/** Destination for security events. Callers never await it for correctness. */
export interface AuditSink {
  logSecurityEvent(event: string, userId: string, details: Record<string, string>): Promise<void>;
}

/** A role held through an assignment, valid up to and including `expiresAt`. */
export interface AssignedRoleGrant {
  role: Role;
  expiresAt?: Date;
}

/**
 * Receives the roles a user currently holds through valid assignments.
 * Readers must drop a grant once its expiry has passed.
 */
export interface UserRoleSync {
  syncAssignedRoles(userId: string, grants: AssignedRoleGrant[]): Promise<void>;
}
