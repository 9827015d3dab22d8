/**
 * Role Assignment Lifecycle Manager
 *
 * Owns role assignments, the append-only role change log and temporary
 * elevation requests.
 *
 * Assignment states: created → active → (revoked | expired). Both terminal
 * states are an expiry at or before now; revocation also clears `active`.
 * Expiry is checked on every read, so an expired assignment stops granting at
 * once; the record itself lingers until
 * {@link RoleAssignmentManager.cleanupExpiredAssignments} logs and removes it.
 *
 * Every mutation runs on the mutation queue shared with the evaluation
 * service, so role changes, cache invalidation and evaluation never
 * interleave mid-step.
 *
 * @module access/roleAssignmentManager
 */

import { v4 as uuidv4 } from 'uuid';

import { createSilentLogger, type Logger } from '../logging/logger.js';
import type { AccessEvaluationService } from './accessEvaluationService.js';
import { AuditEmitter } from './auditEmitter.js';
import { ACCESS_ERROR_CODES, AccessControlError } from './errors.js';
import type {
  AssignedRoleGrant,
  AssignRoleOptions,
  AuditSink,
  AuthenticatedUser,
  CleanupSummary,
  Role,
  RoleAssignment,
  RoleChangeAction,
  RoleChangeLogEntry,
  RoleElevationRequest,
  UserRoleSync,
} from './types.js';

/** Default upper bound for a temporary elevation: 24 hours. */
export const DEFAULT_MAX_ELEVATION_MS = 24 * 60 * 60 * 1000;

/** Default period of the background expiry sweep: 5 minutes. */
export const DEFAULT_CLEANUP_INTERVAL_MS = 5 * 60 * 1000;

export const SYSTEM_ACTOR = 'system';

export interface RoleAssignmentManagerDependencies {
  evaluation: AccessEvaluationService;
  roleSync: UserRoleSync;
  auditSink: AuditSink;
  logger?: Logger;
  maxElevationMs?: number;
  cleanupIntervalMs?: number;
}

/** A valid assignment is active and not past its expiry. */
export function isAssignmentValid(assignment: RoleAssignment, now: Date = new Date()): boolean {
  if (!assignment.active) return false;
  return assignment.expiresAt === undefined || now.getTime() <= assignment.expiresAt.getTime();
}

function copyAssignment(assignment: RoleAssignment): RoleAssignment {
  return { ...assignment, conditions: { ...assignment.conditions } };
}

function copyRequest(request: RoleElevationRequest): RoleElevationRequest {
  return { ...request };
}

export class RoleAssignmentManager {
  readonly maxElevationMs: number;
  readonly cleanupIntervalMs: number;
  private readonly evaluation: AccessEvaluationService;
  private readonly roleSync: UserRoleSync;
  private readonly audit: AuditEmitter;
  private readonly logger: Logger;

  private assignments: RoleAssignment[] = [];
  private readonly changeLog: RoleChangeLogEntry[] = [];
  private readonly elevationRequests = new Map<string, RoleElevationRequest>();

  constructor(deps: RoleAssignmentManagerDependencies) {
    this.evaluation = deps.evaluation;
    this.roleSync = deps.roleSync;
    this.logger = (deps.logger ?? createSilentLogger()).child({ component: 'role-assignment' });
    this.audit = new AuditEmitter(deps.auditSink, this.logger);
    this.maxElevationMs = deps.maxElevationMs ?? DEFAULT_MAX_ELEVATION_MS;
    this.cleanupIntervalMs = deps.cleanupIntervalMs ?? DEFAULT_CLEANUP_INTERVAL_MS;
  }

  // ─── Assignment ────────────────────────────────────────────────────────────

  /**
   * Assign `role` to `userId` on behalf of the current user.
   *
   * @throws AccessControlError AUTHENTICATION_MISSING, ACCOUNT_DISABLED,
   *   INSUFFICIENT_PERMISSION, SELF_MODIFICATION_FORBIDDEN, CONFLICT or INVALID_INPUT
   */
  assignRole(role: Role, userId: string, options: AssignRoleOptions = {}): Promise<RoleAssignment> {
    return this.evaluation.queue.run(async () => {
      const caller = await this.evaluation.requirePermission('assign_role', 'assign roles');

      if (role === 'administrator' && userId === caller.id) {
        throw new AccessControlError(
          ACCESS_ERROR_CODES.SELF_MODIFICATION_FORBIDDEN,
          'Cannot assign the administrator role to yourself',
          { role },
        );
      }

      const now = new Date();
      if (options.expiresAt !== undefined) {
        const expiry = options.expiresAt.getTime();
        if (Number.isNaN(expiry) || expiry <= now.getTime()) {
          throw new AccessControlError(
            ACCESS_ERROR_CODES.INVALID_INPUT,
            'Assignment expiry must be in the future',
            { expiresAt: 'must be in the future' },
          );
        }
      }

      return this.createAssignment(role, userId, caller, options, now);
    });
  }

  /**
   * Shared by direct assignment and elevation approval. Must only be called
   * from inside a queued task.
   */
  private async createAssignment(
    role: Role,
    userId: string,
    caller: AuthenticatedUser,
    options: AssignRoleOptions,
    now: Date,
  ): Promise<RoleAssignment> {
    if (this.findValidAssignment(userId, role, now)) {
      throw new AccessControlError(
        ACCESS_ERROR_CODES.CONFLICT,
        `User ${userId} already holds role ${role}`,
        { userId, role },
      );
    }

    const previousRoles = this.getUserRoles(userId, now);
    const assignment: RoleAssignment = {
      id: uuidv4(),
      userId,
      role,
      assignedBy: caller.id,
      assignedAt: now,
      conditions: { ...options.conditions },
      active: true,
      reason: options.reason ?? '',
    };
    if (options.expiresAt) assignment.expiresAt = options.expiresAt;
    this.assignments.push(assignment);

    this.appendChange(userId, 'assigned', role, caller.id, assignment.reason, previousRoles, now);
    await this.refreshUser(userId);

    this.logger.info('Role assigned', {
      userId,
      role,
      by: caller.id,
      expiresAt: assignment.expiresAt?.toISOString(),
    });
    this.audit.emit('role_assigned', caller.id, {
      target_user: userId,
      role,
      assigned_by: caller.name,
      expires_at: assignment.expiresAt?.toISOString() ?? 'never',
      reason: assignment.reason,
    });

    return copyAssignment(assignment);
  }

  /**
   * Revoke the valid assignment of `role` held by `userId`.
   *
   * @throws AccessControlError AUTHENTICATION_MISSING, ACCOUNT_DISABLED,
   *   INSUFFICIENT_PERMISSION, SELF_MODIFICATION_FORBIDDEN or NOT_FOUND
   */
  revokeRole(role: Role, userId: string, reason = ''): Promise<RoleAssignment> {
    return this.evaluation.queue.run(async () => {
      const caller = await this.evaluation.requirePermission('assign_role', 'revoke roles');

      if (role === 'administrator' && userId === caller.id) {
        throw new AccessControlError(
          ACCESS_ERROR_CODES.SELF_MODIFICATION_FORBIDDEN,
          'Cannot revoke your own administrator role',
          { role },
        );
      }

      const now = new Date();
      const assignment = this.findValidAssignment(userId, role, now);
      if (!assignment) {
        throw new AccessControlError(
          ACCESS_ERROR_CODES.NOT_FOUND,
          `User ${userId} has no active assignment of role ${role}`,
          { userId, role },
        );
      }

      const previousRoles = this.getUserRoles(userId, now);
      assignment.expiresAt = now;
      assignment.active = false;

      this.appendChange(userId, 'revoked', role, caller.id, reason, previousRoles, now);
      await this.refreshUser(userId);

      this.logger.info('Role revoked', { userId, role, by: caller.id });
      this.audit.emit('role_revoked', caller.id, {
        target_user: userId,
        role,
        revoked_by: caller.name,
        reason,
      });

      return copyAssignment(assignment);
    });
  }

  // ─── Elevation ─────────────────────────────────────────────────────────────

  /**
   * File a pending request for temporary possession of `role`.
   *
   * @throws AccessControlError AUTHENTICATION_MISSING, ACCOUNT_DISABLED,
   *   INVALID_INPUT, DURATION_EXCEEDED or CONFLICT
   */
  requestElevation(role: Role, durationMs: number, reason: string): Promise<RoleElevationRequest> {
    return this.evaluation.queue.run(async () => {
      const requester = await this.evaluation.requireActiveUser('request elevation');

      if (!Number.isFinite(durationMs) || durationMs <= 0) {
        throw new AccessControlError(
          ACCESS_ERROR_CODES.INVALID_INPUT,
          'Elevation duration must be a positive number of milliseconds',
          { durationMs: 'must be positive' },
        );
      }
      if (durationMs > this.maxElevationMs) {
        throw new AccessControlError(
          ACCESS_ERROR_CODES.DURATION_EXCEEDED,
          `Elevation duration exceeds the maximum of ${this.maxElevationMs} ms`,
          { durationMs: String(durationMs), maxElevationMs: String(this.maxElevationMs) },
        );
      }
      if (requester.roles.includes(role)) {
        throw new AccessControlError(
          ACCESS_ERROR_CODES.CONFLICT,
          `User ${requester.id} already holds role ${role}`,
          { role },
        );
      }

      const now = new Date();
      this.expireLapsedRequests(now);
      for (const existing of this.elevationRequests.values()) {
        if (
          existing.status === 'pending' &&
          existing.requesterId === requester.id &&
          existing.targetRole === role
        ) {
          throw new AccessControlError(
            ACCESS_ERROR_CODES.CONFLICT,
            `A pending elevation request for role ${role} already exists`,
            { requestId: existing.id },
          );
        }
      }

      const request: RoleElevationRequest = {
        id: uuidv4(),
        requesterId: requester.id,
        requesterName: requester.name,
        targetRole: role,
        reason,
        requestedAt: now,
        requestedDurationMs: durationMs,
        status: 'pending',
      };
      this.elevationRequests.set(request.id, request);

      this.logger.info('Role elevation requested', {
        requestId: request.id,
        role,
        durationMs,
        userId: requester.id,
      });
      this.audit.emit('role_elevation_requested', requester.id, {
        request_id: request.id,
        target_role: role,
        duration_ms: String(durationMs),
        reason,
      });

      return copyRequest(request);
    });
  }

  /**
   * Approve or reject a pending elevation request. Approval creates an
   * assignment expiring `requestedDurationMs` after the review.
   *
   * @throws AccessControlError AUTHENTICATION_MISSING, ACCOUNT_DISABLED,
   *   INSUFFICIENT_PERMISSION, NOT_FOUND or CONFLICT
   */
  reviewElevation(requestId: string, approve: boolean, notes = ''): Promise<RoleElevationRequest> {
    return this.evaluation.queue.run(async () => {
      const reviewer = await this.evaluation.requireActiveUser('review elevation requests');
      if (!reviewer.roles.includes('administrator')) {
        this.logger.warn('Elevation review rejected: reviewer is not an administrator', {
          requestId,
          userId: reviewer.id,
        });
        throw new AccessControlError(
          ACCESS_ERROR_CODES.INSUFFICIENT_PERMISSION,
          'Only administrators can review elevation requests',
          { role: 'administrator' },
        );
      }

      const request = this.elevationRequests.get(requestId);
      if (!request) {
        throw new AccessControlError(
          ACCESS_ERROR_CODES.NOT_FOUND,
          `Elevation request not found: ${requestId}`,
          { requestId },
        );
      }
      if (request.status !== 'pending') {
        throw new AccessControlError(
          ACCESS_ERROR_CODES.CONFLICT,
          `Elevation request ${requestId} is already ${request.status}`,
          { requestId, status: request.status },
        );
      }

      const reviewedAt = new Date();
      if (this.hasLapsed(request, reviewedAt)) {
        request.status = 'expired';
        throw new AccessControlError(
          ACCESS_ERROR_CODES.CONFLICT,
          `Elevation request ${requestId} has expired`,
          { requestId, status: request.status },
        );
      }

      if (approve) {
        const assignment = await this.createAssignment(
          request.targetRole,
          request.requesterId,
          reviewer,
          {
            expiresAt: new Date(reviewedAt.getTime() + request.requestedDurationMs),
            reason: `Temporary elevation: ${request.reason}`,
          },
          reviewedAt,
        );
        request.assignmentId = assignment.id;
      }

      request.status = approve ? 'approved' : 'rejected';
      request.reviewedBy = reviewer.id;
      request.reviewedAt = reviewedAt;
      request.reviewNotes = notes;

      this.logger.info('Role elevation reviewed', {
        requestId,
        decision: request.status,
        by: reviewer.id,
      });
      this.audit.emit('role_elevation_reviewed', reviewer.id, {
        request_id: requestId,
        requester_id: request.requesterId,
        target_role: request.targetRole,
        decision: request.status,
        notes,
      });

      return copyRequest(request);
    });
  }

  // ─── Expiry Sweep ──────────────────────────────────────────────────────────

  /**
   * Log and remove every assignment whose expiry has passed, and expire
   * lapsed pending elevation requests.
   */
  cleanupExpiredAssignments(): Promise<CleanupSummary> {
    return this.evaluation.queue.run(async () => {
      const now = new Date();
      const isPast = (assignment: RoleAssignment): boolean =>
        assignment.expiresAt !== undefined && assignment.expiresAt.getTime() < now.getTime();

      let expiredAssignments = 0;
      const affectedUsers = new Set<string>();
      for (const assignment of this.assignments) {
        if (!isPast(assignment)) continue;
        affectedUsers.add(assignment.userId);
        if (!assignment.active) continue;

        const held = this.getUserRoles(assignment.userId, now);
        const previousRoles = held.includes(assignment.role) ? held : [...held, assignment.role];
        this.appendChange(
          assignment.userId,
          'expired',
          assignment.role,
          SYSTEM_ACTOR,
          'Assignment expired',
          previousRoles,
          now,
        );
        expiredAssignments++;
      }

      const before = this.assignments.length;
      this.assignments = this.assignments.filter((assignment) => !isPast(assignment));
      const removedAssignments = before - this.assignments.length;
      const expiredRequests = this.expireLapsedRequests(now);

      for (const userId of affectedUsers) {
        await this.refreshUser(userId, false);
      }
      if (removedAssignments > 0 || expiredRequests > 0) {
        this.evaluation.cache.invalidateAll();
        this.logger.info('Expired assignments cleaned up', {
          expiredAssignments,
          removedAssignments,
          expiredRequests,
        });
      }

      return { expiredAssignments, removedAssignments, expiredRequests };
    });
  }

  /**
   * Run the expiry sweep every `intervalMs`. The timer does not keep the
   * process alive. Returns a function that stops it.
   */
  startPeriodicCleanup(intervalMs: number = this.cleanupIntervalMs): () => void {
    const timer = setInterval(() => {
      this.cleanupExpiredAssignments().catch((err: unknown) => {
        this.logger.error('Periodic assignment cleanup failed', err);
      });
    }, intervalMs);
    timer.unref();
    this.logger.debug('Periodic assignment cleanup started', { intervalMs });
    return () => clearInterval(timer);
  }

  // ─── Queries ───────────────────────────────────────────────────────────────

  /** Roles the user holds through valid assignments, in assignment order. */
  getUserRoles(userId: string, now: Date = new Date()): Role[] {
    const roles: Role[] = [];
    for (const assignment of this.assignments) {
      if (assignment.userId !== userId || !isAssignmentValid(assignment, now)) continue;
      if (!roles.includes(assignment.role)) roles.push(assignment.role);
    }
    return roles;
  }

  /**
   * The user's valid assigned roles with their expiries, one per role. A role
   * held by several valid assignments keeps the latest expiry.
   */
  getUserGrants(userId: string, now: Date = new Date()): AssignedRoleGrant[] {
    const grants = new Map<Role, AssignedRoleGrant>();
    for (const assignment of this.assignments) {
      if (assignment.userId !== userId || !isAssignmentValid(assignment, now)) continue;
      const known = grants.get(assignment.role);
      if (
        !known ||
        (known.expiresAt !== undefined &&
          (assignment.expiresAt === undefined ||
            assignment.expiresAt.getTime() > known.expiresAt.getTime()))
      ) {
        grants.set(assignment.role, { role: assignment.role, expiresAt: assignment.expiresAt });
      }
    }
    return [...grants.values()].map((grant) =>
      grant.expiresAt === undefined ? { role: grant.role } : grant,
    );
  }

  /** Every stored assignment, valid or not, optionally for one user. */
  getAssignments(userId?: string): RoleAssignment[] {
    return this.assignments
      .filter((assignment) => userId === undefined || assignment.userId === userId)
      .map(copyAssignment);
  }

  /** Change log entries for one user, newest first. */
  getRoleHistory(userId: string): RoleChangeLogEntry[] {
    return this.changeLog
      .map((entry, index) => ({ entry, index }))
      .filter(({ entry }) => entry.userId === userId)
      .sort(
        (a, b) =>
          b.entry.performedAt.getTime() - a.entry.performedAt.getTime() || b.index - a.index,
      )
      .map(({ entry }) => entry);
  }

  /** The full change log in append order. */
  getChangeLog(): RoleChangeLogEntry[] {
    return [...this.changeLog];
  }

  /** Pending elevation requests, oldest first. */
  getPendingElevationRequests(): RoleElevationRequest[] {
    return [...this.elevationRequests.values()]
      .filter((request) => request.status === 'pending')
      .sort((a, b) => a.requestedAt.getTime() - b.requestedAt.getTime())
      .map(copyRequest);
  }

  getElevationRequest(requestId: string): RoleElevationRequest | undefined {
    const request = this.elevationRequests.get(requestId);
    return request ? copyRequest(request) : undefined;
  }

  /** Count of valid assignments per role. */
  getRoleDistribution(now: Date = new Date()): Partial<Record<Role, number>> {
    const distribution: Partial<Record<Role, number>> = {};
    for (const assignment of this.assignments) {
      if (!isAssignmentValid(assignment, now)) continue;
      distribution[assignment.role] = (distribution[assignment.role] ?? 0) + 1;
    }
    return distribution;
  }

  // ─── Internals ─────────────────────────────────────────────────────────────

  private findValidAssignment(userId: string, role: Role, now: Date): RoleAssignment | undefined {
    return this.assignments.find(
      (assignment) =>
        assignment.userId === userId &&
        assignment.role === role &&
        isAssignmentValid(assignment, now),
    );
  }

  private hasLapsed(request: RoleElevationRequest, now: Date): boolean {
    return now.getTime() > request.requestedAt.getTime() + request.requestedDurationMs;
  }

  private expireLapsedRequests(now: Date): number {
    let expired = 0;
    for (const request of this.elevationRequests.values()) {
      if (request.status === 'pending' && this.hasLapsed(request, now)) {
        request.status = 'expired';
        expired++;
      }
    }
    return expired;
  }

  private appendChange(
    userId: string,
    action: RoleChangeAction,
    role: Role,
    performedBy: string,
    reason: string,
    previousRoles: readonly Role[],
    now: Date,
  ): void {
    const entry: RoleChangeLogEntry = Object.freeze({
      id: uuidv4(),
      userId,
      action,
      role,
      performedBy,
      performedAt: now,
      reason,
      previousRoles: Object.freeze([...previousRoles]),
      newRoles: Object.freeze(this.getUserRoles(userId, now)),
    });
    this.changeLog.push(entry);
  }

  /**
   * Push the user's valid grants to the directory, then drop cached results.
   * Invalidating after the sync settles keeps a result computed against the
   * old roles from outliving the change.
   */
  private async refreshUser(userId: string, invalidate = true): Promise<void> {
    try {
      await this.roleSync.syncAssignedRoles(userId, this.getUserGrants(userId));
    } catch (err) {
      this.logger.error('User role refresh failed', err, { userId });
    } finally {
      if (invalidate) this.evaluation.cache.invalidateAll();
    }
  }
}
