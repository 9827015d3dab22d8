/**
 * Access Evaluation Service
 *
 * Answers "can the current user do permission P in context C". Every held
 * role contributes its transitive permission closure (`role:<role>`) and any
 * of its own conditional rules that match the context
 * (`conditional:<role>`); the permission is granted when at least one source
 * applies. Denials are results, never exceptions.
 *
 * Results for active users are cached per user and permission, never past
 * the expiry of a time-bounded role the user holds. A disabled account is
 * checked before the cache on every call. Role-definition mutations run on
 * the shared mutation queue and drop the whole cache in the same step.
 *
 * @module access
 */

import { createSilentLogger, type Logger } from '../logging/logger.js';
import { AuditEmitter } from './auditEmitter.js';
import { findGrantingRules } from './conditionalPermissions.js';
import { ACCESS_ERROR_CODES, AccessControlError } from './errors.js';
import { MutationQueue } from './mutationQueue.js';
import { PermissionCache } from './permissionCache.js';
import { groupPermissionsByCategory, sortPermissionsByLabel } from './permissionCatalog.js';
import { createPermissionContext } from './permissionContext.js';
import { RoleHierarchy } from './roleHierarchy.js';
import { DEFAULT_TIME_ZONE } from './timeConstraint.js';
import type {
  AuditSink,
  AuthenticatedUser,
  ConditionalPermissionRule,
  IdentityProvider,
  Permission,
  PermissionCategory,
  PermissionContext,
  PermissionContextOptions,
  PermissionResult,
  Role,
} from './types.js';

export const REASON_NOT_AUTHENTICATED = 'User is not authenticated';
export const REASON_ACCOUNT_DISABLED = 'User account is disabled';
export const REASON_NO_PERMISSION = 'User does not have this permission';

export interface AccessEvaluationDependencies {
  identity: IdentityProvider;
  auditSink: AuditSink;
  hierarchy?: RoleHierarchy;
  cache?: PermissionCache;
  queue?: MutationQueue;
  logger?: Logger;
  /** IANA zone for weekday and time-of-day rules. Defaults to 'UTC'. */
  timeZone?: string;
}

export class AccessEvaluationService {
  readonly hierarchy: RoleHierarchy;
  readonly cache: PermissionCache;
  readonly queue: MutationQueue;
  private readonly identity: IdentityProvider;
  private readonly audit: AuditEmitter;
  private readonly logger: Logger;
  private readonly timeZone: string;

  constructor(deps: AccessEvaluationDependencies) {
    this.identity = deps.identity;
    this.hierarchy = deps.hierarchy ?? new RoleHierarchy();
    this.cache = deps.cache ?? new PermissionCache();
    this.queue = deps.queue ?? new MutationQueue();
    this.logger = (deps.logger ?? createSilentLogger()).child({ component: 'access-evaluation' });
    this.audit = new AuditEmitter(deps.auditSink, this.logger);
    this.timeZone = deps.timeZone ?? DEFAULT_TIME_ZONE;
  }

  // ─── Evaluation ────────────────────────────────────────────────────────────

  /**
   * Evaluate one permission for the current user. Emits a `permission_check`
   * audit event for every call, cache hits included.
   */
  async evaluate(permission: Permission, context?: PermissionContext): Promise<PermissionResult> {
    const user = await this.identity.currentUser();
    const effectiveContext = context ?? createPermissionContext(user?.id ?? '');

    const result = this.resolve(permission, effectiveContext, user);

    this.audit.emit('permission_check', user?.id ?? effectiveContext.userId, {
      permission,
      granted: String(result.granted),
      reason: result.reason,
      target_entity: effectiveContext.targetEntityId ?? 'none',
    });

    return result;
  }

  /**
   * Evaluate each permission independently; no short-circuiting.
   */
  async evaluateMany(
    permissions: readonly Permission[],
    context?: PermissionContext,
  ): Promise<Map<Permission, PermissionResult>> {
    const results = new Map<Permission, PermissionResult>();
    for (const permission of permissions) {
      results.set(permission, await this.evaluate(permission, context));
    }
    return results;
  }

  /**
   * Cache lookup and write-through. Synchronous, so a concurrent mutation
   * can never land between computing a result and caching it.
   */
  private resolve(
    permission: Permission,
    context: PermissionContext,
    user: AuthenticatedUser | null,
  ): PermissionResult {
    if (!user) {
      return this.buildResult(permission, context, false, REASON_NOT_AUTHENTICATED, []);
    }
    if (!user.isActive) {
      return this.buildResult(permission, context, false, REASON_ACCOUNT_DISABLED, []);
    }

    const cached = this.cache.get(user.id, permission);
    if (cached) return cached;

    const result = this.compute(permission, context, user);
    this.cache.put(user.id, result, user.rolesExpireAt);
    return result;
  }

  private compute(
    permission: Permission,
    context: PermissionContext,
    user: AuthenticatedUser,
  ): PermissionResult {
    const sources: string[] = [];
    for (const role of user.roles) {
      if (this.hierarchy.resolvePermissions(role).has(permission)) {
        sources.push(`role:${role}`);
      }
      const matching = findGrantingRules(
        this.hierarchy.getConditionalRules(role),
        permission,
        context,
        { timeZone: this.timeZone },
      );
      for (let i = 0; i < matching.length; i++) {
        sources.push(`conditional:${role}`);
      }
    }

    const granted = sources.length > 0;
    const reason = granted
      ? `Permission granted via: ${sources.join(', ')}`
      : REASON_NO_PERMISSION;
    return this.buildResult(permission, context, granted, reason, sources);
  }

  private buildResult(
    permission: Permission,
    context: PermissionContext,
    granted: boolean,
    reason: string,
    grantedBy: string[],
  ): PermissionResult {
    return { permission, granted, reason, context, evaluatedAt: new Date(), grantedBy };
  }

  // ─── Queries ───────────────────────────────────────────────────────────────

  /** Union of the closures of every held role, sorted by display label. */
  async getCurrentUserPermissions(): Promise<Permission[]> {
    const user = await this.identity.currentUser();
    if (!user) return [];

    const all = new Set<Permission>();
    for (const role of user.roles) {
      for (const permission of this.hierarchy.resolvePermissions(role)) all.add(permission);
    }
    return sortPermissionsByLabel(all);
  }

  async getPermissionsByCategory(): Promise<Partial<Record<PermissionCategory, Permission[]>>> {
    return groupPermissionsByCategory(await this.getCurrentUserPermissions());
  }

  /** Every role the current user holds or inherits, ascending by level. */
  async getCurrentUserRoleHierarchy(): Promise<Role[]> {
    const user = await this.identity.currentUser();
    if (!user) return [];

    const seen = new Set<Role>();
    for (const role of user.roles) {
      for (const reached of this.hierarchy.hierarchyPath(role)) seen.add(reached);
    }
    return [...seen]
      .map((role, index) => ({ role, index, level: this.hierarchy.getLevel(role) }))
      .sort((a, b) => a.level - b.level || a.index - b.index)
      .map((entry) => entry.role);
  }

  /** A context for the current user, stamped now. */
  async createContext(options: PermissionContextOptions = {}): Promise<PermissionContext> {
    const user = await this.identity.currentUser();
    return createPermissionContext(user?.id ?? '', options);
  }

  // ─── Authorization for Mutations ───────────────────────────────────────────

  /**
   * Resolve the acting user and require `permission`.
   * @throws AccessControlError when unauthenticated, disabled or not granted.
   */
  async requirePermission(permission: Permission, operation: string): Promise<AuthenticatedUser> {
    const user = await this.requireActiveUser(operation);
    const check = await this.evaluate(permission);
    if (!check.granted) {
      this.logger.warn('Mutation rejected: missing permission', {
        operation,
        permission,
        userId: user.id,
      });
      throw new AccessControlError(
        ACCESS_ERROR_CODES.INSUFFICIENT_PERMISSION,
        `Permission ${permission} is required to ${operation}`,
        { permission },
      );
    }
    return user;
  }

  /**
   * Resolve the acting user, rejecting anonymous and disabled callers.
   */
  async requireActiveUser(operation: string): Promise<AuthenticatedUser> {
    const user = await this.identity.currentUser();
    if (!user) {
      throw new AccessControlError(
        ACCESS_ERROR_CODES.AUTHENTICATION_MISSING,
        `Authentication is required to ${operation}`,
      );
    }
    if (!user.isActive) {
      throw new AccessControlError(
        ACCESS_ERROR_CODES.ACCOUNT_DISABLED,
        `Account ${user.id} is disabled`,
      );
    }
    return user;
  }

  // ─── Role Definition Mutations ─────────────────────────────────────────────

  /**
   * Add `permission` to the base set of `role`. Granting a permission the
   * role already owns succeeds without side effects.
   */
  grantPermissionToRole(permission: Permission, role: Role): Promise<void> {
    return this.queue.run(async () => {
      const caller = await this.requirePermission('manage_permissions', 'grant permissions');
      this.requireRole(role);

      if (!this.hierarchy.addPermission(role, permission)) return;
      this.cache.invalidateAll();

      this.logger.info('Permission granted to role', { permission, role, by: caller.id });
      this.audit.emit('permission_granted', caller.id, {
        permission,
        target_role: role,
        granted_by: caller.name,
      });
    });
  }

  /**
   * Remove `permission` from the base set of `role`. Revoking a permission
   * the role does not own directly succeeds without side effects: the cache
   * is kept and no `permission_revoked` audit record is written. The role
   * may still inherit the permission.
   */
  revokePermissionFromRole(permission: Permission, role: Role): Promise<void> {
    return this.queue.run(async () => {
      const caller = await this.requirePermission('manage_permissions', 'revoke permissions');
      this.requireRole(role);

      if (!this.hierarchy.removePermission(role, permission)) return;
      this.cache.invalidateAll();

      this.logger.info('Permission revoked from role', { permission, role, by: caller.id });
      this.audit.emit('permission_revoked', caller.id, {
        permission,
        target_role: role,
        revoked_by: caller.name,
      });
    });
  }

  addConditionalRule(role: Role, rule: ConditionalPermissionRule): Promise<void> {
    return this.queue.run(async () => {
      const caller = await this.requirePermission('manage_permissions', 'add conditional rules');
      this.requireRole(role);

      this.hierarchy.addConditionalRule(role, rule);
      this.cache.invalidateAll();

      this.logger.info('Conditional rule added', {
        role,
        permission: rule.permission,
        by: caller.id,
      });
      this.audit.emit('conditional_rule_added', caller.id, {
        permission: rule.permission,
        target_role: role,
        conditions: JSON.stringify(rule.conditions),
        priority: String(rule.priority),
        added_by: caller.name,
      });
    });
  }

  private requireRole(role: Role): void {
    if (!this.hierarchy.has(role)) {
      throw new AccessControlError(ACCESS_ERROR_CODES.NOT_FOUND, `Role not defined: ${role}`, {
        role,
      });
    }
  }

  /** Audit writes that failed since startup. */
  get auditFailureCount(): number {
    return this.audit.failureCount;
  }
}
