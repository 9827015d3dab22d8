/**
 * Access Control Module
 *
 * Role hierarchy with transitive permission resolution, context- and
 * time-gated conditional grants, cached evaluation, and the role
 * assignment / elevation lifecycle.
 *
 * @module access
 */

export type {
  AssignedRoleGrant,
  AssignRoleOptions,
  AuditSink,
  AuthenticatedUser,
  CleanupSummary,
  ConditionalPermissionRule,
  ContextData,
  ContextValue,
  ElevationStatus,
  IdentityProvider,
  Permission,
  PermissionCategory,
  PermissionContext,
  PermissionContextOptions,
  PermissionResult,
  Role,
  RoleAssignment,
  RoleChangeAction,
  RoleChangeLogEntry,
  RoleDefinition,
  RoleElevationRequest,
  TimeConstraint,
  UserRoleSync,
} from './types.js';
export { ROLES, isRole } from './types.js';
export {
  ALL_PERMISSIONS,
  PERMISSION_CATEGORIES,
  getCategoryLabel,
  getCategoryPermissions,
  getPermissionCategory,
  getPermissionLabel,
  groupPermissionsByCategory,
  isPermission,
  isPermissionCategory,
  sortPermissionsByLabel,
} from './permissionCatalog.js';
export {
  DEFAULT_TIME_ZONE,
  isTimeConstraintSatisfied,
  isValidTimeZone,
  parseClockTime,
} from './timeConstraint.js';
export type { TimeConstraintOptions } from './timeConstraint.js';
export {
  createConditionalRule,
  evaluateConditionalRule,
  findGrantingRules,
} from './conditionalPermissions.js';
export type { ConditionalRuleInput } from './conditionalPermissions.js';
export { createPermissionContext, isContextValue, parseContextData } from './permissionContext.js';
export { RoleHierarchy, createDefaultRoleDefinitions } from './roleHierarchy.js';
export { DEFAULT_PERMISSION_CACHE_TTL_MS, PermissionCache } from './permissionCache.js';
export type { PermissionCacheConfig, PermissionCacheStats } from './permissionCache.js';
export { MutationQueue } from './mutationQueue.js';
export { ACCESS_ERROR_CODES, AccessControlError, isAccessControlError } from './errors.js';
export type { AccessErrorCode } from './errors.js';
export {
  AccessEvaluationService,
  REASON_ACCOUNT_DISABLED,
  REASON_NOT_AUTHENTICATED,
  REASON_NO_PERMISSION,
} from './accessEvaluationService.js';
export type { AccessEvaluationDependencies } from './accessEvaluationService.js';
export {
  DEFAULT_CLEANUP_INTERVAL_MS,
  DEFAULT_MAX_ELEVATION_MS,
  RoleAssignmentManager,
  SYSTEM_ACTOR,
  isAssignmentValid,
} from './roleAssignmentManager.js';
export type { RoleAssignmentManagerDependencies } from './roleAssignmentManager.js';
