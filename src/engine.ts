/**
 * Composition root: builds one instance of every access-control component
 * and wires them together. Nothing else in the tree creates shared state.
 *
 * @module engine
 */

import { AccessEvaluationService } from './access/accessEvaluationService.js';
import { MutationQueue } from './access/mutationQueue.js';
import { PermissionCache } from './access/permissionCache.js';
import { RoleAssignmentManager } from './access/roleAssignmentManager.js';
import { RoleHierarchy } from './access/roleHierarchy.js';
import type { AuditSink, RoleDefinition } from './access/types.js';
import { SecurityAuditLog } from './audit/securityAuditLog.js';
import {
  DEFAULT_ACCESS_CONTROL_CONFIG,
  type AccessControlConfig,
} from './config/accessControlConfig.js';
import { DirectoryIdentityProvider } from './identity/directoryIdentityProvider.js';
import { InMemoryUserDirectory, type DirectoryUserInput } from './identity/userDirectory.js';
import { createLogger, type Logger } from './logging/logger.js';

export interface AccessControlEngineOptions {
  config?: Partial<AccessControlConfig>;
  users?: DirectoryUserInput[];
  /** Replaces the default role hierarchy. */
  roleDefinitions?: RoleDefinition[];
  logger?: Logger;
  /** Defaults to an in-process {@link SecurityAuditLog}. */
  auditSink?: AuditSink;
}

export interface AccessControlEngine {
  config: AccessControlConfig;
  logger: Logger;
  directory: InMemoryUserDirectory;
  identity: DirectoryIdentityProvider;
  auditSink: AuditSink;
  /** Set when no external sink was injected. */
  auditLog: SecurityAuditLog | null;
  hierarchy: RoleHierarchy;
  cache: PermissionCache;
  queue: MutationQueue;
  evaluation: AccessEvaluationService;
  assignments: RoleAssignmentManager;
}

export function createAccessControlEngine(
  options: AccessControlEngineOptions = {},
): AccessControlEngine {
  const config: AccessControlConfig = { ...DEFAULT_ACCESS_CONTROL_CONFIG, ...options.config };
  const logger =
    options.logger ?? createLogger({ service: config.serviceName, level: config.logLevel });

  const directory = new InMemoryUserDirectory(options.users);
  const identity = new DirectoryIdentityProvider(directory);
  let auditLog: SecurityAuditLog | null = null;
  let auditSink: AuditSink;
  if (options.auditSink) {
    auditSink = options.auditSink;
  } else {
    auditLog = new SecurityAuditLog();
    auditSink = auditLog;
  }

  const hierarchy = new RoleHierarchy(options.roleDefinitions);
  const cache = new PermissionCache({ ttlMs: config.cacheTtlMs });
  const queue = new MutationQueue();

  const evaluation = new AccessEvaluationService({
    identity,
    auditSink,
    hierarchy,
    cache,
    queue,
    logger,
    timeZone: config.timeZone,
  });
  const assignments = new RoleAssignmentManager({
    evaluation,
    roleSync: directory,
    auditSink,
    logger,
    maxElevationMs: config.maxElevationMs,
    cleanupIntervalMs: config.cleanupIntervalMs,
  });

  logger.debug('Access control engine created', {
    users: directory.listUsers().length,
    roles: hierarchy.listDefinitions().length,
    cacheTtlMs: config.cacheTtlMs,
    timeZone: config.timeZone,
  });

  return {
    config,
    logger,
    directory,
    identity,
    auditSink,
    auditLog,
    hierarchy,
    cache,
    queue,
    evaluation,
    assignments,
  };
}
