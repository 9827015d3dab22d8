/**
 * Shared fixtures for access-control service and HTTP tests.
 *
 * @module test/accessFixtures
 */

import { AccessControlError } from '../access/errors.js';
import type { AuditSink, RoleDefinition } from '../access/types.js';
import { SecurityAuditLog } from '../audit/securityAuditLog.js';
import type { AccessControlConfig } from '../config/accessControlConfig.js';
import {
  createAccessControlEngine,
  type AccessControlEngine,
  type AccessControlEngineOptions,
} from '../engine.js';
import type { DirectoryUserInput } from '../identity/userDirectory.js';
import {
  createLogger,
  createSilentLogger,
  type LogEntry,
  type Logger,
} from '../logging/logger.js';

export const TEST_USERS: DirectoryUserInput[] = [
  { id: 'admin-1', name: 'Test Admin', roles: ['administrator'] },
  { id: 'admin-2', name: 'Second Admin', roles: ['administrator'] },
  { id: 'manager-1', name: 'Test Manager', roles: ['workshop_manager'] },
  { id: 'seller-1', name: 'Test Seller', roles: ['salesperson'] },
  { id: 'keeper-1', name: 'Test Keeper', roles: ['warehouse_keeper'] },
  { id: 'disabled-1', name: 'Disabled Admin', roles: ['administrator'], isActive: false },
  { id: 'guest-1', name: 'Test Guest' },
];

export interface TestEngine extends AccessControlEngine {
  audit: SecurityAuditLog;
}

export interface TestEngineOptions {
  config?: Partial<AccessControlConfig>;
  logger?: Logger;
  users?: DirectoryUserInput[];
  roleDefinitions?: RoleDefinition[];
}

export function createTestEngine(options: TestEngineOptions = {}): TestEngine {
  const audit = new SecurityAuditLog();
  const engineOptions: AccessControlEngineOptions = {
    users: options.users ?? TEST_USERS,
    logger: options.logger ?? createSilentLogger(),
    auditSink: audit,
  };
  if (options.config) engineOptions.config = options.config;
  if (options.roleDefinitions) engineOptions.roleDefinitions = options.roleDefinitions;
  return { ...createAccessControlEngine(engineOptions), audit };
}

/** Debug-level logger that keeps every entry in memory. */
export function createCapturingLogger(): { logger: Logger; entries: LogEntry[] } {
  const entries: LogEntry[] = [];
  const logger = createLogger({ level: 'debug', output: (entry) => entries.push(entry) });
  return { logger, entries };
}

/** Audit sink whose writes always fail asynchronously. */
export const rejectingAuditSink: AuditSink = {
  logSecurityEvent: () => Promise.reject(new Error('audit store unavailable')),
};

/** Audit sink that throws before returning a promise. */
export const throwingAuditSink: AuditSink = {
  logSecurityEvent: () => {
    throw new Error('audit store misconfigured');
  },
};

/**
 * Await `promise` and return the AccessControlError it rejects with.
 * Fails when it resolves or rejects with anything else.
 */
export async function captureAccessError(promise: Promise<unknown>): Promise<AccessControlError> {
  try {
    await promise;
  } catch (err) {
    if (err instanceof AccessControlError) return err;
    throw err;
  }
  throw new Error('Expected the operation to reject with an AccessControlError');
}

/** Let pending promise callbacks run. Real timers only. */
export function flushPromises(): Promise<void> {
  return new Promise((resolve) => setImmediate(resolve));
}
