/**
 * Audit Module
 *
 * Append-only, hash-chained log of security events.
 *
 * @module audit
 */

export type {
  ChainIntegrityResult,
  IntegrityResult,
  SecurityAuditEntry,
  SecurityAuditFilter,
} from './types.js';

export { SecurityAuditLog } from './securityAuditLog.js';
export type { SecurityAuditLogOptions } from './securityAuditLog.js';
