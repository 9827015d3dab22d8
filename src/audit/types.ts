/**
 * Type definitions for the Audit module.
 */

export interface SecurityAuditEntry {
  id: string;
  timestamp: Date;
  /** Event name, e.g. `permission_check` or `role_assigned`. */
  event: string;
  userId: string;
  details: Record<string, string>;
  correlationId: string;
  checksum: string;
  previousChecksum: string;
}

export interface SecurityAuditFilter {
  event?: string;
  userId?: string;
  startDate?: Date;
  endDate?: Date;
  limit?: number;
  offset?: number;
}

export interface IntegrityResult {
  entryId: string;
  valid: boolean;
  expectedChecksum: string;
  actualChecksum: string;
}

export interface ChainIntegrityResult {
  valid: boolean;
  totalEntries: number;
  firstInvalidIndex: number | null;
  details: string;
}
