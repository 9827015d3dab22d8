/**
 * In-process security audit log.
 *
 * Append-only and tamper-evident: every entry carries a SHA-256 checksum
 * over its fields and the previous entry's checksum, so editing any entry
 * breaks the chain from that point on.
 *
 * @module audit
 */

import { createHash, randomUUID } from 'node:crypto';

import type { AuditSink } from '../access/types.js';
import type {
  ChainIntegrityResult,
  IntegrityResult,
  SecurityAuditEntry,
  SecurityAuditFilter,
} from './types.js';

export interface SecurityAuditLogOptions {
  /** Correlation id stamped on entries. Defaults to a fresh UUID per entry. */
  correlationId?: () => string;
}

interface ChainFault {
  index: number;
  details: string;
}

/** Stable serialization: detail keys are sorted so insertion order never matters. */
function checksumOf(entry: SecurityAuditEntry): string {
  const details = Object.keys(entry.details)
    .sort()
    .map((key) => [key, entry.details[key]]);
  const canonical = JSON.stringify([
    entry.previousChecksum,
    entry.id,
    entry.timestamp.toISOString(),
    entry.event,
    entry.userId,
    entry.correlationId,
    details,
  ]);
  return createHash('sha256').update(canonical).digest('hex');
}

function matchesFilter(entry: SecurityAuditEntry, filter: SecurityAuditFilter): boolean {
  return (
    (!filter.event || entry.event === filter.event) &&
    (!filter.userId || entry.userId === filter.userId) &&
    (!filter.startDate || entry.timestamp >= filter.startDate) &&
    (!filter.endDate || entry.timestamp <= filter.endDate)
  );
}

export class SecurityAuditLog implements AuditSink {
  private readonly entries: SecurityAuditEntry[] = [];
  private readonly nextCorrelationId: () => string;

  constructor(options: SecurityAuditLogOptions = {}) {
    this.nextCorrelationId = options.correlationId ?? randomUUID;
  }

  get size(): number {
    return this.entries.length;
  }

  async logSecurityEvent(
    event: string,
    userId: string,
    details: Record<string, string>,
  ): Promise<void> {
    const entry: SecurityAuditEntry = {
      id: randomUUID(),
      timestamp: new Date(),
      event,
      userId,
      details: { ...details },
      correlationId: this.nextCorrelationId(),
      checksum: '',
      previousChecksum: this.entries.at(-1)?.checksum ?? '',
    };
    entry.checksum = checksumOf(entry);
    this.entries.push(entry);
  }

  /** Entries in append order, optionally filtered and paged. */
  async query(filter: SecurityAuditFilter = {}): Promise<SecurityAuditEntry[]> {
    const matches = this.entries.filter((entry) => matchesFilter(entry, filter));
    const offset = filter.offset ?? 0;
    return matches.slice(offset, offset + (filter.limit ?? matches.length));
  }

  async verifyIntegrity(entryId: string): Promise<IntegrityResult> {
    const entry = this.entries.find((e) => e.id === entryId);
    if (!entry) {
      return { entryId, valid: false, expectedChecksum: '', actualChecksum: '' };
    }
    const actualChecksum = checksumOf(entry);
    return {
      entryId,
      valid: entry.checksum === actualChecksum,
      expectedChecksum: entry.checksum,
      actualChecksum,
    };
  }

  async verifyChainIntegrity(): Promise<ChainIntegrityResult> {
    const totalEntries = this.entries.length;
    if (totalEntries === 0) {
      return { valid: true, totalEntries, firstInvalidIndex: null, details: 'No entries to verify' };
    }

    const fault = this.findFirstFault();
    if (fault) {
      return { valid: false, totalEntries, firstInvalidIndex: fault.index, details: fault.details };
    }
    return { valid: true, totalEntries, firstInvalidIndex: null, details: 'All entries verified' };
  }

  private findFirstFault(): ChainFault | null {
    let previous = '';
    for (const [index, entry] of this.entries.entries()) {
      if (entry.previousChecksum !== previous) {
        return { index, details: `Chain broken at index ${index}: previousChecksum mismatch` };
      }
      if (entry.checksum !== checksumOf(entry)) {
        return { index, details: `Tampered entry at index ${index}: checksum mismatch` };
      }
      previous = entry.checksum;
    }
    return null;
  }
}
