/**
 * Best-effort delivery of security events to the audit sink.
 *
 * The access decision or mutation is authoritative whether or not its audit
 * record lands; a sink failure is logged at warn and goes no further.
 *
 * @module access/auditEmitter
 */

import type { Logger } from '../logging/logger.js';
import type { AuditSink } from './types.js';

export class AuditEmitter {
  private failures = 0;

  constructor(
    private readonly sink: AuditSink,
    private readonly logger: Logger,
  ) {}

  /** Fire-and-forget; never throws and never rejects. */
  emit(event: string, userId: string, details: Record<string, string>): void {
    let pending: Promise<void>;
    try {
      pending = this.sink.logSecurityEvent(event, userId, details);
    } catch (err) {
      this.recordFailure(event, err);
      return;
    }
    void pending.catch((err: unknown) => this.recordFailure(event, err));
  }

  /** Audit writes that failed since startup. */
  get failureCount(): number {
    return this.failures;
  }

  private recordFailure(event: string, err: unknown): void {
    this.failures++;
    this.logger.warn('Audit sink rejected security event', {
      event,
      error: err instanceof Error ? err.message : String(err),
    });
  }
}
