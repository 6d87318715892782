/**
 * AuditTrail - Append-only, ordered record of one pipeline invocation
 */

import { logger } from '../logger';
import type { AuditEntry, AuditStep } from '../types';

export class AuditTrail {
  private readonly entries: AuditEntry[] = [];

  record(step: AuditStep, detail: Record<string, unknown> = {}): void {
    const entry: AuditEntry = {
      timestamp: new Date().toISOString(),
      step,
      detail: { ...detail },
    };
    this.entries.push(entry);
    logger.debug(`audit.${step}`, detail);
  }

  /**
   * Copies of the entries; mutating them does not touch the trail.
   */
  getEntries(): AuditEntry[] {
    return this.entries.map((entry) => ({ ...entry, detail: { ...entry.detail } }));
  }

  get size(): number {
    return this.entries.length;
  }

  steps(): AuditStep[] {
    return this.entries.map((entry) => entry.step);
  }
}
