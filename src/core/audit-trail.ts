import type { AuditAction, AuditEntry } from '../types/index.js';

export interface AuditTrailOptions {
  maxEntries: number;
}

/**
 * Bounded, in-memory record of consultation outcomes.
 * Oldest entries are dropped once maxEntries is reached.
 */
export class AuditTrail {
  private entries: AuditEntry[] = [];
  private maxEntries: number;

  constructor(options: AuditTrailOptions) {
    this.maxEntries = Math.max(1, options.maxEntries);
  }

  record(entry: Omit<AuditEntry, 'timestamp'>): AuditEntry {
    const recorded: AuditEntry = { ...entry, timestamp: new Date().toISOString() };
    this.entries.push(recorded);
    if (this.entries.length > this.maxEntries) {
      this.entries.splice(0, this.entries.length - this.maxEntries);
    }
    return recorded;
  }

  getEntries(): AuditEntry[] {
    return [...this.entries];
  }

  getEntriesForUser(userId: string): AuditEntry[] {
    return this.entries.filter((entry) => entry.userId === userId);
  }

  getEntriesByAction(action: AuditAction): AuditEntry[] {
    return this.entries.filter((entry) => entry.action === action);
  }

  /**
   * Count of entries per action
   */
  summarize(): Record<AuditAction, number> {
    const summary: Record<AuditAction, number> = {
      REQUEST_PROCESSED: 0,
      REQUEST_FAILED: 0,
      VALIDATION_FAILED: 0,
      AUTHENTICATION_FAILED: 0,
      AUTHORIZATION_FAILED: 0,
      NO_AGENT_AVAILABLE: 0,
    };
    for (const entry of this.entries) {
      summary[entry.action]++;
    }
    return summary;
  }

  clear(): void {
    this.entries = [];
  }
}
