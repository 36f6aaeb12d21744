/**
 * Append-only audit log for recording who-did-what-when.
 *
 * The oracle service records every configuration mutation, distribution
 * and revocation here. In-memory only — survives as long as the process.
 */

// =============================================================================
// Types
// =============================================================================

export type AuditAction =
  | "config.set"
  | "config.activate"
  | "config.deactivate"
  | "distribution.distribute"
  | "distribution.revoke";

export type AuditResourceType = "config" | "snapshot";

export interface AuditLogEntry {
  readonly timestamp: string;
  readonly actor: string;
  readonly action: AuditAction;
  readonly resourceType: AuditResourceType;
  readonly resourceId: string;
  readonly detail?: string | undefined;
}

export interface AuditLogQuery {
  readonly actor?: string | undefined;
  readonly action?: string | undefined;
  readonly resourceType?: string | undefined;
  readonly resourceId?: string | undefined;
  readonly limit?: number | undefined;
}

export interface AuditLogOptions {
  readonly now?: () => Date;
}

// =============================================================================
// AuditLog
// =============================================================================

export class AuditLog {
  private readonly _entries: AuditLogEntry[] = [];
  private readonly now: () => Date;

  constructor(options: AuditLogOptions = {}) {
    this.now = options.now ?? (() => new Date());
  }

  /**
   * Append an entry to the audit log.
   */
  append(entry: Omit<AuditLogEntry, "timestamp">): AuditLogEntry {
    const recorded: AuditLogEntry = Object.freeze({
      ...entry,
      timestamp: this.now().toISOString(),
    });
    this._entries.push(recorded);
    return recorded;
  }

  /**
   * Query audit log entries with optional filters.
   *
   * Returns newest-first.
   */
  query(filter?: AuditLogQuery): readonly AuditLogEntry[] {
    let results: AuditLogEntry[] = this._entries;

    if (filter?.actor !== undefined) {
      results = results.filter((e) => e.actor === filter.actor);
    }
    if (filter?.action !== undefined) {
      results = results.filter((e) => e.action === filter.action);
    }
    if (filter?.resourceType !== undefined) {
      results = results.filter((e) => e.resourceType === filter.resourceType);
    }
    if (filter?.resourceId !== undefined) {
      results = results.filter((e) => e.resourceId === filter.resourceId);
    }

    // Newest first
    results = [...results].reverse();

    if (filter?.limit !== undefined && filter.limit > 0) {
      results = results.slice(0, filter.limit);
    }

    return results;
  }

  /**
   * Total number of entries.
   */
  get size(): number {
    return this._entries.length;
  }
}
