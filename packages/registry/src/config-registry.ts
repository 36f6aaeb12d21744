/**
 * Event-Sourced Config Registry
 *
 * Versioned store of oracle configurations keyed by config digest.
 * Every accepted mutation emits a change event and appends one new frozen
 * record to an arena indexed by registry version; the registry exposes the
 * current version for each digest and can publish immutable snapshots.
 *
 * Design:
 * - Copy-on-write: records are never edited, only superseded
 * - Deterministic replay: same events → same records and versions
 * - Fail-closed: a rejected mutation leaves the registry unchanged
 * - Optimistic concurrency via `expectedVersion` per digest
 */

import { ConfigError } from "./errors.js";
import { normalizeHex } from "./hex.js";
import { createSnapshot } from "./snapshot.js";
import type { ConfigSnapshot } from "./snapshot.js";
import { validateConfig } from "./validation.js";
import type {
  ConfigDigest,
  ConfigRecord,
  MutationOptions,
  OracleKey,
  RegistryChangeEvent,
  RegistryVersion,
} from "./types.js";

export interface ConfigRegistryOptions {
  /** Clock used for event timestamps (default: wall clock) */
  readonly now?: () => Date;
}

// =============================================================================
// Config Registry
// =============================================================================

export class ConfigRegistry {
  /** arena[v - 1] is the record produced by version v */
  private readonly arena: ConfigRecord[] = [];
  private readonly current: Map<ConfigDigest, ConfigRecord> = new Map();
  private readonly events: RegistryChangeEvent[] = [];
  private readonly now: () => Date;

  constructor(options: ConfigRegistryOptions = {}) {
    this.now = options.now ?? (() => new Date());
  }

  /**
   * Insert or fully replace the configuration for a digest.
   *
   * The new record is active regardless of the state it replaces.
   *
   * @throws {ConfigError} on any validation failure, or STALE_VERSION
   */
  set(
    digest: string,
    oracles: readonly string[],
    f: number,
    options: MutationOptions = {},
  ): RegistryVersion {
    const config = validateConfig(digest, oracles, f);
    this.assertExpectedVersion(config.digest, options);

    return this.applyEvent({
      type: "config_set",
      digest: config.digest,
      oracles: Object.freeze([...config.oracles]),
      f: config.f,
      timestamp: this.timestamp(),
    });
  }

  /**
   * Mark a configuration active. Idempotent.
   *
   * @throws {ConfigError} DIGEST_NOT_SET, STALE_VERSION
   */
  activate(digest: string, options: MutationOptions = {}): RegistryVersion {
    const normalized = this.requireDigest(digest);
    this.assertExpectedVersion(normalized, options);

    return this.applyEvent({
      type: "config_activated",
      digest: normalized,
      timestamp: this.timestamp(),
    });
  }

  /**
   * Mark a configuration inactive. Idempotent.
   *
   * @throws {ConfigError} DIGEST_NOT_SET, STALE_VERSION
   */
  deactivate(digest: string, options: MutationOptions = {}): RegistryVersion {
    const normalized = this.requireDigest(digest);
    this.assertExpectedVersion(normalized, options);

    return this.applyEvent({
      type: "config_deactivated",
      digest: normalized,
      timestamp: this.timestamp(),
    });
  }

  /**
   * Publish an immutable snapshot of every current record.
   */
  publish(): ConfigSnapshot {
    return createSnapshot(this.version, this.current.values(), this.timestamp());
  }

  /**
   * Current record for a digest, if set.
   */
  get(digest: string): ConfigRecord | undefined {
    const normalized = normalizeHex(digest);
    return normalized === undefined ? undefined : this.current.get(normalized);
  }

  /**
   * Current version for a digest, or 0 if the digest was never set.
   */
  versionOf(digest: string): RegistryVersion {
    return this.get(digest)?.version ?? 0;
  }

  /**
   * The record produced by a specific registry version.
   */
  recordAt(version: RegistryVersion): ConfigRecord | undefined {
    return this.arena[version - 1];
  }

  /**
   * Digests with a current record, in insertion order.
   */
  digests(): readonly ConfigDigest[] {
    return [...this.current.keys()];
  }

  /**
   * Latest registry version (0 before the first mutation).
   */
  get version(): RegistryVersion {
    return this.arena.length;
  }

  /**
   * Get the full event history.
   */
  getEventHistory(): readonly RegistryChangeEvent[] {
    return [...this.events];
  }

  /**
   * Replace the registry state with the result of replaying `events`.
   *
   * Every event is validated as if it were submitted fresh. If any event is
   * rejected the registry keeps its previous state.
   *
   * @throws {ConfigError} if the history contains an invalid event
   */
  replayFrom(events: readonly RegistryChangeEvent[]): void {
    const rebuilt = new ConfigRegistry({ now: this.now });
    for (const event of events) {
      rebuilt.applyHistoricalEvent(event);
    }

    this.arena.splice(0, this.arena.length, ...rebuilt.arena);
    this.events.splice(0, this.events.length, ...rebuilt.events);
    this.current.clear();
    for (const [digest, record] of rebuilt.current) {
      this.current.set(digest, record);
    }
  }

  // ===========================================================================
  // Private
  // ===========================================================================

  private applyHistoricalEvent(event: RegistryChangeEvent): void {
    switch (event.type) {
      case "config_set": {
        const config = validateConfig(event.digest, event.oracles, event.f);
        this.applyEvent({ ...event, digest: config.digest, oracles: config.oracles });
        break;
      }

      case "config_activated":
      case "config_deactivated":
        this.applyEvent({ ...event, digest: this.requireDigest(event.digest) });
        break;
    }
  }

  private applyEvent(event: RegistryChangeEvent): RegistryVersion {
    const version = this.arena.length + 1;
    const record = this.nextRecord(event, version);

    this.arena.push(record);
    this.current.set(record.digest, record);
    this.events.push(event);
    return version;
  }

  private nextRecord(event: RegistryChangeEvent, version: RegistryVersion): ConfigRecord {
    switch (event.type) {
      case "config_set":
        return freezeRecord({
          digest: event.digest,
          oracles: event.oracles,
          f: event.f,
          isActive: true,
          lastUpdated: event.timestamp,
          version,
        });

      case "config_activated":
      case "config_deactivated": {
        const previous = this.current.get(event.digest);
        if (previous === undefined) {
          throw digestNotSet(event.digest);
        }
        return freezeRecord({
          ...previous,
          isActive: event.type === "config_activated",
          lastUpdated: event.timestamp,
          version,
        });
      }
    }
  }

  private requireDigest(digest: string): ConfigDigest {
    const record = this.get(digest);
    if (record === undefined) {
      throw digestNotSet(digest);
    }
    return record.digest;
  }

  private assertExpectedVersion(digest: ConfigDigest, options: MutationOptions): void {
    if (options.expectedVersion === undefined) {
      return;
    }
    const actual = this.versionOf(digest);
    if (actual !== options.expectedVersion) {
      throw new ConfigError(
        "STALE_VERSION",
        `Config ${digest} is at version ${actual}, expected ${options.expectedVersion}`,
        { digest, expected: options.expectedVersion, actual },
      );
    }
  }

  private timestamp(): string {
    return this.now().toISOString();
  }
}

function freezeRecord(record: ConfigRecord): ConfigRecord {
  return Object.freeze({
    ...record,
    oracles: Object.freeze<OracleKey[]>([...record.oracles]),
  });
}

function digestNotSet(digest: string): ConfigError {
  return new ConfigError("DIGEST_NOT_SET", `Config digest ${digest} is not set`, {
    digest,
  });
}
