/**
 * Configuration Snapshots
 *
 * A snapshot is an immutable digest → record mapping as of one registry
 * version. Consumers verify reports against the snapshot they hold, never
 * against the live registry, so later mutations cannot change the outcome
 * of a verification already in flight.
 */

import { createHash } from "node:crypto";
import { canonicalize } from "json-canonicalize";
import { ConfigError } from "./errors.js";
import { normalizeHex } from "./hex.js";
import type { ConfigDigest, ConfigRecord, RegistryVersion } from "./types.js";

// =============================================================================
// Types
// =============================================================================

export interface ConfigSnapshot {
  /** Content-addressed ID (same version + same records → same ID) */
  readonly id: string;

  /** Registry version the snapshot was taken at */
  readonly version: RegistryVersion;

  /** ISO 8601 timestamp of publication */
  readonly publishedAt: string;

  readonly configs: ReadonlyMap<ConfigDigest, ConfigRecord>;
}

// =============================================================================
// Construction
// =============================================================================

/**
 * Build a snapshot from already-frozen records.
 *
 * Records are shared by reference; they are immutable, so no copy is needed.
 */
export function createSnapshot(
  version: RegistryVersion,
  records: Iterable<ConfigRecord>,
  publishedAt: string,
): ConfigSnapshot {
  const sorted = [...records].sort((a, b) => a.digest.localeCompare(b.digest));
  const configs = new SnapshotConfigs(
    sorted.map((record): [ConfigDigest, ConfigRecord] => [record.digest, record]),
  );

  return Object.freeze({
    id: computeSnapshotId(version, sorted),
    version,
    publishedAt,
    configs,
  });
}

/**
 * Read-only digest → record map. The backing `Map` is held in a private
 * field, so the snapshot exposes no `set`, `delete` or `clear`.
 */
class SnapshotConfigs implements ReadonlyMap<ConfigDigest, ConfigRecord> {
  readonly #records: Map<ConfigDigest, ConfigRecord>;

  constructor(entries: Iterable<readonly [ConfigDigest, ConfigRecord]>) {
    this.#records = new Map(entries);
    Object.freeze(this);
  }

  get size(): number {
    return this.#records.size;
  }

  get(digest: ConfigDigest): ConfigRecord | undefined {
    return this.#records.get(digest);
  }

  has(digest: ConfigDigest): boolean {
    return this.#records.has(digest);
  }

  forEach(
    callback: (record: ConfigRecord, digest: ConfigDigest, map: ReadonlyMap<ConfigDigest, ConfigRecord>) => void,
  ): void {
    for (const [digest, record] of this.#records) {
      callback(record, digest, this);
    }
  }

  entries() {
    return this.#records.entries();
  }

  keys() {
    return this.#records.keys();
  }

  values() {
    return this.#records.values();
  }

  [Symbol.iterator]() {
    return this.#records[Symbol.iterator]();
  }
}

function computeSnapshotId(
  version: RegistryVersion,
  records: readonly ConfigRecord[],
): string {
  const data = canonicalize({
    version,
    configs: records.map((r) => ({
      digest: r.digest,
      oracles: r.oracles,
      f: r.f,
      isActive: r.isActive,
      version: r.version,
    })),
  });
  return createHash("sha256").update(data).digest("hex").slice(0, 16);
}

// =============================================================================
// Reads
// =============================================================================

/**
 * Look up a configuration in a snapshot.
 *
 * @throws {ConfigError} DIGEST_NOT_SET if the snapshot has no such digest
 */
export function lookup(snapshot: ConfigSnapshot, digest: string): ConfigRecord {
  const normalized = normalizeHex(digest);
  const record = normalized === undefined ? undefined : snapshot.configs.get(normalized);
  if (record === undefined) {
    throw new ConfigError(
      "DIGEST_NOT_SET",
      `Config digest ${digest} is not set in snapshot ${snapshot.id}`,
      { digest, snapshotId: snapshot.id, snapshotVersion: snapshot.version },
    );
  }
  return record;
}

/**
 * All records of a snapshot, ordered by digest.
 */
export function snapshotRecords(snapshot: ConfigSnapshot): readonly ConfigRecord[] {
  return [...snapshot.configs.values()];
}
