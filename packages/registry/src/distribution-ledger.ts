/**
 * Distribution Ledger
 *
 * Bookkeeping of which consumer holds which configuration snapshot.
 * Consumers get a handle (a reference to a published snapshot), never a
 * copy; published snapshots are immutable, so sharing them is safe.
 *
 * Rules:
 * - Each user holds at most one current handle
 * - Distributing supersedes the previous handle; it never touches the
 *   snapshot that handle referenced
 * - A snapshot no current handle references is released
 * - Per-user updates are independent of each other
 */

import { DistributionError } from "./errors.js";
import type { ConfigSnapshot } from "./snapshot.js";
import type { RegistryVersion } from "./types.js";

// =============================================================================
// Types
// =============================================================================

export interface SnapshotHandle {
  readonly user: string;
  readonly snapshotId: string;
  readonly version: RegistryVersion;

  /** ISO 8601 timestamp when the handle was issued */
  readonly issuedAt: string;
}

export interface DistributionLedgerOptions {
  readonly now?: () => Date;
}

// =============================================================================
// Distribution Ledger
// =============================================================================

export class DistributionLedger {
  private readonly snapshots: Map<string, ConfigSnapshot> = new Map();
  private readonly handles: Map<string, SnapshotHandle> = new Map();
  private readonly now: () => Date;

  constructor(options: DistributionLedgerOptions = {}) {
    this.now = options.now ?? (() => new Date());
  }

  /**
   * Point each user at `snapshot`, superseding any handle they held.
   *
   * @returns The handle issued to each user
   * @throws {DistributionError} INVALID_USER if any user ID is empty
   */
  distribute(
    users: readonly string[],
    snapshot: ConfigSnapshot,
  ): ReadonlyMap<string, SnapshotHandle> {
    assertUsers(users);

    this.snapshots.set(snapshot.id, snapshot);
    const issuedAt = this.now().toISOString();
    const issued = new Map<string, SnapshotHandle>();

    for (const user of users) {
      const handle: SnapshotHandle = Object.freeze({
        user,
        snapshotId: snapshot.id,
        version: snapshot.version,
        issuedAt,
      });
      this.handles.set(user, handle);
      issued.set(user, handle);
    }

    this.release();
    return issued;
  }

  /**
   * Withdraw the handles of the given users.
   *
   * @returns Users that held a handle and no longer do
   * @throws {DistributionError} INVALID_USER if any user ID is empty
   */
  revoke(users: readonly string[]): readonly string[] {
    assertUsers(users);

    const revoked: string[] = [];
    for (const user of users) {
      if (this.handles.delete(user)) {
        revoked.push(user);
      }
    }

    this.release();
    return revoked;
  }

  handleOf(user: string): SnapshotHandle | undefined {
    return this.handles.get(user);
  }

  /**
   * The snapshot the user currently holds.
   *
   * @throws {DistributionError} NOT_DISTRIBUTED
   */
  snapshotFor(user: string): ConfigSnapshot {
    const handle = this.handles.get(user);
    if (handle === undefined) {
      throw notDistributed(user);
    }
    return this.snapshotById(handle);
  }

  /**
   * Resolve a handle presented by a caller.
   *
   * Only the user's current handle resolves; superseded handles are stale.
   *
   * @throws {DistributionError} NOT_DISTRIBUTED, STALE_HANDLE
   */
  resolve(handle: Pick<SnapshotHandle, "user" | "snapshotId">): ConfigSnapshot {
    const current = this.handles.get(handle.user);
    if (current === undefined) {
      throw notDistributed(handle.user);
    }
    if (current.snapshotId !== handle.snapshotId) {
      throw new DistributionError(
        "STALE_HANDLE",
        `Snapshot ${handle.snapshotId} is no longer current for ${handle.user}`,
        {
          user: handle.user,
          presented: handle.snapshotId,
          current: current.snapshotId,
        },
      );
    }
    return this.snapshotById(current);
  }

  /**
   * Users currently holding a handle.
   */
  users(): readonly string[] {
    return [...this.handles.keys()];
  }

  /**
   * Number of distinct snapshots still referenced by some handle.
   */
  get snapshotCount(): number {
    return this.snapshots.size;
  }

  // ===========================================================================
  // Private
  // ===========================================================================

  private snapshotById(handle: SnapshotHandle): ConfigSnapshot {
    const snapshot = this.snapshots.get(handle.snapshotId);
    if (snapshot === undefined) {
      throw notDistributed(handle.user);
    }
    return snapshot;
  }

  private release(): void {
    const referenced = new Set([...this.handles.values()].map((h) => h.snapshotId));
    for (const id of [...this.snapshots.keys()]) {
      if (!referenced.has(id)) {
        this.snapshots.delete(id);
      }
    }
  }
}

function assertUsers(users: readonly string[]): void {
  const index = users.findIndex((u) => u.trim() === "");
  if (index !== -1) {
    throw new DistributionError(
      "INVALID_USER",
      `User ID at index ${index} is empty`,
      { index },
    );
  }
}

function notDistributed(user: string): DistributionError {
  return new DistributionError(
    "NOT_DISTRIBUTED",
    `No configuration snapshot has been distributed to ${user}`,
    { user },
  );
}
