/**
 * OracleService — Orchestration layer over the registry, the
 * distribution ledger and the verification engine.
 *
 * Route handlers call this service rather than the packages directly.
 * Every operation takes the acting identity, is checked against the access
 * policy, and administrative operations are recorded in the audit log.
 */

import { pino } from "pino";
import type { Logger } from "pino";
import {
  ConfigError,
  ConfigRegistry,
  DistributionError,
  DistributionLedger,
} from "@feedguard/registry";
import type {
  ConfigRecord,
  ConfigSnapshot,
  RegistryVersion,
  SnapshotHandle,
} from "@feedguard/registry";
import { ReportError, verifyReportDetailed } from "@feedguard/verify";
import type { VerifiedReport } from "@feedguard/verify";
import type { AuthContext } from "../types/auth.js";
import { AuditLog } from "./audit-log.js";
import { authorize } from "./policy.js";

// =============================================================================
// Types
// =============================================================================

export interface OracleServiceOptions {
  /** Clock shared by the registry, the ledger and the audit log */
  readonly now?: () => Date;
  readonly logger?: Logger;
}

export interface ConfigMutationResult {
  readonly version: RegistryVersion;
  readonly record: ConfigRecord;
}

export interface DistributionResult {
  readonly snapshotId: string;
  readonly version: RegistryVersion;
  readonly publishedAt: string;
  readonly handles: readonly SnapshotHandle[];
}

// =============================================================================
// Service
// =============================================================================

export class OracleService {
  readonly registry: ConfigRegistry;
  readonly ledger: DistributionLedger;
  readonly auditLog: AuditLog;
  private readonly logger: Logger;

  constructor(options: OracleServiceOptions = {}) {
    const clock = options.now === undefined ? {} : { now: options.now };
    this.registry = new ConfigRegistry(clock);
    this.ledger = new DistributionLedger(clock);
    this.auditLog = new AuditLog(clock);
    this.logger = options.logger ?? pino({ level: "silent" });
  }

  // ─── Configs ──────────────────────────────────────────────────────────

  setConfig(
    actor: AuthContext,
    digest: string,
    signers: readonly string[],
    f: number,
    expectedVersion?: RegistryVersion,
  ): ConfigMutationResult {
    authorize(actor, "configure");
    const version = this.registry.set(digest, signers, f, { expectedVersion });
    const record = this.recordOf(version);

    this.auditLog.append({
      actor: actor.identity,
      action: "config.set",
      resourceType: "config",
      resourceId: record.digest,
      detail: `version=${version} signers=${record.oracles.length} f=${record.f}`,
    });
    this.logger.info(
      { actor: actor.identity, digest: record.digest, version, signers: record.oracles.length, f: record.f },
      "Config set",
    );
    return { version, record };
  }

  activateConfig(
    actor: AuthContext,
    digest: string,
    expectedVersion?: RegistryVersion,
  ): ConfigMutationResult {
    authorize(actor, "configure");
    const version = this.registry.activate(digest, { expectedVersion });
    return this.recordToggle(actor, "config.activate", version);
  }

  deactivateConfig(
    actor: AuthContext,
    digest: string,
    expectedVersion?: RegistryVersion,
  ): ConfigMutationResult {
    authorize(actor, "configure");
    const version = this.registry.deactivate(digest, { expectedVersion });
    return this.recordToggle(actor, "config.deactivate", version);
  }

  listConfigs(actor: AuthContext): readonly ConfigRecord[] {
    authorize(actor, "read");
    return this.registry.digests().flatMap((digest) => {
      const record = this.registry.get(digest);
      return record === undefined ? [] : [record];
    });
  }

  /**
   * @throws {ConfigError} DIGEST_NOT_SET
   */
  getConfig(actor: AuthContext, digest: string): ConfigRecord {
    authorize(actor, "read");
    const record = this.registry.get(digest);
    if (record === undefined) {
      throw new ConfigError("DIGEST_NOT_SET", `Config digest ${digest} is not set`, {
        digest,
      });
    }
    return record;
  }

  // ─── Distribution ─────────────────────────────────────────────────────

  /**
   * Publish a snapshot of the current registry and hand it to `users`.
   */
  distribute(actor: AuthContext, users: readonly string[]): DistributionResult {
    authorize(actor, "distribute");
    const snapshot = this.registry.publish();
    const handles = [...this.ledger.distribute(users, snapshot).values()];

    this.auditLog.append({
      actor: actor.identity,
      action: "distribution.distribute",
      resourceType: "snapshot",
      resourceId: snapshot.id,
      detail: `version=${snapshot.version} users=${handles.map((h) => h.user).join(",")}`,
    });
    this.logger.info(
      { actor: actor.identity, snapshotId: snapshot.id, version: snapshot.version, users: handles.length },
      "Snapshot distributed",
    );

    return {
      snapshotId: snapshot.id,
      version: snapshot.version,
      publishedAt: snapshot.publishedAt,
      handles,
    };
  }

  revoke(actor: AuthContext, users: readonly string[]): readonly string[] {
    authorize(actor, "distribute");
    const revoked = this.ledger.revoke(users);

    this.auditLog.append({
      actor: actor.identity,
      action: "distribution.revoke",
      resourceType: "snapshot",
      resourceId: "*",
      detail: `users=${revoked.join(",")}`,
    });
    this.logger.info({ actor: actor.identity, revoked }, "Snapshot handles revoked");
    return revoked;
  }

  /**
   * The caller's own snapshot handle.
   *
   * @throws {DistributionError} NOT_DISTRIBUTED
   */
  handleFor(actor: AuthContext): SnapshotHandle {
    authorize(actor, "verify");
    const handle = this.ledger.handleOf(actor.identity);
    if (handle === undefined) {
      throw new DistributionError(
        "NOT_DISTRIBUTED",
        `No configuration snapshot has been distributed to ${actor.identity}`,
        { user: actor.identity },
      );
    }
    return handle;
  }

  // ─── Verification ─────────────────────────────────────────────────────

  /**
   * Verify a signed report against the caller's snapshot.
   *
   * When `snapshotId` is given it must be the caller's current handle.
   */
  verify(
    actor: AuthContext,
    signedReport: Uint8Array | string,
    snapshotId?: string,
  ): VerifiedReport {
    authorize(actor, "verify");
    const snapshot = this.snapshotOf(actor, snapshotId);

    try {
      return verifyReportDetailed(snapshot, signedReport);
    } catch (err) {
      this.logger.debug(
        { user: actor.identity, snapshotId: snapshot.id, code: errorCode(err) },
        "Report rejected",
      );
      throw err;
    }
  }

  // ─── Private ──────────────────────────────────────────────────────────

  private snapshotOf(actor: AuthContext, snapshotId: string | undefined): ConfigSnapshot {
    return snapshotId === undefined
      ? this.ledger.snapshotFor(actor.identity)
      : this.ledger.resolve({ user: actor.identity, snapshotId });
  }

  private recordToggle(
    actor: AuthContext,
    action: "config.activate" | "config.deactivate",
    version: RegistryVersion,
  ): ConfigMutationResult {
    const record = this.recordOf(version);
    this.auditLog.append({
      actor: actor.identity,
      action,
      resourceType: "config",
      resourceId: record.digest,
      detail: `version=${version}`,
    });
    this.logger.info(
      { actor: actor.identity, digest: record.digest, version, isActive: record.isActive },
      action === "config.activate" ? "Config activated" : "Config deactivated",
    );
    return { version, record };
  }

  private recordOf(version: RegistryVersion): ConfigRecord {
    const record = this.registry.recordAt(version);
    if (record === undefined) {
      throw new Error(`Registry has no record for version ${version}`);
    }
    return record;
  }
}

function errorCode(err: unknown): string {
  if (err instanceof ReportError || err instanceof ConfigError) {
    return err.code;
  }
  return "UNKNOWN";
}
