/**
 * Oracle Configuration Types
 *
 * A configuration names the oracle signer set that may sign reports under
 * a given config digest, together with the fault tolerance `f` that fixes
 * how many signatures (exactly `f + 1`) a report must carry.
 *
 * Design:
 * - All types are readonly; records are frozen when created
 * - Every transition produces a new record with a new registry version
 * - Event-sourced: the registry state is derived from its change events
 */

import type { Hex } from "viem";

// =============================================================================
// Limits
// =============================================================================

/** Uncompressed secp256k1 public key: 0x04 ‖ X ‖ Y */
export const ORACLE_KEY_BYTES = 65;

export const CONFIG_DIGEST_BYTES = 32;

/** Protocol maximum number of oracles in one configuration */
export const MAX_SIGNERS = 31;

export const MAX_FAULT_TOLERANCE = 10;

// =============================================================================
// Core Types
// =============================================================================

/** 0x-prefixed lowercase hex of a 65-byte uncompressed public key */
export type OracleKey = Hex;

/** 0x-prefixed lowercase hex of a 32-byte configuration identifier */
export type ConfigDigest = Hex;

/**
 * Monotonically increasing registry version. Each accepted mutation
 * consumes exactly one version.
 */
export type RegistryVersion = number;

/**
 * The state of one configuration as of a given registry version.
 */
export interface ConfigRecord {
  readonly digest: ConfigDigest;

  /**
   * Oracle keys in configuration order. A key's position is its ordinal
   * index; signatures are matched against keys in this order.
   */
  readonly oracles: readonly OracleKey[];

  /** Fault tolerance; reports need exactly f + 1 signatures */
  readonly f: number;

  readonly isActive: boolean;

  /** ISO 8601 timestamp of the transition that produced this record */
  readonly lastUpdated: string;

  /** Registry version that produced this record */
  readonly version: RegistryVersion;
}

/**
 * Options accepted by every registry mutation.
 */
export interface MutationOptions {
  /**
   * Version the caller last observed for the digest, or 0 if it expects the
   * digest to be unknown. The mutation fails with STALE_VERSION otherwise.
   */
  readonly expectedVersion?: RegistryVersion | undefined;
}

// =============================================================================
// Registry Change Events (Event-Sourced)
// =============================================================================

export type RegistryChangeEvent =
  | ConfigSetEvent
  | ConfigActivatedEvent
  | ConfigDeactivatedEvent;

export interface ConfigSetEvent {
  readonly type: "config_set";
  readonly digest: ConfigDigest;
  readonly oracles: readonly OracleKey[];
  readonly f: number;
  readonly timestamp: string;
}

export interface ConfigActivatedEvent {
  readonly type: "config_activated";
  readonly digest: ConfigDigest;
  readonly timestamp: string;
}

export interface ConfigDeactivatedEvent {
  readonly type: "config_deactivated";
  readonly digest: ConfigDigest;
  readonly timestamp: string;
}

// =============================================================================
// Type Guards
// =============================================================================

export function isConfigSetEvent(e: RegistryChangeEvent): e is ConfigSetEvent {
  return e.type === "config_set";
}

export function isConfigActivatedEvent(e: RegistryChangeEvent): e is ConfigActivatedEvent {
  return e.type === "config_activated";
}

export function isConfigDeactivatedEvent(e: RegistryChangeEvent): e is ConfigDeactivatedEvent {
  return e.type === "config_deactivated";
}
