/**
 * @feedguard/registry — Oracle configuration registry.
 *
 * Versioned, copy-on-write store of oracle signer-set configurations,
 * immutable snapshots of that store, and the ledger that tracks which
 * consumer holds which snapshot.
 */

// Registry
export { ConfigRegistry } from "./config-registry.js";
export type { ConfigRegistryOptions } from "./config-registry.js";

// Snapshots
export { createSnapshot, lookup, snapshotRecords } from "./snapshot.js";
export type { ConfigSnapshot } from "./snapshot.js";

// Distribution
export { DistributionLedger } from "./distribution-ledger.js";
export type {
  SnapshotHandle,
  DistributionLedgerOptions,
} from "./distribution-ledger.js";

// Validation
export { validateConfig, validateDigest } from "./validation.js";
export type { ValidatedConfig } from "./validation.js";

// Hex helpers
export { normalizeHex, byteLength, isZeroHex } from "./hex.js";

// Errors
export { ConfigError, DistributionError } from "./errors.js";
export type { ConfigErrorCode, DistributionErrorCode } from "./errors.js";

// Types
export {
  ORACLE_KEY_BYTES,
  CONFIG_DIGEST_BYTES,
  MAX_SIGNERS,
  MAX_FAULT_TOLERANCE,
  isConfigSetEvent,
  isConfigActivatedEvent,
  isConfigDeactivatedEvent,
} from "./types.js";
export type {
  OracleKey,
  ConfigDigest,
  RegistryVersion,
  ConfigRecord,
  MutationOptions,
  RegistryChangeEvent,
  ConfigSetEvent,
  ConfigActivatedEvent,
  ConfigDeactivatedEvent,
} from "./types.js";
