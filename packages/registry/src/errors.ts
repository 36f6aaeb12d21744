/**
 * Registry and distribution errors.
 *
 * Every error is terminal: it carries a stable code plus the values needed
 * to reproduce it (offending digest, expected vs. actual counts).
 */

// =============================================================================
// Config Errors
// =============================================================================

export type ConfigErrorCode =
  | "INVALID_CONFIG_DIGEST_LENGTH"
  | "FAULT_TOLERANCE_MUST_BE_POSITIVE"
  | "FAULT_TOLERANCE_TOO_LARGE"
  | "EXCESS_SIGNERS"
  | "INSUFFICIENT_SIGNERS"
  | "INVALID_PUBLIC_KEY_LENGTH"
  | "ZERO_PUBLIC_KEY"
  | "NON_UNIQUE_SIGNATURES"
  | "DIGEST_NOT_SET"
  | "STALE_VERSION";

export class ConfigError extends Error {
  public readonly code: ConfigErrorCode;
  public readonly details: Readonly<Record<string, unknown>>;

  constructor(
    code: ConfigErrorCode,
    message: string,
    details: Readonly<Record<string, unknown>> = {},
  ) {
    super(message);
    this.name = "ConfigError";
    this.code = code;
    this.details = details;
  }
}

// =============================================================================
// Distribution Errors
// =============================================================================

export type DistributionErrorCode =
  | "NOT_DISTRIBUTED"
  | "STALE_HANDLE"
  | "INVALID_USER";

export class DistributionError extends Error {
  public readonly code: DistributionErrorCode;
  public readonly details: Readonly<Record<string, unknown>>;

  constructor(
    code: DistributionErrorCode,
    message: string,
    details: Readonly<Record<string, unknown>> = {},
  ) {
    super(message);
    this.name = "DistributionError";
    this.code = code;
    this.details = details;
  }
}
