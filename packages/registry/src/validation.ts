/**
 * Configuration validation.
 *
 * Checks run in a fixed order so that a given bad input always reports the
 * same error: digest, fault tolerance, signer count bounds, then each key,
 * then uniqueness.
 */

import { ConfigError } from "./errors.js";
import { byteLength, isZeroHex, normalizeHex } from "./hex.js";
import {
  CONFIG_DIGEST_BYTES,
  MAX_FAULT_TOLERANCE,
  MAX_SIGNERS,
  ORACLE_KEY_BYTES,
} from "./types.js";
import type { ConfigDigest, OracleKey } from "./types.js";

export interface ValidatedConfig {
  readonly digest: ConfigDigest;
  readonly oracles: readonly OracleKey[];
  readonly f: number;
}

/**
 * Normalize and validate a config digest.
 *
 * @throws {ConfigError} INVALID_CONFIG_DIGEST_LENGTH
 */
export function validateDigest(digest: string): ConfigDigest {
  const normalized = normalizeHex(digest);
  if (normalized === undefined || byteLength(normalized) !== CONFIG_DIGEST_BYTES) {
    throw new ConfigError(
      "INVALID_CONFIG_DIGEST_LENGTH",
      `Config digest must be ${CONFIG_DIGEST_BYTES} bytes of hex`,
      {
        digest,
        expected: CONFIG_DIGEST_BYTES,
        actual: normalized === undefined ? null : byteLength(normalized),
      },
    );
  }
  return normalized;
}

/**
 * Validate a full configuration as accepted by `ConfigRegistry.set`.
 *
 * @throws {ConfigError} on the first violated constraint
 */
export function validateConfig(
  digest: string,
  oracles: readonly string[],
  f: number,
): ValidatedConfig {
  const normalizedDigest = validateDigest(digest);

  if (!Number.isInteger(f) || f < 1) {
    throw new ConfigError(
      "FAULT_TOLERANCE_MUST_BE_POSITIVE",
      `Fault tolerance must be a positive integer, got ${f}`,
      { digest: normalizedDigest, f },
    );
  }
  if (f > MAX_FAULT_TOLERANCE) {
    throw new ConfigError(
      "FAULT_TOLERANCE_TOO_LARGE",
      `Fault tolerance must be <= ${MAX_FAULT_TOLERANCE}, got ${f}`,
      { digest: normalizedDigest, f, max: MAX_FAULT_TOLERANCE },
    );
  }
  if (oracles.length > MAX_SIGNERS) {
    throw new ConfigError(
      "EXCESS_SIGNERS",
      `At most ${MAX_SIGNERS} signers are allowed, got ${oracles.length}`,
      { digest: normalizedDigest, max: MAX_SIGNERS, actual: oracles.length },
    );
  }
  if (oracles.length <= 3 * f) {
    throw new ConfigError(
      "INSUFFICIENT_SIGNERS",
      `Need more than ${3 * f} signers for f=${f}, got ${oracles.length}`,
      { digest: normalizedDigest, f, minExclusive: 3 * f, actual: oracles.length },
    );
  }

  const keys: OracleKey[] = [];
  for (const [index, raw] of oracles.entries()) {
    const key = normalizeHex(raw);
    if (key === undefined || byteLength(key) !== ORACLE_KEY_BYTES) {
      throw new ConfigError(
        "INVALID_PUBLIC_KEY_LENGTH",
        `Oracle key at index ${index} must be ${ORACLE_KEY_BYTES} bytes of hex`,
        {
          digest: normalizedDigest,
          index,
          expected: ORACLE_KEY_BYTES,
          actual: key === undefined ? null : byteLength(key),
        },
      );
    }
    if (isZeroHex(key)) {
      throw new ConfigError(
        "ZERO_PUBLIC_KEY",
        `Oracle key at index ${index} is all zero`,
        { digest: normalizedDigest, index },
      );
    }
    keys.push(key);
  }

  const seen = new Set<OracleKey>();
  for (const [index, key] of keys.entries()) {
    if (seen.has(key)) {
      throw new ConfigError(
        "NON_UNIQUE_SIGNATURES",
        `Oracle key at index ${index} is a duplicate`,
        { digest: normalizedDigest, index, key },
      );
    }
    seen.add(key);
  }

  return { digest: normalizedDigest, oracles: keys, f };
}
