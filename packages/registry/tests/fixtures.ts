/**
 * Shared fixtures for registry tests.
 */

export const DIGEST_A = `0x${"aa".repeat(32)}` as const;
export const DIGEST_B = `0x${"bb".repeat(32)}` as const;

export const FIXED_NOW = new Date("2026-01-01T00:00:00.000Z");

export function fixedClock(): Date {
  return FIXED_NOW;
}

/**
 * A syntactically valid, distinct 65-byte key. Registry validation does not
 * require keys to be points on the curve.
 */
export function oracleKey(index: number): `0x${string}` {
  return `0x04${index.toString(16).padStart(128, "0")}`;
}

export function oracleKeys(count: number, offset = 1): `0x${string}`[] {
  return Array.from({ length: count }, (_, i) => oracleKey(i + offset));
}

/**
 * Run `fn` and return what it threw.
 */
export function captureError(fn: () => unknown): unknown {
  try {
    fn();
  } catch (err) {
    return err;
  }
  throw new Error("Expected function to throw");
}
