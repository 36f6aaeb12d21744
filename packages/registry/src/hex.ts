/**
 * Hex normalization shared by the registry and the report codec.
 */

import { size } from "viem";
import type { Hex } from "viem";

const HEX_BODY = /^[0-9a-fA-F]*$/;

/**
 * Normalize hex text to lowercase `0x`-prefixed form.
 *
 * The `0x` (or `0X`) prefix is optional on input. Returns undefined when
 * the remainder is not an even-length hex string.
 */
export function normalizeHex(value: string): Hex | undefined {
  const body =
    value.startsWith("0x") || value.startsWith("0X") ? value.slice(2) : value;
  if (body.length % 2 !== 0 || !HEX_BODY.test(body)) {
    return undefined;
  }
  return `0x${body.toLowerCase()}`;
}

/**
 * Number of bytes encoded by a normalized hex value.
 */
export function byteLength(hex: Hex): number {
  return size(hex);
}

/**
 * Whether every byte of a normalized hex value is zero.
 */
export function isZeroHex(hex: Hex): boolean {
  return /^0x(00)*$/.test(hex);
}
