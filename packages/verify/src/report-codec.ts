/**
 * Report Codec
 *
 * Wire format is the Solidity ABI encoding of
 *
 *   (bytes32[3] reportContext, bytes report, bytes32[] rs, bytes32[] ss, bytes32 rawVs)
 *
 * A static `bytes32[3]` is encoded in place, so the context is declared
 * here as three consecutive `bytes32` words; the byte layout is identical.
 *
 * Only the canonical encoding is accepted: decoding re-encodes the values
 * and requires the result to equal the input byte for byte.
 */

import {
  bytesToHex,
  decodeAbiParameters,
  encodeAbiParameters,
  hexToBytes,
  parseAbiParameters,
  size,
} from "viem";
import type { Hex } from "viem";
import { normalizeHex } from "@feedguard/registry";
import { ReportError } from "./errors.js";
import type { ReportContext, ReportSignature, SignedReport } from "./types.js";

const REPORT_PARAMETERS = parseAbiParameters(
  "bytes32 configDigest, bytes32 contextWord1, bytes32 contextWord2, bytes report, bytes32[] rs, bytes32[] ss, bytes32 rawVs",
);

const ZERO_WORD: Hex = `0x${"00".repeat(32)}`;

// =============================================================================
// Decode
// =============================================================================

/**
 * Decode a signed report.
 *
 * String input is treated as hex text with an optional `0x` prefix.
 *
 * @throws {ReportError} MALFORMED_ENCODING, MISMATCHED_SIGNATURE_ARRAYS
 */
export function decodeReport(input: Uint8Array | string): SignedReport {
  const bytes = typeof input === "string" ? hexTextToBytes(input) : input;
  const [configDigest, word1, word2, reportData, rs, ss, rawVs] = decodeTuple(bytes);

  if (rs.length !== ss.length) {
    throw mismatchedArrays(rs.length, ss.length);
  }

  // One report, one byte form: trailing bytes, overlapping offsets and
  // dirty padding all fail here.
  const canonical = encodeAbiParameters(REPORT_PARAMETERS, [
    configDigest,
    word1,
    word2,
    reportData,
    rs,
    ss,
    rawVs,
  ]);
  if (canonical !== bytesToHex(bytes)) {
    throw new ReportError(
      "MALFORMED_ENCODING",
      "Signed report is not in canonical ABI encoding",
      { byteLength: bytes.length, expectedByteLength: size(canonical) },
    );
  }

  const signatures = rs.map((r, index): ReportSignature => {
    const s = ss[index];
    if (s === undefined) {
      throw mismatchedArrays(rs.length, ss.length);
    }
    return { r, s };
  });

  const reportContext: ReportContext = [configDigest, word1, word2];
  return { reportContext, reportData, signatures, rawVs };
}

// =============================================================================
// Encode
// =============================================================================

export interface EncodableReport {
  readonly reportContext: ReportContext;
  readonly reportData: Hex;
  readonly signatures: readonly ReportSignature[];
  readonly rawVs?: Hex | undefined;
}

/**
 * Encode a report in the wire format accepted by `decodeReport`.
 */
export function encodeReport(report: EncodableReport): Hex {
  const [configDigest, word1, word2] = report.reportContext;
  return encodeAbiParameters(REPORT_PARAMETERS, [
    configDigest,
    word1,
    word2,
    report.reportData,
    report.signatures.map((sig) => sig.r),
    report.signatures.map((sig) => sig.s),
    report.rawVs ?? ZERO_WORD,
  ]);
}

// =============================================================================
// Internals
// =============================================================================

function hexTextToBytes(text: string): Uint8Array {
  const hex = normalizeHex(text.trim());
  if (hex === undefined) {
    throw new ReportError(
      "MALFORMED_ENCODING",
      "Signed report is not an even-length hex string",
      { length: text.length },
    );
  }
  return hexToBytes(hex);
}

function decodeTuple(bytes: Uint8Array) {
  try {
    return decodeAbiParameters(REPORT_PARAMETERS, bytes);
  } catch (err) {
    const reason = err instanceof Error ? err.message.split("\n")[0] : String(err);
    throw new ReportError(
      "MALFORMED_ENCODING",
      `Signed report could not be decoded: ${reason}`,
      { byteLength: bytes.length },
    );
  }
}

function mismatchedArrays(rCount: number, sCount: number): ReportError {
  return new ReportError(
    "MISMATCHED_SIGNATURE_ARRAYS",
    `Signature arrays differ in length: ${rCount} r values, ${sCount} s values`,
    { rCount, sCount },
  );
}
