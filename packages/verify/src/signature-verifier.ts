/**
 * Signature Verifier
 *
 * Resolves each report signature to the configured oracle that produced it.
 * There is no public key recovery, so every signature is tested against the
 * oracle keys in configuration order until one verifies: O(signatures × keys).
 *
 * Rules:
 * - A signature that matches no key fails the whole report
 * - Two signatures resolving to the same key fail the whole report
 * - Signature order is irrelevant; only signer uniqueness counts
 * - High-S signatures are accepted, out-of-range r or s never match
 */

import { secp256k1 } from "@noble/curves/secp256k1";
import { hexToBigInt, hexToBytes } from "viem";
import type { Hex } from "viem";
import type { OracleKey } from "@feedguard/registry";
import { ReportError } from "./errors.js";
import type { ReportSignature } from "./types.js";

interface Candidate {
  readonly key: OracleKey;
  readonly index: number;
  readonly bytes: Uint8Array;
}

/**
 * Match every signature to a distinct oracle key.
 *
 * @param messageHash 32-byte digest that was signed
 * @param oracles Configured keys, in configuration order
 * @returns The matched keys, in signature order
 * @throws {ReportError} BAD_VERIFICATION on no match or a duplicate signer
 */
export function verifySignatures(
  messageHash: Hex,
  oracles: readonly OracleKey[],
  signatures: readonly ReportSignature[],
): readonly OracleKey[] {
  const hash = hexToBytes(messageHash);
  const candidates: readonly Candidate[] = oracles.map((key, index) => ({
    key,
    index,
    bytes: hexToBytes(key),
  }));

  const matched = new Set<number>();
  const signers: OracleKey[] = [];

  for (const [signatureIndex, signature] of signatures.entries()) {
    const parsed = { r: hexToBigInt(signature.r), s: hexToBigInt(signature.s) };
    const match = candidates.find((candidate) =>
      secp256k1.verify(parsed, hash, candidate.bytes, { lowS: false }),
    );

    if (match === undefined) {
      throw new ReportError(
        "BAD_VERIFICATION",
        `Signature ${signatureIndex} matches no configured oracle`,
        { reason: "no match", signatureIndex },
      );
    }
    if (matched.has(match.index)) {
      throw new ReportError(
        "BAD_VERIFICATION",
        `Signature ${signatureIndex} is a second signature by oracle ${match.index}`,
        { reason: "duplicate signer", signatureIndex, oracleIndex: match.index },
      );
    }

    matched.add(match.index);
    signers.push(match.key);
  }

  return signers;
}
