/**
 * Deterministic test oracles and report assembly.
 */

import { secp256k1 } from "@noble/curves/secp256k1";
import { bytesToHex, hexToBytes, keccak256, numberToHex, stringToHex } from "viem";
import type { Hex } from "viem";
import { encodeReport, reportMessageHash } from "@feedguard/verify";
import type { ReportContext } from "@feedguard/verify";

export const DIGEST = `0x${"d1".repeat(32)}` as const;
export const OTHER_DIGEST = `0x${"e2".repeat(32)}` as const;
export const REPORT_DATA = "0xcafe0001" as const;

const CONTEXT_WORD_1 = `0x${"00".repeat(31)}07` as const;
const CONTEXT_WORD_2 = `0x${"00".repeat(32)}` as const;

export interface TestOracle {
  readonly privateKey: Uint8Array;
  readonly publicKey: Hex;
}

export function makeOracle(label: string): TestOracle {
  const privateKey = hexToBytes(keccak256(stringToHex(label)));
  return {
    privateKey,
    publicKey: bytesToHex(secp256k1.getPublicKey(privateKey, false)),
  };
}

export function makeOracles(count: number, prefix = "node-oracle"): TestOracle[] {
  return Array.from({ length: count }, (_, i) => makeOracle(`${prefix}-${i}`));
}

/**
 * Encoded report over REPORT_DATA for `digest`, signed by `signers`.
 */
export function buildReport(digest: Hex, signers: readonly TestOracle[]): Hex {
  const reportContext: ReportContext = [digest, CONTEXT_WORD_1, CONTEXT_WORD_2];
  const hash = hexToBytes(reportMessageHash({ reportContext, reportData: REPORT_DATA }));
  const signatures = signers.map((oracle) => {
    const sig = secp256k1.sign(hash, oracle.privateKey);
    return { r: numberToHex(sig.r, { size: 32 }), s: numberToHex(sig.s, { size: 32 }) };
  });
  return encodeReport({ reportContext, reportData: REPORT_DATA, signatures });
}
