/**
 * @feedguard/verify — Report types.
 *
 * A signed report is what the oracle network transmits: the context words
 * that bind it to a configuration, the opaque payload, and one (r, s)
 * signature per signing oracle.
 */

import type { Hex } from "viem";
import type { ConfigDigest, OracleKey } from "@feedguard/registry";

/**
 * Three 32-byte context words. The first is the config digest; the other
 * two are signed but not interpreted here.
 */
export type ReportContext = readonly [configDigest: ConfigDigest, word1: Hex, word2: Hex];

export interface ReportSignature {
  /** 32-byte r component */
  readonly r: Hex;

  /** 32-byte s component */
  readonly s: Hex;
}

export interface SignedReport {
  readonly reportContext: ReportContext;

  /** The payload the oracles attested to */
  readonly reportData: Hex;

  readonly signatures: readonly ReportSignature[];

  /**
   * Packed recovery IDs. Carried for wire compatibility only; signers are
   * found by testing keys, not by recovery.
   */
  readonly rawVs: Hex;
}

/**
 * Outcome of a successful verification.
 */
export interface VerifiedReport {
  readonly configDigest: ConfigDigest;
  readonly reportData: Hex;

  /** Matched oracle keys, in signature order */
  readonly signers: readonly OracleKey[];
}
