/**
 * Verification Engine
 *
 * Single entry point for consumers: decode → snapshot lookup → active check
 * → exact signature count → signature matching.
 *
 * Design:
 * - Pure: reads only the snapshot it is given, never the live registry
 * - Deterministic: same (snapshot, bytes) → same outcome
 * - All-or-nothing: either the payload or a typed error
 */

import type { Hex } from "viem";
import { lookup } from "@feedguard/registry";
import type { ConfigSnapshot } from "@feedguard/registry";
import { ReportError } from "./errors.js";
import { reportMessageHash } from "./message-hash.js";
import { decodeReport } from "./report-codec.js";
import { verifySignatures } from "./signature-verifier.js";
import type { VerifiedReport } from "./types.js";

/**
 * Verify a signed report and return its payload.
 *
 * @param snapshot The configuration snapshot the caller holds
 * @param signedReport Encoded report, as bytes or hex text
 * @throws {ReportError} decoding and verification failures
 * @throws {ConfigError} DIGEST_NOT_SET if the snapshot lacks the report's digest
 */
export function verifyReport(
  snapshot: ConfigSnapshot,
  signedReport: Uint8Array | string,
): Hex {
  return verifyReportDetailed(snapshot, signedReport).reportData;
}

/**
 * Like `verifyReport`, but also returns the digest and the resolved signers.
 */
export function verifyReportDetailed(
  snapshot: ConfigSnapshot,
  signedReport: Uint8Array | string,
): VerifiedReport {
  const report = decodeReport(signedReport);
  const record = lookup(snapshot, report.reportContext[0]);

  if (!record.isActive) {
    throw new ReportError(
      "DIGEST_INACTIVE",
      `Config digest ${record.digest} is inactive in snapshot ${snapshot.id}`,
      { digest: record.digest, snapshotId: snapshot.id, version: record.version },
    );
  }

  const required = record.f + 1;
  if (report.signatures.length !== required) {
    throw new ReportError(
      "INCORRECT_SIGNATURE_COUNT",
      `Expected exactly ${required} signatures, got ${report.signatures.length}`,
      { digest: record.digest, expected: required, actual: report.signatures.length },
    );
  }

  const signers = verifySignatures(
    reportMessageHash(report),
    record.oracles,
    report.signatures,
  );

  if (signers.length !== required) {
    throw new ReportError(
      "BAD_VERIFICATION",
      `Resolved ${signers.length} distinct signers, need ${required}`,
      { reason: "threshold not met", digest: record.digest, expected: required, actual: signers.length },
    );
  }

  return { configDigest: record.digest, reportData: report.reportData, signers };
}
