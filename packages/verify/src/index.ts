/**
 * @feedguard/verify — Oracle report verification.
 *
 * Decodes signed oracle reports, matches their signatures against the
 * configured oracle keys and enforces the exact f + 1 threshold, all
 * against an immutable configuration snapshot.
 */

// Engine
export { verifyReport, verifyReportDetailed } from "./verification-engine.js";

// Building blocks
export { decodeReport, encodeReport } from "./report-codec.js";
export type { EncodableReport } from "./report-codec.js";
export { reportMessageHash } from "./message-hash.js";
export { verifySignatures } from "./signature-verifier.js";

// Errors
export { ReportError } from "./errors.js";
export type { ReportErrorCode } from "./errors.js";

// Types
export type {
  ReportContext,
  ReportSignature,
  SignedReport,
  VerifiedReport,
} from "./types.js";
