/**
 * Report decoding and verification errors.
 *
 * Decoding errors (MALFORMED_ENCODING, MISMATCHED_SIGNATURE_ARRAYS) are
 * structural; the rest are verification outcomes. None are transient.
 * A missing digest surfaces as the registry's ConfigError DIGEST_NOT_SET.
 */

export type ReportErrorCode =
  | "MALFORMED_ENCODING"
  | "MISMATCHED_SIGNATURE_ARRAYS"
  | "DIGEST_INACTIVE"
  | "INCORRECT_SIGNATURE_COUNT"
  | "BAD_VERIFICATION";

export class ReportError extends Error {
  public readonly code: ReportErrorCode;
  public readonly details: Readonly<Record<string, unknown>>;

  constructor(
    code: ReportErrorCode,
    message: string,
    details: Readonly<Record<string, unknown>> = {},
  ) {
    super(message);
    this.name = "ReportError";
    this.code = code;
    this.details = details;
  }
}
