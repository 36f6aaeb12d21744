/**
 * Global error handler middleware.
 *
 * Catches all errors thrown by route handlers and produces
 * a consistent error envelope response.
 *
 * Maps known domain errors (ConfigError, DistributionError, ReportError)
 * and request validation failures to appropriate HTTP status codes.
 */

import type { Context, ErrorHandler } from "hono";
import type { Logger } from "pino";
import { ConfigError, DistributionError } from "@feedguard/registry";
import type { ConfigErrorCode, DistributionErrorCode } from "@feedguard/registry";
import { ReportError } from "@feedguard/verify";
import type { ReportErrorCode } from "@feedguard/verify";
import { AccessDeniedError } from "../services/policy.js";
import { RequestValidationError } from "./validate.js";
import type { AppEnv } from "../types/api-contract.js";
import { createErrorEnvelope } from "../types/error.js";

// =============================================================================
// Domain Error → HTTP Status Mapping
// =============================================================================

type DomainError =
  | ConfigError
  | DistributionError
  | ReportError
  | AccessDeniedError
  | RequestValidationError;

type DomainStatus = 400 | 403 | 404 | 409 | 422;

const STATUS_MAP: Record<
  ConfigErrorCode | DistributionErrorCode | ReportErrorCode | "FORBIDDEN" | "VALIDATION_ERROR",
  DomainStatus
> = {
  // Config errors
  INVALID_CONFIG_DIGEST_LENGTH: 400,
  FAULT_TOLERANCE_MUST_BE_POSITIVE: 400,
  FAULT_TOLERANCE_TOO_LARGE: 400,
  EXCESS_SIGNERS: 400,
  INSUFFICIENT_SIGNERS: 400,
  INVALID_PUBLIC_KEY_LENGTH: 400,
  ZERO_PUBLIC_KEY: 400,
  NON_UNIQUE_SIGNATURES: 400,
  DIGEST_NOT_SET: 404,
  STALE_VERSION: 409,

  // Distribution errors
  INVALID_USER: 400,
  NOT_DISTRIBUTED: 403,
  STALE_HANDLE: 409,

  // Report errors
  MALFORMED_ENCODING: 400,
  MISMATCHED_SIGNATURE_ARRAYS: 400,
  DIGEST_INACTIVE: 422,
  INCORRECT_SIGNATURE_COUNT: 422,
  BAD_VERIFICATION: 422,

  // Request / policy
  VALIDATION_ERROR: 400,
  FORBIDDEN: 403,
};

function isDomainError(err: Error): err is DomainError {
  return (
    err instanceof ConfigError ||
    err instanceof DistributionError ||
    err instanceof ReportError ||
    err instanceof AccessDeniedError ||
    err instanceof RequestValidationError
  );
}

// =============================================================================
// Middleware
// =============================================================================

/**
 * Global error handler. Registered as Hono's onError handler.
 */
export function handleError(err: Error, c: Context<AppEnv>): Response {
  if (isDomainError(err)) {
    return c.json(
      createErrorEnvelope(err.code, err.message, err.details),
      STATUS_MAP[err.code],
    );
  }

  // Don't leak internal details
  return c.json(createErrorEnvelope("INTERNAL_ERROR", "Internal server error"), 500);
}

/**
 * Error handler that also logs unexpected failures.
 */
export function createErrorHandler(logger?: Logger): ErrorHandler<AppEnv> {
  return (err, c) => {
    if (logger !== undefined && !isDomainError(err)) {
      logger.error({ err, requestId: c.get("requestId") }, "Unhandled error");
    }
    return handleError(err, c);
  };
}
