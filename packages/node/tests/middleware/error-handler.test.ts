/**
 * Tests for error handler middleware.
 *
 * Verifies domain errors are mapped to correct HTTP status codes
 * and the error envelope format.
 */

import { describe, it, expect } from "vitest";
import { Hono } from "hono";
import type { ErrorHandler } from "hono";
import { pino } from "pino";
import { ConfigError, DistributionError } from "@feedguard/registry";
import { ReportError } from "@feedguard/verify";
import type { AppEnv } from "../../src/types/api-contract.js";
import { createErrorHandler, handleError } from "../../src/middleware/error-handler.js";
import { requestIdMiddleware } from "../../src/middleware/request-id.js";
import { RequestValidationError } from "../../src/middleware/validate.js";
import { readJson } from "../setup.js";
import type { ErrorBody } from "../setup.js";

function appThrowing(err: Error, onError: ErrorHandler<AppEnv> = handleError) {
  const app = new Hono<AppEnv>();
  app.use("*", requestIdMiddleware());
  app.onError(onError);
  app.get("/boom", () => {
    throw err;
  });
  return app;
}

describe("handleError", () => {
  it("maps STALE_VERSION to 409 with details", async () => {
    const res = await appThrowing(
      new ConfigError("STALE_VERSION", "Config is stale", { expected: 1, actual: 2 }),
    ).request("/boom");

    expect(res.status).toBe(409);
    expect(await readJson<ErrorBody>(res)).toEqual({
      error: {
        code: "STALE_VERSION",
        message: "Config is stale",
        details: { expected: 1, actual: 2 },
      },
    });
  });

  it("maps DIGEST_NOT_SET to 404", async () => {
    const res = await appThrowing(
      new ConfigError("DIGEST_NOT_SET", "missing", { digest: "0x01" }),
    ).request("/boom");
    expect(res.status).toBe(404);
  });

  it("maps NOT_DISTRIBUTED to 403", async () => {
    const res = await appThrowing(
      new DistributionError("NOT_DISTRIBUTED", "nothing held", { user: "desk-a" }),
    ).request("/boom");
    expect(res.status).toBe(403);
  });

  it("maps verification failures to 422", async () => {
    const res = await appThrowing(
      new ReportError("BAD_VERIFICATION", "no match", { reason: "no match", signatureIndex: 0 }),
    ).request("/boom");

    expect(res.status).toBe(422);
    const body = await readJson<ErrorBody>(res);
    expect(body.error.code).toBe("BAD_VERIFICATION");
    expect(body.error.details).toEqual({ reason: "no match", signatureIndex: 0 });
  });

  it("maps malformed reports to 400", async () => {
    const res = await appThrowing(
      new ReportError("MALFORMED_ENCODING", "bad bytes", { byteLength: 3 }),
    ).request("/boom");
    expect(res.status).toBe(400);
  });

  it("maps request validation errors to 400", async () => {
    const res = await appThrowing(new RequestValidationError("bad body")).request("/boom");

    expect(res.status).toBe(400);
    expect(await readJson<ErrorBody>(res)).toEqual({
      error: { code: "VALIDATION_ERROR", message: "bad body", details: {} },
    });
  });

  it("hides unexpected errors behind a 500", async () => {
    const res = await appThrowing(new Error("database password is hunter2")).request("/boom");

    expect(res.status).toBe(500);
    expect(await readJson<ErrorBody>(res)).toEqual({
      error: { code: "INTERNAL_ERROR", message: "Internal server error" },
    });
  });
});

describe("createErrorHandler", () => {
  function capture() {
    const lines: string[] = [];
    const logger = pino({ level: "info" }, { write: (line: string) => lines.push(line) });
    return { lines, logger };
  }

  it("logs unexpected errors with the request id", async () => {
    const { lines, logger } = capture();
    const res = await appThrowing(new Error("boom"), createErrorHandler(logger)).request("/boom", {
      headers: { "X-Request-Id": "req-42" },
    });

    expect(res.status).toBe(500);
    expect(lines).toHaveLength(1);
    const entry: { level: number; msg: string; requestId: string; err: { message: string } } =
      JSON.parse(lines[0] ?? "{}");
    expect(entry.level).toBe(50);
    expect(entry.msg).toBe("Unhandled error");
    expect(entry.requestId).toBe("req-42");
    expect(entry.err.message).toBe("boom");
  });

  it("does not log domain errors", async () => {
    const { lines, logger } = capture();
    const res = await appThrowing(
      new ConfigError("DIGEST_NOT_SET", "missing"),
      createErrorHandler(logger),
    ).request("/boom");

    expect(res.status).toBe(404);
    expect(lines).toHaveLength(0);
  });
});
