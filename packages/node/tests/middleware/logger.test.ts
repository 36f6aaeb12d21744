/**
 * Tests for logger middleware.
 */

import { describe, it, expect } from "vitest";
import { pino } from "pino";
import type { RequestLogEntry } from "../../src/middleware/logger.js";
import { pinoRequestLog } from "../../src/middleware/logger.js";
import { ADMIN, createTestApp, jsonRequest } from "../setup.js";

describe("loggerMiddleware", () => {
  it("calls logFn with request details", async () => {
    const entries: RequestLogEntry[] = [];
    const { app } = createTestApp({ logFn: (entry) => entries.push(entry) });

    await app.request("/health", { headers: { "X-Request-Id": "req-1" } });

    expect(entries).toHaveLength(1);
    expect(entries[0]).toMatchObject({
      method: "GET",
      path: "/health",
      status: 200,
      requestId: "req-1",
    });
    expect(entries[0]?.durationMs).toBeGreaterThanOrEqual(0);
  });

  it("logs the status produced by the error handler", async () => {
    const entries: RequestLogEntry[] = [];
    const { app } = createTestApp({ logFn: (entry) => entries.push(entry) });

    await app.request(
      jsonRequest("/api/v1/configs/0x01/activate", "POST", {}, ADMIN),
    );

    expect(entries).toHaveLength(1);
    expect(entries[0]).toMatchObject({ method: "POST", status: 404 });
  });
});

describe("pinoRequestLog", () => {
  const base = { method: "GET", path: "/x", durationMs: 1, requestId: "r" };

  it("picks the level from the status", () => {
    const lines: string[] = [];
    const log = pinoRequestLog(pino({ level: "info" }, { write: (line: string) => lines.push(line) }));

    log({ ...base, status: 200 });
    log({ ...base, status: 409 });
    log({ ...base, status: 503 });

    const parsed: { level: number; msg: string }[] = lines.map((line) => JSON.parse(line));
    expect(parsed.map((p) => p.level)).toEqual([30, 40, 50]);
    expect(parsed[1]?.msg).toBe("GET /x 409");
  });
});
