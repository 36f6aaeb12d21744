/**
 * Tests for distribution routes.
 */

import { describe, it, expect } from "vitest";
import type { SnapshotHandle } from "@feedguard/registry";
import type { DistributionResult } from "../../src/services/oracle-service.js";
import { ADMIN, ALICE, BOB, createTestApp, jsonRequest, readJson } from "../setup.js";
import type { ErrorBody } from "../setup.js";

function distribute(users: unknown): Request {
  return jsonRequest("/api/v1/distribution", "POST", { users }, ADMIN);
}

describe("POST /api/v1/distribution", () => {
  it("publishes a snapshot and issues handles", async () => {
    const { app } = createTestApp();
    const res = await app.request(distribute(["alice", "bob"]));

    expect(res.status).toBe(201);
    const { data } = await readJson<{ data: DistributionResult }>(res);
    expect(data.version).toBe(0);
    expect(data.publishedAt).toBe("2026-01-01T00:00:00.000Z");
    expect(data.handles.map((h) => h.user)).toEqual(["alice", "bob"]);
    expect(data.handles.every((h) => h.snapshotId === data.snapshotId)).toBe(true);
  });

  it("rejects an empty user list", async () => {
    const { app } = createTestApp();
    const res = await app.request(distribute([]));

    expect(res.status).toBe(400);
    expect((await readJson<ErrorBody>(res)).error.code).toBe("VALIDATION_ERROR");
  });

  it("rejects a blank user id", async () => {
    const { app } = createTestApp();
    const res = await app.request(distribute(["alice", "   "]));

    expect(res.status).toBe(400);
    expect((await readJson<ErrorBody>(res)).error).toMatchObject({
      code: "INVALID_USER",
      details: { index: 1 },
    });
  });

  it("is closed to consumers", async () => {
    const { app } = createTestApp();
    const res = await app.request(jsonRequest("/api/v1/distribution", "POST", { users: ["alice"] }, ALICE));
    expect(res.status).toBe(403);
  });
});

describe("GET /api/v1/distribution/me", () => {
  it("returns the caller's handle", async () => {
    const { app } = createTestApp();
    await app.request(distribute(["alice"]));

    const res = await app.request(jsonRequest("/api/v1/distribution/me", "GET", undefined, ALICE));

    expect(res.status).toBe(200);
    const { data } = await readJson<{ data: SnapshotHandle }>(res);
    expect(data).toMatchObject({ user: "alice", version: 0, issuedAt: "2026-01-01T00:00:00.000Z" });
  });

  it("returns 403 when nothing was distributed to the caller", async () => {
    const { app } = createTestApp();
    await app.request(distribute(["alice"]));

    const res = await app.request(jsonRequest("/api/v1/distribution/me", "GET", undefined, BOB));

    expect(res.status).toBe(403);
    expect((await readJson<ErrorBody>(res)).error).toEqual({
      code: "NOT_DISTRIBUTED",
      message: "No configuration snapshot has been distributed to bob",
      details: { user: "bob" },
    });
  });
});

describe("POST /api/v1/distribution/revoke", () => {
  it("withdraws handles", async () => {
    const { app } = createTestApp();
    await app.request(distribute(["alice", "bob"]));

    const res = await app.request(
      jsonRequest("/api/v1/distribution/revoke", "POST", { users: ["alice", "carol"] }, ADMIN),
    );

    expect(res.status).toBe(200);
    expect(await readJson<unknown>(res)).toEqual({ data: { revoked: ["alice"] } });

    const me = await app.request(jsonRequest("/api/v1/distribution/me", "GET", undefined, ALICE));
    expect(me.status).toBe(403);
    const still = await app.request(jsonRequest("/api/v1/distribution/me", "GET", undefined, BOB));
    expect(still.status).toBe(200);
  });
});
