/**
 * Tests for DistributionLedger.
 *
 * Verifies:
 * - Handles issued per user
 * - Superseding and stale handles
 * - Revocation and snapshot release
 * - In-flight snapshots are never mutated
 */

import { describe, it, expect } from "vitest";
import { ConfigRegistry } from "../src/config-registry.js";
import { DistributionLedger } from "../src/distribution-ledger.js";
import { DistributionError } from "../src/errors.js";
import { lookup } from "../src/snapshot.js";
import { DIGEST_A, captureError, fixedClock, oracleKeys } from "./fixtures.js";

function setup(): { registry: ConfigRegistry; ledger: DistributionLedger } {
  const registry = new ConfigRegistry();
  registry.set(DIGEST_A, oracleKeys(4), 1);
  return { registry, ledger: new DistributionLedger({ now: fixedClock }) };
}

describe("DistributionLedger", () => {
  describe("distribute", () => {
    it("issues a handle per user", () => {
      const { registry, ledger } = setup();
      const snapshot = registry.publish();

      const handles = ledger.distribute(["alice", "bob"], snapshot);

      expect([...handles.keys()]).toEqual(["alice", "bob"]);
      expect(handles.get("alice")).toEqual({
        user: "alice",
        snapshotId: snapshot.id,
        version: 1,
        issuedAt: "2026-01-01T00:00:00.000Z",
      });
      expect(ledger.snapshotFor("bob")).toBe(snapshot);
      expect(ledger.users()).toEqual(["alice", "bob"]);
    });

    it("holds snapshots by reference", () => {
      const { registry, ledger } = setup();
      const snapshot = registry.publish();
      ledger.distribute(["alice", "bob"], snapshot);

      expect(ledger.snapshotFor("alice")).toBe(ledger.snapshotFor("bob"));
      expect(ledger.snapshotCount).toBe(1);
    });

    it("supersedes a previous handle without touching the old snapshot", () => {
      const { registry, ledger } = setup();
      const first = registry.publish();
      ledger.distribute(["alice"], first);
      const inFlight = ledger.snapshotFor("alice");

      registry.deactivate(DIGEST_A);
      const second = registry.publish();
      ledger.distribute(["alice"], second);

      expect(lookup(inFlight, DIGEST_A).isActive).toBe(true);
      expect(lookup(ledger.snapshotFor("alice"), DIGEST_A).isActive).toBe(false);
      expect(ledger.snapshotCount).toBe(1);
    });

    it("tolerates partial propagation", () => {
      const { registry, ledger } = setup();
      const first = registry.publish();
      ledger.distribute(["alice", "bob"], first);

      registry.deactivate(DIGEST_A);
      const second = registry.publish();
      ledger.distribute(["alice"], second);

      expect(ledger.snapshotFor("alice")).toBe(second);
      expect(ledger.snapshotFor("bob")).toBe(first);
      expect(ledger.snapshotCount).toBe(2);
    });

    it("rejects an empty user ID before updating anyone", () => {
      const { registry, ledger } = setup();
      const err = captureError(() => ledger.distribute(["alice", " "], registry.publish()));

      expect(err).toBeInstanceOf(DistributionError);
      expect(err).toMatchObject({ code: "INVALID_USER", details: { index: 1 } });
      expect(ledger.handleOf("alice")).toBeUndefined();
      expect(ledger.snapshotCount).toBe(0);
    });
  });

  describe("resolve", () => {
    it("resolves the current handle", () => {
      const { registry, ledger } = setup();
      const snapshot = registry.publish();
      const handle = ledger.distribute(["alice"], snapshot).get("alice");

      expect(handle).toBeDefined();
      if (handle !== undefined) {
        expect(ledger.resolve(handle)).toBe(snapshot);
      }
    });

    it("rejects a superseded handle as stale", () => {
      const { registry, ledger } = setup();
      const first = registry.publish();
      ledger.distribute(["alice"], first);
      registry.deactivate(DIGEST_A);
      const second = registry.publish();
      ledger.distribute(["alice"], second);

      const err = captureError(() =>
        ledger.resolve({ user: "alice", snapshotId: first.id }),
      );

      expect(err).toMatchObject({
        code: "STALE_HANDLE",
        details: { user: "alice", presented: first.id, current: second.id },
      });
    });

    it("rejects a user without a handle", () => {
      const { ledger } = setup();

      expect(captureError(() => ledger.resolve({ user: "carol", snapshotId: "x" }))).toMatchObject({
        code: "NOT_DISTRIBUTED",
        details: { user: "carol" },
      });
      expect(captureError(() => ledger.snapshotFor("carol"))).toMatchObject({
        code: "NOT_DISTRIBUTED",
      });
    });
  });

  describe("revoke", () => {
    it("removes handles and releases unreferenced snapshots", () => {
      const { registry, ledger } = setup();
      ledger.distribute(["alice", "bob"], registry.publish());

      expect(ledger.revoke(["alice", "carol"])).toEqual(["alice"]);
      expect(ledger.snapshotCount).toBe(1);

      expect(ledger.revoke(["bob"])).toEqual(["bob"]);
      expect(ledger.snapshotCount).toBe(0);
      expect(captureError(() => ledger.snapshotFor("alice"))).toMatchObject({
        code: "NOT_DISTRIBUTED",
      });
    });

    it("rejects an empty user ID", () => {
      const { ledger } = setup();

      expect(captureError(() => ledger.revoke([""]))).toMatchObject({ code: "INVALID_USER" });
    });
  });
});
