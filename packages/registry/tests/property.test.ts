/**
 * Property-Based Tests for @feedguard/registry
 *
 * Uses fast-check to verify invariants that must hold for ANY valid input:
 *
 * 1. set → lookup returns an active record with the same f
 * 2. activate / deactivate are idempotent
 * 3. Replaying the event history reproduces the registry
 * 4. Rejected configurations never change the registry
 */

import { describe, it, expect } from "vitest";
import fc from "fast-check";
import { ConfigRegistry } from "../src/config-registry.js";
import { lookup } from "../src/snapshot.js";
import { DIGEST_A, fixedClock, oracleKeys } from "./fixtures.js";

// =============================================================================
// Arbitraries
// =============================================================================

/** A valid (f, n) pair: 1 ≤ f ≤ 10, 3f < n ≤ 31. */
const arbValidShape = fc
  .integer({ min: 1, max: 10 })
  .chain((f) => fc.tuple(fc.constant(f), fc.integer({ min: 3 * f + 1, max: 31 })));

/** An (f, n) pair that violates the signer bounds. */
const arbInvalidShape = fc
  .integer({ min: 1, max: 10 })
  .chain((f) =>
    fc.tuple(
      fc.constant(f),
      fc.oneof(fc.integer({ min: 0, max: 3 * f }), fc.integer({ min: 32, max: 40 })),
    ),
  );

const arbDigest = fc
  .uint8Array({ minLength: 32, maxLength: 32 })
  .map((bytes) => `0x${Buffer.from(bytes).toString("hex")}`);

type Toggle = "activate" | "deactivate";
const arbToggles = fc.array(fc.constantFrom<Toggle>("activate", "deactivate"), {
  maxLength: 12,
});

// =============================================================================
// Properties
// =============================================================================

describe("registry properties", () => {
  it("set followed by lookup yields an active record with the same f", () => {
    fc.assert(
      fc.property(arbDigest, arbValidShape, (digest, [f, n]) => {
        const registry = new ConfigRegistry();
        registry.set(digest, oracleKeys(n), f);
        const record = lookup(registry.publish(), digest);

        expect(record.isActive).toBe(true);
        expect(record.f).toBe(f);
        expect(record.oracles).toHaveLength(n);
      }),
    );
  });

  it("repeating a toggle leaves the record content unchanged", () => {
    fc.assert(
      fc.property(arbToggles, fc.constantFrom<Toggle>("activate", "deactivate"), (history, op) => {
        const registry = new ConfigRegistry({ now: fixedClock });
        registry.set(DIGEST_A, oracleKeys(4), 1);
        for (const toggle of history) {
          registry[toggle](DIGEST_A);
        }

        registry[op](DIGEST_A);
        const once = registry.get(DIGEST_A);
        registry[op](DIGEST_A);
        const twice = registry.get(DIGEST_A);

        expect(twice?.isActive).toBe(op === "activate");
        expect({ ...twice, version: 0 }).toEqual({ ...once, version: 0 });
      }),
    );
  });

  it("replaying the history reproduces every record", () => {
    fc.assert(
      fc.property(arbValidShape, arbToggles, ([f, n], toggles) => {
        const registry = new ConfigRegistry();
        registry.set(DIGEST_A, oracleKeys(n), f);
        for (const toggle of toggles) {
          registry[toggle](DIGEST_A);
        }

        const replayed = new ConfigRegistry();
        replayed.replayFrom(registry.getEventHistory());

        expect(replayed.version).toBe(registry.version);
        expect(replayed.get(DIGEST_A)).toEqual(registry.get(DIGEST_A));
        expect(replayed.publish().id).toBe(registry.publish().id);
      }),
    );
  });

  it("rejected configurations never change the registry", () => {
    fc.assert(
      fc.property(arbInvalidShape, ([f, n]) => {
        const registry = new ConfigRegistry();
        registry.set(DIGEST_A, oracleKeys(4), 1);
        const before = registry.get(DIGEST_A);

        expect(() => registry.set(DIGEST_A, oracleKeys(n), f)).toThrow();
        expect(registry.get(DIGEST_A)).toBe(before);
        expect(registry.version).toBe(1);
      }),
    );
  });
});
