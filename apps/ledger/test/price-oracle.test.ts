/**
 * Price oracle — round-gated adjustment, skipped-round backfill, floor,
 * and soft failure of the push to the postage ledger.
 */

import { describe, it, expect, beforeEach } from "vitest";
import { ROUND_LENGTH } from "@stampnet/protocol";
import { PRICE_PUSH_FAILED_EVENT } from "../src/event-log/schemas.js";
import { ADMIN, ALICE, KEEPER, codeOf, setup, type Fixture } from "./helpers.js";

describe("PriceOracle", () => {
  let f: Fixture;

  beforeEach(() => {
    f = setup();
    f.oracle.grantRole(ADMIN, "PRICE_UPDATER", KEEPER);
  });

  it("starts at the minimum price and pushes it", () => {
    expect(f.oracle.currentPrice()).toBe(24_000n);
    expect(f.oracle.minimumPrice()).toBe(24_000n);
    expect(f.postage.lastPrice()).toBe(24_000n);
    expect(f.initialPush).toEqual({ ok: true });
  });

  describe("adjustPrice", () => {
    it("lowers the price on high redundancy and pushes it", () => {
      f.oracle.setPrice(ADMIN, 100_000n);

      const result = f.oracle.adjustPrice(KEEPER, 8);
      expect(result).toEqual({ price: 99_919n, push: { ok: true } });
      expect(f.postage.lastPrice()).toBe(99_919n);
      expect(f.oracle.lastAdjustedRound()).toBe(0);
    });

    it("adjusts at most once per round", () => {
      f.oracle.adjustPrice(KEEPER, 4);
      expect(codeOf(() => f.oracle.adjustPrice(KEEPER, 4))).toBe("PriceAlreadyAdjusted");

      f.clock.advanceTo(ROUND_LENGTH);
      expect(f.oracle.adjustPrice(KEEPER, 4).price).toBe(24_000n);
    });

    it("rejects a zero redundancy", () => {
      expect(codeOf(() => f.oracle.adjustPrice(KEEPER, 0))).toBe("UnexpectedZero");
    });

    it("rejects negative and fractional redundancy", () => {
      expect(codeOf(() => f.oracle.adjustPrice(KEEPER, -1))).toBe("InvalidParameter");
      expect(codeOf(() => f.oracle.adjustPrice(KEEPER, 2.5))).toBe("InvalidParameter");
      expect(f.oracle.lastAdjustedRound()).toBe(-1);
    });

    it("never lowers the price below the minimum", () => {
      const result = f.oracle.adjustPrice(KEEPER, 8);
      expect(result.price).toBe(24_000n);
      expect(f.oracle.currentPrice()).toBe(f.oracle.minimumPrice());
    });

    it("backfills skipped rounds with the largest increase", () => {
      f.clock.advanceTo(2 * ROUND_LENGTH);
      // rounds 0 and 1 went by without a report
      expect(f.oracle.adjustPrice(KEEPER, 4).price).toBe(24_038n);
    });

    it("is reserved for the updater role and gated by pause", () => {
      expect(codeOf(() => f.oracle.adjustPrice(ALICE, 4))).toBe("Unauthorized");

      f.oracle.pause(ADMIN);
      expect(codeOf(() => f.oracle.adjustPrice(KEEPER, 4))).toBe("EnforcedPause");
      f.oracle.unPause(ADMIN);
      expect(f.oracle.adjustPrice(KEEPER, 4).price).toBe(24_000n);
    });
  });

  describe("setPrice", () => {
    it("floors at the minimum", () => {
      expect(f.oracle.setPrice(ADMIN, 1n).price).toBe(24_000n);
      expect(f.oracle.currentPrice()).toBe(f.oracle.minimumPrice());
    });

    it("is admin only", () => {
      expect(codeOf(() => f.oracle.setPrice(KEEPER, 50_000n))).toBe("Unauthorized");
    });

    it("keeps the new price when the ledger rejects the push", () => {
      f.postage.pause(ADMIN);

      const result = f.oracle.setPrice(ADMIN, 50_000n);
      expect(result).toEqual({ price: 50_000n, push: { ok: false, error: "EnforcedPause" } });
      expect(f.oracle.currentPrice()).toBe(50_000n);
      expect(f.postage.lastPrice()).toBe(24_000n);
      expect(f.chain.events.last(PRICE_PUSH_FAILED_EVENT)?.payload).toEqual({
        price: 50_000n,
        error: "EnforcedPause",
      });
    });
  });
});
