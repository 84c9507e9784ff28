/**
 * Stake registry — collateral minimums, overlay derivation, freeze/slash,
 * emergency migration.
 */

import { describe, it, expect, beforeEach } from "vitest";
import { overlayAddress } from "@stampnet/protocol";
import { STAKE_SLASHED_EVENT, STAKE_UPDATED_EVENT } from "../src/event-log/schemas.js";
import { ADMIN, ALICE, BOB, KEEPER, codeOf, nonce, setup, type Fixture } from "./helpers.js";

const MIN = 1_000n;

describe("StakeRegistry", () => {
  let f: Fixture;

  beforeEach(() => {
    f = setup({ minimumStake: MIN });
    f.fund(ALICE, 100_000n);
    f.fund(BOB, 100_000n);
    f.registry.grantRole(ADMIN, "REDISTRIBUTOR", KEEPER);
  });

  describe("manageStake", () => {
    it("derives the overlay from identity, network id and nonce", () => {
      const record = f.registry.manageStake(ALICE, nonce("alice"), MIN, 0);

      expect(record.overlay).toBe(overlayAddress(ALICE, 1n, nonce("alice")));
      expect(record.collateral).toBe(MIN);
      expect(f.token.balanceOf(f.registry.address)).toBe(MIN);
      expect(f.token.balanceOf(ALICE)).toBe(100_000n - MIN);
      expect(f.chain.events.last(STAKE_UPDATED_EVENT)?.payload.owner).toBe(ALICE);
    });

    it("requires minimum × 2^height, exactly at the boundary", () => {
      expect(codeOf(() => f.registry.manageStake(ALICE, nonce("alice"), 3_999n, 2))).toBe(
        "BelowMinimumStake",
      );
      expect(f.registry.stakes(ALICE)).toBeUndefined();

      const record = f.registry.manageStake(ALICE, nonce("alice"), 4_000n, 2);
      expect(record.height).toBe(2);
      expect(f.registry.nodeEffectiveStake(ALICE)).toBe(4_000n);
    });

    it("adds to existing collateral and keeps the first overlay", () => {
      const first = f.registry.manageStake(ALICE, nonce("alice"), MIN, 0);
      f.clock.mine(10);
      const second = f.registry.manageStake(ALICE, nonce("other"), 500n, 0);

      expect(second.overlay).toBe(first.overlay);
      expect(second.collateral).toBe(1_500n);
      expect(second.lastUpdateHeight).toBe(10);
    });

    it("counts existing collateral towards a higher height", () => {
      f.registry.manageStake(ALICE, nonce("alice"), 2_000n, 0);
      const record = f.registry.manageStake(ALICE, nonce("alice"), 0n, 1);
      expect(record.height).toBe(1);
      expect(record.collateral).toBe(2_000n);
    });

    it("fails without an allowance and leaves no record", () => {
      const eventsBefore = f.chain.events.count();
      f.token.approve(ALICE, f.registry.address, 0n);

      expect(codeOf(() => f.registry.manageStake(ALICE, nonce("alice"), MIN, 0))).toBe("TransferFailed");
      expect(f.registry.stakes(ALICE)).toBeUndefined();
      expect(f.chain.events.count()).toBe(eventsBefore);
    });
  });

  describe("freezeDeposit", () => {
    beforeEach(() => {
      f.registry.manageStake(ALICE, nonce("alice"), MIN, 0);
    });

    it("zeroes effective stake until the freeze elapses", () => {
      f.clock.advanceTo(5);
      f.registry.freezeDeposit(KEEPER, ALICE, 10);
      expect(f.registry.frozenUntilOf(ALICE)).toBe(15);

      f.clock.advanceTo(14);
      expect(f.registry.nodeEffectiveStake(ALICE)).toBe(0n);
      expect(codeOf(() => f.registry.manageStake(ALICE, nonce("alice"), MIN, 0))).toBe("Frozen");

      f.clock.advanceTo(15);
      expect(f.registry.nodeEffectiveStake(ALICE)).toBe(MIN);
      expect(f.registry.stakes(ALICE)?.collateral).toBe(MIN);
    });

    it("is reserved for the redistributor role", () => {
      expect(codeOf(() => f.registry.freezeDeposit(BOB, ALICE, 10))).toBe("Unauthorized");
    });

    it("ignores identities that never staked", () => {
      f.registry.freezeDeposit(KEEPER, BOB, 10);
      expect(f.registry.frozenUntilOf(BOB)).toBeUndefined();
    });
  });

  describe("slashDeposit", () => {
    beforeEach(() => {
      f.registry.manageStake(ALICE, nonce("alice"), 1_500n, 0);
    });

    it("reduces collateral by the slashed amount", () => {
      f.clock.mine(3);
      f.registry.slashDeposit(KEEPER, ALICE, 400n);

      const record = f.registry.stakes(ALICE);
      expect(record?.collateral).toBe(1_100n);
      expect(record?.lastUpdateHeight).toBe(3);
      expect(f.chain.events.last(STAKE_SLASHED_EVENT)?.payload.amount).toBe(400n);
    });

    it("deletes the record when slashed to nothing", () => {
      f.registry.slashDeposit(KEEPER, ALICE, 1_500n);

      expect(f.registry.stakes(ALICE)).toBeUndefined();
      expect(f.registry.nodeEffectiveStake(ALICE)).toBe(0n);
      expect(f.registry.overlayOfAddress(ALICE)).toBeUndefined();
    });

    it("is reserved for the redistributor role", () => {
      expect(codeOf(() => f.registry.slashDeposit(ALICE, ALICE, 1n))).toBe("Unauthorized");
    });
  });

  describe("withdrawFromStake", () => {
    it("returns surplus above the minimum", () => {
      f.registry.manageStake(ALICE, nonce("alice"), 1_500n, 0);

      expect(f.registry.withdrawFromStake(ALICE, 500n)).toBe(500n);
      expect(f.registry.stakes(ALICE)?.collateral).toBe(MIN);
      expect(f.token.balanceOf(ALICE)).toBe(100_000n - MIN);
      expect(codeOf(() => f.registry.withdrawFromStake(ALICE, 1n))).toBe("BelowMinimumStake");
    });

    it("fails for identities that never staked", () => {
      expect(codeOf(() => f.registry.withdrawFromStake(BOB, 1n))).toBe("NotStaked");
    });
  });

  describe("migrateStake", () => {
    beforeEach(() => {
      f.registry.manageStake(ALICE, nonce("alice"), 2_000n, 0);
    });

    it("only works while paused", () => {
      expect(codeOf(() => f.registry.migrateStake(ALICE))).toBe("ExpectedPause");
    });

    it("returns the full collateral and deletes the record", () => {
      f.registry.pause(ADMIN);

      expect(f.registry.migrateStake(ALICE)).toBe(2_000n);
      expect(f.registry.stakes(ALICE)).toBeUndefined();
      expect(f.token.balanceOf(ALICE)).toBe(100_000n);
    });

    it("pause blocks staking until unpause", () => {
      f.registry.pause(ADMIN);
      expect(codeOf(() => f.registry.manageStake(BOB, nonce("bob"), MIN, 0))).toBe("EnforcedPause");
      expect(codeOf(() => f.registry.pause(ADMIN))).toBe("EnforcedPause");

      f.registry.unPause(ADMIN);
      const record = f.registry.manageStake(BOB, nonce("bob"), MIN, 0);
      expect(record.overlay).toBe(overlayAddress(BOB, 1n, nonce("bob")));
      expect(codeOf(() => f.registry.unPause(ADMIN))).toBe("ExpectedPause");
    });
  });

  describe("pause", () => {
    it("gates withdraw, freeze and slash and replays identically after unpause", () => {
      f.registry.manageStake(ALICE, nonce("alice"), 2_000n, 0);
      f.registry.pause(ADMIN);

      expect(codeOf(() => f.registry.withdrawFromStake(ALICE, 500n))).toBe("EnforcedPause");
      expect(codeOf(() => f.registry.freezeDeposit(KEEPER, ALICE, 10))).toBe("EnforcedPause");
      expect(codeOf(() => f.registry.slashDeposit(KEEPER, ALICE, 100n))).toBe("EnforcedPause");
      expect(f.registry.stakes(ALICE)).toMatchObject({ collateral: 2_000n, frozenUntil: 0 });

      f.registry.unPause(ADMIN);
      expect(f.registry.withdrawFromStake(ALICE, 500n)).toBe(500n);
      f.registry.slashDeposit(KEEPER, ALICE, 100n);
      f.registry.freezeDeposit(KEEPER, ALICE, 10);
      expect(f.registry.stakes(ALICE)).toMatchObject({ collateral: 1_400n, frozenUntil: 10 });
    });
  });

  describe("changeNetworkId", () => {
    it("affects only overlays derived afterwards", () => {
      const before = f.registry.manageStake(ALICE, nonce("alice"), MIN, 0);
      f.registry.changeNetworkId(ADMIN, 5n);
      const after = f.registry.manageStake(BOB, nonce("bob"), MIN, 0);

      expect(f.registry.overlayOfAddress(ALICE)).toBe(before.overlay);
      expect(after.overlay).toBe(overlayAddress(BOB, 5n, nonce("bob")));
      expect(f.registry.networkId()).toBe(5n);
    });

    it("is admin only", () => {
      expect(codeOf(() => f.registry.changeNetworkId(ALICE, 5n))).toBe("Unauthorized");
    });
  });
});
