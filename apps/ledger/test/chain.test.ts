/**
 * Chain.transact — journaled rollback across token, events and components.
 */

import { describe, it, expect } from "vitest";
import { MemoryToken } from "@stampnet/token-client";
import { Chain, type Journal } from "../src/chain.js";
import { ManualClock } from "../src/clock.js";
import { PAUSED_EVENT } from "../src/event-log/schemas.js";
import { ALICE, BOB } from "./helpers.js";

class Counter implements Journal {
  value = 0;

  checkpoint(): () => void {
    const saved = this.value;
    return () => {
      this.value = saved;
    };
  }
}

function makeChain() {
  const token = new MemoryToken();
  const chain = new Chain({ clock: new ManualClock(0), token });
  const counter = new Counter();
  chain.register(counter);
  return { chain, token, counter };
}

describe("Chain.transact", () => {
  it("keeps every change when the call returns", () => {
    const { chain, token, counter } = makeChain();

    const result = chain.transact(() => {
      token.mint(ALICE, 100n);
      chain.events.append(PAUSED_EVENT, ALICE, 0, { sender: ALICE });
      counter.value = 7;
      return "done";
    });

    expect(result).toBe("done");
    expect(token.balanceOf(ALICE)).toBe(100n);
    expect(chain.events.count()).toBe(1);
    expect(counter.value).toBe(7);
  });

  it("restores every journal and rethrows when the call throws", () => {
    const { chain, token, counter } = makeChain();
    token.mint(ALICE, 50n);

    expect(() =>
      chain.transact(() => {
        token.transfer(ALICE, BOB, 50n);
        chain.events.append(PAUSED_EVENT, ALICE, 0, { sender: ALICE });
        counter.value = 3;
        throw new Error("boom");
      }),
    ).toThrow("boom");

    expect(token.balanceOf(ALICE)).toBe(50n);
    expect(token.balanceOf(BOB)).toBe(0n);
    expect(chain.events.count()).toBe(0);
    expect(counter.value).toBe(0);
  });

  it("treats a nested call as a savepoint", () => {
    const { chain, token, counter } = makeChain();

    chain.transact(() => {
      counter.value = 1;
      token.mint(ALICE, 10n);
      try {
        chain.transact(() => {
          counter.value = 2;
          token.mint(ALICE, 90n);
          throw new Error("inner");
        });
      } catch (err) {
        expect(err).toBeInstanceOf(Error);
      }
    });

    expect(counter.value).toBe(1);
    expect(token.balanceOf(ALICE)).toBe(10n);
  });

  it("reads the block number from its clock", () => {
    const clock = new ManualClock(5);
    const chain = new Chain({ clock, token: new MemoryToken() });
    clock.mine(3);
    expect(chain.blockNumber()).toBe(8);
  });
});
