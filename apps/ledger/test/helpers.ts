/**
 * Shared fixtures: a deployed ledger on a manual clock with an
 * in-memory token.
 */

import { isProtocolError, keccakHex, type Address, type Hash32 } from "@stampnet/protocol";
import { MemoryToken } from "@stampnet/token-client";
import { Chain } from "../src/chain.js";
import { ManualClock } from "../src/clock.js";
import { deploy, type DeployOptions, type Deployment } from "../src/deploy.js";
import { deterministicEntropy } from "../src/entropy.js";

export const ADMIN = "ad".repeat(20);
export const ALICE = "a1".repeat(20);
export const BOB = "b0".repeat(20);
export const CAROL = "c0".repeat(20);
export const DAVE = "d0".repeat(20);
export const KEEPER = "ee".repeat(20);

export const ENTROPY_BASE = "11".repeat(32);

export interface Fixture extends Deployment {
  clock: ManualClock;
  token: MemoryToken;
  /** Mint `amount` to `account` and approve every component to pull it. */
  fund(account: Address, amount: bigint): void;
}

export function setup(options: Omit<DeployOptions, "admin"> = {}): Fixture {
  const clock = new ManualClock(0);
  const token = new MemoryToken();
  const chain = new Chain({ clock, token });
  const deployment = deploy(chain, {
    admin: ADMIN,
    entropy: deterministicEntropy(ENTROPY_BASE),
    ...options,
  });

  const fund = (account: Address, amount: bigint): void => {
    token.mint(account, amount);
    for (const component of [deployment.registry, deployment.postage, deployment.oracle, deployment.game]) {
      token.approve(account, component.address, token.allowance(account, component.address) + amount);
    }
  };

  return { ...deployment, clock, token, fund };
}

/** Deterministic 32-byte nonce for test data. */
export function nonce(label: string): Hash32 {
  return keccakHex(new TextEncoder().encode(label));
}

/** Run `fn` and return the protocol error code it failed with, if any. */
export function codeOf(fn: () => unknown): string | undefined {
  try {
    fn();
  } catch (err) {
    if (isProtocolError(err)) return err.code;
    throw err;
  }
  return undefined;
}
