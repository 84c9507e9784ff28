/**
 * In-memory token for tests, simulation and dev mode.
 *
 * Balances and allowances live in maps. Transfers that would overdraw
 * return false instead of throwing, the way token contracts report it.
 */

import type { Address } from "@stampnet/protocol";
import type { JournaledToken } from "./types.js";

interface TokenState {
  balances: Map<Address, bigint>;
  allowances: Map<string, bigint>;
  totalSupply: bigint;
}

function allowanceKey(owner: Address, spender: Address): string {
  return `${owner}:${spender}`;
}

export class MemoryToken implements JournaledToken {
  private state: TokenState = {
    balances: new Map(),
    allowances: new Map(),
    totalSupply: 0n,
  };

  balanceOf(account: Address): bigint {
    return this.state.balances.get(account) ?? 0n;
  }

  totalSupply(): bigint {
    return this.state.totalSupply;
  }

  allowance(owner: Address, spender: Address): bigint {
    return this.state.allowances.get(allowanceKey(owner, spender)) ?? 0n;
  }

  approve(owner: Address, spender: Address, amount: bigint): boolean {
    if (amount < 0n) return false;
    this.state.allowances.set(allowanceKey(owner, spender), amount);
    return true;
  }

  transfer(from: Address, to: Address, amount: bigint): boolean {
    if (amount < 0n) return false;
    const fromBalance = this.balanceOf(from);
    if (fromBalance < amount) return false;
    this.state.balances.set(from, fromBalance - amount);
    this.state.balances.set(to, this.balanceOf(to) + amount);
    return true;
  }

  transferFrom(spender: Address, from: Address, to: Address, amount: bigint): boolean {
    if (spender !== from) {
      const allowed = this.allowance(from, spender);
      if (allowed < amount) return false;
      if (this.balanceOf(from) < amount) return false;
      this.state.allowances.set(allowanceKey(from, spender), allowed - amount);
    }
    return this.transfer(from, to, amount);
  }

  /** Test helper: create tokens out of thin air. */
  mint(to: Address, amount: bigint): void {
    if (amount < 0n) {
      throw new RangeError("MemoryToken: cannot mint a negative amount");
    }
    this.state.balances.set(to, this.balanceOf(to) + amount);
    this.state.totalSupply += amount;
  }

  checkpoint(): () => void {
    const saved = structuredClone(this.state);
    return () => {
      this.state = saved;
    };
  }
}
