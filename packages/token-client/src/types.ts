/**
 * Value-transfer capability — the fungible token every component moves
 * collateral, postage and payouts through.
 *
 * The ledger only ever talks to this interface. Transfers report success
 * as a boolean; callers must check it.
 */

import type { Address } from "@stampnet/protocol";

export interface ValueToken {
  /** Move `amount` from `from` to `to`, spending `spender`'s allowance unless spender === from. */
  transferFrom(spender: Address, from: Address, to: Address, amount: bigint): boolean;
  /** Move `amount` held by `from` to `to`. */
  transfer(from: Address, to: Address, amount: bigint): boolean;
  balanceOf(account: Address): bigint;
}

/**
 * A token whose state the surrounding transaction can roll back.
 * `checkpoint()` captures the current state and returns the thunk that restores it.
 */
export interface JournaledToken extends ValueToken {
  checkpoint(): () => void;
}
