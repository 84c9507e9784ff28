/**
 * Stake registry — operator collateral, overlay derivation, freeze/slash.
 *
 * Keyed by operator identity. The overlay is derived once, on the first
 * stake, from (identity, networkId, nonce); later top-ups keep it.
 * Freeze and slash belong to the REDISTRIBUTOR role.
 */

import {
  ensure,
  MIN_STAKE,
  DEFAULT_NETWORK_ID,
  overlayAddress,
  type Address,
  type Hash32,
} from "@stampnet/protocol";
import type { Chain } from "../chain.js";
import { LedgerComponent } from "../component.js";
import {
  NETWORK_ID_CHANGED_EVENT,
  STAKE_FROZEN_EVENT,
  STAKE_SLASHED_EVENT,
  STAKE_UPDATED_EVENT,
  STAKE_WITHDRAWN_EVENT,
} from "../event-log/schemas.js";

export interface StakeRecord {
  owner: Address;
  overlay: Hash32;
  collateral: bigint;
  /** Declared storage height; the minimum stake doubles per unit. */
  height: number;
  lastUpdateHeight: number;
  /** Frozen while the current block is below this height. */
  frozenUntil: number;
}

interface StakeState {
  stakes: Map<Address, StakeRecord>;
  networkId: bigint;
  minimumStake: bigint;
}

export interface StakeRegistryOptions {
  networkId?: bigint;
  minimumStake?: bigint;
}

export class StakeRegistry extends LedgerComponent<StakeState> {
  constructor(chain: Chain, address: Address, admin: Address, options: StakeRegistryOptions = {}) {
    super("stake-registry", address, chain, {
      stakes: new Map(),
      networkId: options.networkId ?? DEFAULT_NETWORK_ID,
      minimumStake: options.minimumStake ?? MIN_STAKE,
    }, admin);
  }

  // ── Operator entry points ──────────────────────────────────────

  /**
   * Create or top up the caller's stake. `amount` is pulled from the
   * caller; the cumulative collateral must cover `minimumStake × 2^height`.
   */
  manageStake(sender: Address, nonce: Hash32, amount: bigint, height: number): StakeRecord {
    return this.atomic(() => {
      this.requireNotPaused();
      ensure(Number.isInteger(height) && height >= 0 && height <= 255, "InvalidDepth", { height });
      ensure(amount >= 0n, "TransferFailed", { amount });

      const existing = this.state.stakes.get(sender);
      if (existing) {
        ensure(!this.frozen(existing), "Frozen", { owner: sender, frozenUntil: existing.frozenUntil });
      }

      const collateral = (existing?.collateral ?? 0n) + amount;
      const required = this.minimumStakeFor(height);
      ensure(collateral >= required, "BelowMinimumStake", { collateral, required });

      this.pull(sender, amount);

      const record: StakeRecord = {
        owner: sender,
        overlay: existing?.overlay ?? overlayAddress(sender, this.state.networkId, nonce),
        collateral,
        height,
        lastUpdateHeight: this.now(),
        frozenUntil: existing?.frozenUntil ?? 0,
      };
      this.state.stakes.set(sender, record);

      this.emit(STAKE_UPDATED_EVENT, {
        owner: sender,
        overlay: record.overlay,
        collateral,
        height,
        lastUpdateHeight: record.lastUpdateHeight,
      });
      this.log.info({ owner: sender, overlay: record.overlay, collateral: collateral.toString() }, "stake updated");
      return { ...record };
    });
  }

  /** Withdraw collateral above the minimum for the declared height. */
  withdrawFromStake(sender: Address, amount: bigint): bigint {
    return this.atomic(() => {
      this.requireNotPaused();
      const record = this.state.stakes.get(sender);
      ensure(record !== undefined, "NotStaked", { owner: sender });
      ensure(!this.frozen(record), "Frozen", { owner: sender, frozenUntil: record.frozenUntil });
      ensure(amount > 0n, "UnexpectedZero", { amount });

      const remainder = record.collateral - amount;
      const required = this.minimumStakeFor(record.height);
      ensure(remainder >= required, "BelowMinimumStake", { remainder, required });

      record.collateral = remainder;
      this.push(sender, amount);
      this.emit(STAKE_WITHDRAWN_EVENT, { owner: sender, amount });
      return amount;
    });
  }

  /** Emergency exit: only while paused. Returns the full collateral. */
  migrateStake(sender: Address): bigint {
    return this.atomic(() => {
      this.requireIsPaused();
      const record = this.state.stakes.get(sender);
      ensure(record !== undefined, "NotStaked", { owner: sender });

      this.state.stakes.delete(sender);
      this.push(sender, record.collateral);
      this.emit(STAKE_WITHDRAWN_EVENT, { owner: sender, amount: record.collateral });
      this.log.warn({ owner: sender }, "stake migrated");
      return record.collateral;
    });
  }

  // ── Redistributor capability ───────────────────────────────────

  freezeDeposit(sender: Address, owner: Address, blocks: number): void {
    this.atomic(() => {
      this.requireNotPaused();
      this.requireRole("REDISTRIBUTOR", sender);
      const record = this.state.stakes.get(owner);
      if (!record) return;

      record.frozenUntil = this.now() + blocks;
      this.emit(STAKE_FROZEN_EVENT, { owner, overlay: record.overlay, frozenUntil: record.frozenUntil });
      this.log.info({ owner, frozenUntil: record.frozenUntil }, "stake frozen");
    });
  }

  /** Reduce collateral by `amount`; a stake reduced to nothing is deleted. */
  slashDeposit(sender: Address, owner: Address, amount: bigint): void {
    this.atomic(() => {
      this.requireNotPaused();
      this.requireRole("REDISTRIBUTOR", sender);
      const record = this.state.stakes.get(owner);
      if (!record) return;

      if (record.collateral > amount) {
        record.collateral -= amount;
        record.lastUpdateHeight = this.now();
      } else {
        this.state.stakes.delete(owner);
      }
      this.emit(STAKE_SLASHED_EVENT, { owner, overlay: record.overlay, amount });
      this.log.warn({ owner, amount: amount.toString() }, "stake slashed");
    });
  }

  // ── Admin ──────────────────────────────────────────────────────

  /** Only affects overlays derived after the change. */
  changeNetworkId(sender: Address, networkId: bigint): void {
    this.atomic(() => {
      this.requireRole("DEFAULT_ADMIN", sender);
      this.state.networkId = networkId;
      this.emit(NETWORK_ID_CHANGED_EVENT, { networkId });
    });
  }

  // ── Reads ──────────────────────────────────────────────────────

  stakes(owner: Address): StakeRecord | undefined {
    const record = this.state.stakes.get(owner);
    return record ? { ...record } : undefined;
  }

  /** 0 when frozen or never staked. */
  nodeEffectiveStake(owner: Address): bigint {
    const record = this.state.stakes.get(owner);
    if (!record || this.frozen(record)) return 0n;
    return record.collateral;
  }

  overlayOfAddress(owner: Address): Hash32 | undefined {
    return this.state.stakes.get(owner)?.overlay;
  }

  heightOfAddress(owner: Address): number | undefined {
    return this.state.stakes.get(owner)?.height;
  }

  lastUpdatedBlockNumberOfAddress(owner: Address): number | undefined {
    return this.state.stakes.get(owner)?.lastUpdateHeight;
  }

  frozenUntilOf(owner: Address): number | undefined {
    return this.state.stakes.get(owner)?.frozenUntil;
  }

  networkId(): bigint {
    return this.state.networkId;
  }

  minimumStakeFor(height: number): bigint {
    return this.state.minimumStake << BigInt(height);
  }

  private frozen(record: StakeRecord): boolean {
    return this.now() < record.frozenUntil;
  }
}
