/**
 * Price oracle — one scalar price, adjusted at most once per round from
 * the redundancy the redistribution game observed.
 *
 * Held upscaled by 2^10. Every change is pushed to the postage ledger; a
 * rejected push leaves the oracle's own price in place and is reported
 * in the result, the event log and a warning.
 */

import {
  adjustUpscaledPrice,
  downscalePrice,
  ensure,
  isProtocolError,
  upscalePrice,
  roundOf,
  DEFAULT_PRICE_ADJUSTMENT,
  MINIMUM_PRICE,
  type Address,
  type PriceAdjustmentParams,
} from "@stampnet/protocol";
import type { Chain } from "../chain.js";
import { LedgerComponent } from "../component.js";
import { PRICE_PUSH_FAILED_EVENT, PRICE_UPDATE_EVENT } from "../event-log/schemas.js";

/** Where the oracle pushes prices. Implemented by PostageStamp. */
export interface PriceSink {
  setPrice(sender: Address, price: bigint): void;
}

export type PushResult = { ok: true } | { ok: false; error: string };

export interface PriceUpdateResult {
  price: bigint;
  push: PushResult;
}

interface OracleState {
  currentPriceUpscaled: bigint;
  minimumPriceUpscaled: bigint;
  lastAdjustedRound: number;
  params: PriceAdjustmentParams;
}

export interface PriceOracleOptions {
  minimumPrice?: bigint;
  params?: PriceAdjustmentParams;
}

export class PriceOracle extends LedgerComponent<OracleState> {
  constructor(
    chain: Chain,
    address: Address,
    admin: Address,
    private readonly sink: PriceSink,
    options: PriceOracleOptions = {},
  ) {
    const minimum = upscalePrice(options.minimumPrice ?? MINIMUM_PRICE);
    super("price-oracle", address, chain, {
      currentPriceUpscaled: minimum,
      minimumPriceUpscaled: minimum,
      lastAdjustedRound: roundOf(chain.blockNumber()) - 1,
      params: options.params ?? DEFAULT_PRICE_ADJUSTMENT,
    }, admin);
  }

  /**
   * PRICE_UPDATER: once per round. Rounds that went by without an
   * adjustment are backfilled with the largest increase.
   */
  adjustPrice(sender: Address, redundancy: number): PriceUpdateResult {
    return this.atomic(() => {
      this.requireNotPaused();
      this.requireRole("PRICE_UPDATER", sender);

      const round = this.currentRound();
      ensure(round > this.state.lastAdjustedRound, "PriceAlreadyAdjusted", { round });
      ensure(Number.isSafeInteger(redundancy) && redundancy >= 0, "InvalidParameter", { redundancy });
      ensure(redundancy !== 0, "UnexpectedZero");

      const skippedRounds = round - this.state.lastAdjustedRound - 1;
      this.state.currentPriceUpscaled = adjustUpscaledPrice(
        this.state.currentPriceUpscaled,
        redundancy,
        skippedRounds,
        this.state.minimumPriceUpscaled,
        this.state.params,
      );
      this.state.lastAdjustedRound = round;

      this.log.info(
        { round, redundancy, skippedRounds, price: this.currentPrice().toString() },
        "price adjusted",
      );
      return this.publish(round);
    });
  }

  /** Admin override: skips the round gate, keeps the floor. */
  setPrice(sender: Address, price: bigint): PriceUpdateResult {
    return this.atomic(() => {
      this.requireRole("DEFAULT_ADMIN", sender);
      const upscaled = upscalePrice(price);
      this.state.currentPriceUpscaled =
        upscaled < this.state.minimumPriceUpscaled ? this.state.minimumPriceUpscaled : upscaled;
      return this.publish(this.currentRound());
    });
  }

  currentPrice(): bigint {
    return downscalePrice(this.state.currentPriceUpscaled);
  }

  minimumPrice(): bigint {
    return downscalePrice(this.state.minimumPriceUpscaled);
  }

  lastAdjustedRound(): number {
    return this.state.lastAdjustedRound;
  }

  currentRound(): number {
    return roundOf(this.now());
  }

  private publish(round: number): PriceUpdateResult {
    const price = this.currentPrice();
    this.emit(PRICE_UPDATE_EVENT, { price, round });
    return { price, push: this.pushToSink(price) };
  }

  private pushToSink(price: bigint): PushResult {
    try {
      this.chain.transact(() => this.sink.setPrice(this.address, price));
      return { ok: true };
    } catch (err) {
      if (!isProtocolError(err)) throw err;
      this.emit(PRICE_PUSH_FAILED_EVENT, { price, error: err.code });
      this.log.warn({ price: price.toString(), error: err.code }, "price push failed");
      return { ok: false, error: err.code };
    }
  }
}
