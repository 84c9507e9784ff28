/**
 * Price adjustment.
 *
 * Prices are held upscaled by 2^PRICE_UPSCALE_BITS so the per-round
 * multiplicative rates (fixed point over PRICE_BASE) do not truncate to zero.
 *
 *   next = current × CHANGE_RATE[clamp(redundancy)] / PRICE_BASE
 *   then, once per skipped round: next = next × CHANGE_RATE[0] / PRICE_BASE
 *   then floored at the minimum.
 */

import {
  CHANGE_RATE,
  MAX_CONSIDERED_EXTRA_REDUNDANCY,
  PRICE_BASE,
  PRICE_UPSCALE_BITS,
  TARGET_REDUNDANCY,
} from "./constants.js";

export interface PriceAdjustmentParams {
  targetRedundancy: number;
  maxConsideredExtraRedundancy: number;
}

export const DEFAULT_PRICE_ADJUSTMENT: PriceAdjustmentParams = {
  targetRedundancy: TARGET_REDUNDANCY,
  maxConsideredExtraRedundancy: MAX_CONSIDERED_EXTRA_REDUNDANCY,
};

export function upscalePrice(price: bigint): bigint {
  return price << PRICE_UPSCALE_BITS;
}

export function downscalePrice(upscaled: bigint): bigint {
  return upscaled >> PRICE_UPSCALE_BITS;
}

/** Clamp an observed redundancy into the rate table's index range. */
export function clampRedundancy(
  redundancy: number,
  params: PriceAdjustmentParams = DEFAULT_PRICE_ADJUSTMENT,
): number {
  if (!Number.isInteger(redundancy)) {
    throw new RangeError(`redundancy must be an integer: ${redundancy}`);
  }
  const max = Math.min(
    params.targetRedundancy + params.maxConsideredExtraRedundancy,
    CHANGE_RATE.length - 1,
  );
  return Math.max(1, Math.min(redundancy, max));
}

export function changeRateFor(index: number): bigint {
  const rate = CHANGE_RATE[index];
  if (rate === undefined) {
    throw new RangeError(`no change rate for redundancy ${index}`);
  }
  return rate;
}

/**
 * Compute the next upscaled price.
 *
 * @param skippedRounds rounds since the last adjustment that saw no report
 */
export function adjustUpscaledPrice(
  currentUpscaled: bigint,
  redundancy: number,
  skippedRounds: number,
  minimumUpscaled: bigint,
  params: PriceAdjustmentParams = DEFAULT_PRICE_ADJUSTMENT,
): bigint {
  let next = (changeRateFor(clampRedundancy(redundancy, params)) * currentUpscaled) / PRICE_BASE;

  const maxIncrease = changeRateFor(0);
  for (let i = 0; i < skippedRounds; i++) {
    next = (maxIncrease * next) / PRICE_BASE;
  }

  return next < minimumUpscaled ? minimumUpscaled : next;
}
