/**
 * Test vectors — per-round price adjustment.
 * Minimum price 24000, upscaled by 2^10 → 24_576_000.
 */

import { describe, it, expect } from "vitest";
import {
  adjustUpscaledPrice,
  clampRedundancy,
  upscalePrice,
  downscalePrice,
} from "../../src/price.js";

const MIN_UP = upscalePrice(24_000n);

describe("clampRedundancy", () => {
  it("clamps into [1, target + maxExtra]", () => {
    expect(clampRedundancy(0)).toBe(1);
    expect(clampRedundancy(3)).toBe(3);
    expect(clampRedundancy(8)).toBe(8);
    expect(clampRedundancy(50)).toBe(8);
  });

  it("rejects fractional redundancy", () => {
    expect(() => clampRedundancy(2.5)).toThrow(RangeError);
  });
});

describe("adjustUpscaledPrice", () => {
  it("at target redundancy the price is unchanged", () => {
    expect(adjustUpscaledPrice(MIN_UP, 4, 0, MIN_UP)).toBe(24_576_000n);
  });

  it("low redundancy raises the price", () => {
    // 1049206 × 24576000 / 1048576
    expect(adjustUpscaledPrice(MIN_UP, 1, 0, MIN_UP)).toBe(24_590_765n);
  });

  it("high redundancy lowers the price but never below the floor", () => {
    expect(adjustUpscaledPrice(MIN_UP, 8, 0, MIN_UP)).toBe(MIN_UP);
  });

  it("high redundancy above the floor", () => {
    const start = upscalePrice(100_000n);
    const next = adjustUpscaledPrice(start, 8, 0, MIN_UP);
    expect(next).toBe(102_317_968n);
    expect(downscalePrice(next)).toBe(99_919n);
  });

  it("skipped rounds apply the maximum increase once each", () => {
    // target rate (×1), then two rounds at 1049417 / 1048576
    expect(adjustUpscaledPrice(MIN_UP, 4, 2, MIN_UP)).toBe(24_615_436n);
  });

  it("redundancy beyond the table is clamped", () => {
    expect(adjustUpscaledPrice(MIN_UP, 200, 0, MIN_UP)).toBe(
      adjustUpscaledPrice(MIN_UP, 8, 0, MIN_UP),
    );
  });
});
