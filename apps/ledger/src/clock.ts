/**
 * Block clocks. The ledger never reads wall time directly; it asks a
 * BlockClock for the current height.
 */

export interface BlockClock {
  blockNumber(): number;
}

/** Height advanced by hand. Used by tests and simulations. */
export class ManualClock implements BlockClock {
  private height: number;

  constructor(start = 0) {
    this.height = start;
  }

  blockNumber(): number {
    return this.height;
  }

  /** Advance by `blocks` (default 1). */
  mine(blocks = 1): number {
    if (!Number.isInteger(blocks) || blocks < 0) {
      throw new RangeError(`ManualClock: cannot mine ${blocks} blocks`);
    }
    this.height += blocks;
    return this.height;
  }

  /** Jump forward to an absolute height. */
  advanceTo(height: number): number {
    if (height < this.height) {
      throw new RangeError(`ManualClock: cannot go back from ${this.height} to ${height}`);
    }
    this.height = height;
    return this.height;
  }
}

/** Height derived from wall time: floor((now − genesis) / blockTimeMs). */
export class WallClock implements BlockClock {
  constructor(
    private readonly genesisMs: number,
    private readonly blockTimeMs: number,
    private readonly now: () => number = Date.now,
  ) {
    if (blockTimeMs <= 0) {
      throw new RangeError("WallClock: blockTimeMs must be positive");
    }
  }

  blockNumber(): number {
    const elapsed = this.now() - this.genesisMs;
    if (elapsed < 0) return 0;
    return Math.floor(elapsed / this.blockTimeMs);
  }
}
