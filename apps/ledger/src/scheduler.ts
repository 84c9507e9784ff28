/**
 * Round boundary scheduler — postage expiry keeper.
 *
 * Checks every `checkIntervalMs` whether a new round has started. When
 * it has, expires up to `batchLimit` batches so the pot stays current
 * without any single call walking the whole index.
 */

import { roundOf } from "@stampnet/protocol";
import type { BlockClock } from "./clock.js";
import { createLogger, type Logger } from "./logger.js";
import type { ExpiryResult, PostageStamp } from "./views/postage-stamp.js";

export interface RoundTickResult extends ExpiryResult {
  round: number;
}

export interface SchedulerOptions {
  /** How often to check for a round boundary (ms). Default: 5_000. */
  checkIntervalMs?: number;
  /** Batches to expire per round. Default: 50. */
  batchLimit?: number;
  /** Callback after each keeper run. */
  onTick?: (result: RoundTickResult) => void;
  /** Callback for errors. Defaults to logging them at error level. */
  onError?: (error: unknown) => void;
  /** Defaults to a root logger at info level. */
  logger?: Logger;
}

export interface RoundScheduler {
  start(): void;
  stop(): void;
  /** Last round the keeper ran in (-1 before the first run). */
  lastRound(): number;
  /** Manually trigger a check (useful for testing). */
  tick(): RoundTickResult | null;
}

const DEFAULT_CHECK_INTERVAL_MS = 5_000;
const DEFAULT_BATCH_LIMIT = 50;

export function createRoundScheduler(
  clock: BlockClock,
  postage: PostageStamp,
  options: SchedulerOptions = {},
): RoundScheduler {
  const checkIntervalMs = options.checkIntervalMs ?? DEFAULT_CHECK_INTERVAL_MS;
  const batchLimit = options.batchLimit ?? DEFAULT_BATCH_LIMIT;
  const onTick = options.onTick;
  const logger = options.logger ?? createLogger("info");
  const onError =
    options.onError ?? ((err: unknown) => logger.error({ err }, "round scheduler error"));

  let timer: ReturnType<typeof setInterval> | null = null;
  let _lastRound = -1;

  function tick(): RoundTickResult | null {
    const round = roundOf(clock.blockNumber());
    if (round <= _lastRound) return null;

    try {
      const result = { round, ...postage.expireLimited(batchLimit) };
      _lastRound = round;
      if (onTick) onTick(result);
      return result;
    } catch (err) {
      onError(err);
      return null;
    }
  }

  return {
    start() {
      if (timer) return;
      timer = setInterval(tick, checkIntervalMs);
      tick();
    },

    stop() {
      if (timer) {
        clearInterval(timer);
        timer = null;
      }
    },

    lastRound() {
      return _lastRound;
    },

    tick,
  };
}
