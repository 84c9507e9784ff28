/**
 * Chain — the execution environment every component runs on.
 *
 * Owns the block clock, the value token, the event log and the root
 * logger. Every state-mutating call runs inside `transact()`: all
 * registered journals are checkpointed first and restored, newest first,
 * if the call throws. Nested calls act as savepoints.
 */

import type { JournaledToken } from "@stampnet/token-client";
import type { BlockClock } from "./clock.js";
import { EventLog } from "./event-log/writer.js";
import type { Logger } from "./logger.js";
import { silentLogger } from "./logger.js";

/** Anything whose state can be saved and later put back. */
export interface Journal {
  checkpoint(): () => void;
}

export interface ChainOptions {
  clock: BlockClock;
  token: JournaledToken;
  logger?: Logger;
  events?: EventLog;
}

export class Chain {
  readonly clock: BlockClock;
  readonly token: JournaledToken;
  readonly events: EventLog;
  readonly logger: Logger;
  private readonly journals: Journal[] = [];

  constructor(options: ChainOptions) {
    this.clock = options.clock;
    this.token = options.token;
    this.events = options.events ?? new EventLog();
    this.logger = options.logger ?? silentLogger();
    this.journals.push(this.token, this.events);
  }

  register(journal: Journal): void {
    this.journals.push(journal);
  }

  blockNumber(): number {
    return this.clock.blockNumber();
  }

  transact<T>(fn: () => T): T {
    const restores = this.journals.map((journal) => journal.checkpoint());
    try {
      return fn();
    } catch (err) {
      for (const restore of restores.reverse()) restore();
      throw err;
    }
  }
}
