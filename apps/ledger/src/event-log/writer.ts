/**
 * Event log writer — in-process append-only store.
 *
 * Components append through the chain; the log is journaled like any
 * other state, so events from a reverted call disappear with it.
 */

import type { Address } from "@stampnet/protocol";
import type { EventPayloads, EventType, LedgerEvent } from "./schemas.js";

export class EventLog {
  private entries: LedgerEvent[] = [];

  append<K extends EventType>(
    type: K,
    emitter: Address,
    block: number,
    payload: EventPayloads[K],
  ): LedgerEvent<K> {
    const event: LedgerEvent<K> = {
      seq: this.entries.length,
      type,
      block,
      emitter,
      payload,
    };
    this.entries.push(event);
    return event;
  }

  getEvents(fromSeq: number = 0): LedgerEvent[] {
    return this.entries.slice(Math.max(0, fromSeq));
  }

  getEventsByType<K extends EventType>(type: K): LedgerEvent<K>[] {
    return this.entries.filter((e): e is LedgerEvent<K> => e.type === type);
  }

  /** Most recent event of a type, if any. */
  last<K extends EventType>(type: K): LedgerEvent<K> | undefined {
    const matching = this.getEventsByType(type);
    return matching[matching.length - 1];
  }

  count(): number {
    return this.entries.length;
  }

  checkpoint(): () => void {
    const length = this.entries.length;
    return () => {
      this.entries = this.entries.slice(0, length);
    };
  }
}
