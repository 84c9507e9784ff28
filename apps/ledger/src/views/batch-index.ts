/**
 * Expiry index: batches ordered by normalised balance (ties by id).
 * The first entry is always the batch that expires soonest.
 */

import type { Hash32 } from "@stampnet/protocol";

export interface IndexEntry {
  balance: bigint;
  id: Hash32;
}

function compare(a: IndexEntry, b: IndexEntry): number {
  if (a.balance !== b.balance) return a.balance < b.balance ? -1 : 1;
  if (a.id === b.id) return 0;
  return a.id < b.id ? -1 : 1;
}

/** First position whose entry is not below `entry`. */
function lowerBound(index: readonly IndexEntry[], entry: IndexEntry): number {
  let lo = 0;
  let hi = index.length;
  while (lo < hi) {
    const mid = (lo + hi) >>> 1;
    const probe = index[mid];
    if (probe !== undefined && compare(probe, entry) < 0) {
      lo = mid + 1;
    } else {
      hi = mid;
    }
  }
  return lo;
}

export function insertEntry(index: IndexEntry[], entry: IndexEntry): void {
  index.splice(lowerBound(index, entry), 0, { ...entry });
}

/** @returns false when the entry was not present */
export function removeEntry(index: IndexEntry[], entry: IndexEntry): boolean {
  const at = lowerBound(index, entry);
  const found = index[at];
  if (found === undefined || compare(found, entry) !== 0) return false;
  index.splice(at, 1);
  return true;
}

export function firstEntry(index: readonly IndexEntry[]): IndexEntry | undefined {
  return index[0];
}
