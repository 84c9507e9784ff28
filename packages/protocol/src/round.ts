/**
 * Round geometry.
 *
 * A round is ROUND_LENGTH blocks: commit in the first quarter,
 * reveal in the second, claim in the remaining half.
 * Everything here is a pure function of block height.
 */

import { ROUND_LENGTH } from "./constants.js";

export type Phase = "commit" | "reveal" | "claim";

export function roundOf(blockHeight: number, roundLength: number = ROUND_LENGTH): number {
  return Math.floor(blockHeight / roundLength);
}

export function roundOffset(blockHeight: number, roundLength: number = ROUND_LENGTH): number {
  return blockHeight % roundLength;
}

export function phaseOf(blockHeight: number, roundLength: number = ROUND_LENGTH): Phase {
  const offset = roundOffset(blockHeight, roundLength);
  const quarter = roundLength / 4;
  if (offset < quarter) return "commit";
  if (offset < 2 * quarter) return "reveal";
  return "claim";
}

/** True on the last block of the commit or reveal quarter. */
export function isPhaseLastBlock(
  blockHeight: number,
  roundLength: number = ROUND_LENGTH,
): boolean {
  const quarter = roundLength / 4;
  const offset = roundOffset(blockHeight, roundLength);
  return offset < 2 * quarter && offset % quarter === quarter - 1;
}

export function roundStartBlock(round: number, roundLength: number = ROUND_LENGTH): number {
  return round * roundLength;
}

/** First block of the given phase in the given round. */
export function phaseStartBlock(
  round: number,
  phase: Phase,
  roundLength: number = ROUND_LENGTH,
): number {
  const start = roundStartBlock(round, roundLength);
  switch (phase) {
    case "commit":
      return start;
    case "reveal":
      return start + roundLength / 4;
    case "claim":
      return start + roundLength / 2;
  }
}
