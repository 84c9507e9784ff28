/**
 * Schema barrel export.
 * All V1 wire types used across the ledger.
 */

export { Hex32, Hex20, Amount, Depth, BlockHeight } from "./common.js";
export { StakeV1 } from "./stake.js";
export { BatchV1, PostageStatusV1 } from "./batch.js";
export { PhaseV1, CommitV1, RevealV1, RoundStatusV1 } from "./round.js";
