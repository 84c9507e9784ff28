/**
 * Round records — commits, reveals and the round status view.
 */

import { Type, type Static } from "@sinclair/typebox";
import { Amount, BlockHeight, Depth, Hex20, Hex32 } from "./common.js";

export const PhaseV1 = Type.Union([
  Type.Literal("commit"),
  Type.Literal("reveal"),
  Type.Literal("claim"),
]);

export const CommitV1 = Type.Object(
  {
    round: Type.Integer({ minimum: 0 }),
    overlay: Hex32,
    owner: Hex20,
    height: Depth,
    stake: Amount,
    obfuscated_hash: Hex32,
    revealed: Type.Boolean(),
  },
  { additionalProperties: false },
);

export type CommitV1 = Static<typeof CommitV1>;

export const RevealV1 = Type.Object(
  {
    round: Type.Integer({ minimum: 0 }),
    overlay: Hex32,
    owner: Hex20,
    depth: Depth,
    height: Depth,
    hash: Hex32,
    stake: Amount,
    stake_density: Amount,
  },
  { additionalProperties: false },
);

export type RevealV1 = Static<typeof RevealV1>;

export const RoundStatusV1 = Type.Object(
  {
    version: Type.Literal(1),
    block: BlockHeight,
    round: Type.Integer({ minimum: 0 }),
    phase: PhaseV1,
    /** Last round with a commit, reveal or claim; -1 before the first. */
    commit_round: Type.Integer({ minimum: -1 }),
    reveal_round: Type.Integer({ minimum: -1 }),
    claim_round: Type.Integer({ minimum: -1 }),
    anchor: Type.Union([Hex32, Type.Null()]),
    minimum_depth: Depth,
    current_price: Amount,
    paused: Type.Boolean(),
  },
  { additionalProperties: false },
);

export type RoundStatusV1 = Static<typeof RoundStatusV1>;
