/**
 * StakeV1 — operator collateral record.
 */

import { Type, type Static } from "@sinclair/typebox";
import { Amount, BlockHeight, Depth, Hex20, Hex32 } from "./common.js";

export const StakeV1 = Type.Object(
  {
    version: Type.Literal(1),
    owner: Hex20,
    overlay: Hex32,
    collateral: Amount,
    height: Depth,
    last_update_block: BlockHeight,
    frozen_until: BlockHeight,
    effective_stake: Amount,
  },
  { additionalProperties: false },
);

export type StakeV1 = Static<typeof StakeV1>;
