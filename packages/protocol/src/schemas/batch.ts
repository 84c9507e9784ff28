/**
 * BatchV1 — prepaid postage batch.
 */

import { Type, type Static } from "@sinclair/typebox";
import { Amount, BlockHeight, Depth, Hex20, Hex32 } from "./common.js";

export const BatchV1 = Type.Object(
  {
    version: Type.Literal(1),
    id: Hex32,
    owner: Hex20,
    depth: Depth,
    bucket_depth: Depth,
    immutable: Type.Boolean(),
    normalised_balance: Amount,
    remaining_balance: Amount,
    last_update_block: BlockHeight,
  },
  { additionalProperties: false },
);

export type BatchV1 = Static<typeof BatchV1>;

export const PostageStatusV1 = Type.Object(
  {
    version: Type.Literal(1),
    last_price: Amount,
    total_out_payment: Amount,
    valid_chunk_count: Amount,
    pot: Amount,
    batch_count: Type.Integer({ minimum: 0 }),
    paused: Type.Boolean(),
  },
  { additionalProperties: false },
);

export type PostageStatusV1 = Static<typeof PostageStatusV1>;
