/**
 * Shared wire primitives. Amounts travel as decimal strings.
 */

import { Type } from "@sinclair/typebox";

export const Hex32 = Type.String({ pattern: "^[0-9a-f]{64}$" });
export const Hex20 = Type.String({ pattern: "^[0-9a-f]{40}$" });
export const Amount = Type.String({ pattern: "^[0-9]+$" });
export const Depth = Type.Integer({ minimum: 0, maximum: 255 });
export const BlockHeight = Type.Integer({ minimum: 0 });
