/**
 * @stampnet/token-client — value-transfer capability.
 *
 * Components import the ValueToken interface. Tests and dev mode use
 * MemoryToken; a deployment binds the interface to the host ledger's token.
 */

export type { ValueToken, JournaledToken } from "./types.js";
export { MemoryToken } from "./memory-token.js";
