/**
 * Hashing and byte packing.
 *
 * All protocol identifiers are keccak-256 over tightly packed fields,
 * represented as lowercase hex strings without prefix.
 */

import { keccak_256 } from "@noble/hashes/sha3";
import { bytesToHex, hexToBytes } from "@noble/hashes/utils";
import { ADDRESS_BYTES, HASH_BYTES } from "./constants.js";

/** 20-byte hex identity (operator, component, token holder). */
export type Address = string;

/** 32-byte hex hash (overlay, batch id, commitment, seed). */
export type Hash32 = string;

const ADDRESS_RE = /^[0-9a-f]{40}$/;
const HASH_RE = /^[0-9a-f]{64}$/;

export function isAddress(value: string): value is Address {
  return ADDRESS_RE.test(value);
}

export function isHash32(value: string): value is Hash32 {
  return HASH_RE.test(value);
}

/** Convert hex string to bytes. */
export function fromHex(hex: string): Uint8Array {
  return hexToBytes(hex);
}

/** Convert bytes to hex string. */
export function toHex(bytes: Uint8Array): string {
  return bytesToHex(bytes);
}

/** keccak-256 of raw bytes → hex. */
export function keccakHex(bytes: Uint8Array): Hash32 {
  return bytesToHex(keccak_256(bytes));
}

// ── Packing ────────────────────────────────────────────────────────

export function concatParts(parts: readonly Uint8Array[]): Uint8Array {
  const totalLen = parts.reduce((sum, p) => sum + p.length, 0);
  const result = new Uint8Array(totalLen);
  let offset = 0;
  for (const part of parts) {
    result.set(part, offset);
    offset += part.length;
  }
  return result;
}

export function uint8(n: number): Uint8Array {
  if (!Number.isInteger(n) || n < 0 || n > 255) {
    throw new RangeError(`uint8 out of range: ${n}`);
  }
  return Uint8Array.of(n);
}

export function uint64LE(n: bigint): Uint8Array {
  const buf = new Uint8Array(8);
  new DataView(buf.buffer).setBigUint64(0, n, true);
  return buf;
}

/** Big-endian 32-byte word, the packing of a uint256. */
export function uint256(n: bigint): Uint8Array {
  if (n < 0n || n >= 1n << 256n) {
    throw new RangeError(`uint256 out of range: ${n}`);
  }
  return fromHex(n.toString(16).padStart(HASH_BYTES * 2, "0"));
}

export function addressBytes(address: Address): Uint8Array {
  if (!isAddress(address)) {
    throw new TypeError(`invalid address: ${address}`);
  }
  const bytes = fromHex(address);
  if (bytes.length !== ADDRESS_BYTES) {
    throw new TypeError(`invalid address length: ${address}`);
  }
  return bytes;
}

export function hashBytes(hash: Hash32): Uint8Array {
  if (!isHash32(hash)) {
    throw new TypeError(`invalid 32-byte hash: ${hash}`);
  }
  return fromHex(hash);
}

/** Interpret a 32-byte hex hash as an unsigned 256-bit integer. */
export function hashToBigInt(hash: Hash32): bigint {
  return BigInt("0x" + hash);
}
