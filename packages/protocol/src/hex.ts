/**
 * Byte/hex helpers shared by the mint and its tests.
 *
 * Points travel as 33-byte compressed SEC1 hex, scalars as 32-byte hex,
 * secrets as UTF-8 strings (usually 64 hex chars, but not required).
 */

import { sha256 } from "@noble/hashes/sha256";
import { bytesToHex, hexToBytes, utf8ToBytes } from "@noble/hashes/utils";

/** Compressed secp256k1 point, hex-encoded (66 chars). */
export type PointHex = string;

const HEX_RE = /^(?:[0-9a-f]{2})*$/;

/** Convert hex string to bytes. Throws on odd length or non-hex input. */
export function fromHex(hex: string): Uint8Array {
  if (!HEX_RE.test(hex)) throw new Error("invalid hex");
  return hexToBytes(hex);
}

/** Convert bytes to lowercase hex. */
export function toHex(bytes: Uint8Array): string {
  return bytesToHex(bytes);
}

/** UTF-8 encode a string. */
export function utf8(str: string): Uint8Array {
  return utf8ToBytes(str);
}

/** SHA256 of raw bytes. */
export function hashBytes(bytes: Uint8Array): Uint8Array {
  return sha256(bytes);
}

/** SHA256 of raw bytes → hex. */
export function sha256Hex(bytes: Uint8Array): string {
  return bytesToHex(sha256(bytes));
}

/** Concatenate byte arrays. */
export function concat(...parts: Uint8Array[]): Uint8Array {
  const totalLen = parts.reduce((sum, p) => sum + p.length, 0);
  const out = new Uint8Array(totalLen);
  let offset = 0;
  for (const part of parts) {
    out.set(part, offset);
    offset += part.length;
  }
  return out;
}
