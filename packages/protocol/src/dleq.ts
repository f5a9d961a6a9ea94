/**
 * Discrete-log equality proofs for blind signatures.
 * DocRef: NUT-12
 *
 * Proves C_ = k·B_ was made with the same k as the published K = k·G,
 * without revealing k:
 *
 *   R1 = r·G, R2 = r·B_
 *   e  = SHA256(R1 || R2 || K || C_)   (uncompressed hex, concatenated)
 *   s  = r + e·k  (mod n)
 *
 * Verification recomputes R1 = s·G − e·K and R2 = s·B_ − e·C_.
 */

import { numberToBytesBE, bytesToNumberBE } from "@noble/curves/abstract/utils";
import { CURVE_ORDER, G, randomScalar, type Point } from "./dhke.js";
import { fromHex, hashBytes, toHex, utf8 } from "./hex.js";

export interface DleqProof {
  /** Challenge, 32 bytes hex. */
  e: string;
  /** Response, 32 bytes hex. */
  s: string;
}

function modN(x: bigint): bigint {
  const r = x % CURVE_ORDER;
  return r >= 0n ? r : r + CURVE_ORDER;
}

export function hashE(points: Point[]): Uint8Array {
  return hashBytes(utf8(points.map((p) => p.toHex(false)).join("")));
}

export function createDleq(B_: Point, C_: Point, k: bigint, nonce: bigint = randomScalar()): DleqProof {
  const R1 = G.multiply(nonce);
  const R2 = B_.multiply(nonce);
  const K = G.multiply(k);
  const e = hashE([R1, R2, K, C_]);
  const s = modN(nonce + modN(bytesToNumberBE(e)) * k);
  return { e: toHex(e), s: toHex(numberToBytesBE(s, 32)) };
}

/** Wallet-side check of a mint's DLEQ proof. */
export function verifyDleq(proof: DleqProof, K: Point, B_: Point, C_: Point): boolean {
  const e = modN(bytesToNumberBE(fromHex(proof.e)));
  const s = modN(bytesToNumberBE(fromHex(proof.s)));
  if (e === 0n || s === 0n) return false;
  const R1 = G.multiply(s).subtract(K.multiply(e));
  const R2 = B_.multiply(s).subtract(C_.multiply(e));
  return toHex(hashE([R1, R2, K, C_])) === proof.e;
}
