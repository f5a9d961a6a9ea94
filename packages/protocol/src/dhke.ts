/**
 * Blind Diffie-Hellman key exchange over secp256k1.
 * DocRef: NUT-00
 *
 *   Y  = hash_to_curve(secret)
 *   B_ = Y + r·G                 (wallet blinds)
 *   C_ = k·B_                    (mint signs)
 *   C  = C_ − r·K = k·Y          (wallet unblinds)
 *   verify: k·hash_to_curve(secret) == C   (only the mint, it holds k)
 *
 * Pure functions. The wallet half (blind/unblind) is here so tests and
 * tooling can produce real proofs against the mint.
 */

import { secp256k1 } from "@noble/curves/secp256k1";
import { bytesToNumberBE } from "@noble/curves/abstract/utils";
import type { ProjPointType } from "@noble/curves/abstract/weierstrass";
import { concat, hashBytes, utf8, type PointHex } from "./hex.js";

export type Point = ProjPointType<bigint>;

const DOMAIN_SEPARATOR = utf8("Secp256k1_HashToCurve_Cashu_");
const MAX_HASH_TO_CURVE_ITERATIONS = 2 ** 16;

export const CURVE_ORDER = secp256k1.CURVE.n;
export const G: Point = secp256k1.ProjectivePoint.BASE;

/**
 * Deterministically map a secret onto the curve.
 *
 * msg = SHA256(DOMAIN_SEPARATOR || secret)
 * Y   = first valid point 02 || SHA256(msg || counter_le32)
 */
export function hashToCurve(secret: Uint8Array): Point {
  const msgHash = hashBytes(concat(DOMAIN_SEPARATOR, secret));
  const counterBytes = new Uint8Array(4);
  const view = new DataView(counterBytes.buffer);
  for (let counter = 0; counter < MAX_HASH_TO_CURVE_ITERATIONS; counter++) {
    view.setUint32(0, counter, true);
    const candidate = concat(
      new Uint8Array([0x02]),
      hashBytes(concat(msgHash, counterBytes)),
    );
    try {
      return secp256k1.ProjectivePoint.fromHex(candidate);
    } catch {
      // x is not on the curve, next counter
      continue;
    }
  }
  throw new Error("hash_to_curve: no valid point found");
}

/** Proof-state fingerprint of a secret: compressed hex of hash_to_curve(secret). */
export function fingerprint(secret: string): PointHex {
  return hashToCurve(utf8(secret)).toHex(true);
}

/** Parse a compressed/uncompressed point. Throws on invalid encoding. */
export function pointFromHex(hex: string): Point {
  const point = secp256k1.ProjectivePoint.fromHex(hex);
  point.assertValidity();
  return point;
}

/** Private key bytes → scalar in [1, n). */
export function scalarFromBytes(privateKey: Uint8Array): bigint {
  const k = bytesToNumberBE(privateKey);
  if (k <= 0n || k >= CURVE_ORDER) throw new Error("scalar out of range");
  return k;
}

/** Public key of a private key, compressed hex. */
export function publicKeyHex(privateKey: Uint8Array): PointHex {
  return G.multiply(scalarFromBytes(privateKey)).toHex(true);
}

/** Random scalar in [1, n). */
export function randomScalar(): bigint {
  return bytesToNumberBE(secp256k1.utils.randomPrivateKey());
}

// ── Mint side ──────────────────────────────────────────────────────

/** C_ = k·B_ */
export function signBlinded(B_: Point, k: bigint): Point {
  return B_.multiply(k);
}

/** k·hash_to_curve(secret) == C */
export function verifyUnblinded(secret: string, C: Point, k: bigint): boolean {
  return hashToCurve(utf8(secret)).multiply(k).equals(C);
}

// ── Wallet side (tests, tooling) ───────────────────────────────────

export interface BlindedSecret {
  B_: Point;
  r: bigint;
  secret: string;
}

/** B_ = hash_to_curve(secret) + r·G */
export function blindMessage(secret: string, r: bigint = randomScalar()): BlindedSecret {
  const Y = hashToCurve(utf8(secret));
  return { B_: Y.add(G.multiply(r)), r, secret };
}

/** C = C_ − r·K */
export function unblindSignature(C_: Point, r: bigint, K: Point): Point {
  return C_.subtract(K.multiply(r));
}
