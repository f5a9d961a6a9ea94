/**
 * Deterministic keyset derivation.
 * DocRef: NUT-01, NUT-02
 *
 * keyset(seed, unit, counter) is a pure function:
 *   parent   = BIP32(seed) / 0' / unitIndex' / counter'
 *   k_{2^i}  = parent / i'               for i in [0, maxOrder)
 *   id       = "00" || hex(SHA256(K_1 || K_2 || … || K_max))[0..14]
 *
 * Only the seed is secret material; any instance holding it re-derives
 * identical keys and IDs.
 */

import { HDKey } from "@scure/bip32";
import { concat, fromHex, hashBytes, sha256Hex, utf8, type PointHex } from "./hex.js";
import { publicKeyHex } from "./dhke.js";
import { KEYSET_ID_VERSION, MAX_KEYSET_ORDER } from "./constants.js";

const HARDENED = 0x80000000;

export interface DerivedKey {
  amount: number;
  privateKey: Uint8Array;
  publicKey: PointHex;
}

export interface DerivedKeyset {
  id: string;
  unit: string;
  counter: number;
  maxOrder: number;
  /** Ascending by amount. */
  keys: DerivedKey[];
}

/** amount → compressed public key hex, as published by /v1/keys. */
export type PublicKeys = Record<string, PointHex>;

const WELL_KNOWN_UNITS: Record<string, number> = {
  sat: 0,
  msat: 1,
  usd: 2,
  eur: 3,
};

/** BIP32 path component for a currency unit. */
export function unitIndex(unit: string): number {
  const known = WELL_KNOWN_UNITS[unit];
  if (known !== undefined) return known;
  const digest = hashBytes(utf8(unit));
  return new DataView(digest.buffer, digest.byteOffset, 4).getUint32(0, false) & 0x7fffffff;
}

export function derivationPath(unit: string, counter: number): string {
  return `m/0'/${unitIndex(unit)}'/${counter}'`;
}

/** Keyset ID from public keys (sorted by amount). */
export function keysetIdFromKeys(keys: PublicKeys): string {
  const sorted = Object.entries(keys).sort(([a], [b]) => Number(a) - Number(b));
  const joined = concat(...sorted.map(([, pk]) => fromHex(pk)));
  return KEYSET_ID_VERSION + sha256Hex(joined).slice(0, 14);
}

export function deriveKeyset(
  seed: Uint8Array,
  unit: string,
  counter: number,
  maxOrder: number,
): DerivedKeyset {
  if (!Number.isInteger(counter) || counter < 0 || counter >= HARDENED) {
    throw new Error(`invalid keyset counter: ${counter}`);
  }
  if (!Number.isInteger(maxOrder) || maxOrder < 1 || maxOrder > MAX_KEYSET_ORDER) {
    throw new Error(`invalid max order: ${maxOrder}`);
  }
  const parent = HDKey.fromMasterSeed(seed).derive(derivationPath(unit, counter));

  const keys: DerivedKey[] = [];
  let amount = 1;
  for (let i = 0; i < maxOrder; i++) {
    const privateKey = parent.deriveChild(HARDENED + i).privateKey;
    if (!privateKey) {
      throw new Error(`could not derive key ${derivationPath(unit, counter)}/${i}'`);
    }
    keys.push({ amount, privateKey, publicKey: publicKeyHex(privateKey) });
    amount *= 2;
  }

  return { id: keysetIdFromKeys(publicKeysOf(keys)), unit, counter, maxOrder, keys };
}

export function publicKeysOf(keys: ReadonlyArray<{ amount: number; publicKey: PointHex }>): PublicKeys {
  const out: PublicKeys = {};
  for (const key of keys) out[String(key.amount)] = key.publicKey;
  return out;
}
