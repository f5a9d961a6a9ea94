/**
 * Public keys and keyset listings.
 * DocRef: NUT-01, NUT-02
 */

import { Type, type Static } from "@sinclair/typebox";
import { KeysetId, CompressedPoint, Unit } from "./common.js";

export const KeysetKeys = Type.Object({
  id: KeysetId,
  unit: Unit,
  keys: Type.Record(Type.String({ pattern: "^[0-9]+$" }), CompressedPoint),
});

export type KeysetKeys = Static<typeof KeysetKeys>;

export const KeysResponse = Type.Object({
  keysets: Type.Array(KeysetKeys),
});

export type KeysResponse = Static<typeof KeysResponse>;

export const KeysetEntry = Type.Object({
  id: KeysetId,
  unit: Unit,
  active: Type.Boolean(),
  input_fee_ppk: Type.Integer({ minimum: 0 }),
});

export type KeysetEntry = Static<typeof KeysetEntry>;

export const KeysetsResponse = Type.Object({
  keysets: Type.Array(KeysetEntry),
});

export type KeysetsResponse = Static<typeof KeysetsResponse>;
