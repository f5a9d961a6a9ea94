/**
 * Proof: an unblinded signature plus its secret.
 * DocRef: NUT-00, NUT-07
 */

import { Type, type Static } from "@sinclair/typebox";
import { Amount, KeysetId, CompressedPoint } from "./common.js";

export const Proof = Type.Object({
  amount: Amount,
  id: KeysetId,
  secret: Type.String({ minLength: 1, maxLength: 1024 }),
  C: CompressedPoint,
  witness: Type.Optional(Type.String()),
});

export type Proof = Static<typeof Proof>;

export const ProofState = Type.Union([
  Type.Literal("UNSPENT"),
  Type.Literal("PENDING"),
  Type.Literal("SPENT"),
]);

export type ProofState = Static<typeof ProofState>;

export const CheckStateRequest = Type.Object({
  Ys: Type.Array(CompressedPoint, { minItems: 1, maxItems: 1000 }),
});

export type CheckStateRequest = Static<typeof CheckStateRequest>;

export const ProofStateEntry = Type.Object({
  Y: CompressedPoint,
  state: ProofState,
  witness: Type.Union([Type.String(), Type.Null()]),
});

export type ProofStateEntry = Static<typeof ProofStateEntry>;

export const CheckStateResponse = Type.Object({
  states: Type.Array(ProofStateEntry),
});

export type CheckStateResponse = Static<typeof CheckStateResponse>;
