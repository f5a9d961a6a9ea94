/**
 * Melt quotes and melting over bolt11, with fee-return change.
 * DocRef: NUT-05, NUT-08
 */

import { Type, type Static } from "@sinclair/typebox";
import { Amount, QuoteId, Timestamp, Unit } from "./common.js";
import { BlindedMessage, BlindedSignature } from "./outputs.js";
import { Proof } from "./proof.js";

export const MeltQuoteState = Type.Union([
  Type.Literal("UNPAID"),
  Type.Literal("PENDING"),
  Type.Literal("PAID"),
]);

export type MeltQuoteState = Static<typeof MeltQuoteState>;

export const MeltQuoteRequest = Type.Object({
  request: Type.String({ minLength: 1, maxLength: 4096 }),
  unit: Unit,
});

export type MeltQuoteRequest = Static<typeof MeltQuoteRequest>;

export const MeltQuoteResponse = Type.Object({
  quote: QuoteId,
  request: Type.String(),
  amount: Amount,
  unit: Unit,
  fee_reserve: Amount,
  state: MeltQuoteState,
  expiry: Timestamp,
  payment_preimage: Type.Union([Type.String(), Type.Null()]),
  change: Type.Optional(Type.Array(BlindedSignature)),
});

export type MeltQuoteResponse = Static<typeof MeltQuoteResponse>;

export const MeltRequest = Type.Object({
  quote: QuoteId,
  inputs: Type.Array(Proof, { minItems: 1, maxItems: 1000 }),
  outputs: Type.Optional(Type.Array(BlindedMessage, { maxItems: 64 })),
});

export type MeltRequest = Static<typeof MeltRequest>;
