/**
 * Mint quotes and minting over bolt11.
 * DocRef: NUT-04
 */

import { Type, type Static } from "@sinclair/typebox";
import { Amount, QuoteId, Timestamp, Unit } from "./common.js";
import { BlindedMessage, BlindedSignature } from "./outputs.js";

export const MintQuoteState = Type.Union([
  Type.Literal("UNPAID"),
  Type.Literal("PAID"),
  Type.Literal("ISSUED"),
]);

export type MintQuoteState = Static<typeof MintQuoteState>;

export const MintQuoteRequest = Type.Object({
  amount: Type.Integer({ minimum: 1, maximum: Number.MAX_SAFE_INTEGER }),
  unit: Unit,
  description: Type.Optional(Type.String({ maxLength: 640 })),
});

export type MintQuoteRequest = Static<typeof MintQuoteRequest>;

export const MintQuoteResponse = Type.Object({
  quote: QuoteId,
  request: Type.String(),
  amount: Amount,
  unit: Unit,
  state: MintQuoteState,
  expiry: Timestamp,
});

export type MintQuoteResponse = Static<typeof MintQuoteResponse>;

export const MintRequest = Type.Object({
  quote: QuoteId,
  outputs: Type.Array(BlindedMessage, { minItems: 1, maxItems: 1000 }),
});

export type MintRequest = Static<typeof MintRequest>;

export const MintResponse = Type.Object({
  signatures: Type.Array(BlindedSignature),
});

export type MintResponse = Static<typeof MintResponse>;
