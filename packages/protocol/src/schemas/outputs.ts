/**
 * BlindedMessage / BlindedSignature: request and response outputs.
 * DocRef: NUT-00, NUT-12
 */

import { Type, type Static } from "@sinclair/typebox";
import { Amount, Hex32, KeysetId, CompressedPoint } from "./common.js";

export const BlindedMessage = Type.Object(
  {
    amount: Amount,
    id: KeysetId,
    B_: CompressedPoint,
  },
  { additionalProperties: false },
);

export type BlindedMessage = Static<typeof BlindedMessage>;

export const Dleq = Type.Object({
  e: Hex32,
  s: Hex32,
});

export const BlindedSignature = Type.Object({
  amount: Amount,
  id: KeysetId,
  C_: CompressedPoint,
  dleq: Type.Optional(Dleq),
});

export type BlindedSignature = Static<typeof BlindedSignature>;
