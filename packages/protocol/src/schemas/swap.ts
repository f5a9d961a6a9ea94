/**
 * Swap: exchange proofs for new blind signatures of equal value.
 * DocRef: NUT-03
 */

import { Type, type Static } from "@sinclair/typebox";
import { BlindedMessage, BlindedSignature } from "./outputs.js";
import { Proof } from "./proof.js";

export const SwapRequest = Type.Object({
  inputs: Type.Array(Proof, { minItems: 1, maxItems: 1000 }),
  outputs: Type.Array(BlindedMessage, { minItems: 1, maxItems: 1000 }),
});

export type SwapRequest = Static<typeof SwapRequest>;

export const SwapResponse = Type.Object({
  signatures: Type.Array(BlindedSignature),
});

export type SwapResponse = Static<typeof SwapResponse>;
