/**
 * Swap engine: proofs in, equal-value signatures out.
 * DocRef: NUT-03
 *
 * The inputs are spent and the outputs signed in one transaction: either
 * both happen or neither does.
 */

import {
  MintError,
  sumAmounts,
  type BlindedMessage,
  type BlindedSignature,
  type Proof,
} from "@satmint/protocol";
import type { MintContext } from "./context.js";
import { validateInputs, validateOutputs } from "./validation.js";

export class SwapEngine {
  constructor(private readonly ctx: MintContext) {}

  async swap(inputs: readonly Proof[], outputs: readonly BlindedMessage[]): Promise<BlindedSignature[]> {
    const { keysets, signer, proofs, store, log } = this.ctx;

    const inputUnit = validateInputs(keysets, inputs);
    const outputUnit = validateOutputs(keysets, outputs);
    if (inputUnit !== outputUnit) {
      throw new MintError("UnitMismatch", `inputs are ${inputUnit}, outputs are ${outputUnit}`);
    }
    const inTotal = sumAmounts(inputs);
    const outTotal = sumAmounts(outputs);
    if (inTotal !== outTotal) {
      throw new MintError("AmountMismatch", `inputs total ${inTotal}, outputs total ${outTotal}`);
    }
    signer.assertValid(inputs);

    const signatures = await store.transaction(async (tx) => {
      await proofs.transition(tx, inputs, { from: ["UNSPENT"], to: "SPENT" });
      return signer.signAll(outputs);
    });

    log.info({ inputs: inputs.length, outputs: outputs.length, amount: inTotal }, "swap: done");
    return signatures;
  }
}
