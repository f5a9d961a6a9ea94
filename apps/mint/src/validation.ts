/**
 * Shared input/output checks for mint, melt and swap.
 *
 * Pure validation: nothing here touches the store, so a rejected request
 * never leaves state behind.
 */

import {
  MintError,
  isPowerOfTwo,
  pointFromHex,
  type BlindedMessage,
  type Proof,
} from "@satmint/protocol";
import type { KeysetManager } from "./keysets/keyset-manager.js";

/**
 * Validate blinded outputs: unique B_, known active keyset, a key for each
 * amount, one unit. Returns that unit.
 */
export function validateOutputs(keysets: KeysetManager, outputs: readonly BlindedMessage[]): string {
  if (outputs.length === 0) throw new MintError("InvalidRequest", "no outputs");

  const seen = new Set<string>();
  const units = new Set<string>();
  for (const output of outputs) {
    if (seen.has(output.B_)) throw new MintError("DuplicateOutputs");
    seen.add(output.B_);

    const keyset = keysets.getById(output.id);
    if (!keyset.active) {
      throw new MintError("InactiveKeyset", `keyset ${output.id} is inactive`);
    }
    if (!isPowerOfTwo(output.amount) || keyset.publicKeys[String(output.amount)] === undefined) {
      throw new MintError("UnknownDenomination", `keyset ${output.id} has no key for amount ${output.amount}`);
    }
    units.add(keyset.unit);
  }
  return singleUnit(units);
}

/**
 * Validate presented proofs: unique secrets, verifiable keysets, one
 * unit. Signatures are checked separately by the signer. Returns the unit.
 */
export function validateInputs(keysets: KeysetManager, inputs: readonly Proof[]): string {
  if (inputs.length === 0) throw new MintError("InvalidRequest", "no inputs");

  const secrets = new Set<string>();
  const units = new Set<string>();
  for (const proof of inputs) {
    if (secrets.has(proof.secret)) throw new MintError("DuplicateInputs");
    secrets.add(proof.secret);
    units.add(keysets.getForVerification(proof.id).unit);
  }
  return singleUnit(units);
}

function singleUnit(units: Set<string>): string {
  const [unit, ...rest] = units;
  if (unit === undefined || rest.length > 0) {
    throw new MintError("UnitMismatch", `mixed units: ${[...units].join(", ")}`);
  }
  return unit;
}

/**
 * NUT-08 blank outputs: the mint assigns the amounts, so only B_ (unique,
 * on the curve), the keyset and the unit are checked. Returns the unit,
 * or null for no outputs.
 */
export function validateBlankOutputs(
  keysets: KeysetManager,
  outputs: readonly BlindedMessage[],
): string | null {
  if (outputs.length === 0) return null;
  const seen = new Set<string>();
  const units = new Set<string>();
  for (const output of outputs) {
    if (seen.has(output.B_)) throw new MintError("DuplicateOutputs");
    seen.add(output.B_);
    try {
      pointFromHex(output.B_);
    } catch {
      throw new MintError("InvalidRequest", "B_ is not a valid curve point");
    }
    units.add(keysets.getById(output.id).unit);
  }
  return singleUnit(units);
}
