/**
 * Blind signer: BDHKE issuance and verification.
 * DocRef: NUT-00, NUT-12
 *
 *   sign:   C_ = k_a·B_   (+ DLEQ proof that k_a matches the published K_a)
 *   verify: k_a·hash_to_curve(secret) == C
 *
 * This module is the core of the mint. It signs and verifies, nothing
 * else: no state, no I/O. Private scalars come from the KeysetManager and
 * never leave this class.
 */

import {
  MintError,
  createDleq,
  pointFromHex,
  scalarFromBytes,
  signBlinded,
  verifyUnblinded,
  type BlindedMessage,
  type BlindedSignature,
  type Point,
  type Proof,
} from "@satmint/protocol";
import type { KeysetManager } from "./keysets/keyset-manager.js";

function parsePoint(hex: string, kind: "InvalidRequest" | "InvalidProof", field: string): Point {
  try {
    return pointFromHex(hex);
  } catch {
    throw new MintError(kind, `${field} is not a valid curve point`);
  }
}

export class BlindSigner {
  constructor(private readonly keysets: KeysetManager) {}

  /**
   * Sign one blinded message with the active keyset it names.
   * Fails UnknownKeyset, InactiveKeyset, UnknownDenomination, InvalidRequest.
   */
  sign(output: BlindedMessage): BlindedSignature {
    const keyset = this.keysets.getById(output.id);
    if (!keyset.active) {
      throw new MintError("InactiveKeyset", `keyset ${output.id} is inactive`);
    }
    const key = this.keysets.signingKey(output.id, output.amount);
    const B_ = parsePoint(output.B_, "InvalidRequest", "B_");
    const k = scalarFromBytes(key.privateKey);
    const C_ = signBlinded(B_, k);

    return {
      amount: output.amount,
      id: output.id,
      C_: C_.toHex(true),
      dleq: createDleq(B_, C_, k),
    };
  }

  signAll(outputs: readonly BlindedMessage[]): BlindedSignature[] {
    return outputs.map((o) => this.sign(o));
  }

  /**
   * True when C is the mint's signature on the secret.
   * Throws UnknownKeyset / UnknownDenomination for keys this mint never had.
   */
  verify(proof: Proof): boolean {
    this.keysets.getForVerification(proof.id);
    const key = this.keysets.signingKey(proof.id, proof.amount);
    const C = parsePoint(proof.C, "InvalidProof", "C");
    return verifyUnblinded(proof.secret, C, scalarFromBytes(key.privateKey));
  }

  /** Throws InvalidProof on the first proof that does not verify. */
  assertValid(proofs: readonly Proof[]): void {
    for (const proof of proofs) {
      if (!this.verify(proof)) {
        throw new MintError("InvalidProof", `invalid signature for proof of amount ${proof.amount}`);
      }
    }
  }
}
