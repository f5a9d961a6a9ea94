/**
 * Proof / double-spend tracker.
 * DocRef: NUT-07
 *
 * One row per ever-seen secret, keyed by Y = hash_to_curve(secret).
 * Unseen Ys are UNSPENT. Every state change goes through a batch
 * compare-and-set inside the caller's store transaction: if any row is not
 * in an expected state the whole batch fails and nothing is written.
 *
 *   UNSPENT → PENDING → SPENT
 *                     ↘ UNSPENT   (melt rolled back)
 *   UNSPENT → SPENT               (swap)
 */

import {
  MintError,
  fingerprint,
  type Proof,
  type ProofState,
  type ProofStateEntry,
} from "@satmint/protocol";
import type { MintStore, MintTx, ProofRecord } from "../storage/types.js";

export interface TransitionOptions {
  from: readonly ProofState[];
  to: ProofState;
  /** Melt quote that reserves (PENDING) or spent the proofs. */
  meltQuoteId?: string | null;
}

export class ProofTracker {
  private readonly clock: () => number;

  constructor(
    private readonly store: MintStore,
    clock?: () => number,
  ) {
    this.clock = clock ?? (() => Math.floor(Date.now() / 1000));
  }

  /** Batch state lookup; order follows `ys`. */
  async checkState(ys: readonly string[]): Promise<ProofStateEntry[]> {
    const rows = await this.store.transaction((tx) => tx.getProofs(ys));
    return ys.map((Y) => ({ Y, state: rows.get(Y)?.state ?? "UNSPENT", witness: null }));
  }

  /**
   * Compare-and-set for a batch of presented proofs.
   * Fails ProofNotUnspent for the whole batch if any proof is not in `from`.
   */
  async transition(tx: MintTx, proofs: readonly Proof[], opts: TransitionOptions): Promise<ProofRecord[]> {
    const entries = proofs.map((proof) => ({ proof, y: fingerprint(proof.secret) }));
    const rows = await tx.getProofs(entries.map((e) => e.y));
    const now = this.clock();

    const next: ProofRecord[] = entries.map(({ proof, y }) => {
      const current = rows.get(y)?.state ?? "UNSPENT";
      if (!opts.from.includes(current)) {
        throw new MintError("ProofNotUnspent", `proof ${y} is ${current}`);
      }
      return {
        y,
        amount: proof.amount,
        keysetId: proof.id,
        secret: proof.secret,
        C: proof.C,
        state: opts.to,
        meltQuoteId: opts.to === "UNSPENT" ? null : opts.meltQuoteId ?? null,
        updatedAt: now,
      };
    });

    await tx.saveProofs(next);
    return next;
  }

  /**
   * Resolve the proofs a melt quote holds PENDING: SPENT on payment,
   * UNSPENT on failure.
   */
  async settleMelt(tx: MintTx, meltQuoteId: string, to: "SPENT" | "UNSPENT"): Promise<ProofRecord[]> {
    const rows = await tx.getProofsByMeltQuote(meltQuoteId);
    const now = this.clock();
    const next = rows.map((row): ProofRecord => {
      if (row.state !== "PENDING") {
        throw new MintError("ProofNotUnspent", `proof ${row.y} is ${row.state}`);
      }
      return {
        ...row,
        state: to,
        meltQuoteId: to === "UNSPENT" ? null : meltQuoteId,
        updatedAt: now,
      };
    });
    await tx.saveProofs(next);
    return next;
  }
}
