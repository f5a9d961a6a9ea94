/**
 * In-memory MintStore: dev mode and tests.
 *
 * Transactions run one at a time behind an async lock. Writes are staged
 * and applied only when fn() resolves, so a throwing transaction leaves no
 * partial state. Records are cloned on the way in and out.
 */

import type { MeltQuoteState, MintQuoteState } from "@satmint/protocol";
import type {
  KeysetRecord,
  MeltQuoteRecord,
  MintQuoteRecord,
  MintStore,
  MintTx,
  ProofRecord,
} from "./types.js";

/** Promise-chain lock: callers run strictly in arrival order. */
class AsyncLock {
  private tail: Promise<void> = Promise.resolve();

  run<T>(fn: () => Promise<T>): Promise<T> {
    const result = this.tail.then(fn);
    this.tail = result.then(
      () => undefined,
      () => undefined,
    );
    return result;
  }
}

/** Committed rows plus one transaction's staged writes (null = deleted). */
class StagedTable<T> {
  readonly staged = new Map<string, T | null>();

  constructor(private readonly committed: Map<string, T>) {}

  get(key: string): T | null {
    const value = this.staged.has(key) ? this.staged.get(key) : this.committed.get(key);
    return value ? structuredClone(value) : null;
  }

  values(): T[] {
    const keys = new Set([...this.committed.keys(), ...this.staged.keys()]);
    const out: T[] = [];
    for (const key of keys) {
      const value = this.get(key);
      if (value) out.push(value);
    }
    return out;
  }

  set(key: string, value: T): void {
    this.staged.set(key, structuredClone(value));
  }

  delete(key: string): void {
    this.staged.set(key, null);
  }

  commit(): void {
    for (const [key, value] of this.staged) {
      if (value === null) this.committed.delete(key);
      else this.committed.set(key, value);
    }
  }
}

export class MemoryMintStore implements MintStore {
  private readonly keysets = new Map<string, KeysetRecord>();
  private readonly mintQuotes = new Map<string, MintQuoteRecord>();
  private readonly meltQuotes = new Map<string, MeltQuoteRecord>();
  private readonly proofs = new Map<string, ProofRecord>();
  private readonly lock = new AsyncLock();

  transaction<T>(fn: (tx: MintTx) => Promise<T>): Promise<T> {
    return this.lock.run(async () => {
      const keysets = new StagedTable(this.keysets);
      const mintQuotes = new StagedTable(this.mintQuotes);
      const meltQuotes = new StagedTable(this.meltQuotes);
      const proofs = new StagedTable(this.proofs);

      const tx: MintTx = {
        async listKeysets(unit?: string) {
          return keysets
            .values()
            .filter((k) => unit === undefined || k.unit === unit)
            .sort((a, b) => a.unit.localeCompare(b.unit) || a.counter - b.counter);
        },
        async getKeyset(id) {
          return keysets.get(id);
        },
        async saveKeyset(keyset) {
          keysets.set(keyset.id, keyset);
        },

        async getMintQuote(id) {
          return mintQuotes.get(id);
        },
        async listMintQuotes(state: MintQuoteState) {
          return mintQuotes.values().filter((q) => q.state === state);
        },
        async saveMintQuote(quote) {
          mintQuotes.set(quote.id, quote);
        },
        async deleteMintQuote(id) {
          mintQuotes.delete(id);
        },

        async getMeltQuote(id) {
          return meltQuotes.get(id);
        },
        async listMeltQuotes(state: MeltQuoteState) {
          return meltQuotes.values().filter((q) => q.state === state);
        },
        async listMeltQuotesByPaymentHash(paymentHash) {
          return meltQuotes.values().filter((q) => q.paymentHash === paymentHash);
        },
        async saveMeltQuote(quote) {
          meltQuotes.set(quote.id, quote);
        },
        async deleteMeltQuote(id) {
          meltQuotes.delete(id);
        },

        async getProofs(ys) {
          const out = new Map<string, ProofRecord>();
          for (const y of ys) {
            const row = proofs.get(y);
            if (row) out.set(y, row);
          }
          return out;
        },
        async getProofsByMeltQuote(quoteId) {
          return proofs.values().filter((p) => p.meltQuoteId === quoteId);
        },
        async saveProofs(rows) {
          for (const row of rows) proofs.set(row.y, row);
        },
      };

      const result = await fn(tx);
      keysets.commit();
      mintQuotes.commit();
      meltQuotes.commit();
      proofs.commit();
      return result;
    });
  }

  async close(): Promise<void> {
    // nothing to release
  }
}
