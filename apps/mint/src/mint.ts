/**
 * Mint: the protocol surface, wired from its parts.
 *
 * Routes, the CLI and the scheduler all call through this class; nothing
 * outside it touches the store or the backend directly.
 */

import type { BaseLogger } from "pino";
import type {
  BlindedMessage,
  BlindedSignature,
  KeysetEntry,
  KeysetKeys,
  MintInfo,
  Proof,
  ProofStateEntry,
} from "@satmint/protocol";
import type { LightningBackend } from "@satmint/lnd-client";
import type { MintContext, MintSettings } from "./context.js";
import { KeysetManager } from "./keysets/keyset-manager.js";
import { BlindSigner } from "./signer.js";
import { ProofTracker } from "./ledger/proof-tracker.js";
import { MintQuotes, type CreateMintQuoteParams } from "./quotes/mint-quotes.js";
import { MeltQuotes, type CreateMeltQuoteParams, type MeltParams } from "./quotes/melt-quotes.js";
import { SwapEngine } from "./swap.js";
import { MintInfoService } from "./info.js";
import type { KeysetRecord, MeltQuoteRecord, MintQuoteRecord, MintStore } from "./storage/types.js";

export interface MintDeps {
  store: MintStore;
  lightning: LightningBackend;
  /** BIP-39 seed; every keyset derives from it. */
  seed: Uint8Array;
  settings: MintSettings;
  log: BaseLogger;
  /** Unix seconds. Default: wall clock. */
  clock?: () => number;
}

export class Mint {
  readonly keysets: KeysetManager;
  private readonly ctx: MintContext;
  private readonly mintQuotes: MintQuotes;
  private readonly meltQuotes: MeltQuotes;
  private readonly swapEngine: SwapEngine;
  private readonly info: MintInfoService;

  private constructor(ctx: MintContext) {
    this.ctx = ctx;
    this.keysets = ctx.keysets;
    this.mintQuotes = new MintQuotes(ctx);
    this.meltQuotes = new MeltQuotes(ctx);
    this.swapEngine = new SwapEngine(ctx);
    this.info = new MintInfoService(ctx);
  }

  static async create(deps: MintDeps): Promise<Mint> {
    const clock = deps.clock ?? (() => Math.floor(Date.now() / 1000));
    const keysets = await KeysetManager.init(deps.store, {
      seed: deps.seed,
      units: deps.settings.units,
      maxOrder: deps.settings.maxOrder,
      retentionSecs: deps.settings.keysetRetentionSecs,
      log: deps.log,
      clock,
    });
    return new Mint({
      store: deps.store,
      keysets,
      signer: new BlindSigner(keysets),
      proofs: new ProofTracker(deps.store, clock),
      lightning: deps.lightning,
      settings: deps.settings,
      log: deps.log,
      clock,
    });
  }

  // ── Keys and info ────────────────────────────────────────────────

  getKeysets(): KeysetEntry[] {
    return this.info.getKeysets();
  }

  getKeys(): KeysetKeys[] {
    return this.info.getKeys();
  }

  getKeysetKeys(id: string): KeysetKeys {
    return this.info.getKeysetKeys(id);
  }

  getInfo(): MintInfo {
    return this.info.getInfo();
  }

  rotateKeyset(unit: string): Promise<KeysetRecord> {
    return this.keysets.rotate(unit);
  }

  // ── Mint (Lightning in) ──────────────────────────────────────────

  createMintQuote(params: CreateMintQuoteParams): Promise<MintQuoteRecord> {
    return this.mintQuotes.create(params);
  }

  getMintQuote(id: string): Promise<MintQuoteRecord> {
    return this.mintQuotes.get(id);
  }

  mint(quote: string, outputs: readonly BlindedMessage[]): Promise<BlindedSignature[]> {
    return this.mintQuotes.issue(quote, outputs);
  }

  // ── Melt (Lightning out) ─────────────────────────────────────────

  createMeltQuote(params: CreateMeltQuoteParams): Promise<MeltQuoteRecord> {
    return this.meltQuotes.create(params);
  }

  getMeltQuote(id: string): Promise<MeltQuoteRecord> {
    return this.meltQuotes.get(id);
  }

  melt(params: MeltParams): Promise<MeltQuoteRecord> {
    return this.meltQuotes.melt(params);
  }

  // ── Swap and state ───────────────────────────────────────────────

  swap(inputs: readonly Proof[], outputs: readonly BlindedMessage[]): Promise<BlindedSignature[]> {
    return this.swapEngine.swap(inputs, outputs);
  }

  checkState(ys: readonly string[]): Promise<ProofStateEntry[]> {
    return this.ctx.proofs.checkState(ys);
  }

  // ── Background work (scheduler) ──────────────────────────────────

  /** Poll every UNPAID, unexpired mint quote once. Returns how many became PAID. */
  async pollMintQuotes(): Promise<number> {
    const now = this.ctx.clock();
    let paid = 0;
    for (const quote of await this.mintQuotes.listUnpaid()) {
      if (quote.expiry <= now) continue;
      try {
        const next = await this.mintQuotes.poll(quote);
        if (next.state === "PAID") paid++;
      } catch (err) {
        this.ctx.log.warn({ err, quote: quote.id }, "scheduler: mint quote poll failed");
      }
    }
    return paid;
  }

  /** Reconcile every PENDING melt quote. Returns how many were resolved. */
  async reconcileMeltQuotes(): Promise<number> {
    let resolved = 0;
    for (const quote of await this.meltQuotes.listPending()) {
      try {
        const next = await this.meltQuotes.reconcile(quote);
        if (next.state !== "PENDING") resolved++;
      } catch (err) {
        this.ctx.log.warn({ err, quote: quote.id }, "scheduler: melt reconciliation failed");
      }
    }
    return resolved;
  }

  async sweepExpiredQuotes(graceSecs: number): Promise<number> {
    return (await this.mintQuotes.sweepExpired(graceSecs)) + (await this.meltQuotes.sweepExpired(graceSecs));
  }

  async close(): Promise<void> {
    await this.ctx.store.close();
  }
}
