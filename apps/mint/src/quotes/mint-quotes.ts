/**
 * Mint quotes: Lightning in, e-cash out.
 * DocRef: NUT-04
 *
 *   UNPAID ──invoice settled──▶ PAID ──outputs signed──▶ ISSUED
 *
 * Transitions are monotonic. Signing happens inside the transaction that
 * moves PAID → ISSUED and the commit lands before any signature is
 * returned: a retry after a crash fails QuoteAlreadyIssued instead of
 * issuing twice.
 */

import { randomUUID } from "node:crypto";
import {
  MintError,
  sumAmounts,
  type BlindedMessage,
  type BlindedSignature,
  type MintQuoteResponse,
} from "@satmint/protocol";
import type { Invoice } from "@satmint/lnd-client";
import { assertAmountInRange, type MintContext } from "../context.js";
import type { MintQuoteRecord } from "../storage/types.js";
import { validateOutputs } from "../validation.js";
import { toSats } from "./units.js";

export interface CreateMintQuoteParams {
  amount: number;
  unit: string;
  description?: string;
}

export function mintQuoteResponse(q: MintQuoteRecord): MintQuoteResponse {
  return {
    quote: q.id,
    request: q.request,
    amount: q.amount,
    unit: q.unit,
    state: q.state,
    expiry: q.expiry,
  };
}

export class MintQuotes {
  constructor(private readonly ctx: MintContext) {}

  async create(params: CreateMintQuoteParams): Promise<MintQuoteRecord> {
    const { settings, keysets, lightning, log } = this.ctx;
    if (settings.mintingDisabled) throw new MintError("MintingDisabled");
    keysets.getActive(params.unit);
    const amountSats = toSats(params.amount, params.unit);
    assertAmountInRange(params.amount, settings.mintMinAmount, settings.mintMaxAmount);

    let invoice: Invoice;
    try {
      invoice = await lightning.createInvoice({
        amountSats,
        memo: params.description,
        expirySecs: settings.quoteTtlSecs,
      });
    } catch (err) {
      log.error({ err }, "mint quote: invoice creation failed");
      throw new MintError("BackendUnavailable", "could not create invoice");
    }

    const quote: MintQuoteRecord = {
      id: randomUUID(),
      unit: params.unit,
      amount: params.amount,
      request: invoice.bolt11,
      paymentHash: invoice.paymentHash,
      state: "UNPAID",
      expiry: invoice.expiresAt,
      createdAt: this.ctx.clock(),
      paidAt: null,
      issuedAt: null,
    };
    await this.ctx.store.transaction((tx) => tx.saveMintQuote(quote));
    log.info({ quote: quote.id, amount: quote.amount, unit: quote.unit }, "mint quote: created");
    return quote;
  }

  /** Current state; an UNPAID quote is checked against the backend first. */
  async get(id: string): Promise<MintQuoteRecord> {
    const quote = await this.load(id);
    if (quote.state !== "UNPAID") return quote;
    try {
      return await this.poll(quote);
    } catch (err) {
      this.ctx.log.warn({ err, quote: id }, "mint quote: invoice lookup failed");
      return quote;
    }
  }

  /**
   * Ask the backend whether the invoice settled; on settlement CAS
   * UNPAID → PAID. Idempotent.
   */
  async poll(quote: MintQuoteRecord): Promise<MintQuoteRecord> {
    const info = await this.ctx.lightning.lookupInvoice(quote.paymentHash);
    if (!info.settled) return quote;

    return this.ctx.store.transaction(async (tx) => {
      const current = await tx.getMintQuote(quote.id);
      if (!current) throw new MintError("QuoteNotFound");
      if (current.state !== "UNPAID") return current;
      const paid: MintQuoteRecord = { ...current, state: "PAID", paidAt: this.ctx.clock() };
      await tx.saveMintQuote(paid);
      this.ctx.log.info({ quote: quote.id }, "mint quote: paid");
      return paid;
    });
  }

  /** Sign `outputs` against a PAID quote, exactly once. */
  async issue(id: string, outputs: readonly BlindedMessage[]): Promise<BlindedSignature[]> {
    const { keysets, signer, store, clock, log } = this.ctx;
    const unit = validateOutputs(keysets, outputs);

    // an invoice settled before expiry is still honoured after it
    let quote = await this.load(id);
    if (quote.state === "UNPAID") {
      try {
        quote = await this.poll(quote);
      } catch (err) {
        if (err instanceof MintError) throw err;
        log.warn({ err, quote: id }, "mint quote: invoice lookup failed");
      }
      if (quote.state === "UNPAID") {
        throw new MintError(quote.expiry <= clock() ? "QuoteExpired" : "QuoteNotPaid");
      }
    }

    const signatures = await store.transaction(async (tx) => {
      const current = await tx.getMintQuote(id);
      if (!current) throw new MintError("QuoteNotFound");
      if (current.state === "ISSUED") throw new MintError("QuoteAlreadyIssued");
      if (current.state !== "PAID") throw new MintError("QuoteNotPaid");
      if (unit !== current.unit) {
        throw new MintError("UnitMismatch", `quote is ${current.unit}, outputs are ${unit}`);
      }
      const total = sumAmounts(outputs);
      if (total !== current.amount) {
        throw new MintError("AmountMismatch", `outputs total ${total}, quote is ${current.amount}`);
      }

      const signed = signer.signAll(outputs);
      await tx.saveMintQuote({ ...current, state: "ISSUED", issuedAt: clock() });
      return signed;
    });

    log.info({ quote: id, outputs: signatures.length }, "mint quote: issued");
    return signatures;
  }

  /** UNPAID quotes the scheduler should poll. */
  async listUnpaid(): Promise<MintQuoteRecord[]> {
    return this.ctx.store.transaction((tx) => tx.listMintQuotes("UNPAID"));
  }

  /**
   * Drop UNPAID quotes that expired more than `graceSecs` ago. Each one
   * gets a last invoice lookup first: a settled quote becomes PAID and
   * stays, and one whose lookup fails waits for the next sweep.
   */
  async sweepExpired(graceSecs: number): Promise<number> {
    const { log, clock } = this.ctx;
    const cutoff = clock() - graceSecs;
    const unsettled: string[] = [];
    for (const quote of (await this.listUnpaid()).filter((q) => q.expiry < cutoff)) {
      try {
        const next = await this.poll(quote);
        if (next.state === "UNPAID") unsettled.push(quote.id);
        else log.warn({ quote: quote.id }, "mint quote: expired quote was paid, kept");
      } catch (err) {
        log.warn({ err, quote: quote.id }, "mint quote: final invoice lookup failed, not swept");
      }
    }
    if (unsettled.length === 0) return 0;

    const removed = await this.ctx.store.transaction(async (tx) => {
      let count = 0;
      for (const id of unsettled) {
        const current = await tx.getMintQuote(id);
        if (current?.state !== "UNPAID") continue;
        await tx.deleteMintQuote(id);
        count++;
      }
      return count;
    });
    if (removed > 0) log.info({ removed }, "mint quote: swept expired quotes");
    return removed;
  }

  private async load(id: string): Promise<MintQuoteRecord> {
    const quote = await this.ctx.store.transaction((tx) => tx.getMintQuote(id));
    if (!quote) throw new MintError("QuoteNotFound", `quote not found: ${id}`);
    return quote;
  }
}
