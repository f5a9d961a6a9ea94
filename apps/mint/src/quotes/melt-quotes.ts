/**
 * Melt quotes: e-cash in, Lightning out.
 * DocRef: NUT-05, NUT-08
 *
 *   UNPAID ──inputs reserved──▶ PENDING ──paid──▶ PAID
 *      ▲                           │
 *      └──────payment failed───────┘
 *
 * melt() is two transactions around unlocked I/O:
 *   1. reserve: inputs UNSPENT → PENDING, quote UNPAID → PENDING
 *   2. pay the invoice, no locks held
 *   3. commit (SPENT / PAID + change) or roll back (UNSPENT / UNPAID)
 *
 * When the backend cannot say how the payment ended (timeout, IN_FLIGHT,
 * transport error) everything stays PENDING and the caller gets
 * PaymentUncertain. Only reconcile() resolves it, from paymentStatus();
 * the invoice is never paid a second time.
 *
 * A node with no record of a payment may simply not have received it yet,
 * so reconcile() leaves quotes alone while this process is still paying
 * them, and treats "no record" as failed only once the payment timeout
 * plus UNKNOWN_GRACE_SECS has passed since the inputs were reserved.
 * At most one quote per invoice is ever PENDING or PAID.
 */

import { randomUUID } from "node:crypto";
import {
  MintError,
  splitAmount,
  sumAmounts,
  type BlindedMessage,
  type BlindedSignature,
  type MeltQuoteResponse,
  type Proof,
} from "@satmint/protocol";
import type { DecodedInvoice, PaymentResult, PaymentStatus } from "@satmint/lnd-client";
import { assertAmountInRange, type MintContext } from "../context.js";
import type { MeltQuoteRecord, MintTx } from "../storage/types.js";
import { validateBlankOutputs, validateInputs } from "../validation.js";
import { fromSats, toSatsFloor, assertLightningUnit } from "./units.js";

const UNKNOWN_GRACE_SECS = 60;

export interface CreateMeltQuoteParams {
  request: string;
  unit: string;
}

export interface MeltParams {
  quote: string;
  inputs: readonly Proof[];
  outputs?: readonly BlindedMessage[];
}

export function meltQuoteResponse(q: MeltQuoteRecord): MeltQuoteResponse {
  return {
    quote: q.id,
    request: q.request,
    amount: q.amount,
    unit: q.unit,
    fee_reserve: q.feeReserve,
    state: q.state,
    expiry: q.expiry,
    payment_preimage: q.preimage,
    ...(q.change ? { change: q.change } : {}),
  };
}

function timeout(ms: number): { promise: Promise<"timeout">; cancel: () => void } {
  let timer: ReturnType<typeof setTimeout> | undefined;
  const promise = new Promise<"timeout">((resolve) => {
    timer = setTimeout(() => resolve("timeout"), ms);
  });
  return { promise, cancel: () => clearTimeout(timer) };
}

export class MeltQuotes {
  /** Quotes with a payInvoice call outstanding in this process. */
  private readonly paying = new Set<string>();

  constructor(private readonly ctx: MintContext) {}

  async create(params: CreateMeltQuoteParams): Promise<MeltQuoteRecord> {
    const { settings, keysets, lightning, log, clock } = this.ctx;
    keysets.getActive(params.unit);
    assertLightningUnit(params.unit);

    let decoded: DecodedInvoice;
    try {
      decoded = await lightning.decodeInvoice(params.request);
    } catch (err) {
      log.warn({ err }, "melt quote: invoice decode failed");
      throw new MintError("InvalidRequest", "invalid bolt11 invoice");
    }
    if (decoded.amountSats <= 0) {
      throw new MintError("InvalidRequest", "amountless invoices are not supported");
    }
    const now = clock();
    if (decoded.expiresAt <= now) {
      throw new MintError("InvalidRequest", "invoice has expired");
    }

    const amount = fromSats(decoded.amountSats, params.unit);
    assertAmountInRange(amount, settings.meltMinAmount, settings.meltMaxAmount);

    let estimate = 0;
    try {
      estimate = fromSats(await lightning.estimateFee(params.request), params.unit);
    } catch (err) {
      log.warn({ err }, "melt quote: fee estimate failed, using configured reserve");
    }
    const feeReserve = Math.max(
      estimate,
      settings.minFeeReserve,
      Math.ceil(amount * settings.feePercent),
    );

    const quote: MeltQuoteRecord = {
      id: randomUUID(),
      unit: params.unit,
      amount,
      feeReserve,
      request: params.request,
      paymentHash: decoded.paymentHash,
      state: "UNPAID",
      expiry: Math.min(decoded.expiresAt, now + settings.quoteTtlSecs),
      createdAt: now,
      pendingAt: null,
      paidAt: null,
      preimage: null,
      feePaid: null,
      changeOutputs: null,
      change: null,
    };
    await this.ctx.store.transaction((tx) => tx.saveMeltQuote(quote));
    log.info({ quote: quote.id, amount, feeReserve }, "melt quote: created");
    return quote;
  }

  /** Current state; a PENDING quote is reconciled with the backend first. */
  async get(id: string): Promise<MeltQuoteRecord> {
    const quote = await this.load(id);
    if (quote.state !== "PENDING") return quote;
    try {
      return await this.reconcile(quote);
    } catch (err) {
      if (err instanceof MintError) throw err;
      this.ctx.log.warn({ err, quote: id }, "melt quote: payment status lookup failed");
      return quote;
    }
  }

  async melt(params: MeltParams): Promise<MeltQuoteRecord> {
    const { keysets, signer, proofs, store, settings, log, clock } = this.ctx;
    const outputs = params.outputs ?? [];

    // 1. validate, no mutation
    const quote = await this.load(params.quote);
    this.assertMeltable(quote);
    if (quote.expiry <= clock()) throw new MintError("QuoteExpired");

    const unit = validateInputs(keysets, params.inputs);
    const outputUnit = validateBlankOutputs(keysets, outputs);
    if (unit !== quote.unit || (outputUnit !== null && outputUnit !== quote.unit)) {
      throw new MintError("UnitMismatch", `quote is ${quote.unit}`);
    }
    signer.assertValid(params.inputs);
    const total = sumAmounts(params.inputs);
    if (total < quote.amount + quote.feeReserve) {
      throw new MintError(
        "AmountMismatch",
        `inputs total ${total}, need ${quote.amount + quote.feeReserve} including fee reserve`,
      );
    }

    // 2. reserve
    const reserved = await store.transaction(async (tx) => {
      const current = await tx.getMeltQuote(quote.id);
      if (!current) throw new MintError("QuoteNotFound");
      this.assertMeltable(current);
      for (const other of await tx.listMeltQuotesByPaymentHash(current.paymentHash)) {
        if (other.id === current.id) continue;
        if (other.state === "PAID") {
          throw new MintError("InvoiceAlreadyPaid", `invoice paid by quote ${other.id}`);
        }
        if (other.state === "PENDING") {
          throw new MintError("QuotePending", `invoice is being paid by quote ${other.id}`);
        }
      }
      await proofs.transition(tx, params.inputs, {
        from: ["UNSPENT"],
        to: "PENDING",
        meltQuoteId: current.id,
      });
      const pending: MeltQuoteRecord = {
        ...current,
        state: "PENDING",
        pendingAt: clock(),
        changeOutputs: outputs.length > 0 ? [...outputs] : null,
      };
      await tx.saveMeltQuote(pending);
      return pending;
    });
    log.info({ quote: quote.id, inputs: params.inputs.length }, "melt: inputs reserved, paying");

    // 3. pay, unlocked
    const result = await this.pay(reserved, settings.lightningTimeoutMs);

    // 4. commit / roll back
    switch (result.status) {
      case "SUCCEEDED":
        return this.finalize(quote.id, result.preimage, result.feeSats);
      case "FAILED":
        await this.rollback(quote.id, result.reason);
        throw new MintError("PaymentFailed", `payment failed: ${result.reason}`);
      case "IN_FLIGHT":
        log.warn({ quote: quote.id }, "melt: payment outcome unknown, left pending");
        throw new MintError("PaymentUncertain");
    }
  }

  /**
   * Resolve a PENDING quote from the backend's record of the payment.
   * A payment the node still has no record of once the payment timeout
   * has long passed was never sent, so it rolls back.
   */
  async reconcile(quote: MeltQuoteRecord): Promise<MeltQuoteRecord> {
    const { lightning, log, settings, clock } = this.ctx;
    if (this.paying.has(quote.id)) return quote;

    const status: PaymentStatus = await lightning.paymentStatus(quote.paymentHash);
    switch (status.status) {
      case "SUCCEEDED":
        log.warn({ quote: quote.id }, "melt: reconciled pending payment as paid");
        return this.finalize(quote.id, status.preimage, status.feeSats);
      case "FAILED":
        log.warn({ quote: quote.id, reason: status.reason }, "melt: reconciled pending payment as failed");
        return this.rollback(quote.id, status.reason);
      case "UNKNOWN": {
        const windowSecs = Math.ceil(settings.lightningTimeoutMs / 1000) + UNKNOWN_GRACE_SECS;
        if (clock() - (quote.pendingAt ?? quote.createdAt) <= windowSecs) return quote;
        log.warn({ quote: quote.id }, "melt: no payment record after the timeout, rolling back");
        return this.rollback(quote.id, "no payment record");
      }
      case "IN_FLIGHT":
        return quote;
    }
  }

  /** PENDING quotes the scheduler should reconcile. */
  async listPending(): Promise<MeltQuoteRecord[]> {
    return this.ctx.store.transaction((tx) => tx.listMeltQuotes("PENDING"));
  }

  /** Drop UNPAID quotes that expired more than `graceSecs` ago. */
  async sweepExpired(graceSecs: number): Promise<number> {
    const cutoff = this.ctx.clock() - graceSecs;
    const removed = await this.ctx.store.transaction(async (tx) => {
      const expired = (await tx.listMeltQuotes("UNPAID")).filter((q) => q.expiry < cutoff);
      for (const q of expired) await tx.deleteMeltQuote(q.id);
      return expired.length;
    });
    if (removed > 0) this.ctx.log.info({ removed }, "melt quote: swept expired quotes");
    return removed;
  }

  // ── internals ────────────────────────────────────────────────────

  /** The quote stays in `paying` until payInvoice settles, even past the timeout. */
  private async pay(quote: MeltQuoteRecord, timeoutMs: number): Promise<PaymentResult> {
    this.paying.add(quote.id);
    const attempt = this.ctx.lightning
      .payInvoice({
        bolt11: quote.request,
        maxFeeSats: toSatsFloor(quote.feeReserve, quote.unit),
        timeoutSecs: Math.ceil(timeoutMs / 1000),
      })
      .catch((err: unknown): PaymentResult => {
        // the request may have reached the node before the error
        this.ctx.log.error({ err, quote: quote.id }, "melt: payInvoice errored");
        return { status: "IN_FLIGHT", paymentHash: quote.paymentHash };
      })
      .finally(() => this.paying.delete(quote.id));

    const timer = timeout(timeoutMs);
    try {
      const outcome = await Promise.race([attempt, timer.promise]);
      if (outcome === "timeout") {
        this.ctx.log.warn({ quote: quote.id, timeoutMs }, "melt: payment timed out");
        return { status: "IN_FLIGHT", paymentHash: quote.paymentHash };
      }
      return outcome;
    } finally {
      timer.cancel();
    }
  }

  private async finalize(id: string, preimage: string, feeSats: number): Promise<MeltQuoteRecord> {
    const { store, proofs, log } = this.ctx;
    const paid = await store.transaction(async (tx) => {
      const current = await tx.getMeltQuote(id);
      if (!current) throw new MintError("QuoteNotFound");
      if (current.state === "UNPAID") {
        log.error(
          { quote: id, paymentHash: current.paymentHash, preimage, feeSats },
          "melt: payment succeeded after the inputs were released",
        );
      }
      if (current.state !== "PENDING") return current;

      const spent = await proofs.settleMelt(tx, id, "SPENT");
      const feePaid = fromSats(feeSats, current.unit);
      const change = this.signChange(current, sumAmounts(spent) - current.amount - feePaid);
      const next: MeltQuoteRecord = {
        ...current,
        state: "PAID",
        pendingAt: null,
        paidAt: this.ctx.clock(),
        preimage,
        feePaid,
        changeOutputs: null,
        change: change.length > 0 ? change : null,
      };
      await tx.saveMeltQuote(next);
      return next;
    });
    log.info({ quote: id, feePaid: paid.feePaid, change: paid.change?.length ?? 0 }, "melt: paid");
    return paid;
  }

  private async rollback(id: string, reason: string): Promise<MeltQuoteRecord> {
    const { store, proofs, log } = this.ctx;
    const reverted = await store.transaction(async (tx: MintTx) => {
      const current = await tx.getMeltQuote(id);
      if (!current) throw new MintError("QuoteNotFound");
      if (current.state !== "PENDING") return current;
      await proofs.settleMelt(tx, id, "UNSPENT");
      const next: MeltQuoteRecord = {
        ...current,
        state: "UNPAID",
        pendingAt: null,
        changeOutputs: null,
      };
      await tx.saveMeltQuote(next);
      return next;
    });
    log.info({ quote: id, reason }, "melt: payment failed, inputs released");
    return reverted;
  }

  /**
   * Overpaid fee back to the payer, largest denominations first over the
   * blank outputs. Signed with the unit's active keyset. Runs after the
   * invoice is paid, so a blank that cannot be signed is dropped, not fatal.
   */
  private signChange(quote: MeltQuoteRecord, amount: number): BlindedSignature[] {
    const blanks = quote.changeOutputs ?? [];
    if (amount <= 0 || blanks.length === 0) return [];

    const parts = splitAmount(amount).reverse();
    if (parts.length > blanks.length) {
      const dropped = sumAmounts(parts.slice(blanks.length).map((a) => ({ amount: a })));
      this.ctx.log.warn(
        { quote: quote.id, change: amount, dropped, blanks: blanks.length },
        "melt: not enough blank outputs, change truncated",
      );
    }

    const keysetId = this.ctx.keysets.getActive(quote.unit).id;
    const signed: BlindedSignature[] = [];
    blanks.slice(0, parts.length).forEach((blank, i) => {
      const amount = parts[i];
      try {
        signed.push(this.ctx.signer.sign({ amount, id: keysetId, B_: blank.B_ }));
      } catch (err) {
        this.ctx.log.warn({ err, quote: quote.id, amount }, "melt: unsignable blank output dropped");
      }
    });
    return signed;
  }

  private assertMeltable(quote: MeltQuoteRecord): void {
    if (quote.state === "PENDING") throw new MintError("QuotePending");
    if (quote.state === "PAID") throw new MintError("InvoiceAlreadyPaid");
  }

  private async load(id: string): Promise<MeltQuoteRecord> {
    const quote = await this.ctx.store.transaction((tx) => tx.getMeltQuote(id));
    if (!quote) throw new MintError("QuoteNotFound", `quote not found: ${id}`);
    return quote;
  }
}
