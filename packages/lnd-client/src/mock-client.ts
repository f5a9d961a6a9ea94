/**
 * Mock LND client for testing and dev mode.
 *
 * Generates deterministic-looking invoices. Use settleInvoice() to simulate
 * an incoming payment, createExternalInvoice() to get an invoice the mint
 * can pay, and setPaymentOutcome() to script how outgoing payments end.
 * Share a single instance between the mint and the test so both see the
 * same invoice state.
 */

import { createHash, randomBytes } from "node:crypto";
import type {
  LightningBackend,
  CreateInvoiceParams,
  Invoice,
  InvoiceInfo,
  DecodedInvoice,
  PayInvoiceParams,
  PaymentResult,
  PaymentStatus,
} from "./types.js";

const MOCK_NODE_PUBKEY = "02" + "ab".repeat(32);
const EXTERNAL_NODE_PUBKEY = "03" + "cd".repeat(32);

/** How the next payment to an invoice ends. */
export type MockPaymentOutcome =
  | { kind: "succeed"; feeSats?: number }
  | { kind: "fail"; reason?: string }
  | { kind: "in_flight" };

export interface MockLndOptions {
  /** Returned by estimateFee(). Default 2. */
  feeEstimateSats?: number;
  /** Fee charged by a successful payment unless scripted. Default 1. */
  defaultFeeSats?: number;
  /** Artificial latency for payInvoice(), ms. Default 0. */
  payDelayMs?: number;
  /** Treat every issued invoice as paid on first lookup (dev mode). */
  autoSettle?: boolean;
}

interface MockInvoice {
  paymentHash: string;
  preimage: string;
  bolt11: string;
  settled: boolean;
  amountSats: number;
  expiresAt: number;
  destination: string;
}

interface MockPayment {
  status: PaymentStatus;
  attempts: number;
}

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

export class MockLndClient implements LightningBackend {
  private readonly invoices = new Map<string, MockInvoice>();
  private readonly byBolt11 = new Map<string, MockInvoice>();
  private readonly payments = new Map<string, MockPayment>();
  private readonly outcomes = new Map<string, MockPaymentOutcome>();
  private offline = false;

  feeEstimateSats: number;
  defaultFeeSats: number;
  payDelayMs: number;
  private readonly autoSettle: boolean;

  constructor(opts: MockLndOptions = {}) {
    this.feeEstimateSats = opts.feeEstimateSats ?? 2;
    this.defaultFeeSats = opts.defaultFeeSats ?? 1;
    this.payDelayMs = opts.payDelayMs ?? 0;
    this.autoSettle = opts.autoSettle ?? false;
  }

  async createInvoice(params: CreateInvoiceParams): Promise<Invoice> {
    this.assertOnline();
    const inv = this.register(params.amountSats, params.expirySecs ?? 600, MOCK_NODE_PUBKEY);
    return { paymentHash: inv.paymentHash, bolt11: inv.bolt11, expiresAt: inv.expiresAt };
  }

  async lookupInvoice(paymentHash: string): Promise<InvoiceInfo> {
    this.assertOnline();
    const inv = this.invoices.get(paymentHash);
    if (!inv) {
      return { settled: false, valueSats: 0, amtPaidSats: 0, state: "OPEN" };
    }
    if (this.autoSettle && inv.destination === MOCK_NODE_PUBKEY) inv.settled = true;
    return {
      settled: inv.settled,
      valueSats: inv.amountSats,
      amtPaidSats: inv.settled ? inv.amountSats : 0,
      state: inv.settled ? "SETTLED" : "OPEN",
    };
  }

  async decodeInvoice(bolt11: string): Promise<DecodedInvoice> {
    this.assertOnline();
    const inv = this.byBolt11.get(bolt11);
    if (!inv) throw new Error(`MockLndClient: cannot decode ${bolt11}`);
    return {
      paymentHash: inv.paymentHash,
      amountSats: inv.amountSats,
      expiresAt: inv.expiresAt,
      destination: inv.destination,
    };
  }

  async estimateFee(bolt11: string): Promise<number> {
    this.assertOnline();
    if (!this.byBolt11.has(bolt11)) {
      throw new Error(`MockLndClient: no route for ${bolt11}`);
    }
    return this.feeEstimateSats;
  }

  async payInvoice(params: PayInvoiceParams): Promise<PaymentResult> {
    this.assertOnline();
    const inv = this.byBolt11.get(params.bolt11);
    if (!inv) throw new Error(`MockLndClient: cannot decode ${params.bolt11}`);
    const paymentHash = inv.paymentHash;

    const previous = this.payments.get(paymentHash);
    const attempts = (previous?.attempts ?? 0) + 1;
    if (previous?.status.status === "SUCCEEDED") {
      this.payments.set(paymentHash, { status: previous.status, attempts });
      return { status: "FAILED", paymentHash, reason: "invoice is already paid" };
    }

    if (this.payDelayMs > 0) await sleep(this.payDelayMs);

    const outcome = this.outcomes.get(paymentHash) ?? { kind: "succeed" };
    let result: PaymentResult;
    switch (outcome.kind) {
      case "succeed": {
        const feeSats = outcome.feeSats ?? this.defaultFeeSats;
        result = feeSats > params.maxFeeSats
          ? { status: "FAILED", paymentHash, reason: "fee limit exceeded" }
          : { status: "SUCCEEDED", paymentHash, preimage: inv.preimage, feeSats };
        break;
      }
      case "fail":
        result = { status: "FAILED", paymentHash, reason: outcome.reason ?? "no route" };
        break;
      case "in_flight":
        result = { status: "IN_FLIGHT", paymentHash };
        break;
    }

    if (result.status === "SUCCEEDED") inv.settled = true;
    this.payments.set(paymentHash, { status: result, attempts });
    return result;
  }

  async paymentStatus(paymentHash: string): Promise<PaymentStatus> {
    this.assertOnline();
    return this.payments.get(paymentHash)?.status ?? { status: "UNKNOWN", paymentHash };
  }

  // ── Test helpers ─────────────────────────────────────────────────

  /** Simulate payment settlement of an invoice we issued. Returns preimage hex. */
  settleInvoice(paymentHash: string): string {
    const inv = this.invoices.get(paymentHash);
    if (!inv) {
      throw new Error(`MockLndClient: unknown payment_hash ${paymentHash}`);
    }
    inv.settled = true;
    return inv.preimage;
  }

  /** An invoice issued by some other node, payable by the mint. */
  createExternalInvoice(amountSats: number, expirySecs = 600): Invoice {
    const inv = this.register(amountSats, expirySecs, EXTERNAL_NODE_PUBKEY);
    return { paymentHash: inv.paymentHash, bolt11: inv.bolt11, expiresAt: inv.expiresAt };
  }

  /** Script the result of paying the invoice with this hash. */
  setPaymentOutcome(paymentHash: string, outcome: MockPaymentOutcome): void {
    this.outcomes.set(paymentHash, outcome);
  }

  /** Resolve an IN_FLIGHT payment as the node eventually would. */
  resolvePayment(paymentHash: string, outcome: { kind: "succeed"; feeSats?: number } | { kind: "fail"; reason?: string }): void {
    const payment = this.payments.get(paymentHash);
    const inv = this.invoices.get(paymentHash);
    if (!payment || !inv) {
      throw new Error(`MockLndClient: no payment to ${paymentHash}`);
    }
    if (outcome.kind === "succeed") {
      inv.settled = true;
      payment.status = {
        status: "SUCCEEDED",
        paymentHash,
        preimage: inv.preimage,
        feeSats: outcome.feeSats ?? this.defaultFeeSats,
      };
    } else {
      payment.status = { status: "FAILED", paymentHash, reason: outcome.reason ?? "no route" };
    }
  }

  /** Number of payInvoice() calls made for this hash. */
  paymentAttempts(paymentHash: string): number {
    return this.payments.get(paymentHash)?.attempts ?? 0;
  }

  /** While offline, every backend call rejects. */
  setOffline(offline: boolean): void {
    this.offline = offline;
  }

  /** Test helper: check if an invoice exists. */
  hasInvoice(paymentHash: string): boolean {
    return this.invoices.has(paymentHash);
  }

  private register(amountSats: number, expirySecs: number, destination: string): MockInvoice {
    const preimageBytes = randomBytes(32);
    const paymentHash = createHash("sha256")
      .update(preimageBytes)
      .digest("hex");
    const inv: MockInvoice = {
      paymentHash,
      preimage: preimageBytes.toString("hex"),
      bolt11: `lnbcrt${amountSats}n1mock${paymentHash.slice(0, 20)}`,
      settled: false,
      amountSats,
      expiresAt: Math.floor(Date.now() / 1000) + expirySecs,
      destination,
    };
    this.invoices.set(paymentHash, inv);
    this.byBolt11.set(inv.bolt11, inv);
    return inv;
  }

  private assertOnline(): void {
    if (this.offline) throw new Error("MockLndClient: backend offline");
  }
}
