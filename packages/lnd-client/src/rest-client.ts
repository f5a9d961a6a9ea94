/**
 * LND REST client: uses HTTPS + macaroon auth.
 *
 * Wraps LND's REST API (typically port 8080).
 * TLS cert + macaroon pushed into headers.
 *
 * Payments go through the synchronous send endpoint. If the HTTP call
 * times out or dies mid-flight the node may still complete the payment, so
 * payInvoice() reports IN_FLIGHT and callers reconcile via paymentStatus().
 */

import { Agent, request } from "node:https";
import { readFileSync } from "node:fs";
import type {
  LightningBackend,
  CreateInvoiceParams,
  Invoice,
  InvoiceInfo,
  InvoiceState,
  DecodedInvoice,
  PayInvoiceParams,
  PaymentResult,
  PaymentStatus,
  LndRestClientOptions,
} from "./types.js";

const DEFAULT_REQUEST_TIMEOUT_MS = 30_000;
const DEFAULT_INVOICE_EXPIRY_SECS = 600;
const PAYMENTS_PAGE_SIZE = 500;
const INVOICE_STATES: readonly InvoiceState[] = ["OPEN", "SETTLED", "CANCELED", "ACCEPTED"];

export class LndRequestError extends Error {
  constructor(
    readonly method: string,
    readonly path: string,
    readonly statusCode: number,
    readonly body: string,
  ) {
    super(`LND REST ${method} ${path}: ${String(statusCode)} ${body}`);
    this.name = "LndRequestError";
  }
}

export class LndTimeoutError extends Error {
  constructor(method: string, path: string, timeoutMs: number) {
    super(`LND REST ${method} ${path}: no response after ${String(timeoutMs)}ms`);
    this.name = "LndTimeoutError";
  }
}

// ── Response narrowing ─────────────────────────────────────────────

type Json = Record<string, unknown>;

function asObject(value: unknown): Json {
  if (typeof value !== "object" || value === null || Array.isArray(value)) {
    throw new Error("LND REST: expected a JSON object");
  }
  return Object.fromEntries(Object.entries(value));
}

/** LND encodes int64 as strings; absent fields are zero-valued. */
function str(obj: Json, key: string): string {
  const v = obj[key];
  if (typeof v === "string") return v;
  if (typeof v === "number") return String(v);
  return "";
}

function int(obj: Json, key: string): number {
  const n = parseInt(str(obj, key) || "0", 10);
  return Number.isFinite(n) ? n : 0;
}

function b64ToHex(value: string): string {
  return Buffer.from(value, "base64").toString("hex");
}

function invoiceState(value: string): InvoiceState {
  return INVOICE_STATES.find((s) => s === value) ?? "OPEN";
}

function paymentStatusOf(payment: Json, paymentHash: string): PaymentStatus {
  switch (str(payment, "status")) {
    case "SUCCEEDED":
      return {
        status: "SUCCEEDED",
        paymentHash,
        preimage: str(payment, "payment_preimage"),
        feeSats: Math.ceil(int(payment, "fee_msat") / 1000),
      };
    case "FAILED":
      return { status: "FAILED", paymentHash, reason: str(payment, "failure_reason") };
    default:
      // IN_FLIGHT, INITIATED, or a state this client does not know: the
      // node has a record, so the payment was sent
      return { status: "IN_FLIGHT", paymentHash };
  }
}

export class LndRestClient implements LightningBackend {
  private readonly baseUrl: string;
  private readonly macaroonHex: string;
  private readonly agent: Agent;
  private readonly requestTimeoutMs: number;

  constructor(opts: LndRestClientOptions) {
    this.baseUrl = `https://${opts.host}`;
    this.macaroonHex = opts.macaroonPath
      ? readFileSync(opts.macaroonPath).toString("hex")
      : "";
    this.agent = opts.tlsCertPath
      ? new Agent({ ca: readFileSync(opts.tlsCertPath) })
      : new Agent({ rejectUnauthorized: false });
    this.requestTimeoutMs = opts.requestTimeoutMs ?? DEFAULT_REQUEST_TIMEOUT_MS;
  }

  /** Generic HTTPS JSON request helper. */
  protected httpRequest(
    method: string,
    path: string,
    body?: unknown,
    timeoutMs: number = this.requestTimeoutMs,
  ): Promise<Json> {
    return new Promise((resolve, reject) => {
      const url = new URL(path, this.baseUrl);
      const req = request(
        url,
        {
          method,
          agent: this.agent,
          headers: {
            ...(this.macaroonHex
              ? { "Grpc-Metadata-macaroon": this.macaroonHex }
              : {}),
            ...(body ? { "Content-Type": "application/json" } : {}),
          },
        },
        (res) => {
          let data = "";
          res.setEncoding("utf8");
          res.on("data", (chunk: string) => (data += chunk));
          res.on("end", () => {
            if (res.statusCode && res.statusCode >= 400) {
              reject(new LndRequestError(method, path, res.statusCode, data));
              return;
            }
            try {
              resolve(asObject(JSON.parse(data)));
            } catch (err) {
              reject(err instanceof Error ? err : new Error("LND REST: invalid JSON response"));
            }
          });
        },
      );
      req.setTimeout(timeoutMs, () => {
        req.destroy(new LndTimeoutError(method, path, timeoutMs));
      });
      req.on("error", reject);
      if (body) req.write(JSON.stringify(body));
      req.end();
    });
  }

  async createInvoice(params: CreateInvoiceParams): Promise<Invoice> {
    const expirySecs = params.expirySecs ?? DEFAULT_INVOICE_EXPIRY_SECS;
    const res = await this.httpRequest("POST", "/v1/invoices", {
      value: String(params.amountSats),
      memo: params.memo ?? "",
      expiry: String(expirySecs),
    });

    return {
      paymentHash: b64ToHex(str(res, "r_hash")),
      bolt11: str(res, "payment_request"),
      expiresAt: Math.floor(Date.now() / 1000) + expirySecs,
    };
  }

  async lookupInvoice(paymentHash: string): Promise<InvoiceInfo> {
    // LND REST: /v1/invoice/{r_hash_str} expects hex-encoded payment hash
    const res = await this.httpRequest("GET", `/v1/invoice/${paymentHash}`);
    const state = invoiceState(str(res, "state"));

    return {
      settled: state === "SETTLED",
      valueSats: int(res, "value"),
      amtPaidSats: int(res, "amt_paid_sat"),
      state,
    };
  }

  async decodeInvoice(bolt11: string): Promise<DecodedInvoice> {
    const res = await this.httpRequest("GET", `/v1/payreq/${encodeURIComponent(bolt11)}`);
    const msat = int(res, "num_msat");
    return {
      paymentHash: str(res, "payment_hash"),
      amountSats: msat > 0 ? Math.ceil(msat / 1000) : int(res, "num_satoshis"),
      expiresAt: int(res, "timestamp") + int(res, "expiry"),
      destination: str(res, "destination"),
    };
  }

  async estimateFee(bolt11: string): Promise<number> {
    const res = await this.httpRequest("POST", "/v2/router/route/estimatefee", {
      payment_request: bolt11,
      timeout: 30,
    });
    return Math.ceil(int(res, "routing_fee_msat") / 1000);
  }

  async payInvoice(params: PayInvoiceParams): Promise<PaymentResult> {
    const decoded = await this.decodeInvoice(params.bolt11);
    let res: Json;
    try {
      res = await this.httpRequest(
        "POST",
        "/v1/channels/transactions",
        {
          payment_request: params.bolt11,
          fee_limit: { fixed: String(params.maxFeeSats) },
        },
        params.timeoutSecs * 1000,
      );
    } catch (err) {
      // The node may have accepted the HTLC before the connection failed.
      if (err instanceof LndRequestError && err.statusCode < 500) {
        return { status: "FAILED", paymentHash: decoded.paymentHash, reason: err.body };
      }
      return { status: "IN_FLIGHT", paymentHash: decoded.paymentHash };
    }

    const paymentError = str(res, "payment_error");
    if (paymentError) {
      return { status: "FAILED", paymentHash: decoded.paymentHash, reason: paymentError };
    }
    const route = res["payment_route"] ? asObject(res["payment_route"]) : {};
    return {
      status: "SUCCEEDED",
      paymentHash: decoded.paymentHash,
      preimage: b64ToHex(str(res, "payment_preimage")),
      feeSats: Math.ceil(int(route, "total_fees_msat") / 1000),
    };
  }

  /**
   * Walks the node's payment history newest first, one page at a time,
   * until the hash turns up. UNKNOWN only once every page has been read;
   * a failed request throws instead.
   */
  async paymentStatus(paymentHash: string): Promise<PaymentStatus> {
    let offset: string | undefined;
    for (;;) {
      const query = new URLSearchParams({
        include_incomplete: "true",
        reversed: "true",
        max_payments: String(PAYMENTS_PAGE_SIZE),
      });
      if (offset !== undefined) query.set("index_offset", offset);
      const res = await this.httpRequest("GET", `/v1/payments?${query.toString()}`);

      const payments = Array.isArray(res["payments"]) ? res["payments"].map(asObject) : [];
      const match = payments.find((p) => str(p, "payment_hash") === paymentHash);
      if (match) return paymentStatusOf(match, paymentHash);

      // reversed: first_index_offset is the oldest payment on this page
      const next = str(res, "first_index_offset");
      if (payments.length < PAYMENTS_PAGE_SIZE || next === "" || next === "0" || next === offset) {
        return { status: "UNKNOWN", paymentHash };
      }
      offset = next;
    }
  }
}
