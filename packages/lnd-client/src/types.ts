/**
 * Lightning backend interface: the mint's only view of a Lightning node.
 *
 * The mint engine depends on this capability interface, never on a concrete
 * node type. LndRestClient talks to LND; MockLndClient runs in-process for
 * tests and dev mode.
 */

export interface CreateInvoiceParams {
  amountSats: number;
  memo?: string;
  expirySecs?: number;
}

export interface Invoice {
  /** Hex-encoded SHA256 payment hash (32 bytes). */
  paymentHash: string;
  /** BOLT11 encoded invoice string. */
  bolt11: string;
  /** Unix seconds. */
  expiresAt: number;
}

export type InvoiceState = "OPEN" | "SETTLED" | "CANCELED" | "ACCEPTED";

export interface InvoiceInfo {
  settled: boolean;
  valueSats: number;
  amtPaidSats: number;
  state: InvoiceState;
}

export interface DecodedInvoice {
  paymentHash: string;
  /** 0 for amountless invoices. */
  amountSats: number;
  /** Unix seconds. */
  expiresAt: number;
  /** Payee node pubkey (hex). */
  destination: string;
}

export interface PayInvoiceParams {
  bolt11: string;
  /** Routing fee cap. */
  maxFeeSats: number;
  /** Give up waiting after this long; the payment may still complete. */
  timeoutSecs: number;
}

/**
 * Outcome of a payment attempt.
 *
 * IN_FLIGHT means the node has not reported a final state (including
 * client-side timeouts): the caller must not retry with a new attempt and
 * must reconcile through paymentStatus().
 */
export type PaymentResult =
  | { status: "SUCCEEDED"; paymentHash: string; preimage: string; feeSats: number }
  | { status: "FAILED"; paymentHash: string; reason: string }
  | { status: "IN_FLIGHT"; paymentHash: string };

/** UNKNOWN: the node has no record of a payment to this hash. */
export type PaymentStatus =
  | PaymentResult
  | { status: "UNKNOWN"; paymentHash: string };

export interface LightningBackend {
  createInvoice(params: CreateInvoiceParams): Promise<Invoice>;
  lookupInvoice(paymentHash: string): Promise<InvoiceInfo>;
  decodeInvoice(bolt11: string): Promise<DecodedInvoice>;
  /** Expected routing fee to pay this invoice, sats. */
  estimateFee(bolt11: string): Promise<number>;
  payInvoice(params: PayInvoiceParams): Promise<PaymentResult>;
  paymentStatus(paymentHash: string): Promise<PaymentStatus>;
}

export interface LndRestClientOptions {
  /** LND REST host:port (e.g. "localhost:8080"). */
  host: string;
  /** Path to macaroon file. Empty = no auth (regtest only). */
  macaroonPath: string;
  /** Path to tls.cert file. Empty = skip TLS verification (regtest only). */
  tlsCertPath: string;
  /** Per-request timeout for non-payment calls. Default 30s. */
  requestTimeoutMs?: number;
}
