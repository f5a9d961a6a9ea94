/**
 * @satmint/lnd-client: Lightning backend abstraction.
 *
 * The mint imports the LightningBackend interface only.
 * Swap LndRestClient for MockLndClient in tests.
 */

export type {
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

export { LndRestClient, LndRequestError, LndTimeoutError } from "./rest-client.js";
export { MockLndClient, type MockPaymentOutcome, type MockLndOptions } from "./mock-client.js";
