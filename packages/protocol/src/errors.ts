/**
 * Closed error taxonomy for mint operations.
 * DocRef: NUT error codes (mint responses carry { detail, code })
 *
 * Every rejection a caller can observe is one of these kinds. Validation
 * and state-conflict errors are raised before any state is mutated;
 * backend errors are raised after the reserved state was rolled back
 * (PaymentFailed) or deferred for reconciliation (PaymentUncertain).
 */

export const MINT_ERRORS = {
  InvalidRequest: { code: 10000, status: 400, message: "Invalid request" },
  InvalidProof: { code: 10003, status: 400, message: "Token could not be verified" },
  ProofNotUnspent: { code: 11001, status: 400, message: "Token is already spent or pending" },
  AmountMismatch: { code: 11002, status: 400, message: "Transaction is not balanced" },
  UnsupportedUnit: { code: 11005, status: 400, message: "Unit in request is not supported" },
  AmountOutOfRange: { code: 11006, status: 400, message: "Amount outside of limit range" },
  DuplicateInputs: { code: 11007, status: 400, message: "Duplicate inputs provided" },
  DuplicateOutputs: { code: 11008, status: 400, message: "Duplicate outputs provided" },
  UnitMismatch: { code: 11010, status: 400, message: "Inputs and outputs not of same unit" },
  UnknownKeyset: { code: 12001, status: 400, message: "Keyset is not known" },
  InactiveKeyset: { code: 12002, status: 400, message: "Keyset is inactive, cannot sign messages" },
  UnknownDenomination: { code: 12003, status: 400, message: "Amount has no key in keyset" },
  QuoteNotPaid: { code: 20001, status: 400, message: "Quote request is not paid" },
  QuoteAlreadyIssued: { code: 20002, status: 400, message: "Tokens have already been issued for quote" },
  MintingDisabled: { code: 20003, status: 400, message: "Minting is disabled" },
  PaymentFailed: { code: 20004, status: 400, message: "Lightning payment failed" },
  QuotePending: { code: 20005, status: 400, message: "Quote is pending" },
  InvoiceAlreadyPaid: { code: 20006, status: 400, message: "Invoice already paid" },
  QuoteExpired: { code: 20007, status: 400, message: "Quote is expired" },
  QuoteNotFound: { code: 20010, status: 404, message: "Quote not found" },
  PaymentUncertain: { code: 20011, status: 409, message: "Lightning payment outcome unknown" },
  BackendUnavailable: { code: 20012, status: 502, message: "Lightning backend unavailable" },
  StorageConflict: { code: 50001, status: 503, message: "Storage conflict, retry" },
} as const;

export type MintErrorKind = keyof typeof MINT_ERRORS;

export class MintError extends Error {
  readonly kind: MintErrorKind;
  readonly code: number;
  readonly status: number;

  constructor(kind: MintErrorKind, detail?: string) {
    const def = MINT_ERRORS[kind];
    super(detail ?? def.message);
    this.name = "MintError";
    this.kind = kind;
    this.code = def.code;
    this.status = def.status;
  }

  /** Wire body: { detail, code }. */
  toJSON(): { detail: string; code: number } {
    return { detail: this.message, code: this.code };
  }
}

export function isMintError(err: unknown, kind?: MintErrorKind): err is MintError {
  return err instanceof MintError && (kind === undefined || err.kind === kind);
}
