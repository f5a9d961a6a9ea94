/**
 * Persistence Store interface: the mint's sole source of truth.
 *
 * Every read-check-write runs inside transaction(fn). A transaction that
 * throws leaves no trace; one that resolves is durable before the caller
 * sees the result. Implementations: MemoryMintStore, PostgresMintStore.
 */

import type {
  BlindedMessage,
  BlindedSignature,
  MeltQuoteState,
  MintQuoteState,
  ProofState,
  PublicKeys,
} from "@satmint/protocol";

// ── Records ────────────────────────────────────────────────────────

/** Public half of a keyset. Private keys are re-derived from the seed. */
export interface KeysetRecord {
  id: string;
  unit: string;
  counter: number;
  maxOrder: number;
  active: boolean;
  publicKeys: PublicKeys;
  /** Unix seconds. */
  createdAt: number;
  /** Unix seconds; null while active. */
  retiredAt: number | null;
}

export interface MintQuoteRecord {
  id: string;
  unit: string;
  amount: number;
  /** bolt11 invoice the payer settles. */
  request: string;
  paymentHash: string;
  state: MintQuoteState;
  /** Unix seconds. */
  expiry: number;
  createdAt: number;
  paidAt: number | null;
  issuedAt: number | null;
}

export interface MeltQuoteRecord {
  id: string;
  unit: string;
  amount: number;
  feeReserve: number;
  request: string;
  paymentHash: string;
  state: MeltQuoteState;
  expiry: number;
  createdAt: number;
  /** Unix seconds the inputs were reserved; null unless PENDING. */
  pendingAt: number | null;
  paidAt: number | null;
  preimage: string | null;
  feePaid: number | null;
  /** Blank outputs submitted with melt, kept until the payment resolves. */
  changeOutputs: BlindedMessage[] | null;
  /** Signed change, returned on later lookups of a PAID quote. */
  change: BlindedSignature[] | null;
}

/** One row per ever-seen secret, keyed by its fingerprint Y. */
export interface ProofRecord {
  y: string;
  amount: number;
  keysetId: string;
  secret: string;
  C: string;
  state: ProofState;
  /** Melt quote holding the proof while PENDING / that spent it. */
  meltQuoteId: string | null;
  updatedAt: number;
}

// ── Store ──────────────────────────────────────────────────────────

export interface MintTx {
  listKeysets(unit?: string): Promise<KeysetRecord[]>;
  getKeyset(id: string): Promise<KeysetRecord | null>;
  /** Insert or replace. */
  saveKeyset(keyset: KeysetRecord): Promise<void>;

  getMintQuote(id: string): Promise<MintQuoteRecord | null>;
  listMintQuotes(state: MintQuoteState): Promise<MintQuoteRecord[]>;
  /** Insert or replace. */
  saveMintQuote(quote: MintQuoteRecord): Promise<void>;
  deleteMintQuote(id: string): Promise<void>;

  getMeltQuote(id: string): Promise<MeltQuoteRecord | null>;
  listMeltQuotes(state: MeltQuoteState): Promise<MeltQuoteRecord[]>;
  /** Every melt quote for the invoice with this payment hash. */
  listMeltQuotesByPaymentHash(paymentHash: string): Promise<MeltQuoteRecord[]>;
  saveMeltQuote(quote: MeltQuoteRecord): Promise<void>;
  deleteMeltQuote(id: string): Promise<void>;

  /** Rows for the given fingerprints; unseen fingerprints are absent. */
  getProofs(ys: readonly string[]): Promise<Map<string, ProofRecord>>;
  /** Proofs reserved by / spent for a melt quote. */
  getProofsByMeltQuote(quoteId: string): Promise<ProofRecord[]>;
  saveProofs(proofs: readonly ProofRecord[]): Promise<void>;
}

export interface MintStore {
  transaction<T>(fn: (tx: MintTx) => Promise<T>): Promise<T>;
  close(): Promise<void>;
}
