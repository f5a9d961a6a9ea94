/**
 * PostgreSQL MintStore.
 *
 * Each transaction runs at SERIALIZABLE and locks the rows it reads with
 * SELECT … FOR UPDATE. Serialization failures (40001) and deadlocks
 * (40P01) re-run fn() from scratch up to maxRetries times, then surface
 * as StorageConflict. fn() must therefore have no side effects outside
 * the transaction.
 */

import { readFile } from "node:fs/promises";
import pg from "pg";
import type { PoolClient } from "pg";
import {
  MintError,
  type BlindedMessage,
  type BlindedSignature,
  type MeltQuoteState,
  type MintQuoteState,
  type ProofState,
  type PublicKeys,
} from "@satmint/protocol";
import type {
  KeysetRecord,
  MeltQuoteRecord,
  MintQuoteRecord,
  MintStore,
  MintTx,
  ProofRecord,
} from "./types.js";

const SCHEMA_URL = new URL("./schema.sql", import.meta.url);
const RETRYABLE_SQLSTATES = new Set(["40001", "40P01"]);
const DEFAULT_MAX_RETRIES = 5;

export interface PostgresStoreOptions {
  /** Re-runs of a transaction after a serialization failure. Default 5. */
  maxRetries?: number;
}

function isRetryable(err: unknown): boolean {
  return (
    typeof err === "object" &&
    err !== null &&
    "code" in err &&
    typeof err.code === "string" &&
    RETRYABLE_SQLSTATES.has(err.code)
  );
}

/** int8 columns come back as strings. */
function num(value: string | number): number {
  return typeof value === "number" ? value : Number(value);
}

function numOrNull(value: string | number | null): number | null {
  return value === null ? null : num(value);
}

// ── Row shapes ─────────────────────────────────────────────────────

interface KeysetRow {
  id: string;
  unit: string;
  counter: number;
  max_order: number;
  active: boolean;
  public_keys: PublicKeys;
  created_at: string;
  retired_at: string | null;
}

interface MintQuoteRow {
  id: string;
  unit: string;
  amount: string;
  request: string;
  payment_hash: string;
  state: MintQuoteState;
  expiry: string;
  created_at: string;
  paid_at: string | null;
  issued_at: string | null;
}

interface MeltQuoteRow {
  id: string;
  unit: string;
  amount: string;
  fee_reserve: string;
  request: string;
  payment_hash: string;
  state: MeltQuoteState;
  expiry: string;
  created_at: string;
  pending_at: string | null;
  paid_at: string | null;
  preimage: string | null;
  fee_paid: string | null;
  change_outputs: BlindedMessage[] | null;
  change: BlindedSignature[] | null;
}

interface ProofRow {
  y: string;
  amount: string;
  keyset_id: string;
  secret: string;
  c: string;
  state: ProofState;
  melt_quote_id: string | null;
  updated_at: string;
}

function toKeyset(row: KeysetRow): KeysetRecord {
  return {
    id: row.id,
    unit: row.unit,
    counter: row.counter,
    maxOrder: row.max_order,
    active: row.active,
    publicKeys: row.public_keys,
    createdAt: num(row.created_at),
    retiredAt: numOrNull(row.retired_at),
  };
}

function toMintQuote(row: MintQuoteRow): MintQuoteRecord {
  return {
    id: row.id,
    unit: row.unit,
    amount: num(row.amount),
    request: row.request,
    paymentHash: row.payment_hash,
    state: row.state,
    expiry: num(row.expiry),
    createdAt: num(row.created_at),
    paidAt: numOrNull(row.paid_at),
    issuedAt: numOrNull(row.issued_at),
  };
}

function toMeltQuote(row: MeltQuoteRow): MeltQuoteRecord {
  return {
    id: row.id,
    unit: row.unit,
    amount: num(row.amount),
    feeReserve: num(row.fee_reserve),
    request: row.request,
    paymentHash: row.payment_hash,
    state: row.state,
    expiry: num(row.expiry),
    createdAt: num(row.created_at),
    pendingAt: numOrNull(row.pending_at),
    paidAt: numOrNull(row.paid_at),
    preimage: row.preimage,
    feePaid: numOrNull(row.fee_paid),
    changeOutputs: row.change_outputs,
    change: row.change,
  };
}

function toProof(row: ProofRow): ProofRecord {
  return {
    y: row.y,
    amount: num(row.amount),
    keysetId: row.keyset_id,
    secret: row.secret,
    C: row.c,
    state: row.state,
    meltQuoteId: row.melt_quote_id,
    updatedAt: num(row.updated_at),
  };
}

// ── Transaction ────────────────────────────────────────────────────

class PgTx implements MintTx {
  constructor(private readonly client: PoolClient) {}

  async listKeysets(unit?: string): Promise<KeysetRecord[]> {
    const res = unit === undefined
      ? await this.client.query<KeysetRow>("SELECT * FROM keysets ORDER BY unit, counter")
      : await this.client.query<KeysetRow>(
          "SELECT * FROM keysets WHERE unit = $1 ORDER BY counter FOR UPDATE",
          [unit],
        );
    return res.rows.map(toKeyset);
  }

  async getKeyset(id: string): Promise<KeysetRecord | null> {
    const res = await this.client.query<KeysetRow>("SELECT * FROM keysets WHERE id = $1", [id]);
    const row = res.rows[0];
    return row ? toKeyset(row) : null;
  }

  async saveKeyset(k: KeysetRecord): Promise<void> {
    await this.client.query(
      `INSERT INTO keysets (id, unit, counter, max_order, active, public_keys, created_at, retired_at)
       VALUES ($1, $2, $3, $4, $5, $6, $7, $8)
       ON CONFLICT (id) DO UPDATE SET active = EXCLUDED.active, retired_at = EXCLUDED.retired_at`,
      [k.id, k.unit, k.counter, k.maxOrder, k.active, JSON.stringify(k.publicKeys), k.createdAt, k.retiredAt],
    );
  }

  async getMintQuote(id: string): Promise<MintQuoteRecord | null> {
    const res = await this.client.query<MintQuoteRow>(
      "SELECT * FROM mint_quotes WHERE id = $1 FOR UPDATE",
      [id],
    );
    const row = res.rows[0];
    return row ? toMintQuote(row) : null;
  }

  async listMintQuotes(state: MintQuoteState): Promise<MintQuoteRecord[]> {
    const res = await this.client.query<MintQuoteRow>(
      "SELECT * FROM mint_quotes WHERE state = $1 ORDER BY created_at",
      [state],
    );
    return res.rows.map(toMintQuote);
  }

  async saveMintQuote(q: MintQuoteRecord): Promise<void> {
    await this.client.query(
      `INSERT INTO mint_quotes (id, unit, amount, request, payment_hash, state, expiry, created_at, paid_at, issued_at)
       VALUES ($1, $2, $3, $4, $5, $6, $7, $8, $9, $10)
       ON CONFLICT (id) DO UPDATE SET state = EXCLUDED.state, paid_at = EXCLUDED.paid_at, issued_at = EXCLUDED.issued_at`,
      [q.id, q.unit, q.amount, q.request, q.paymentHash, q.state, q.expiry, q.createdAt, q.paidAt, q.issuedAt],
    );
  }

  async deleteMintQuote(id: string): Promise<void> {
    await this.client.query("DELETE FROM mint_quotes WHERE id = $1", [id]);
  }

  async getMeltQuote(id: string): Promise<MeltQuoteRecord | null> {
    const res = await this.client.query<MeltQuoteRow>(
      "SELECT * FROM melt_quotes WHERE id = $1 FOR UPDATE",
      [id],
    );
    const row = res.rows[0];
    return row ? toMeltQuote(row) : null;
  }

  async listMeltQuotes(state: MeltQuoteState): Promise<MeltQuoteRecord[]> {
    const res = await this.client.query<MeltQuoteRow>(
      "SELECT * FROM melt_quotes WHERE state = $1 ORDER BY created_at",
      [state],
    );
    return res.rows.map(toMeltQuote);
  }

  async listMeltQuotesByPaymentHash(paymentHash: string): Promise<MeltQuoteRecord[]> {
    const res = await this.client.query<MeltQuoteRow>(
      "SELECT * FROM melt_quotes WHERE payment_hash = $1 ORDER BY created_at FOR UPDATE",
      [paymentHash],
    );
    return res.rows.map(toMeltQuote);
  }

  async saveMeltQuote(q: MeltQuoteRecord): Promise<void> {
    await this.client.query(
      `INSERT INTO melt_quotes (id, unit, amount, fee_reserve, request, payment_hash, state, expiry,
                                created_at, pending_at, paid_at, preimage, fee_paid, change_outputs, change)
       VALUES ($1, $2, $3, $4, $5, $6, $7, $8, $9, $10, $11, $12, $13, $14, $15)
       ON CONFLICT (id) DO UPDATE SET
         state = EXCLUDED.state, pending_at = EXCLUDED.pending_at, paid_at = EXCLUDED.paid_at,
         preimage = EXCLUDED.preimage,
         fee_paid = EXCLUDED.fee_paid, change_outputs = EXCLUDED.change_outputs, change = EXCLUDED.change`,
      [
        q.id, q.unit, q.amount, q.feeReserve, q.request, q.paymentHash, q.state, q.expiry,
        q.createdAt, q.pendingAt, q.paidAt, q.preimage, q.feePaid,
        q.changeOutputs === null ? null : JSON.stringify(q.changeOutputs),
        q.change === null ? null : JSON.stringify(q.change),
      ],
    );
  }

  async deleteMeltQuote(id: string): Promise<void> {
    await this.client.query("DELETE FROM melt_quotes WHERE id = $1", [id]);
  }

  async getProofs(ys: readonly string[]): Promise<Map<string, ProofRecord>> {
    const out = new Map<string, ProofRecord>();
    if (ys.length === 0) return out;
    const res = await this.client.query<ProofRow>(
      "SELECT * FROM proofs WHERE y = ANY($1::text[]) FOR UPDATE",
      [[...ys]],
    );
    for (const row of res.rows) out.set(row.y, toProof(row));
    return out;
  }

  async getProofsByMeltQuote(quoteId: string): Promise<ProofRecord[]> {
    const res = await this.client.query<ProofRow>(
      "SELECT * FROM proofs WHERE melt_quote_id = $1 FOR UPDATE",
      [quoteId],
    );
    return res.rows.map(toProof);
  }

  async saveProofs(proofs: readonly ProofRecord[]): Promise<void> {
    for (const p of proofs) {
      await this.client.query(
        `INSERT INTO proofs (y, amount, keyset_id, secret, c, state, melt_quote_id, updated_at)
         VALUES ($1, $2, $3, $4, $5, $6, $7, $8)
         ON CONFLICT (y) DO UPDATE SET
           state = EXCLUDED.state, melt_quote_id = EXCLUDED.melt_quote_id, updated_at = EXCLUDED.updated_at`,
        [p.y, p.amount, p.keysetId, p.secret, p.C, p.state, p.meltQuoteId, p.updatedAt],
      );
    }
  }
}

// ── Store ──────────────────────────────────────────────────────────

export class PostgresMintStore implements MintStore {
  private readonly maxRetries: number;

  constructor(
    private readonly pool: pg.Pool,
    opts: PostgresStoreOptions = {},
  ) {
    this.maxRetries = opts.maxRetries ?? DEFAULT_MAX_RETRIES;
  }

  static fromUrl(databaseUrl: string, opts?: PostgresStoreOptions): PostgresMintStore {
    return new PostgresMintStore(new pg.Pool({ connectionString: databaseUrl }), opts);
  }

  /** Create tables and indexes if missing. */
  async migrate(): Promise<void> {
    const sql = await readFile(SCHEMA_URL, "utf8");
    const client = await this.pool.connect();
    try {
      await client.query(sql);
    } finally {
      client.release();
    }
  }

  async transaction<T>(fn: (tx: MintTx) => Promise<T>): Promise<T> {
    for (let attempt = 0; ; attempt++) {
      const client = await this.pool.connect();
      let broken: Error | undefined;
      try {
        await client.query("BEGIN ISOLATION LEVEL SERIALIZABLE");
        const result = await fn(new PgTx(client));
        await client.query("COMMIT");
        return result;
      } catch (err) {
        try {
          await client.query("ROLLBACK");
        } catch (rollbackErr) {
          // connection is unusable; drop it from the pool
          broken = rollbackErr instanceof Error ? rollbackErr : new Error(String(rollbackErr));
        }
        if (!isRetryable(err)) throw err;
        if (attempt >= this.maxRetries) {
          throw new MintError("StorageConflict", `transaction aborted after ${attempt + 1} attempts`);
        }
      } finally {
        client.release(broken);
      }
    }
  }

  async close(): Promise<void> {
    await this.pool.end();
  }
}
