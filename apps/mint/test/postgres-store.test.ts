/**
 * PostgresMintStore against a scripted pg pool: transaction framing,
 * retries and row mapping. No database is involved.
 */

import { describe, it, expect, vi } from "vitest";
import { MintError } from "@satmint/protocol";
import { PostgresMintStore } from "../src/storage/postgres-store.js";
import { expectMintError } from "./expect-mint-error.js";

type Responder = (sql: string, params: unknown[]) => { rows: unknown[] };

function fakePool(respond: Responder = () => ({ rows: [] })) {
  const queries: string[] = [];
  const client = {
    query: vi.fn(async (sql: string, params: unknown[] = []) => {
      queries.push(sql.split("\n")[0]?.trim() ?? sql);
      return respond(sql, params);
    }),
    release: vi.fn(),
  };
  const pool = {
    connect: vi.fn(async () => client),
    end: vi.fn(async () => undefined),
  };
  return { pool, client, queries };
}

function serializationFailure(): Error {
  return Object.assign(new Error("could not serialize access"), { code: "40001" });
}

describe("PostgresMintStore", () => {
  it("wraps fn in a serializable transaction and commits", async () => {
    const { pool, client, queries } = fakePool();
    const store = new PostgresMintStore(pool as never);

    const result = await store.transaction(async (tx) => tx.getMintQuote("q1"));
    expect(result).toBeNull();
    expect(queries).toEqual([
      "BEGIN ISOLATION LEVEL SERIALIZABLE",
      "SELECT * FROM mint_quotes WHERE id = $1 FOR UPDATE",
      "COMMIT",
    ]);
    expect(client.release).toHaveBeenCalledWith(undefined);
  });

  it("rolls back and rethrows when fn fails", async () => {
    const { pool, queries } = fakePool();
    const store = new PostgresMintStore(pool as never);

    await expectMintError(
      store.transaction(async () => {
        throw new MintError("QuoteNotFound");
      }),
      "QuoteNotFound",
    );
    expect(queries).toEqual(["BEGIN ISOLATION LEVEL SERIALIZABLE", "ROLLBACK"]);
    expect(pool.connect).toHaveBeenCalledTimes(1);
  });

  it("re-runs fn after a serialization failure", async () => {
    let commits = 0;
    const { pool } = fakePool((sql) => {
      if (sql === "COMMIT" && commits++ === 0) throw serializationFailure();
      return { rows: [] };
    });
    const store = new PostgresMintStore(pool as never);
    const fn = vi.fn(async () => "done");

    await expect(store.transaction(fn)).resolves.toBe("done");
    expect(fn).toHaveBeenCalledTimes(2);
    expect(pool.connect).toHaveBeenCalledTimes(2);
  });

  it("gives up with StorageConflict after maxRetries", async () => {
    const { pool } = fakePool((sql) => {
      if (sql === "COMMIT") throw serializationFailure();
      return { rows: [] };
    });
    const store = new PostgresMintStore(pool as never, { maxRetries: 2 });

    await expectMintError(store.transaction(async () => 1), "StorageConflict");
    expect(pool.connect).toHaveBeenCalledTimes(3);
  });

  it("drops a connection whose rollback failed", async () => {
    const { pool, client } = fakePool((sql) => {
      if (sql === "ROLLBACK") throw new Error("connection terminated");
      return { rows: [] };
    });
    const store = new PostgresMintStore(pool as never);

    await expect(
      store.transaction(async () => {
        throw new Error("boom");
      }),
    ).rejects.toThrow("boom");
    expect(client.release).toHaveBeenCalledWith(expect.objectContaining({ message: "connection terminated" }));
  });

  it("maps int8 strings and JSON columns", async () => {
    const { pool } = fakePool((sql) => {
      if (!sql.startsWith("SELECT * FROM melt_quotes")) return { rows: [] };
      return {
        rows: [
          {
            id: "m1",
            unit: "sat",
            amount: "500",
            fee_reserve: "2",
            request: "lnbcrt500n1mock",
            payment_hash: "ab".repeat(32),
            state: "PAID",
            expiry: "1700000600",
            created_at: "1700000000",
            pending_at: "1700000005",
            paid_at: "1700000010",
            preimage: "cd".repeat(32),
            fee_paid: "1",
            change_outputs: null,
            change: [{ amount: 1, id: "00aabbccddeeff00", C_: "02" + "11".repeat(32) }],
          },
        ],
      };
    });
    const store = new PostgresMintStore(pool as never);

    const quote = await store.transaction((tx) => tx.getMeltQuote("m1"));
    expect(quote).toEqual({
      id: "m1",
      unit: "sat",
      amount: 500,
      feeReserve: 2,
      request: "lnbcrt500n1mock",
      paymentHash: "ab".repeat(32),
      state: "PAID",
      expiry: 1700000600,
      createdAt: 1700000000,
      pendingAt: 1700000005,
      paidAt: 1700000010,
      preimage: "cd".repeat(32),
      feePaid: 1,
      changeOutputs: null,
      change: [{ amount: 1, id: "00aabbccddeeff00", C_: "02" + "11".repeat(32) }],
    });
  });

  it("serializes change outputs as JSON and skips empty proof lookups", async () => {
    const { pool, client } = fakePool();
    const store = new PostgresMintStore(pool as never);
    const blank = { amount: 0, id: "00aabbccddeeff00", B_: "02" + "22".repeat(32) };

    await store.transaction(async (tx) => {
      expect((await tx.getProofs([])).size).toBe(0);
      await tx.saveMeltQuote({
        id: "m2",
        unit: "sat",
        amount: 10,
        feeReserve: 2,
        request: "lnbcrt10n1mock",
        paymentHash: "ef".repeat(32),
        state: "PENDING",
        expiry: 100,
        createdAt: 1,
        pendingAt: 5,
        paidAt: null,
        preimage: null,
        feePaid: null,
        changeOutputs: [blank],
        change: null,
      });
    });

    const insert = client.query.mock.calls.find(([sql]) => sql.startsWith("INSERT INTO melt_quotes"));
    expect(insert?.[1]?.[9]).toBe(5);
    expect(insert?.[1]?.[13]).toBe(JSON.stringify([blank]));
    expect(insert?.[1]?.[14]).toBeNull();
    expect(client.query).toHaveBeenCalledTimes(3);
  });

  it("locks every quote for a payment hash", async () => {
    const { pool, client, queries } = fakePool();
    const store = new PostgresMintStore(pool as never);

    const found = await store.transaction((tx) => tx.listMeltQuotesByPaymentHash("ab".repeat(32)));
    expect(found).toEqual([]);
    expect(queries[1]).toBe(
      "SELECT * FROM melt_quotes WHERE payment_hash = $1 ORDER BY created_at FOR UPDATE",
    );
    expect(client.query.mock.calls[1]?.[1]).toEqual(["ab".repeat(32)]);
  });
});
