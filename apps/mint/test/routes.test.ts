/**
 * HTTP surface through app.inject: bodies, status codes, error shape.
 */

import { describe, it, expect, beforeEach, afterEach } from "vitest";
import type { FastifyInstance } from "fastify";
import { MockLndClient } from "@satmint/lnd-client";
import {
  fingerprint,
  pointFromHex,
  splitAmount,
  unblindSignature,
  type BlindedSignature,
  type BlindedSecret,
  type KeysResponse,
  type MeltQuoteResponse,
  type MintQuoteResponse,
  type Proof,
  type PublicKeys,
} from "@satmint/protocol";
import { buildApp } from "../src/server.js";
import { MemoryMintStore } from "../src/storage/memory-store.js";
import { SEED, prepareOutputs, testSettings } from "./helpers.js";

let app: FastifyInstance;
let lnd: MockLndClient;
let keysetId: string;
let keys: PublicKeys;

beforeEach(async () => {
  lnd = new MockLndClient();
  app = await buildApp({
    lightning: lnd,
    store: new MemoryMintStore(),
    seed: SEED,
    settings: testSettings(),
    scheduler: false,
    logger: false,
  });
  const res = await app.inject({ method: "GET", url: "/v1/keys" });
  const body: KeysResponse = res.json();
  const [active] = body.keysets;
  if (!active) throw new Error("no active keyset");
  keysetId = active.id;
  keys = active.keys;
});

afterEach(async () => {
  await app.close();
});

function unblindAll(signatures: readonly BlindedSignature[], blinded: readonly BlindedSecret[]): Proof[] {
  return signatures.map((sig, i) => {
    const b = blinded[i];
    const K = keys[String(sig.amount)];
    if (!b || !K) throw new Error(`cannot unblind signature ${i}`);
    const C = unblindSignature(pointFromHex(sig.C_), b.r, pointFromHex(K));
    return { amount: sig.amount, id: sig.id, secret: b.secret, C: C.toHex(true) };
  });
}

/** Quote, settle and mint over HTTP. */
async function mintOverHttp(amount: number): Promise<Proof[]> {
  const quoteRes = await app.inject({
    method: "POST",
    url: "/v1/mint/quote/bolt11",
    payload: { amount, unit: "sat" },
  });
  const quote: MintQuoteResponse = quoteRes.json();
  lnd.settleInvoice((await lnd.decodeInvoice(quote.request)).paymentHash);

  const { outputs, blinded } = prepareOutputs(keysetId, splitAmount(amount));
  const res = await app.inject({
    method: "POST",
    url: "/v1/mint/bolt11",
    payload: { quote: quote.quote, outputs },
  });
  expect(res.statusCode).toBe(200);
  const body: { signatures: BlindedSignature[] } = res.json();
  return unblindAll(body.signatures, blinded);
}

describe("keys", () => {
  it("GET /v1/keys returns the active keyset", async () => {
    const res = await app.inject({ method: "GET", url: "/v1/keys" });
    expect(res.statusCode).toBe(200);
    const body: KeysResponse = res.json();
    expect(body.keysets).toHaveLength(1);
    expect(body.keysets[0]?.unit).toBe("sat");
    expect(Object.keys(keys)).toHaveLength(32);
  });

  it("GET /v1/keys/:id resolves a keyset, or fails UnknownKeyset", async () => {
    const ok = await app.inject({ method: "GET", url: `/v1/keys/${keysetId}` });
    expect(ok.statusCode).toBe(200);

    const missing = await app.inject({ method: "GET", url: "/v1/keys/00ffffffffffffff" });
    expect(missing.statusCode).toBe(400);
    expect(missing.json()).toEqual({ detail: "unknown keyset: 00ffffffffffffff", code: 12001 });
  });

  it("rejects malformed keyset ids at the schema", async () => {
    const res = await app.inject({ method: "GET", url: "/v1/keys/not-hex" });
    expect(res.statusCode).toBe(400);
    expect(res.json()).toMatchObject({ code: 10000 });
  });

  it("GET /v1/keysets lists keysets with fees", async () => {
    const res = await app.inject({ method: "GET", url: "/v1/keysets" });
    expect(res.json()).toEqual({
      keysets: [{ id: keysetId, unit: "sat", active: true, input_fee_ppk: 0 }],
    });
  });
});

describe("mint", () => {
  it("quote → paid → issued, then QuoteAlreadyIssued", async () => {
    const quoteRes = await app.inject({
      method: "POST",
      url: "/v1/mint/quote/bolt11",
      payload: { amount: 100, unit: "sat" },
    });
    expect(quoteRes.statusCode).toBe(200);
    const quote: MintQuoteResponse = quoteRes.json();
    expect(quote).toMatchObject({ amount: 100, unit: "sat", state: "UNPAID" });

    lnd.settleInvoice((await lnd.decodeInvoice(quote.request)).paymentHash);
    const state = await app.inject({ method: "GET", url: `/v1/mint/quote/bolt11/${quote.quote}` });
    expect(state.json()).toMatchObject({ state: "PAID" });

    const payload = { quote: quote.quote, outputs: prepareOutputs(keysetId, splitAmount(100)).outputs };
    const first = await app.inject({ method: "POST", url: "/v1/mint/bolt11", payload });
    expect(first.statusCode).toBe(200);

    const second = await app.inject({ method: "POST", url: "/v1/mint/bolt11", payload });
    expect(second.statusCode).toBe(400);
    expect(second.json()).toEqual({ detail: "Tokens have already been issued for quote", code: 20002 });
  });

  it("unknown quotes are 404", async () => {
    const res = await app.inject({ method: "GET", url: "/v1/mint/quote/bolt11/nope" });
    expect(res.statusCode).toBe(404);
    expect(res.json()).toEqual({ detail: "quote not found: nope", code: 20010 });
  });

  it("schema violations are InvalidRequest", async () => {
    const res = await app.inject({
      method: "POST",
      url: "/v1/mint/quote/bolt11",
      payload: { amount: 0, unit: "sat" },
    });
    expect(res.statusCode).toBe(400);
    expect(res.json()).toMatchObject({ code: 10000 });
  });

  it("a down backend is 502", async () => {
    lnd.setOffline(true);
    const res = await app.inject({
      method: "POST",
      url: "/v1/mint/quote/bolt11",
      payload: { amount: 1, unit: "sat" },
    });
    expect(res.statusCode).toBe(502);
    expect(res.json()).toEqual({ detail: "could not create invoice", code: 20012 });
  });
});

describe("swap and checkstate", () => {
  it("swaps and reports the inputs spent", async () => {
    const proofs = await mintOverHttp(64);
    const res = await app.inject({
      method: "POST",
      url: "/v1/swap",
      payload: { inputs: proofs, outputs: prepareOutputs(keysetId, [32, 32]).outputs },
    });
    expect(res.statusCode).toBe(200);
    const body: { signatures: BlindedSignature[] } = res.json();
    expect(body.signatures.map((s) => s.amount)).toEqual([32, 32]);

    const Ys = proofs.map((p) => fingerprint(p.secret));
    const states = await app.inject({ method: "POST", url: "/v1/checkstate", payload: { Ys } });
    expect(states.json()).toEqual({ states: Ys.map((Y) => ({ Y, state: "SPENT", witness: null })) });

    const again = await app.inject({
      method: "POST",
      url: "/v1/swap",
      payload: { inputs: proofs, outputs: prepareOutputs(keysetId, [64]).outputs },
    });
    expect(again.statusCode).toBe(400);
    expect(again.json()).toMatchObject({ code: 11001 });
  });

  it("keeps the status of a request Fastify cannot parse", async () => {
    const res = await app.inject({
      method: "POST",
      url: "/v1/swap",
      headers: { "content-type": "application/xml" },
      payload: "<swap/>",
    });
    expect(res.statusCode).toBe(415);
    expect(res.json()).toMatchObject({ code: 10000 });
  });

  it("rejects a checkstate request with a malformed Y", async () => {
    const res = await app.inject({ method: "POST", url: "/v1/checkstate", payload: { Ys: ["zz"] } });
    expect(res.statusCode).toBe(400);
    expect(res.json()).toMatchObject({ code: 10000 });
  });
});

describe("melt", () => {
  it("pays an invoice and returns the preimage", async () => {
    const invoice = lnd.createExternalInvoice(50);
    const quoteRes = await app.inject({
      method: "POST",
      url: "/v1/melt/quote/bolt11",
      payload: { request: invoice.bolt11, unit: "sat" },
    });
    const quote: MeltQuoteResponse = quoteRes.json();
    expect(quote).toMatchObject({ amount: 50, fee_reserve: 2, state: "UNPAID", payment_preimage: null });

    const proofs = await mintOverHttp(52);
    const res = await app.inject({
      method: "POST",
      url: "/v1/melt/bolt11",
      payload: { quote: quote.quote, inputs: proofs, outputs: prepareOutputs(keysetId, [0]).outputs },
    });
    expect(res.statusCode).toBe(200);
    const paid: MeltQuoteResponse = res.json();
    expect(paid.state).toBe("PAID");
    expect(paid.payment_preimage).toMatch(/^[0-9a-f]{64}$/);
    expect(paid.change?.map((c) => c.amount)).toEqual([1]);
  });

  it("an uncertain payment is 409 and the quote stays PENDING", async () => {
    const invoice = lnd.createExternalInvoice(10);
    lnd.setPaymentOutcome(invoice.paymentHash, { kind: "in_flight" });
    const quoteRes = await app.inject({
      method: "POST",
      url: "/v1/melt/quote/bolt11",
      payload: { request: invoice.bolt11, unit: "sat" },
    });
    const quote: MeltQuoteResponse = quoteRes.json();

    const res = await app.inject({
      method: "POST",
      url: "/v1/melt/bolt11",
      payload: { quote: quote.quote, inputs: await mintOverHttp(12) },
    });
    expect(res.statusCode).toBe(409);
    expect(res.json()).toMatchObject({ code: 20011 });

    const state = await app.inject({ method: "GET", url: `/v1/melt/quote/bolt11/${quote.quote}` });
    expect(state.json()).toMatchObject({ state: "PENDING" });
  });
});

describe("info", () => {
  it("GET /v1/info and /health", async () => {
    const info = await app.inject({ method: "GET", url: "/v1/info" });
    expect(info.json()).toMatchObject({ name: "test mint", nuts: { "7": { supported: true } } });

    const health = await app.inject({ method: "GET", url: "/health" });
    expect(health.json()).toMatchObject({ status: "ok" });
  });
});
