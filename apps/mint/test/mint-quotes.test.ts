/**
 * Mint path: quote → invoice paid → issue, exactly once.
 */

import { describe, it, expect } from "vitest";
import { fingerprint, pointFromHex, splitAmount, sumAmounts, verifyDleq } from "@satmint/protocol";
import { createTestMint, prepareOutputs, unblind } from "./helpers.js";
import { expectMintError } from "./expect-mint-error.js";

describe("mint quotes", () => {
  it("Scenario 1: quote, pay, issue once", async () => {
    const t = await createTestMint();
    const quote = await t.mint.createMintQuote({ amount: 1000, unit: "sat" });
    expect(quote.state).toBe("UNPAID");
    expect(quote.amount).toBe(1000);
    expect(quote.request.startsWith("lnbcrt1000n1mock")).toBe(true);

    t.lnd.settleInvoice(quote.paymentHash);
    expect((await t.mint.getMintQuote(quote.id)).state).toBe("PAID");

    const keysetId = t.mint.keysets.getActive("sat").id;
    const { outputs, blinded } = prepareOutputs(keysetId, splitAmount(1000));
    const signatures = await t.mint.mint(quote.id, outputs);
    expect(sumAmounts(signatures)).toBe(1000);
    expect(signatures.map((s) => s.amount)).toEqual([8, 32, 64, 128, 256, 512]);
    expect((await t.mint.getMintQuote(quote.id)).state).toBe("ISSUED");

    const proofs = unblind(t.mint, signatures, blinded);
    const states = await t.mint.checkState(proofs.map((p) => fingerprint(p.secret)));
    expect(states.every((s) => s.state === "UNSPENT")).toBe(true);

    const again = prepareOutputs(keysetId, splitAmount(1000));
    await expectMintError(t.mint.mint(quote.id, again.outputs), "QuoteAlreadyIssued");
  });

  it("issued signatures carry verifiable DLEQ proofs", async () => {
    const t = await createTestMint();
    const quote = await t.mint.createMintQuote({ amount: 5, unit: "sat" });
    t.lnd.settleInvoice(quote.paymentHash);

    const keyset = t.mint.keysets.getActive("sat");
    const { outputs, blinded } = prepareOutputs(keyset.id, [1, 4]);
    const signatures = await t.mint.mint(quote.id, outputs);

    signatures.forEach((sig, i) => {
      const K = keyset.publicKeys[String(sig.amount)];
      const b = blinded[i];
      if (!sig.dleq || !K || !b) throw new Error("missing dleq data");
      expect(verifyDleq(sig.dleq, pointFromHex(K), b.B_, pointFromHex(sig.C_))).toBe(true);
    });
  });

  it("polling after settlement is idempotent", async () => {
    const t = await createTestMint();
    const quote = await t.mint.createMintQuote({ amount: 10, unit: "sat" });
    t.lnd.settleInvoice(quote.paymentHash);

    const first = await t.mint.getMintQuote(quote.id);
    t.clock.advance(30);
    const second = await t.mint.getMintQuote(quote.id);
    expect(second.state).toBe("PAID");
    expect(second.paidAt).toBe(first.paidAt);
  });

  it("issue polls the backend once before refusing", async () => {
    const t = await createTestMint();
    const quote = await t.mint.createMintQuote({ amount: 2, unit: "sat" });
    const keysetId = t.mint.keysets.getActive("sat").id;

    await expectMintError(t.mint.mint(quote.id, prepareOutputs(keysetId, [2]).outputs), "QuoteNotPaid");

    // settled but never polled: issue sees it
    t.lnd.settleInvoice(quote.paymentHash);
    const signatures = await t.mint.mint(quote.id, prepareOutputs(keysetId, [2]).outputs);
    expect(signatures).toHaveLength(1);
  });

  it("an unpaid quote past expiry is QuoteExpired", async () => {
    const t = await createTestMint();
    const quote = await t.mint.createMintQuote({ amount: 2, unit: "sat" });
    t.clock.advance(700);
    const keysetId = t.mint.keysets.getActive("sat").id;
    await expectMintError(t.mint.mint(quote.id, prepareOutputs(keysetId, [2]).outputs), "QuoteExpired");
  });

  it("a quote paid before expiry can still be minted after it", async () => {
    const t = await createTestMint();
    const quote = await t.mint.createMintQuote({ amount: 2, unit: "sat" });
    t.lnd.settleInvoice(quote.paymentHash);
    t.clock.advance(601);

    const keysetId = t.mint.keysets.getActive("sat").id;
    const signatures = await t.mint.mint(quote.id, prepareOutputs(keysetId, [2]).outputs);
    expect(signatures.map((s) => s.amount)).toEqual([2]);
    expect((await t.mint.getMintQuote(quote.id)).state).toBe("ISSUED");
  });

  it("outputs must sum to the quote amount, and a failed issue can be retried", async () => {
    const t = await createTestMint();
    const quote = await t.mint.createMintQuote({ amount: 1000, unit: "sat" });
    t.lnd.settleInvoice(quote.paymentHash);
    const keysetId = t.mint.keysets.getActive("sat").id;

    await expectMintError(
      t.mint.mint(quote.id, prepareOutputs(keysetId, splitAmount(999)).outputs),
      "AmountMismatch",
    );
    expect((await t.mint.getMintQuote(quote.id)).state).toBe("PAID");

    const signatures = await t.mint.mint(quote.id, prepareOutputs(keysetId, splitAmount(1000)).outputs);
    expect(sumAmounts(signatures)).toBe(1000);
  });

  it("concurrent issue calls: exactly one succeeds", async () => {
    const t = await createTestMint();
    const quote = await t.mint.createMintQuote({ amount: 64, unit: "sat" });
    t.lnd.settleInvoice(quote.paymentHash);
    const keysetId = t.mint.keysets.getActive("sat").id;

    const results = await Promise.allSettled([
      t.mint.mint(quote.id, prepareOutputs(keysetId, [64]).outputs),
      t.mint.mint(quote.id, prepareOutputs(keysetId, [32, 32]).outputs),
    ]);
    expect(results.filter((r) => r.status === "fulfilled")).toHaveLength(1);
    const rejected = results.find((r) => r.status === "rejected");
    expect(rejected?.status === "rejected" && rejected.reason).toMatchObject({ kind: "QuoteAlreadyIssued" });
  });

  it("rejects duplicate outputs and outputs for a retired keyset", async () => {
    const t = await createTestMint();
    const quote = await t.mint.createMintQuote({ amount: 2, unit: "sat" });
    t.lnd.settleInvoice(quote.paymentHash);
    const oldId = t.mint.keysets.getActive("sat").id;

    const { outputs } = prepareOutputs(oldId, [1]);
    const dup = outputs[0];
    if (!dup) throw new Error("no output");
    await expectMintError(t.mint.mint(quote.id, [dup, dup]), "DuplicateOutputs");

    await t.mint.rotateKeyset("sat");
    await expectMintError(t.mint.mint(quote.id, prepareOutputs(oldId, [2]).outputs), "InactiveKeyset");
  });

  it("validates unit, limits and the minting switch", async () => {
    const limited = await createTestMint({ settings: { mintMaxAmount: 100 } });
    await expectMintError(limited.mint.createMintQuote({ amount: 101, unit: "sat" }), "AmountOutOfRange");
    await expectMintError(limited.mint.createMintQuote({ amount: 1, unit: "usd" }), "UnsupportedUnit");

    const disabled = await createTestMint({ settings: { mintingDisabled: true } });
    await expectMintError(disabled.mint.createMintQuote({ amount: 1, unit: "sat" }), "MintingDisabled");
  });

  it("unknown quotes are QuoteNotFound", async () => {
    const t = await createTestMint();
    await expectMintError(t.mint.getMintQuote("no-such-quote"), "QuoteNotFound");
  });

  it("a down backend is BackendUnavailable", async () => {
    const t = await createTestMint();
    t.lnd.setOffline(true);
    await expectMintError(t.mint.createMintQuote({ amount: 1, unit: "sat" }), "BackendUnavailable");
  });

  it("msat quotes invoice the rounded-up sat amount", async () => {
    const t = await createTestMint({ settings: { units: ["sat", "msat"] } });
    const quote = await t.mint.createMintQuote({ amount: 1500, unit: "msat" });
    expect(quote.request.startsWith("lnbcrt2n1mock")).toBe(true);
    expect(quote.unit).toBe("msat");
  });
});
