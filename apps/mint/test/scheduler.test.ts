import { describe, it, expect, vi } from "vitest";
import { createQuoteScheduler } from "../src/scheduler.js";
import { createTestMint, mintProofs, silentLog } from "./helpers.js";
import { expectMintError } from "./expect-mint-error.js";

describe("quote scheduler", () => {
  it("marks paid quotes, reconciles pending melts and sweeps expired quotes", async () => {
    const t = await createTestMint();
    const scheduler = createQuoteScheduler(t.mint, silentLog, { expiredGraceSecs: 60 });

    const paidQuote = await t.mint.createMintQuote({ amount: 8, unit: "sat" });
    t.lnd.settleInvoice(paidQuote.paymentHash);

    const invoice = t.lnd.createExternalInvoice(100);
    const meltQuote = await t.mint.createMeltQuote({ request: invoice.bolt11, unit: "sat" });
    t.lnd.setPaymentOutcome(invoice.paymentHash, { kind: "in_flight" });
    await expectMintError(
      t.mint.melt({ quote: meltQuote.id, inputs: await mintProofs(t, 102) }),
      "PaymentUncertain",
    );
    t.lnd.resolvePayment(invoice.paymentHash, { kind: "succeed" });

    expect(await scheduler.tick()).toEqual({ paid: 1, reconciled: 1, swept: 0 });
    expect((await t.mint.getMintQuote(paidQuote.id)).state).toBe("PAID");
    expect((await t.mint.getMeltQuote(meltQuote.id)).state).toBe("PAID");

    const stale = await t.mint.createMintQuote({ amount: 4, unit: "sat" });
    t.clock.advance(1000);
    expect(await scheduler.tick()).toEqual({ paid: 0, reconciled: 0, swept: 1 });
    await expectMintError(t.mint.getMintQuote(stale.id), "QuoteNotFound");
  });

  it("keeps an expired quote whose invoice settled before the sweep", async () => {
    const t = await createTestMint();
    const scheduler = createQuoteScheduler(t.mint, silentLog, { expiredGraceSecs: 60 });
    const quote = await t.mint.createMintQuote({ amount: 8, unit: "sat" });
    t.lnd.settleInvoice(quote.paymentHash);
    t.clock.advance(1000);

    expect(await scheduler.tick()).toEqual({ paid: 0, reconciled: 0, swept: 0 });
    expect((await t.mint.getMintQuote(quote.id)).state).toBe("PAID");
  });

  it("does not sweep a quote whose final lookup fails", async () => {
    const t = await createTestMint();
    const scheduler = createQuoteScheduler(t.mint, silentLog, { expiredGraceSecs: 60 });
    const quote = await t.mint.createMintQuote({ amount: 8, unit: "sat" });
    t.clock.advance(1000);
    t.lnd.setOffline(true);

    expect(await scheduler.tick()).toEqual({ paid: 0, reconciled: 0, swept: 0 });
    t.lnd.setOffline(false);
    expect((await t.mint.getMintQuote(quote.id)).state).toBe("UNPAID");
  });

  it("leaves in-flight payments pending", async () => {
    const t = await createTestMint();
    const scheduler = createQuoteScheduler(t.mint, silentLog);
    const invoice = t.lnd.createExternalInvoice(10);
    const quote = await t.mint.createMeltQuote({ request: invoice.bolt11, unit: "sat" });
    t.lnd.setPaymentOutcome(invoice.paymentHash, { kind: "in_flight" });
    await expectMintError(t.mint.melt({ quote: quote.id, inputs: await mintProofs(t, 12) }), "PaymentUncertain");

    expect(await scheduler.tick()).toEqual({ paid: 0, reconciled: 0, swept: 0 });
    expect((await t.mint.getMeltQuote(quote.id)).state).toBe("PENDING");
  });

  it("survives an unreachable backend", async () => {
    const t = await createTestMint();
    const scheduler = createQuoteScheduler(t.mint, silentLog);
    await t.mint.createMintQuote({ amount: 8, unit: "sat" });
    t.lnd.setOffline(true);

    expect(await scheduler.tick()).toEqual({ paid: 0, reconciled: 0, swept: 0 });
  });

  it("skips a tick while another is running", async () => {
    const t = await createTestMint();
    const scheduler = createQuoteScheduler(t.mint, silentLog);
    const [first, second] = await Promise.all([scheduler.tick(), scheduler.tick()]);
    expect(first).toEqual({ paid: 0, reconciled: 0, swept: 0 });
    expect(second).toBeNull();
  });

  it("reports a failed pass and keeps going", async () => {
    const t = await createTestMint();
    const onError = vi.fn();
    const scheduler = createQuoteScheduler(t.mint, silentLog, { onError });
    const poll = vi.spyOn(t.mint, "pollMintQuotes").mockRejectedValueOnce(new Error("store down"));

    expect(await scheduler.tick()).toBeNull();
    expect(onError).toHaveBeenCalledWith(expect.objectContaining({ message: "store down" }));
    expect(await scheduler.tick()).toEqual({ paid: 0, reconciled: 0, swept: 0 });
    expect(poll).toHaveBeenCalledTimes(2);
  });

  it("ticks immediately on start", async () => {
    const t = await createTestMint();
    const onTick = vi.fn();
    const scheduler = createQuoteScheduler(t.mint, silentLog, { intervalMs: 60_000, onTick });
    scheduler.start();
    try {
      await vi.waitFor(() => expect(onTick).toHaveBeenCalledTimes(1));
    } finally {
      scheduler.stop();
    }
  });
});
