/**
 * LndRestClient payment lookup against scripted REST responses. No node
 * is involved: httpRequest is replaced by a queue of pages.
 */

import { describe, it, expect } from "vitest";
import { LndRestClient } from "../src/index.js";

type Page = Record<string, unknown>;

class ScriptedLndClient extends LndRestClient {
  readonly paths: string[] = [];

  constructor(private readonly pages: Page[]) {
    super({ host: "localhost:8080", macaroonPath: "", tlsCertPath: "" });
  }

  protected override async httpRequest(method: string, path: string): Promise<Page> {
    this.paths.push(`${method} ${path}`);
    const page = this.pages.shift();
    if (!page) throw new Error("connection refused");
    return page;
  }
}

const HASH = "ab".repeat(32);

function otherPayments(count: number): Page[] {
  return Array.from({ length: count }, (_, i) => ({
    payment_hash: i.toString(16).padStart(64, "0"),
    status: "SUCCEEDED",
  }));
}

describe("LndRestClient.paymentStatus", () => {
  it("pages back through the history until the payment turns up", async () => {
    const lnd = new ScriptedLndClient([
      { payments: otherPayments(500), first_index_offset: "1501", last_index_offset: "2000" },
      { payments: otherPayments(500), first_index_offset: "1001", last_index_offset: "1500" },
      {
        payments: [
          { payment_hash: HASH, status: "SUCCEEDED", payment_preimage: "cd".repeat(32), fee_msat: "1500" },
        ],
        first_index_offset: "1000",
        last_index_offset: "1000",
      },
    ]);

    expect(await lnd.paymentStatus(HASH)).toEqual({
      status: "SUCCEEDED",
      paymentHash: HASH,
      preimage: "cd".repeat(32),
      feeSats: 2,
    });
    expect(lnd.paths).toEqual([
      "GET /v1/payments?include_incomplete=true&reversed=true&max_payments=500",
      "GET /v1/payments?include_incomplete=true&reversed=true&max_payments=500&index_offset=1501",
      "GET /v1/payments?include_incomplete=true&reversed=true&max_payments=500&index_offset=1001",
    ]);
  });

  it("reports UNKNOWN only after the last page", async () => {
    const lnd = new ScriptedLndClient([
      { payments: otherPayments(500), first_index_offset: "501" },
      { payments: otherPayments(3), first_index_offset: "1" },
    ]);

    expect(await lnd.paymentStatus(HASH)).toEqual({ status: "UNKNOWN", paymentHash: HASH });
    expect(lnd.paths).toHaveLength(2);
  });

  it("throws when a page cannot be fetched", async () => {
    const lnd = new ScriptedLndClient([{ payments: otherPayments(500), first_index_offset: "501" }]);

    await expect(lnd.paymentStatus(HASH)).rejects.toThrow("connection refused");
  });

  it("maps recorded payments without a final state to IN_FLIGHT", async () => {
    const lnd = new ScriptedLndClient([
      { payments: [{ payment_hash: HASH, status: "INITIATED" }], first_index_offset: "7" },
      { payments: [{ payment_hash: HASH, status: "FAILED", failure_reason: "FAILURE_REASON_NO_ROUTE" }] },
    ]);

    expect(await lnd.paymentStatus(HASH)).toEqual({ status: "IN_FLIGHT", paymentHash: HASH });
    expect(await lnd.paymentStatus(HASH)).toEqual({
      status: "FAILED",
      paymentHash: HASH,
      reason: "FAILURE_REASON_NO_ROUTE",
    });
  });
});
