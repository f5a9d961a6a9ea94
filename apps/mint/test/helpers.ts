/**
 * Shared fixtures: a mint over the memory store and mock LND, plus the
 * wallet half of BDHKE to turn signatures into spendable proofs.
 */

import pino from "pino";
import { MockLndClient } from "@satmint/lnd-client";
import {
  blindMessage,
  pointFromHex,
  splitAmount,
  unblindSignature,
  type BlindedMessage,
  type BlindedSecret,
  type BlindedSignature,
  type Proof,
} from "@satmint/protocol";
import { Mint } from "../src/mint.js";
import type { MintSettings } from "../src/context.js";
import { MemoryMintStore } from "../src/storage/memory-store.js";
import type { MintStore } from "../src/storage/types.js";

export const SEED = new Uint8Array(64).fill(11);
export const silentLog = pino({ level: "silent" });

export function testSettings(overrides: Partial<MintSettings> = {}): MintSettings {
  return {
    units: ["sat"],
    maxOrder: 32,
    keysetRetentionSecs: 0,
    name: "test mint",
    description: "mint under test",
    contact: [],
    mintMinAmount: 1,
    mintMaxAmount: 0,
    meltMinAmount: 1,
    meltMaxAmount: 0,
    mintingDisabled: false,
    minFeeReserve: 0,
    feePercent: 0,
    quoteTtlSecs: 600,
    lightningTimeoutMs: 5_000,
    ...overrides,
  };
}

/** Controllable clock, starting at wall time. */
export class TestClock {
  now = Math.floor(Date.now() / 1000);

  readonly fn = (): number => this.now;

  advance(secs: number): void {
    this.now += secs;
  }
}

export interface TestMint {
  mint: Mint;
  lnd: MockLndClient;
  store: MintStore;
  clock: TestClock;
}

export async function createTestMint(
  opts: { settings?: Partial<MintSettings>; store?: MintStore; lnd?: MockLndClient } = {},
): Promise<TestMint> {
  const lnd = opts.lnd ?? new MockLndClient();
  const store = opts.store ?? new MemoryMintStore();
  const clock = new TestClock();
  const mint = await Mint.create({
    store,
    lightning: lnd,
    seed: SEED,
    settings: testSettings(opts.settings),
    log: silentLog,
    clock: clock.fn,
  });
  return { mint, lnd, store, clock };
}

// ── Wallet side ────────────────────────────────────────────────────

let secretCounter = 0;

export function nextSecret(): string {
  secretCounter++;
  return `test-secret-${secretCounter}-${Math.random().toString(16).slice(2)}`;
}

export interface PreparedOutputs {
  outputs: BlindedMessage[];
  blinded: BlindedSecret[];
}

/** Blinded outputs for the given denominations. */
export function prepareOutputs(keysetId: string, amounts: readonly number[]): PreparedOutputs {
  const blinded: BlindedSecret[] = [];
  const outputs = amounts.map((amount) => {
    const b = blindMessage(nextSecret());
    blinded.push(b);
    return { amount, id: keysetId, B_: b.B_.toHex(true) };
  });
  return { outputs, blinded };
}

/** Unblind signatures into proofs using the keyset's published keys. */
export function unblind(
  mint: Mint,
  signatures: readonly BlindedSignature[],
  blinded: readonly BlindedSecret[],
): Proof[] {
  return signatures.map((sig, i) => {
    const secret = blinded[i];
    if (!secret) throw new Error(`no blinding data for signature ${i}`);
    const keys = mint.getKeysetKeys(sig.id).keys;
    const K = keys[String(sig.amount)];
    if (!K) throw new Error(`no key for ${sig.amount}`);
    const C = unblindSignature(pointFromHex(sig.C_), secret.r, pointFromHex(K));
    return { amount: sig.amount, id: sig.id, secret: secret.secret, C: C.toHex(true) };
  });
}

/** Mint quote → settle → issue → unblind. */
export async function mintProofs(t: TestMint, amount: number, unit = "sat"): Promise<Proof[]> {
  const quote = await t.mint.createMintQuote({ amount, unit });
  t.lnd.settleInvoice(quote.paymentHash);
  const keysetId = t.mint.keysets.getActive(unit).id;
  const { outputs, blinded } = prepareOutputs(keysetId, splitAmount(amount));
  const signatures = await t.mint.mint(quote.id, outputs);
  return unblind(t.mint, signatures, blinded);
}
