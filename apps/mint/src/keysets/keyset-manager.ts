/**
 * Keyset Manager: deterministic keysets and their lifecycle.
 * DocRef: NUT-01, NUT-02
 *
 * Private keys live only in this process, re-derived from the seed at
 * init(). The store holds the public half plus the derivation counter;
 * a stored ID that does not match its re-derivation means the seed is
 * wrong and init() refuses to start.
 */

import type { BaseLogger } from "pino";
import {
  MintError,
  deriveKeyset,
  publicKeysOf,
  type DerivedKey,
  type DerivedKeyset,
} from "@satmint/protocol";
import type { KeysetRecord, MintStore, MintTx } from "../storage/types.js";

export interface KeysetManagerOptions {
  seed: Uint8Array;
  /** Units with an active keyset. */
  units: readonly string[];
  maxOrder: number;
  /** How long a retired keyset still verifies proofs. 0 = forever. */
  retentionSecs: number;
  log: BaseLogger;
  clock?: () => number;
}

interface LoadedKeyset {
  record: KeysetRecord;
  derived: DerivedKeyset;
}

export class KeysetManager {
  private readonly byId = new Map<string, LoadedKeyset>();
  private readonly activeByUnit = new Map<string, string>();
  private readonly clock: () => number;

  private constructor(
    private readonly store: MintStore,
    private readonly opts: KeysetManagerOptions,
  ) {
    this.clock = opts.clock ?? (() => Math.floor(Date.now() / 1000));
  }

  /** Derive-or-load every configured unit's keysets. */
  static async init(store: MintStore, opts: KeysetManagerOptions): Promise<KeysetManager> {
    const manager = new KeysetManager(store, opts);
    await manager.load();
    return manager;
  }

  private async load(): Promise<void> {
    const records = await this.store.transaction(async (tx) => {
      for (const unit of this.opts.units) {
        const existing = await tx.listKeysets(unit);
        const active = existing.find((k) => k.active);
        if (!active) {
          const counter = existing.reduce((max, k) => Math.max(max, k.counter + 1), 0);
          await tx.saveKeyset(this.newRecord(unit, counter));
        } else if (active.maxOrder !== this.opts.maxOrder) {
          await this.replaceActive(tx, unit, existing);
        }
      }
      return tx.listKeysets();
    });

    for (const record of records) {
      const derived = deriveKeyset(this.opts.seed, record.unit, record.counter, record.maxOrder);
      if (derived.id !== record.id) {
        throw new Error(
          `keyset ${record.id} (${record.unit} #${record.counter}) does not match the configured seed`,
        );
      }
      this.remember(record, derived);
    }

    for (const unit of this.opts.units) {
      const active = this.getActive(unit);
      this.opts.log.info(
        { unit, keyset: active.id, counter: active.counter },
        "keyset manager: active keyset",
      );
    }
  }

  // ── Lookup ───────────────────────────────────────────────────────

  /** Units this mint issues. */
  units(): string[] {
    return [...this.opts.units];
  }

  getActive(unit: string): KeysetRecord {
    const id = this.opts.units.includes(unit) ? this.activeByUnit.get(unit) : undefined;
    const loaded = id ? this.byId.get(id) : undefined;
    if (!loaded) throw new MintError("UnsupportedUnit", `unit not supported: ${unit}`);
    return loaded.record;
  }

  /** Any keyset ever derived by this mint, active or not. */
  getById(id: string): KeysetRecord {
    const loaded = this.byId.get(id);
    if (!loaded) throw new MintError("UnknownKeyset", `unknown keyset: ${id}`);
    return loaded.record;
  }

  /** Keyset usable to verify a proof: known and inside the retention horizon. */
  getForVerification(id: string): KeysetRecord {
    const record = this.getById(id);
    if (this.isExpired(record)) {
      throw new MintError("UnknownKeyset", `keyset ${id} retired past retention`);
    }
    return record;
  }

  /** All keysets, active first within a unit. */
  list(): KeysetRecord[] {
    return [...this.byId.values()]
      .map((k) => k.record)
      .filter((k) => !this.isExpired(k))
      .sort((a, b) => a.unit.localeCompare(b.unit) || Number(b.active) - Number(a.active) || b.counter - a.counter);
  }

  /**
   * Private key for one denomination. Only the blind signer calls this.
   * Throws UnknownDenomination when the keyset has no key for `amount`.
   */
  signingKey(id: string, amount: number): DerivedKey {
    const loaded = this.byId.get(id);
    if (!loaded) throw new MintError("UnknownKeyset", `unknown keyset: ${id}`);
    const key = loaded.derived.keys.find((k) => k.amount === amount);
    if (!key) {
      throw new MintError("UnknownDenomination", `keyset ${id} has no key for amount ${amount}`);
    }
    return key;
  }

  // ── Rotation ─────────────────────────────────────────────────────

  /** Derive counter+1 for `unit`, make it active and retire the previous one. */
  async rotate(unit: string): Promise<KeysetRecord> {
    this.getActive(unit);
    const records = await this.store.transaction(async (tx) => {
      await this.replaceActive(tx, unit, await tx.listKeysets(unit));
      return tx.listKeysets(unit);
    });

    for (const record of records) {
      const known = this.byId.get(record.id);
      if (known) {
        known.record = record;
      } else {
        this.remember(record, deriveKeyset(this.opts.seed, unit, record.counter, record.maxOrder));
      }
      if (record.active) this.activeByUnit.set(unit, record.id);
    }

    const active = this.getActive(unit);
    this.opts.log.info({ unit, keyset: active.id, counter: active.counter }, "keyset manager: rotated");
    return active;
  }

  private async replaceActive(tx: MintTx, unit: string, existing: KeysetRecord[]): Promise<void> {
    const now = this.clock();
    // retire first: at most one active keyset per unit at any point
    for (const k of existing) {
      if (k.active) await tx.saveKeyset({ ...k, active: false, retiredAt: now });
    }
    const counter = existing.reduce((max, k) => Math.max(max, k.counter + 1), 0);
    await tx.saveKeyset(this.newRecord(unit, counter));
  }

  private newRecord(unit: string, counter: number): KeysetRecord {
    const derived = deriveKeyset(this.opts.seed, unit, counter, this.opts.maxOrder);
    return {
      id: derived.id,
      unit,
      counter,
      maxOrder: derived.maxOrder,
      active: true,
      publicKeys: publicKeysOf(derived.keys),
      createdAt: this.clock(),
      retiredAt: null,
    };
  }

  private remember(record: KeysetRecord, derived: DerivedKeyset): void {
    this.byId.set(record.id, { record, derived });
    if (record.active) this.activeByUnit.set(record.unit, record.id);
  }

  private isExpired(record: KeysetRecord): boolean {
    if (record.active || record.retiredAt === null || this.opts.retentionSecs <= 0) return false;
    return this.clock() - record.retiredAt > this.opts.retentionSecs;
  }
}
