/**
 * Mint info and keyset exchange: read-only.
 * DocRef: NUT-01, NUT-02, NUT-06
 */

import {
  PAYMENT_METHOD_BOLT11,
  type KeysetEntry,
  type KeysetKeys,
  type MethodSetting,
  type MintInfo,
} from "@satmint/protocol";
import type { MintContext } from "./context.js";
import type { KeysetRecord } from "./storage/types.js";
import { LIGHTNING_UNITS } from "./quotes/units.js";

export const MINT_VERSION = "satmint/0.1.0";

function keysetKeys(k: KeysetRecord): KeysetKeys {
  return { id: k.id, unit: k.unit, keys: { ...k.publicKeys } };
}

function methodSetting(unit: string, min: number, max: number): MethodSetting {
  return {
    method: PAYMENT_METHOD_BOLT11,
    unit,
    min_amount: min,
    ...(max > 0 ? { max_amount: max } : {}),
  };
}

export class MintInfoService {
  constructor(private readonly ctx: MintContext) {}

  /** Every keyset this mint still verifies. */
  getKeysets(): KeysetEntry[] {
    return this.ctx.keysets.list().map((k) => ({
      id: k.id,
      unit: k.unit,
      active: k.active,
      input_fee_ppk: 0,
    }));
  }

  /** Public keys of the active keysets. */
  getKeys(): KeysetKeys[] {
    return this.ctx.keysets.units().map((unit) => keysetKeys(this.ctx.keysets.getActive(unit)));
  }

  getKeysetKeys(id: string): KeysetKeys {
    return keysetKeys(this.ctx.keysets.getForVerification(id));
  }

  getInfo(): MintInfo {
    const { settings, clock } = this.ctx;
    const lnUnits = this.ctx.keysets.units().filter((u) => LIGHTNING_UNITS.includes(u));

    return {
      name: settings.name,
      version: MINT_VERSION,
      description: settings.description,
      ...(settings.descriptionLong ? { description_long: settings.descriptionLong } : {}),
      contact: settings.contact.map((c) => ({ method: c.method, info: c.info })),
      ...(settings.motd ? { motd: settings.motd } : {}),
      time: clock(),
      nuts: {
        "4": {
          methods: lnUnits.map((u) => methodSetting(u, settings.mintMinAmount, settings.mintMaxAmount)),
          disabled: settings.mintingDisabled,
        },
        "5": {
          methods: lnUnits.map((u) => methodSetting(u, settings.meltMinAmount, settings.meltMaxAmount)),
          disabled: false,
        },
        "7": { supported: true },
        "8": { supported: true },
        "12": { supported: true },
      },
    };
  }
}
