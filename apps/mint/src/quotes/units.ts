/**
 * Lightning settles in sats; quotes are denominated in the keyset unit.
 * Only units with a fixed sat conversion can be paid over bolt11.
 */

import { MintError } from "@satmint/protocol";

const MSAT_PER_SAT = 1000;

export const LIGHTNING_UNITS: readonly string[] = ["sat", "msat"];

export function assertLightningUnit(unit: string): void {
  if (!LIGHTNING_UNITS.includes(unit)) {
    throw new MintError("UnsupportedUnit", `unit ${unit} cannot be settled over bolt11`);
  }
}

/** Unit amount → sats, rounding msat up. */
export function toSats(amount: number, unit: string): number {
  assertLightningUnit(unit);
  return unit === "msat" ? Math.ceil(amount / MSAT_PER_SAT) : amount;
}

/** Unit amount → whole sats, rounding msat down: a cap never exceeds the amount. */
export function toSatsFloor(amount: number, unit: string): number {
  assertLightningUnit(unit);
  return unit === "msat" ? Math.floor(amount / MSAT_PER_SAT) : amount;
}

export function fromSats(sats: number, unit: string): number {
  assertLightningUnit(unit);
  return unit === "msat" ? sats * MSAT_PER_SAT : sats;
}
