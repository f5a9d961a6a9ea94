/**
 * Everything a mint operation needs, passed explicitly.
 */

import type { BaseLogger } from "pino";
import { MintError } from "@satmint/protocol";
import type { LightningBackend } from "@satmint/lnd-client";
import type { KeysetManager } from "./keysets/keyset-manager.js";
import type { BlindSigner } from "./signer.js";
import type { ProofTracker } from "./ledger/proof-tracker.js";
import type { MintStore } from "./storage/types.js";

export interface MintContact {
  method: string;
  info: string;
}

export interface MintSettings {
  units: string[];
  maxOrder: number;
  /** 0 = retired keysets verify forever. */
  keysetRetentionSecs: number;

  name: string;
  description: string;
  descriptionLong?: string;
  motd?: string;
  contact: MintContact[];

  /** Amount limits in the quote's unit. A max of 0 means no limit. */
  mintMinAmount: number;
  mintMaxAmount: number;
  meltMinAmount: number;
  meltMaxAmount: number;
  mintingDisabled: boolean;

  /** Lower bound for the melt fee reserve, in the quote's unit. */
  minFeeReserve: number;
  /** Fee reserve as a fraction of the melt amount (0.01 = 1%). */
  feePercent: number;
  quoteTtlSecs: number;
  lightningTimeoutMs: number;
}

export interface MintContext {
  store: MintStore;
  keysets: KeysetManager;
  signer: BlindSigner;
  proofs: ProofTracker;
  lightning: LightningBackend;
  settings: MintSettings;
  log: BaseLogger;
  /** Unix seconds. */
  clock: () => number;
}

export function assertAmountInRange(amount: number, min: number, max: number): void {
  if (amount < min || (max > 0 && amount > max)) {
    throw new MintError("AmountOutOfRange", `amount ${amount} outside [${min}, ${max > 0 ? max : "∞"}]`);
  }
}
