/**
 * Mint configuration.
 * All env access centralized here: no direct process.env elsewhere.
 */

import { generateMnemonic, mnemonicToSeedSync, validateMnemonic } from "@scure/bip39";
import { wordlist } from "@scure/bip39/wordlists/english";
import {
  DEFAULT_LIGHTNING_TIMEOUT_MS,
  DEFAULT_MAX_ORDER,
  DEFAULT_QUOTE_TTL_SECS,
  DEFAULT_UNIT,
} from "@satmint/protocol";
import type { MintContact, MintSettings } from "./context.js";

function env(key: string, fallback?: string): string {
  const val = process.env[key] ?? fallback;
  if (val === undefined) throw new Error(`Missing env: ${key}`);
  return val;
}

function int(key: string, fallback: number): number {
  const raw = env(key, String(fallback));
  const val = parseInt(raw, 10);
  if (!Number.isSafeInteger(val) || val < 0) throw new Error(`Invalid env ${key}: ${raw}`);
  return val;
}

function float(key: string, fallback: number): number {
  const raw = env(key, String(fallback));
  const val = Number(raw);
  if (!Number.isFinite(val) || val < 0) throw new Error(`Invalid env ${key}: ${raw}`);
  return val;
}

export const config = {
  port: int("MINT_PORT", 3338),
  host: env("MINT_HOST", "0.0.0.0"),
  logLevel: env("LOG_LEVEL", "info"),

  /** BIP-39 mnemonic. Empty = throwaway seed (dev mode only). */
  mnemonic: env("MINT_MNEMONIC", ""),
  units: env("MINT_UNITS", DEFAULT_UNIT)
    .split(",")
    .map((u) => u.trim())
    .filter((u) => u.length > 0),
  maxOrder: int("MINT_MAX_ORDER", DEFAULT_MAX_ORDER),
  /** 0 = retired keysets verify forever. */
  keysetRetentionSecs: int("MINT_KEYSET_RETENTION_SECS", 0),

  name: env("MINT_NAME", "satmint"),
  description: env("MINT_DESCRIPTION", "A Chaumian e-cash mint"),
  descriptionLong: env("MINT_DESCRIPTION_LONG", ""),
  motd: env("MINT_MOTD", ""),
  contactEmail: env("MINT_CONTACT_EMAIL", ""),
  contactNostr: env("MINT_CONTACT_NOSTR", ""),

  mintMinAmount: int("MINT_MIN_AMOUNT", 1),
  mintMaxAmount: int("MINT_MAX_AMOUNT", 0),
  meltMinAmount: int("MELT_MIN_AMOUNT", 1),
  meltMaxAmount: int("MELT_MAX_AMOUNT", 0),
  mintingDisabled: env("MINTING_DISABLED", "false") === "true",

  minFeeReserve: int("MIN_FEE_RESERVE", 2),
  /** Fraction of the melt amount, e.g. 0.01 = 1%. */
  feePercent: float("FEE_PERCENT", 0.01),
  quoteTtlSecs: int("QUOTE_TTL_SECS", DEFAULT_QUOTE_TTL_SECS),
  lightningTimeoutMs: int("LIGHTNING_TIMEOUT_MS", DEFAULT_LIGHTNING_TIMEOUT_MS),

  /** Empty = in-memory store (dev mode, state lost on restart). */
  databaseUrl: env("DATABASE_URL", ""),

  /** LND REST endpoint (host:port). Typically port 8080. */
  lndHost: env("LND_HOST", "localhost:8080"),
  lndMacaroonPath: env("LND_MACAROON_PATH", ""),
  lndTlsCertPath: env("LND_TLS_CERT_PATH", ""),

  schedulerIntervalMs: int("SCHEDULER_INTERVAL_MS", 10_000),
} as const;

export type MintConfig = typeof config;

export function settingsFromConfig(cfg: MintConfig): MintSettings {
  const contact: MintContact[] = [];
  if (cfg.contactEmail) contact.push({ method: "email", info: cfg.contactEmail });
  if (cfg.contactNostr) contact.push({ method: "nostr", info: cfg.contactNostr });

  return {
    units: [...cfg.units],
    maxOrder: cfg.maxOrder,
    keysetRetentionSecs: cfg.keysetRetentionSecs,
    name: cfg.name,
    description: cfg.description,
    ...(cfg.descriptionLong ? { descriptionLong: cfg.descriptionLong } : {}),
    ...(cfg.motd ? { motd: cfg.motd } : {}),
    contact,
    mintMinAmount: cfg.mintMinAmount,
    mintMaxAmount: cfg.mintMaxAmount,
    meltMinAmount: cfg.meltMinAmount,
    meltMaxAmount: cfg.meltMaxAmount,
    mintingDisabled: cfg.mintingDisabled,
    minFeeReserve: cfg.minFeeReserve,
    feePercent: cfg.feePercent,
    quoteTtlSecs: cfg.quoteTtlSecs,
    lightningTimeoutMs: cfg.lightningTimeoutMs,
  };
}

/**
 * BIP-39 seed for keyset derivation. Without a mnemonic a random one is
 * generated: keys change on every restart and issued tokens become
 * unverifiable.
 */
export function seedFromMnemonic(mnemonic: string): { seed: Uint8Array; ephemeral: boolean } {
  if (!mnemonic) {
    return { seed: mnemonicToSeedSync(generateMnemonic(wordlist)), ephemeral: true };
  }
  const normalized = mnemonic.trim().split(/\s+/).join(" ");
  if (!validateMnemonic(normalized, wordlist)) {
    throw new Error("MINT_MNEMONIC is not a valid BIP-39 mnemonic");
  }
  return { seed: mnemonicToSeedSync(normalized), ephemeral: false };
}
