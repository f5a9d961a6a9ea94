/**
 * Protocol constants.
 *
 * FIXED values change the wire format or derived key material: changing
 * them orphans every issued token. DEFAULTS are overridable by mint config.
 */

// ── Fixed ──────────────────────────────────────────────────────────
export const KEYSET_ID_VERSION = "00";
export const MAX_KEYSET_ORDER = 53; // 2^52 is the largest safe-integer denomination
export const PROTOCOL_VERSION = "v1";

// ── Defaults ───────────────────────────────────────────────────────
export const DEFAULT_UNIT = "sat";
export const DEFAULT_MAX_ORDER = 32; // denominations 1 … 2^31
export const DEFAULT_QUOTE_TTL_SECS = 10 * 60;
export const DEFAULT_LIGHTNING_TIMEOUT_MS = 60_000;

/** Upper bound on inputs/outputs per request. */
export const MAX_BATCH_SIZE = 1_000;

/** Payment method advertised in quotes and NUT-04/05 settings. */
export const PAYMENT_METHOD_BOLT11 = "bolt11";
