/**
 * @satmint/protocol: e-cash protocol primitives.
 *
 * Pure code only: no I/O, no state. The mint app and tooling import from
 * here, never the reverse.
 */

// Bytes
export { fromHex, toHex, utf8, hashBytes, sha256Hex, concat, type PointHex } from "./hex.js";

// Denominations
export {
  isPowerOfTwo,
  denominationOrder,
  splitAmount,
  sumAmounts,
  blankOutputCount,
} from "./amount.js";

// Blind DH key exchange
export {
  CURVE_ORDER,
  G,
  hashToCurve,
  fingerprint,
  pointFromHex,
  scalarFromBytes,
  publicKeyHex,
  randomScalar,
  signBlinded,
  verifyUnblinded,
  blindMessage,
  unblindSignature,
  type Point,
  type BlindedSecret,
} from "./dhke.js";

// DLEQ proofs
export { createDleq, verifyDleq, hashE, type DleqProof } from "./dleq.js";

// Keyset derivation
export {
  deriveKeyset,
  derivationPath,
  keysetIdFromKeys,
  publicKeysOf,
  unitIndex,
  type DerivedKey,
  type DerivedKeyset,
  type PublicKeys,
} from "./keyset.js";

// Errors
export { MINT_ERRORS, MintError, isMintError, type MintErrorKind } from "./errors.js";

// All schemas
export * from "./schemas/index.js";

// Constants
export * from "./constants.js";
