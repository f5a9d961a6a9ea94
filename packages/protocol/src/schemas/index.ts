/**
 * Schema barrel export.
 * All v1 wire types exchanged with wallets.
 */

export { CompressedPoint, KeysetId, Hex32, Amount, Unit, QuoteId, Timestamp, ErrorResponse } from "./common.js";

export { BlindedMessage, BlindedSignature, Dleq } from "./outputs.js";

export {
  Proof,
  ProofState,
  ProofStateEntry,
  CheckStateRequest,
  CheckStateResponse,
} from "./proof.js";

export {
  MintQuoteState,
  MintQuoteRequest,
  MintQuoteResponse,
  MintRequest,
  MintResponse,
} from "./mint-quote.js";

export {
  MeltQuoteState,
  MeltQuoteRequest,
  MeltQuoteResponse,
  MeltRequest,
} from "./melt-quote.js";

export { SwapRequest, SwapResponse } from "./swap.js";

export {
  KeysetKeys,
  KeysResponse,
  KeysetEntry,
  KeysetsResponse,
} from "./keys.js";

export { MintInfo, MethodSetting, ContactInfo } from "./info.js";
