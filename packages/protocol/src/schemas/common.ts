/**
 * Shared field schemas.
 */

import { Type } from "@sinclair/typebox";

/** Compressed secp256k1 point (33 bytes). */
export const CompressedPoint = Type.String({ pattern: "^0[23][0-9a-f]{64}$" });

/** Keyset ID: version byte 00 + 7 bytes. */
export const KeysetId = Type.String({ pattern: "^[0-9a-f]{16}$" });

export const Hex32 = Type.String({ pattern: "^[0-9a-f]{64}$" });

export const Amount = Type.Integer({ minimum: 0, maximum: Number.MAX_SAFE_INTEGER });

export const Unit = Type.String({ minLength: 1, maxLength: 16 });

export const QuoteId = Type.String({ minLength: 1, maxLength: 128 });

/** Unix seconds. */
export const Timestamp = Type.Integer({ minimum: 0 });

export const ErrorResponse = Type.Object({
  detail: Type.String(),
  code: Type.Integer(),
});
