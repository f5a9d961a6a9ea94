/**
 * Mint info.
 * DocRef: NUT-06
 */

import { Type, type Static } from "@sinclair/typebox";
import { Amount, Unit } from "./common.js";

export const ContactInfo = Type.Object({
  method: Type.String(),
  info: Type.String(),
});

export const MethodSetting = Type.Object({
  method: Type.String(),
  unit: Unit,
  min_amount: Type.Optional(Amount),
  max_amount: Type.Optional(Amount),
});

export type MethodSetting = Static<typeof MethodSetting>;

export const MintInfo = Type.Object({
  name: Type.String(),
  pubkey: Type.Optional(Type.String()),
  version: Type.String(),
  description: Type.String(),
  description_long: Type.Optional(Type.String()),
  contact: Type.Array(ContactInfo),
  motd: Type.Optional(Type.String()),
  time: Type.Integer({ minimum: 0 }),
  nuts: Type.Object({
    "4": Type.Object({ methods: Type.Array(MethodSetting), disabled: Type.Boolean() }),
    "5": Type.Object({ methods: Type.Array(MethodSetting), disabled: Type.Boolean() }),
    "7": Type.Object({ supported: Type.Boolean() }),
    "8": Type.Object({ supported: Type.Boolean() }),
    "12": Type.Object({ supported: Type.Boolean() }),
  }),
});

export type MintInfo = Static<typeof MintInfo>;
