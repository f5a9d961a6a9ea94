/**
 * Keys routes: GET /v1/keys, /v1/keys/:id, /v1/keysets
 * DocRef: NUT-01, NUT-02
 */

import type { FastifyInstance } from "fastify";
import { Type } from "@sinclair/typebox";
import { KeysetId, type KeysResponse, type KeysetsResponse } from "@satmint/protocol";
import type { Mint } from "../mint.js";

const KeysetParams = Type.Object({ id: KeysetId });

export function keysRoutes(app: FastifyInstance, mint: Mint): void {
  app.get("/v1/keys", async (_request, reply) => {
    const body: KeysResponse = { keysets: mint.getKeys() };
    return reply.send(body);
  });

  app.get<{ Params: { id: string } }>(
    "/v1/keys/:id",
    { schema: { params: KeysetParams } },
    async (request, reply) => {
      const body: KeysResponse = { keysets: [mint.getKeysetKeys(request.params.id)] };
      return reply.send(body);
    },
  );

  app.get("/v1/keysets", async (_request, reply) => {
    const body: KeysetsResponse = { keysets: mint.getKeysets() };
    return reply.send(body);
  });
}
