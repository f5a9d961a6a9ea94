/**
 * Swap route: POST /v1/swap
 * DocRef: NUT-03
 */

import type { FastifyInstance } from "fastify";
import { SwapRequest, type SwapResponse } from "@satmint/protocol";
import type { Mint } from "../mint.js";

export function swapRoutes(app: FastifyInstance, mint: Mint): void {
  app.post<{ Body: SwapRequest }>(
    "/v1/swap",
    { schema: { body: SwapRequest } },
    async (request, reply) => {
      const signatures = await mint.swap(request.body.inputs, request.body.outputs);
      const body: SwapResponse = { signatures };
      return reply.send(body);
    },
  );
}
