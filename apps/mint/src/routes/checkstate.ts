/**
 * Token state route: POST /v1/checkstate
 * DocRef: NUT-07
 *
 * Unseen Ys report UNSPENT.
 */

import type { FastifyInstance } from "fastify";
import { CheckStateRequest, type CheckStateResponse } from "@satmint/protocol";
import type { Mint } from "../mint.js";

export function checkStateRoutes(app: FastifyInstance, mint: Mint): void {
  app.post<{ Body: CheckStateRequest }>(
    "/v1/checkstate",
    { schema: { body: CheckStateRequest } },
    async (request, reply) => {
      const body: CheckStateResponse = { states: await mint.checkState(request.body.Ys) };
      return reply.send(body);
    },
  );
}
