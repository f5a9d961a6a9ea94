/**
 * Info and health routes.
 * DocRef: NUT-06
 *
 * GET /v1/info  mint metadata and supported NUTs
 * GET /health   liveness
 */

import type { FastifyInstance } from "fastify";
import type { Mint } from "../mint.js";

export function infoRoutes(app: FastifyInstance, mint: Mint): void {
  app.get("/v1/info", async (_request, reply) => {
    return reply.send(mint.getInfo());
  });

  app.get("/health", async (_request, reply) => {
    return reply.send({ status: "ok", timestamp: Date.now() });
  });
}
