/**
 * Mint routes: Lightning in, e-cash out.
 * DocRef: NUT-04
 *
 * POST /v1/mint/quote/bolt11       request an invoice
 * GET  /v1/mint/quote/bolt11/:id   quote state (polls the invoice)
 * POST /v1/mint/bolt11             exchange a paid quote for signatures
 */

import type { FastifyInstance } from "fastify";
import { Type } from "@sinclair/typebox";
import {
  MintQuoteRequest,
  MintRequest,
  QuoteId,
  type MintResponse,
} from "@satmint/protocol";
import type { Mint } from "../mint.js";
import { mintQuoteResponse } from "../quotes/mint-quotes.js";

const QuoteParams = Type.Object({ id: QuoteId });

export function mintRoutes(app: FastifyInstance, mint: Mint): void {
  app.post<{ Body: MintQuoteRequest }>(
    "/v1/mint/quote/bolt11",
    { schema: { body: MintQuoteRequest } },
    async (request, reply) => {
      const quote = await mint.createMintQuote(request.body);
      return reply.send(mintQuoteResponse(quote));
    },
  );

  app.get<{ Params: { id: string } }>(
    "/v1/mint/quote/bolt11/:id",
    { schema: { params: QuoteParams } },
    async (request, reply) => {
      const quote = await mint.getMintQuote(request.params.id);
      return reply.send(mintQuoteResponse(quote));
    },
  );

  app.post<{ Body: MintRequest }>(
    "/v1/mint/bolt11",
    { schema: { body: MintRequest } },
    async (request, reply) => {
      const signatures = await mint.mint(request.body.quote, request.body.outputs);
      const body: MintResponse = { signatures };
      return reply.send(body);
    },
  );
}
