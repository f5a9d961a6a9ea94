/**
 * Melt routes: e-cash in, Lightning out.
 * DocRef: NUT-05, NUT-08
 *
 * POST /v1/melt/quote/bolt11       quote an invoice (amount + fee reserve)
 * GET  /v1/melt/quote/bolt11/:id   quote state (reconciles a pending payment)
 * POST /v1/melt/bolt11             pay the invoice with proofs
 *
 * The melt handler runs to completion even if the client disconnects;
 * a PENDING quote is resolved on the next lookup or scheduler tick.
 */

import type { FastifyInstance } from "fastify";
import { Type } from "@sinclair/typebox";
import { MeltQuoteRequest, MeltRequest, QuoteId } from "@satmint/protocol";
import type { Mint } from "../mint.js";
import { meltQuoteResponse } from "../quotes/melt-quotes.js";

const QuoteParams = Type.Object({ id: QuoteId });

export function meltRoutes(app: FastifyInstance, mint: Mint): void {
  app.post<{ Body: MeltQuoteRequest }>(
    "/v1/melt/quote/bolt11",
    { schema: { body: MeltQuoteRequest } },
    async (request, reply) => {
      const quote = await mint.createMeltQuote(request.body);
      return reply.send(meltQuoteResponse(quote));
    },
  );

  app.get<{ Params: { id: string } }>(
    "/v1/melt/quote/bolt11/:id",
    { schema: { params: QuoteParams } },
    async (request, reply) => {
      const quote = await mint.getMeltQuote(request.params.id);
      return reply.send(meltQuoteResponse(quote));
    },
  );

  app.post<{ Body: MeltRequest }>(
    "/v1/melt/bolt11",
    { schema: { body: MeltRequest } },
    async (request, reply) => {
      const quote = await mint.melt({
        quote: request.body.quote,
        inputs: request.body.inputs,
        outputs: request.body.outputs,
      });
      return reply.send(meltQuoteResponse(quote));
    },
  );
}
