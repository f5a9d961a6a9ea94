/**
 * Mint server: Chaumian e-cash over Lightning.
 * DocRef: NUT-00 … NUT-08, NUT-12
 *
 * Routes:
 *   GET  /v1/keys, /v1/keys/:id, /v1/keysets   public keys
 *   POST /v1/mint/quote/bolt11, GET /v1/mint/quote/bolt11/:id, POST /v1/mint/bolt11
 *   POST /v1/melt/quote/bolt11, GET /v1/melt/quote/bolt11/:id, POST /v1/melt/bolt11
 *   POST /v1/swap        exchange proofs
 *   POST /v1/checkstate  proof states by Y
 *   GET  /v1/info        mint metadata
 *   GET  /health         health check
 *
 * Errors are { detail, code } with the status of their MintError kind.
 */

import { fileURLToPath } from "node:url";
import { resolve } from "node:path";
import { existsSync } from "node:fs";
import Fastify from "fastify";
import type { BaseLogger } from "pino";
import { MINT_ERRORS, isMintError } from "@satmint/protocol";
import { LndRestClient, MockLndClient, type LightningBackend } from "@satmint/lnd-client";
import { config, seedFromMnemonic, settingsFromConfig } from "./config.js";
import type { MintSettings } from "./context.js";
import { Mint } from "./mint.js";
import { createQuoteScheduler } from "./scheduler.js";
import { MemoryMintStore } from "./storage/memory-store.js";
import { PostgresMintStore } from "./storage/postgres-store.js";
import type { MintStore } from "./storage/types.js";
import { keysRoutes } from "./routes/keys.js";
import { mintRoutes } from "./routes/mint.js";
import { meltRoutes } from "./routes/melt.js";
import { swapRoutes } from "./routes/swap.js";
import { checkStateRoutes } from "./routes/checkstate.js";
import { infoRoutes } from "./routes/info.js";

export interface MintAppDeps {
  lightning?: LightningBackend;
  store?: MintStore;
  seed?: Uint8Array;
  settings?: MintSettings;
  clock?: () => number;
  /** Run the quote scheduler. Default true. */
  scheduler?: boolean;
  /** Fastify logger switch. Default: enabled at LOG_LEVEL. */
  logger?: boolean;
}

/** Real LND REST client from config, or an auto-settling mock (dev mode). */
export function createLightningBackend(log: BaseLogger): LightningBackend {
  if (config.lndMacaroonPath && existsSync(config.lndMacaroonPath)) {
    return new LndRestClient({
      host: config.lndHost,
      macaroonPath: config.lndMacaroonPath,
      tlsCertPath: config.lndTlsCertPath,
    });
  }
  if (config.lndMacaroonPath) {
    log.warn(`LND macaroon not found at ${config.lndMacaroonPath}, dev mode`);
  }
  log.warn("Lightning backend: in-process mock, invoices settle on first lookup");
  return new MockLndClient({ autoSettle: true });
}

export async function createStore(log: BaseLogger): Promise<MintStore> {
  if (!config.databaseUrl) {
    log.warn("No DATABASE_URL set, in-memory store, state is lost on restart");
    return new MemoryMintStore();
  }
  const store = PostgresMintStore.fromUrl(config.databaseUrl);
  await store.migrate();
  return store;
}

/** Mint wired from config, with any dependency overridden. */
export async function createMint(log: BaseLogger, deps: MintAppDeps = {}): Promise<Mint> {
  let seed = deps.seed;
  if (!seed) {
    const derived = seedFromMnemonic(config.mnemonic);
    if (derived.ephemeral) {
      log.warn("No MINT_MNEMONIC set, throwaway seed, issued tokens die with this process");
    }
    seed = derived.seed;
  }
  return Mint.create({
    store: deps.store ?? (await createStore(log)),
    lightning: deps.lightning ?? createLightningBackend(log),
    seed,
    settings: deps.settings ?? settingsFromConfig(config),
    log,
    clock: deps.clock,
  });
}

export async function buildApp(deps: MintAppDeps = {}) {
  const app = Fastify({
    logger: deps.logger === false ? false : { level: config.logLevel },
  });

  const mint = await createMint(app.log, deps);

  app.setErrorHandler((err, request, reply) => {
    if (isMintError(err)) {
      request.log.info({ kind: err.kind, code: err.code }, err.message);
      return reply.status(err.status).send(err.toJSON());
    }
    if (err.validation) {
      return reply
        .status(400)
        .send({ detail: err.message, code: MINT_ERRORS.InvalidRequest.code });
    }
    // Fastify's own client errors (413, 415, malformed JSON) keep their status
    if (err.statusCode !== undefined && err.statusCode < 500) {
      return reply
        .status(err.statusCode)
        .send({ detail: err.message, code: MINT_ERRORS.InvalidRequest.code });
    }
    request.log.error({ err }, "unhandled error");
    return reply.status(500).send({ detail: "Internal error", code: 0 });
  });

  keysRoutes(app, mint);
  mintRoutes(app, mint);
  meltRoutes(app, mint);
  swapRoutes(app, mint);
  checkStateRoutes(app, mint);
  infoRoutes(app, mint);

  if (deps.scheduler !== false) {
    const scheduler = createQuoteScheduler(mint, app.log, {
      intervalMs: config.schedulerIntervalMs,
    });
    app.addHook("onReady", async () => scheduler.start());
    app.addHook("onClose", async () => scheduler.stop());
  }
  app.addHook("onClose", async () => mint.close());

  return app;
}

// Run if executed directly (not when imported in tests)
if (
  process.argv[1] &&
  resolve(process.argv[1]) === fileURLToPath(import.meta.url)
) {
  const app = await buildApp();
  app.log.info(
    {
      port: config.port,
      units: config.units,
      store: config.databaseUrl ? "postgres" : "memory",
      lnd: config.lndMacaroonPath ? config.lndHost : "(mock, dev mode)",
    },
    "mint config",
  );
  app.listen({ port: config.port, host: config.host }, (err) => {
    if (err) {
      app.log.error(err);
      process.exit(1);
    }
  });
}
