#!/usr/bin/env node
/**
 * satmint: mint admin CLI.
 *
 * Commands:
 *   serve                 Start the HTTP server (same as running server.ts)
 *   keysets               List keysets
 *   rotate --unit <unit>  Rotate the active keyset of a unit
 *   info                  Print mint info as JSON
 *
 * Reads the same env config as the server, so it talks to the same store.
 */

import { Command } from "commander";
import pino from "pino";
import { config } from "./config.js";
import { buildApp, createMint } from "./server.js";
import type { Mint } from "./mint.js";

const log = pino({ level: config.logLevel }, pino.destination(2));

/** Run against a mint without the HTTP surface, then release the store. */
async function withMint(fn: (mint: Mint) => Promise<void> | void): Promise<void> {
  const mint = await createMint(log);
  try {
    await fn(mint);
  } finally {
    await mint.close();
  }
}

const program = new Command();

program
  .name("satmint")
  .description("Chaumian e-cash mint over Lightning")
  .version("0.1.0");

// ── serve ───────────────────────────────────────────────────────────

program
  .command("serve")
  .description("Start the mint HTTP server")
  .option("-p, --port <port>", "Listen port override")
  .action(async (opts: { port?: string }) => {
    const port = opts.port ? parseInt(opts.port, 10) : config.port;
    if (!Number.isInteger(port) || port <= 0 || port > 65535) {
      throw new Error(`invalid port: ${opts.port ?? ""}`);
    }
    const app = await buildApp();
    await app.listen({ port, host: config.host });
  });

// ── keysets ─────────────────────────────────────────────────────────

program
  .command("keysets")
  .description("List keysets (active first per unit)")
  .action(async () => {
    await withMint((mint) => {
      const keysets = mint.keysets.list();
      console.log(`${keysets.length} keyset(s):\n`);
      for (const k of keysets) {
        const status = k.active ? "active" : `retired ${new Date((k.retiredAt ?? 0) * 1000).toISOString()}`;
        console.log(`  ${k.id}  ${k.unit.padEnd(5)} #${k.counter}  ${status}`);
      }
    });
  });

// ── rotate ──────────────────────────────────────────────────────────

program
  .command("rotate")
  .description("Derive the next keyset for a unit and make it active")
  .requiredOption("-u, --unit <unit>", "Currency unit, e.g. sat")
  .action(async (opts: { unit: string }) => {
    await withMint(async (mint) => {
      const previous = mint.keysets.getActive(opts.unit);
      const next = await mint.rotateKeyset(opts.unit);
      console.log(`Rotated ${opts.unit}: ${previous.id} → ${next.id} (#${next.counter})`);
    });
  });

// ── info ────────────────────────────────────────────────────────────

program
  .command("info")
  .description("Print mint info (NUT-06) as JSON")
  .action(async () => {
    await withMint((mint) => {
      console.log(JSON.stringify(mint.getInfo(), null, 2));
    });
  });

program.parseAsync(process.argv).catch((err: Error) => {
  console.error(`\nError: ${err.message}`);
  process.exit(1);
});
