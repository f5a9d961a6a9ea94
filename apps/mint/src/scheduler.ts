/**
 * Quote scheduler: drives asynchronous Lightning settlement.
 *
 * Every `intervalMs`:
 *   - polls UNPAID, unexpired mint quotes (UNPAID → PAID)
 *   - reconciles PENDING melt quotes against paymentStatus()
 *   - deletes UNPAID quotes expired longer than `expiredGraceSecs`
 *
 * Ticks never overlap: a tick that starts while another runs is skipped.
 * Each step is idempotent, so a crash mid-tick is harmless.
 */

import type { BaseLogger } from "pino";
import type { Mint } from "./mint.js";

export interface QuoteSchedulerOptions {
  /** How often to tick (ms). Default: 10_000. */
  intervalMs?: number;
  /** Keep expired UNPAID quotes this long before deleting. Default: 86_400 (1 day). */
  expiredGraceSecs?: number;
  /** Callback after each completed tick. */
  onTick?: (result: TickResult) => void;
  /** Callback for errors. */
  onError?: (error: unknown) => void;
}

export interface TickResult {
  /** Mint quotes that became PAID. */
  paid: number;
  /** Melt quotes that left PENDING. */
  reconciled: number;
  /** Expired quotes deleted. */
  swept: number;
}

export interface QuoteScheduler {
  start(): void;
  stop(): void;
  /** Run one pass now. Resolves null when a pass is already running or it failed. */
  tick(): Promise<TickResult | null>;
}

const DEFAULT_INTERVAL_MS = 10_000;
const DEFAULT_EXPIRED_GRACE_SECS = 24 * 60 * 60;

export function createQuoteScheduler(
  mint: Mint,
  log: BaseLogger,
  options: QuoteSchedulerOptions = {},
): QuoteScheduler {
  const intervalMs = options.intervalMs ?? DEFAULT_INTERVAL_MS;
  const expiredGraceSecs = options.expiredGraceSecs ?? DEFAULT_EXPIRED_GRACE_SECS;
  const onError = options.onError ?? ((err) => log.error({ err }, "scheduler: tick failed"));

  let timer: ReturnType<typeof setInterval> | null = null;
  let running = false;

  async function tick(): Promise<TickResult | null> {
    if (running) return null;
    running = true;
    try {
      const result: TickResult = {
        paid: await mint.pollMintQuotes(),
        reconciled: await mint.reconcileMeltQuotes(),
        swept: await mint.sweepExpiredQuotes(expiredGraceSecs),
      };
      if (result.paid + result.reconciled + result.swept > 0) {
        log.info(result, "scheduler: tick");
      }
      options.onTick?.(result);
      return result;
    } catch (err) {
      onError(err);
      return null;
    } finally {
      running = false;
    }
  }

  return {
    start() {
      if (timer) return; // already running
      timer = setInterval(() => {
        void tick();
      }, intervalMs);
      // Immediate first tick: resolve whatever was pending at shutdown
      void tick();
    },

    stop() {
      if (timer) {
        clearInterval(timer);
        timer = null;
      }
    },

    tick,
  };
}
