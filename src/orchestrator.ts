/**
 * Periodic ingestion, conversion and delivery passes.
 *
 * Each pass enumerates its units (books, chapters awaiting conversion,
 * subscriptions), skips those still backing off after a failure, and runs the
 * rest through a bounded pool with a deadline per unit. A pass never overlaps
 * itself; a tick that finds its pass still running is skipped.
 */

import { FailureBackoff } from "./backoff.js";
import type { ChannelSet } from "./channels/index.js";
import type { PassKind } from "./config.js";
import type { FormatConverter } from "./convert.js";
import { evaluateSubscription } from "./deliver.js";
import { classifyError, describeError, type FailureKind } from "./errors.js";
import { convertChapter, ingestBook } from "./ingest.js";
import { silentLogger, type Logger } from "./log.js";
import { runPool, withDeadline } from "./pool.js";
import type { AdapterResolver } from "./sources/index.js";
import type { LeaseOptions, Store } from "./store/store.js";
import { formatDuration } from "./utils.js";

/** Chapters taken per conversion pass */
export const CONVERSION_BATCH_SIZE = 100;

export type UnitStatus = "ok" | "idle" | "locked" | "deferred" | "failed";

export interface UnitReport {
  /** Book, chapter or subscription id */
  id: string;
  status: UnitStatus;
  /** Short human-readable result, e.g. "2 new, 1 skipped" */
  detail?: string;
  kind?: FailureKind;
  error?: string;
}

export interface PassReport {
  pass: PassKind;
  startedAt: Date;
  durationMs: number;
  units: UnitReport[];
}

export interface OrchestratorOptions {
  store: Store;
  adapters: AdapterResolver;
  converter: FormatConverter;
  channels: ChannelSet;
  /** Lease owner id of this process */
  owner: string;
  intervals: Record<PassKind, number>;
  concurrency: Record<PassKind, number>;
  unitDeadlineMs: number;
  leaseTtlMs: number;
  maxConversionAttempts: number;
  backoff: { baseMs: number; maxMs: number };
  logger?: Logger;
  now?: () => Date;
  random?: () => number;
}

interface Unit {
  id: string;
  run: (signal: AbortSignal) => Promise<Omit<UnitReport, "id">>;
}

const PASSES: readonly PassKind[] = ["ingest", "convert", "deliver"];

/**
 * Count units by status, e.g. "3 ok, 1 failed".
 */
export function summarizeReport(report: PassReport): string {
  const counts = new Map<UnitStatus, number>();
  for (const unit of report.units) {
    counts.set(unit.status, (counts.get(unit.status) ?? 0) + 1);
  }
  const parts = [...counts].map(([status, count]) => `${count} ${status}`);
  return parts.length > 0 ? parts.join(", ") : "nothing to do";
}

export class Orchestrator {
  private readonly backoff: FailureBackoff;
  private readonly logger: Logger;
  private readonly now: () => Date;
  private readonly inFlight = new Map<PassKind, Promise<PassReport>>();
  private readonly timers: NodeJS.Timeout[] = [];
  private running = false;

  constructor(private readonly options: OrchestratorOptions) {
    this.logger = options.logger ?? silentLogger;
    this.now = options.now ?? (() => new Date());
    this.backoff = new FailureBackoff({ ...options.backoff, random: options.random, now: this.now });
  }

  private get lease(): LeaseOptions {
    return { owner: this.options.owner, ttlMs: this.options.leaseTtlMs };
  }

  /**
   * Run one pass now.
   *
   * @returns The report, or null if the same pass is already running
   * @throws When the units cannot be enumerated
   */
  runPass(pass: PassKind): Promise<PassReport | null> {
    if (this.inFlight.has(pass)) {
      this.logger.info(`${pass} pass still running, skipping`);
      return Promise.resolve(null);
    }
    const run = this.execute(pass).finally(() => this.inFlight.delete(pass));
    this.inFlight.set(pass, run);
    return run;
  }

  /** Run every pass once now and keep running them on their intervals */
  start(): void {
    if (this.running) return;
    this.running = true;
    for (const pass of PASSES) {
      void this.tick(pass);
      this.timers.push(setInterval(() => void this.tick(pass), this.options.intervals[pass]));
    }
    this.logger.info(`Started (owner ${this.options.owner})`);
  }

  /** Cancel the timers and wait for passes in flight */
  async stop(): Promise<void> {
    this.running = false;
    for (const timer of this.timers.splice(0)) {
      clearInterval(timer);
    }
    await Promise.allSettled([...this.inFlight.values()]);
    this.logger.info("Stopped");
  }

  private async tick(pass: PassKind): Promise<void> {
    try {
      await this.runPass(pass);
    } catch (error) {
      this.logger.error(`${pass} pass failed`, error);
    }
  }

  private async execute(pass: PassKind): Promise<PassReport> {
    const startedAt = this.now();
    const units = await this.enumerate(pass);
    const logger = this.logger.child(pass);
    this.backoff.retainOnly(`${pass}:`, units.map((unit) => unitKey(pass, unit.id)));

    const results = await runPool(units, this.options.concurrency[pass], (unit) => this.runUnit(pass, unit));
    const report: PassReport = {
      pass,
      startedAt,
      durationMs: this.now().getTime() - startedAt.getTime(),
      units: results.map((result, index) =>
        // runUnit reports its own failures
        result.ok ? result.value : failedUnit(units[index].id, result.error),
      ),
    };

    for (const unit of report.units) {
      if (unit.status === "failed") {
        logger.warn(`${unit.id} failed (${unit.kind ?? "transient"}): ${unit.error ?? "unknown error"}`);
      }
    }
    if (report.units.length > 0) {
      logger.info(`${summarizeReport(report)} in ${formatDuration(report.durationMs)}`);
    }
    return report;
  }

  private async runUnit(pass: PassKind, unit: Unit): Promise<UnitReport> {
    const key = unitKey(pass, unit.id);
    if (this.backoff.isDeferred(key)) {
      const retryAt = this.backoff.get(key)?.retryAt;
      return { id: unit.id, status: "deferred", detail: retryAt ? `until ${retryAt.toISOString()}` : undefined };
    }

    try {
      const result = await withDeadline(this.options.unitDeadlineMs, `${pass} ${unit.id}`, unit.run);
      this.backoff.recordSuccess(key);
      return { id: unit.id, ...result };
    } catch (error) {
      this.backoff.recordFailure(key, error);
      return failedUnit(unit.id, error);
    }
  }

  private async enumerate(pass: PassKind): Promise<Unit[]> {
    const { store } = this.options;
    const logger = this.logger.child(pass);

    switch (pass) {
      case "ingest": {
        const deps = { store, adapters: this.options.adapters, lease: this.lease, logger };
        const books = await store.listBooks();
        return books.map((book): Unit => ({
          id: book.id,
          run: async (signal) => {
            const outcome = await ingestBook(book, deps, signal);
            if (outcome.status === "locked") return { status: "locked" };
            return {
              status: "ok",
              detail: `${outcome.inserted.length} new, ${outcome.skipped.length} skipped`,
            };
          },
        }));
      }
      case "convert": {
        const deps = { store, converter: this.options.converter, logger };
        const chapters = await store.listChaptersAwaitingConversion(
          this.options.maxConversionAttempts,
          CONVERSION_BATCH_SIZE,
        );
        return chapters.map((chapter): Unit => ({
          id: chapter.id,
          run: async () => {
            const outcome = await convertChapter(chapter, deps);
            if (outcome.status === "gone") return { status: "idle", detail: "book deleted" };
            return { status: "ok", detail: `${outcome.bytes} bytes` };
          },
        }));
      }
      case "deliver": {
        const deps = { store, channels: this.options.channels, lease: this.lease, logger };
        const subscriptions = await store.listSubscriptions();
        return subscriptions.map((subscription): Unit => ({
          id: subscription.id,
          run: async (signal) => {
            const outcome = await evaluateSubscription(subscription, deps, signal);
            if (outcome.status === "delivered") {
              return { status: "ok", detail: `${outcome.chapterIds.length} chapter(s)` };
            }
            return { status: outcome.status };
          },
        }));
      }
    }
  }
}

function unitKey(pass: PassKind, id: string): string {
  return `${pass}:${id}`;
}

function failedUnit(id: string, error: unknown): UnitReport {
  return { id, status: "failed", kind: classifyError(error), error: describeError(error) };
}
