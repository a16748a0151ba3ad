import type { BatchEntry, BatchOutcome, BatchSummary, JobFailure, TickerSpec } from "@core-types";
import { createLogger, type Logger } from "../logging/logger";
import { ConfigError, errorMessage } from "./errors";
import type { Job } from "./TickerJob";

export interface BatchRunOptions {
  perJobTimeoutMs: number;
  /** Worker count; 1 runs the tickers strictly one after another. */
  concurrency?: number;
  /** Random wait between two jobs on the same worker (rate limiting). */
  pauseMs?: { min: number; max: number };
  requireTickers?: boolean;
  onOutcome?: (entry: BatchEntry, index: number) => void;
}

export interface BatchRunnerDeps {
  logger?: Logger;
  random?: () => number;
}

function sleep(ms: number) { return new Promise<void>((r) => setTimeout(r, ms)); }

function validate(specs: readonly TickerSpec[], opts: BatchRunOptions): void {
  if (!Number.isFinite(opts.perJobTimeoutMs) || opts.perJobTimeoutMs <= 0) {
    throw new ConfigError(`perJobTimeoutMs must be a positive number, got ${opts.perJobTimeoutMs}`);
  }
  const concurrency = opts.concurrency ?? 1;
  if (!Number.isInteger(concurrency) || concurrency < 1) {
    throw new ConfigError(`concurrency must be a positive integer, got ${concurrency}`);
  }
  if (opts.pauseMs) {
    const { min, max } = opts.pauseMs;
    if (!(min >= 0) || !(max >= min)) {
      throw new ConfigError(`pauseMs must satisfy 0 <= min <= max, got ${min}..${max}`);
    }
  }
  if (specs.length === 0 && (opts.requireTickers ?? true)) {
    throw new ConfigError("no tickers to process");
  }
  specs.forEach((s, i) => {
    if (s.ticker.trim() === "") throw new ConfigError(`tickers[${i}] has an empty ticker`);
  });
}

function summarize(entries: readonly BatchEntry[], elapsedMs: number): BatchSummary {
  const failures = entries.flatMap((e) => (e.result.ok ? [] : [e.result.error]));
  const count = (kind: JobFailure["kind"]) => failures.filter((f) => f.kind === kind).length;
  return {
    total: entries.length,
    succeeded: entries.length - failures.length,
    timedOut: count("timeout"),
    upstreamErrors: count("upstream"),
    transformErrors: count("transform"),
    elapsedMs,
  };
}

/**
 * Runs one job per ticker under a per-job wall-clock budget.
 *
 * A job past its budget is aborted through its signal and disowned: the runner
 * records a timeout and moves on without waiting for it. Entries come back in
 * submission order whatever the completion order.
 */
export class BatchRunner {
  private readonly log: Logger;
  private readonly random: () => number;

  constructor(private readonly job: Job, deps: BatchRunnerDeps = {}) {
    this.log = deps.logger ?? createLogger("batch");
    this.random = deps.random ?? Math.random;
  }

  /** Throws ConfigError before any job starts; never rejects for a single ticker. */
  run(specs: readonly TickerSpec[], opts: BatchRunOptions): Promise<BatchOutcome> {
    validate(specs, opts);
    return this.execute([...specs], opts);
  }

  private async execute(specs: TickerSpec[], opts: BatchRunOptions): Promise<BatchOutcome> {
    const started = Date.now();
    const slots = new Map<number, BatchEntry>();
    const workers = Math.min(opts.concurrency ?? 1, specs.length);
    let next = 0;

    this.log.info(`starting ${specs.length} ticker(s), ${workers} worker(s), timeout ${opts.perJobTimeoutMs}ms`);

    const worker = async () => {
      let first = true;
      while (next < specs.length) {
        const index = next++;
        if (!first) await this.pause(opts.pauseMs);
        first = false;

        const entry = await this.runOne(specs[index], opts.perJobTimeoutMs);
        slots.set(index, entry);
        this.report(entry);
        opts.onOutcome?.(entry, index);
      }
    };
    await Promise.all(Array.from({ length: workers }, worker));

    const entries = specs.map((_, i) => {
      const entry = slots.get(i);
      if (!entry) throw new Error(`batch slot ${i} never reported`);
      return entry;
    });
    const summary = summarize(entries, Date.now() - started);
    this.log.info(
      `done: ${summary.succeeded}/${summary.total} ok, ${summary.timedOut} timed out, ` +
      `${summary.upstreamErrors} upstream, ${summary.transformErrors} transform, ${summary.elapsedMs}ms`
    );
    return Object.freeze({ entries: Object.freeze(entries), summary: Object.freeze(summary) });
  }

  private async pause(range: BatchRunOptions["pauseMs"]) {
    if (!range || range.max <= 0) return;
    const ms = Math.round(range.min + this.random() * (range.max - range.min));
    this.log.debug(`pausing ${ms}ms before next ticker`);
    await sleep(ms);
  }

  private async runOne(spec: TickerSpec, timeoutMs: number): Promise<BatchEntry> {
    const controller = new AbortController();
    const started = Date.now();
    const base = { symbol: spec.symbol, ticker: spec.ticker };

    // a job that throws (even before returning its promise) is still only this ticker's problem
    const work = Promise.resolve()
      .then(() => this.job.execute(spec, controller.signal))
      .catch((err: unknown): BatchEntry["result"] => ({
        ok: false,
        error: {
          kind: "upstream",
          ticker: spec.ticker,
          elapsedMs: Date.now() - started,
          reason: errorMessage(err),
          category: "unknown",
        },
      }));

    let timer: NodeJS.Timeout | undefined;
    const expired = new Promise<"timeout">((resolve) => {
      timer = setTimeout(() => resolve("timeout"), timeoutMs);
    });

    try {
      const winner = await Promise.race([work, expired]);
      if (winner === "timeout") {
        controller.abort(new Error(`${spec.ticker} exceeded ${timeoutMs}ms`));
        return {
          ...base,
          result: { ok: false, error: { kind: "timeout", ticker: spec.ticker, elapsedMs: Date.now() - started } },
        };
      }
      return { ...base, result: winner };
    } finally {
      clearTimeout(timer);
    }
  }

  private report(entry: BatchEntry) {
    const r = entry.result;
    if (r.ok) {
      this.log.info(`${entry.symbol} ok`);
    } else if (r.error.kind === "timeout") {
      this.log.warn(`${entry.symbol} timed out after ${r.error.elapsedMs}ms, skipping`);
    } else {
      this.log.warn(`${entry.symbol} ${r.error.kind} error: ${r.error.reason}`);
    }
  }
}
