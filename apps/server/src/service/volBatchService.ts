import type { BatchEntry, BatchOutcome, IsoDate } from "@core-types";
import { BatchRunner, type BatchRunOptions } from "../batch/BatchRunner";
import { ConfigError, errorMessage } from "../batch/errors";
import { TickerJob } from "../batch/TickerJob";
import type { AppConfig } from "../config/schema";
import type { TickerCatalog } from "../config/tickerCatalog";
import { createLogger, type Logger } from "../logging/logger";
import type { ArtifactSink } from "../output/artifactWriter";
import type { DiscountSource, SurfaceSource } from "../sources/types";

export interface VolBatchDeps {
  config: AppConfig;
  catalog: TickerCatalog;
  surfaces: SurfaceSource;
  discounts: DiscountSource;
  writer: ArtifactSink;
  logger?: Logger;
  random?: () => number;
}

export interface ProcessOptions {
  startDate: IsoDate;
  useDividends?: boolean;
  /** Defaults to output.save from the config. */
  save?: boolean;
}

export interface BatchRequest extends ProcessOptions {
  /** Catalog symbols to run; all of them when omitted. */
  tickers?: readonly string[];
}

export interface SavedFile {
  symbol: string;
  file: string;
}

export interface WriteFailure {
  symbol: string;
  reason: string;
}

export interface BatchReport {
  outcome: BatchOutcome;
  saved: SavedFile[];
  writeFailures: WriteFailure[];
}

export interface TickerReport {
  entry: BatchEntry;
  saved: SavedFile[];
  writeFailures: WriteFailure[];
}

/** The two entry points: one ticker, or the whole ticker map. */
export class VolBatchService {
  private readonly log: Logger;
  private readonly runner: BatchRunner;

  constructor(private readonly deps: VolBatchDeps) {
    this.log = deps.logger ?? createLogger("volbatch", deps.config.logLevel);
    const { surface } = deps.config;
    const job = new TickerJob({
      surfaces: deps.surfaces,
      discounts: deps.discounts,
      reshape: {
        strikeGrid: surface.strikeGrid,
        bucketCount: surface.bucketCount,
        halfMonthRounding: surface.halfMonthRounding,
        expiryTieBreak: surface.expiryTieBreak,
        strikeTolerance: surface.strikeTolerance,
      },
      atmStrike: surface.atmStrike,
      logger: this.log.child("job"),
    });
    this.runner = new BatchRunner(job, { logger: this.log.child("batch"), random: deps.random });
  }

  private runOptions(): BatchRunOptions {
    const { batch } = this.deps.config;
    return {
      perJobTimeoutMs: batch.perJobTimeoutMs,
      concurrency: batch.concurrency,
      pauseMs: batch.pauseMs,
      requireTickers: batch.requireTickers,
    };
  }

  async processSingleTicker(symbol: string, opts: ProcessOptions): Promise<TickerReport> {
    if (symbol.trim() === "") throw new ConfigError("ticker is required");
    const spec = this.deps.catalog.specFor(symbol, {
      startDate: opts.startDate,
      useDividends: opts.useDividends ?? false,
      discountMethod: this.deps.config.discount.method,
    });
    const outcome = await this.runner.run([spec], { ...this.runOptions(), requireTickers: true });
    const { saved, writeFailures } = await this.persist(outcome, opts.save);
    return { entry: outcome.entries[0], saved, writeFailures };
  }

  async processBatch(req: BatchRequest): Promise<BatchReport> {
    const symbols = req.tickers ?? this.deps.catalog.symbols();
    const specs = this.deps.catalog.specs(
      {
        startDate: req.startDate,
        useDividends: req.useDividends ?? false,
        discountMethod: this.deps.config.discount.method,
      },
      symbols
    );
    const outcome = await this.runner.run(specs, this.runOptions());
    const { saved, writeFailures } = await this.persist(outcome, req.save);
    return { outcome, saved, writeFailures };
  }

  private async persist(outcome: BatchOutcome, save: boolean | undefined) {
    const saved: SavedFile[] = [];
    const writeFailures: WriteFailure[] = [];
    if (!(save ?? this.deps.config.output.save)) return { saved, writeFailures };

    for (const entry of outcome.entries) {
      if (!entry.result.ok) continue;
      try {
        const file = await this.deps.writer.write(entry.symbol, entry.result.value);
        saved.push({ symbol: entry.symbol, file });
        this.log.info(`saved ${entry.symbol} as ${file}`);
      } catch (err) {
        writeFailures.push({ symbol: entry.symbol, reason: errorMessage(err) });
        this.log.error(`could not save ${entry.symbol}:`, errorMessage(err));
      }
    }
    return { saved, writeFailures };
  }
}
