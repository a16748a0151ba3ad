import type {
  DiscountInputs,
  JobFailure,
  RawSurface,
  ReshapeOptions,
  Result,
  TickerResult,
  TickerSpec,
} from "@core-types";
import { reshapeSurface } from "@vol-core/reshape";
import { buildSkewReport } from "@vol-core/skewReport";
import { createLogger, type Logger } from "../logging/logger";
import type { DiscountSource, SurfaceSource } from "../sources/types";
import { UpstreamError, errorMessage } from "./errors";

export interface TickerJobDeps {
  surfaces: SurfaceSource;
  discounts: DiscountSource;
  reshape: ReshapeOptions;
  atmStrike?: number;
  logger?: Logger;
}

/** The unit the batch runner schedules. Must tolerate being abandoned mid-flight. */
export interface Job {
  execute(spec: TickerSpec, signal: AbortSignal): Promise<Result<TickerResult, JobFailure>>;
}

/**
 * fetch (discount inputs, then surface) → reshape → report.
 * Holds no state between calls; everything it opens hangs off `signal`.
 */
export class TickerJob implements Job {
  private readonly log: Logger;

  constructor(private readonly deps: TickerJobDeps) {
    this.log = deps.logger ?? createLogger("job");
  }

  async execute(spec: TickerSpec, signal: AbortSignal): Promise<Result<TickerResult, JobFailure>> {
    const started = Date.now();
    const elapsed = () => Date.now() - started;

    let discount: DiscountInputs;
    let surface: RawSurface;
    try {
      discount = await this.deps.discounts.getDiscountInputs(
        { ticker: spec.ticker, dividendYield: spec.useDividends ? spec.dividendYield : null, method: spec.discountMethod },
        signal
      );
      surface = await this.deps.surfaces.fetchSurface(
        { ticker: spec.ticker, startDate: spec.startDate, discount },
        signal
      );
    } catch (err) {
      this.log.debug(`${spec.ticker} upstream failure:`, errorMessage(err));
      return {
        ok: false,
        error: {
          kind: "upstream",
          ticker: spec.ticker,
          elapsedMs: elapsed(),
          reason: errorMessage(err),
          category: err instanceof UpstreamError ? err.category : "unknown",
        },
      };
    }

    try {
      const grid = reshapeSurface(surface.points, surface.observationDate, this.deps.reshape);
      const report = buildSkewReport({
        ticker: spec.ticker,
        startDate: spec.startDate,
        surface,
        grid,
        atmStrike: this.deps.atmStrike,
        runParams: {
          strike_grid: this.deps.reshape.strikeGrid,
          bucket_count: this.deps.reshape.bucketCount,
          discount,
        },
      });
      this.log.debug(`${spec.ticker} reshaped ${surface.points.length} points in ${elapsed()}ms`);
      return { ok: true, value: report };
    } catch (err) {
      return {
        ok: false,
        error: { kind: "transform", ticker: spec.ticker, elapsedMs: elapsed(), reason: errorMessage(err) },
      };
    }
  }
}
