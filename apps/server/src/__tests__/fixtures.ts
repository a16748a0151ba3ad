import type { RawSurface, RawSurfacePoint, TickerResult } from "@core-types";
import { UpstreamError } from "../batch/errors";
import type { AppConfig } from "../config/schema";
import type { SurfaceRequest, SurfaceSource } from "../sources/types";

export function fakeResult(ticker: string, startDate = "2024-05-01"): TickerResult {
  return {
    ticker,
    start_date: startDate,
    data_dict: {},
    skew_dict: {},
    skew_data: {
      skew_dict: {},
      ticker,
      start_date: startDate,
      coverage: { populated_cells: 0, total_cells: 0, populated_tenors: [] },
    },
  };
}

export function testConfig(outputDir: string): AppConfig {
  return {
    logLevel: "silent",
    tickersFile: "config/tickers.yaml",
    batch: { perJobTimeoutMs: 5000, concurrency: 1, pauseMs: { min: 0, max: 0 }, requireTickers: true },
    surface: {
      strikeGrid: [80, 90, 100, 110, 120],
      atmStrike: 100,
      bucketCount: 6,
      halfMonthRounding: "up",
      expiryTieBreak: "earlier",
      strikeTolerance: 1e-9,
    },
    discount: {
      method: "smooth",
      interestRate: 0.05,
      curves: { smooth: [{ tenorYears: 1, rate: 0.048 }] },
    },
    source: {
      kind: "file",
      dir: "unused",
      deribit: { network: "testnet", rpcTimeoutMs: 1000, snapTolerancePct: 2.5 },
    },
    output: { dir: outputDir, save: true },
  };
}

// one-month-out smile on the default grid, observed 2024-06-03
export const SPY_POINTS: RawSurfacePoint[] = [
  { expiry: "2024-06-21", strike: 80, impliedVol: 26.2 },
  { expiry: "2024-06-21", strike: 90, impliedVol: 18.4 },
  { expiry: "2024-06-21", strike: 100, impliedVol: 11.8 },
  { expiry: "2024-06-21", strike: 110, impliedVol: 11.2 },
  { expiry: "2024-07-19", strike: 100, impliedVol: 12.4 },
];

/** In-memory option source: tickers it has no entry for are not found. */
export class MapSurfaceSource implements SurfaceSource {
  readonly name = "memory";
  readonly requests: SurfaceRequest[] = [];

  constructor(private readonly points: Record<string, RawSurfacePoint[]>) {}

  async fetchSurface(req: SurfaceRequest): Promise<RawSurface> {
    this.requests.push(req);
    const points = this.points[req.ticker];
    if (!points) throw new UpstreamError(`no surface for ${req.ticker}`, "not_found");
    return {
      ticker: req.ticker,
      observationDate: "2024-06-03",
      points,
      params: { source: this.name, discount: req.discount },
    };
  }
}
