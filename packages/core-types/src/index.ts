/** Calendar date in `YYYY-MM-DD` form. */
export type IsoDate = string;

export interface RawSurfacePoint {
  expiry: IsoDate;
  strike: number;
  impliedVol: number;
  openInterest?: number;
  lastTradeDate?: IsoDate;
}

/** What the vol-surface collaborator hands back for one ticker. */
export interface RawSurface {
  ticker: string;
  observationDate: IsoDate;
  points: RawSurfacePoint[];
  params: Record<string, unknown>;
}

export type TenorLabel = `${number}M`;
export type StrikeRow = Record<string, number | null>;
export type SkewGrid = Record<TenorLabel, StrikeRow>;

export type HalfMonthRounding = "up" | "down";
export type ExpiryTieBreak = "earlier" | "later";

export interface ReshapeOptions {
  strikeGrid: readonly number[];
  bucketCount: number;
  halfMonthRounding?: HalfMonthRounding;
  expiryTieBreak?: ExpiryTieBreak;
  strikeTolerance?: number;
}

export interface RatePoint {
  tenorYears: number;
  rate: number;
}

export interface DiscountInputs {
  method: string;
  dividendYield: number | null;
  interestRate: number | null;
  curve: RatePoint[];
}

export interface TickerSpec {
  /** Catalog key, also the artifact file name. */
  symbol: string;
  /** Ticker as the data collaborators know it. */
  ticker: string;
  startDate: IsoDate;
  useDividends: boolean;
  dividendYield: number | null;
  discountMethod: string;
}

// JSON-safe values, as written to disk
export type JsonPrimitive = string | number | boolean | null;
export type JsonValue = JsonPrimitive | JsonValue[] | { [key: string]: JsonValue };
export type JsonObject = { [key: string]: JsonValue };

export type SkewReportRow = Record<string, number | string | null>;

export interface SkewCoverage {
  populated_cells: number;
  total_cells: number;
  populated_tenors: string[];
}

export interface SkewData {
  skew_dict: Record<string, SkewReportRow>;
  ticker: string;
  start_date: IsoDate;
  coverage: SkewCoverage;
}

export interface TickerResult {
  ticker: string;
  start_date: IsoDate;
  data_dict: JsonObject;
  skew_dict: SkewGrid;
  skew_data: SkewData;
}

export type UpstreamCategory = "network" | "not_found" | "malformed" | "unknown";

export type JobFailure =
  | { kind: "timeout"; ticker: string; elapsedMs: number }
  | { kind: "upstream"; ticker: string; elapsedMs: number; reason: string; category: UpstreamCategory }
  | { kind: "transform"; ticker: string; elapsedMs: number; reason: string };

export type Result<T, E> = { ok: true; value: T } | { ok: false; error: E };

export interface BatchEntry {
  symbol: string;
  ticker: string;
  result: Result<TickerResult, JobFailure>;
}

export interface BatchSummary {
  total: number;
  succeeded: number;
  timedOut: number;
  upstreamErrors: number;
  transformErrors: number;
  elapsedMs: number;
}

export interface BatchOutcome {
  readonly entries: readonly BatchEntry[];
  readonly summary: BatchSummary;
}
