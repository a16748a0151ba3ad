import type {
  JsonObject,
  RawSurface,
  SkewCoverage,
  SkewData,
  SkewGrid,
  SkewReportRow,
  TickerResult,
} from "@core-types";
import { DEFAULT_ATM_STRIKE, HEAVY_PARAM_KEYS, SKEW_DIGITS, SKEW_DIVISOR } from "./constants";
import { sanitizeRecord } from "./sanitize";
import { roundTo, strikeKey } from "./utils";

export interface SkewReportInput {
  ticker: string;
  startDate: string;
  surface: RawSurface;
  grid: SkewGrid;
  /** Run parameters folded into data_dict.params. */
  runParams?: Record<string, unknown>;
  atmStrike?: number;
}

function gridStrikes(grid: SkewGrid): number[] {
  const first = Object.values(grid)[0];
  if (!first) return [];
  return Object.keys(first)
    .map(Number)
    .sort((a, b) => a - b);
}

function pickAtm(strikes: number[], preferred: number): number {
  if (strikes.includes(preferred)) return preferred;
  return strikes[Math.floor(strikes.length / 2)];
}

function stripHeavy(params: Record<string, unknown>): Record<string, unknown> {
  const out: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(params)) {
    if (HEAVY_PARAM_KEYS.includes(key)) continue;
    if (value !== null && typeof value === "object" && !Array.isArray(value) && !(value instanceof Date)) {
      // one level down: per-vol-type blocks carry their own tables
      const inner: Record<string, unknown> = {};
      for (const [k, v] of Object.entries(value)) {
        if (!HEAVY_PARAM_KEYS.includes(k)) inner[k] = v;
      }
      out[key] = inner;
    } else {
      out[key] = value;
    }
  }
  return out;
}

function buildDataDict(input: SkewReportInput): JsonObject {
  const { surface } = input;
  const expiries = Array.from(new Set(surface.points.map((p) => p.expiry))).sort();
  return sanitizeRecord({
    params: {
      ...stripHeavy(surface.params),
      ...input.runParams,
      ticker: input.ticker,
      start_date: input.startDate,
      observation_date: surface.observationDate,
    },
    surface: {
      observation_date: surface.observationDate,
      expiries,
      points: surface.points.map((p) => ({
        expiry: p.expiry,
        strike: p.strike,
        implied_vol: p.impliedVol,
        open_interest: p.openInterest,
        last_trade_date: p.lastTradeDate,
      })),
    },
  });
}

function reportRow(
  row: Record<string, number | null>,
  strikes: number[],
  atm: number,
  label: string
): SkewReportRow {
  const out: SkewReportRow = {};
  const atmVol = row[strikeKey(atm)] ?? null;

  for (const k of strikes) {
    out[k === atm ? "ATM" : `${strikeKey(k)}%`] = row[strikeKey(k)] ?? null;
  }
  for (const k of strikes) {
    if (k === atm) continue;
    const vol = row[strikeKey(k)] ?? null;
    const name = `${k < atm ? "-" : "+"}${strikeKey(Math.abs(k - atm))}% Skew`;
    out[name] = vol === null || atmVol === null ? null : roundTo((vol - atmVol) / SKEW_DIVISOR, SKEW_DIGITS);
  }
  out.label = label;
  return out;
}

function buildSkewData(input: SkewReportInput): SkewData {
  const strikes = gridStrikes(input.grid);
  const atm = pickAtm(strikes, input.atmStrike ?? DEFAULT_ATM_STRIKE);

  const skewDict: Record<string, SkewReportRow> = {};
  const coverage: SkewCoverage = { populated_cells: 0, total_cells: 0, populated_tenors: [] };

  for (const [tenor, row] of Object.entries(input.grid)) {
    const label = tenor.replace(/M$/, "");
    skewDict[label] = reportRow(row, strikes, atm, label);

    const cells = Object.values(row);
    const filled = cells.filter((v) => v !== null).length;
    coverage.total_cells += cells.length;
    coverage.populated_cells += filled;
    if (filled > 0) coverage.populated_tenors.push(tenor);
  }

  return {
    skew_dict: skewDict,
    ticker: input.ticker,
    start_date: input.startDate,
    coverage,
  };
}

/**
 * Assemble the per-ticker artifact. Pure: no I/O, output depends on the input only.
 */
export function buildSkewReport(input: SkewReportInput): TickerResult {
  return {
    ticker: input.ticker,
    start_date: input.startDate,
    data_dict: buildDataDict(input),
    skew_dict: input.grid,
    skew_data: buildSkewData(input),
  };
}
