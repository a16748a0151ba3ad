import { format } from "date-fns";
import type { RawSurface, RawSurfacePoint } from "@core-types";
import { UpstreamError } from "../batch/errors";
import { createLogger, type Logger } from "../logging/logger";
import { type BookSummaryRow, DeribitWS, type DeribitNetwork } from "./deribit";
import type { SurfaceRequest, SurfaceSource } from "./types";

const MONTHS = ["JAN", "FEB", "MAR", "APR", "MAY", "JUN", "JUL", "AUG", "SEP", "OCT", "NOV", "DEC"];

export type ParsedInstrument = {
  currency: string;
  expiry: string;
  strike: number;
  optionType: "C" | "P";
};

/** "BTC-27DEC24-50000-C" → parts; null for anything that is not an option name. */
export function parseInstrumentName(name: string): ParsedInstrument | null {
  const m = /^([A-Z]+)-(\d{1,2})([A-Z]{3})(\d{2})-(\d+(?:d\d+)?)-([CP])$/.exec(name);
  if (!m) return null;
  const month = MONTHS.indexOf(m[3]);
  if (month < 0) return null;
  const strike = Number(m[5].replace("d", "."));
  if (!Number.isFinite(strike) || strike <= 0) return null;
  const optionType = m[6] === "C" ? "C" : "P";
  return {
    currency: m[1],
    expiry: format(new Date(2000 + Number(m[4]), month, Number(m[2])), "yyyy-MM-dd"),
    strike,
    optionType,
  };
}

export interface BookSummaryOptions {
  strikeGrid: readonly number[];
  snapTolerancePct: number;
}

type Pick = { point: RawSurfacePoint; gap: number; isCall: boolean };

/**
 * Per expiry and grid strike (percent of the underlying), keep the listed
 * option nearest in moneyness within the tolerance; calls win exact ties.
 */
export function pointsFromBookSummary(rows: readonly BookSummaryRow[], opts: BookSummaryOptions): RawSurfacePoint[] {
  const picks = new Map<string, Pick>();

  for (const row of rows) {
    const ins = parseInstrumentName(row.instrument_name);
    const underlying = row.underlying_price ?? null;
    if (!ins || underlying === null || underlying <= 0) continue;

    const moneyness = (100 * ins.strike) / underlying;
    for (const target of opts.strikeGrid) {
      const gap = Math.abs(moneyness - target);
      if (gap > opts.snapTolerancePct) continue;

      const isCall = ins.optionType === "C";
      const key = `${ins.expiry}|${target}`;
      const prev = picks.get(key);
      if (prev && (prev.gap < gap || (prev.gap === gap && (prev.isCall || !isCall)))) continue;

      picks.set(key, {
        gap,
        isCall,
        point: {
          expiry: ins.expiry,
          strike: target,
          impliedVol: row.mark_iv ?? Number.NaN,
          openInterest: row.open_interest ?? undefined,
        },
      });
    }
  }

  return Array.from(picks.values(), (p) => p.point).sort(
    (a, b) => a.expiry.localeCompare(b.expiry) || a.strike - b.strike
  );
}

export interface DeribitSourceOptions {
  network: DeribitNetwork;
  rpcTimeoutMs: number;
  snapTolerancePct: number;
  strikeGrid: readonly number[];
}

/** Live option marks from Deribit for currency tickers (BTC, ETH, ...). */
export class DeribitSurfaceSource implements SurfaceSource {
  readonly name = "deribit";

  constructor(
    private readonly opts: DeribitSourceOptions,
    private readonly log: Logger = createLogger("deribit"),
    private readonly today: () => Date = () => new Date()
  ) {}

  async fetchSurface(req: SurfaceRequest, signal: AbortSignal): Promise<RawSurface> {
    const ws = new DeribitWS(this.opts.network, this.opts.rpcTimeoutMs, this.log);
    const onAbort = () => ws.close();
    signal.addEventListener("abort", onAbort, { once: true });
    try {
      await ws.connect(signal);
      const rows = await ws.getBookSummary(req.ticker.toUpperCase());
      if (rows.length === 0) {
        throw new UpstreamError(`no listed options for ${req.ticker}`, "not_found");
      }
      return {
        ticker: req.ticker,
        observationDate: format(this.today(), "yyyy-MM-dd"),
        points: pointsFromBookSummary(rows, {
          strikeGrid: this.opts.strikeGrid,
          snapTolerancePct: this.opts.snapTolerancePct,
        }),
        params: {
          source: this.name,
          network: this.opts.network,
          instruments: rows.length,
          discount: req.discount,
        },
      };
    } finally {
      signal.removeEventListener("abort", onAbort);
      ws.close();
    }
  }
}
