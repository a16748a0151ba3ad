import fs from "fs";
import YAML from "yaml";
import { z } from "zod";
import type { IsoDate, TickerSpec } from "@core-types";
import { ConfigError } from "../batch/errors";
import { resolveRepoPath } from "./configManager";

// upper-case symbol, optionally with an index caret (^SPX) or share class (BRK.B)
export const TickerSymbolSchema = z.string().regex(/^\^?[A-Z0-9.\-]+$/, "expected an upper-case ticker symbol");

const TickerEntrySchema = z.object({
  ticker: TickerSymbolSchema,
  name: z.string().min(1),
  divYield: z.number().min(0).optional(),
  // borrow another entry's yield (index options priced off the ETF's)
  divYieldFrom: z.string().min(1).optional(),
});

const TickerFileSchema = z.record(TickerSymbolSchema, TickerEntrySchema);

export type TickerEntry = z.infer<typeof TickerEntrySchema>;

export interface SpecOptions {
  startDate: IsoDate;
  useDividends: boolean;
  discountMethod: string;
}

/** Static symbol → ticker/name/dividend-yield lookup. */
export class TickerCatalog {
  private readonly entries: ReadonlyMap<string, TickerEntry>;

  constructor(entries: Record<string, TickerEntry>) {
    this.entries = new Map(Object.entries(entries));
    for (const [symbol, entry] of this.entries) {
      if (entry.divYieldFrom !== undefined && !this.entries.has(entry.divYieldFrom)) {
        throw new ConfigError(`${symbol}: divYieldFrom refers to unknown symbol ${entry.divYieldFrom}`);
      }
    }
  }

  symbols(): string[] {
    return Array.from(this.entries.keys());
  }

  get(symbol: string): TickerEntry | undefined {
    return this.entries.get(symbol);
  }

  dividendYield(symbol: string): number | null {
    const seen = new Set<string>();
    let current = symbol;
    while (!seen.has(current)) {
      seen.add(current);
      const entry = this.entries.get(current);
      if (!entry) return null;
      if (entry.divYieldFrom === undefined) return entry.divYield ?? null;
      current = entry.divYieldFrom;
    }
    throw new ConfigError(`divYieldFrom cycle at ${symbol}`);
  }

  /** Build a spec for one symbol; symbols outside the map are allowed without dividends. */
  specFor(symbol: string, opts: SpecOptions): TickerSpec {
    if (!TickerSymbolSchema.safeParse(symbol).success) {
      throw new ConfigError(`invalid ticker symbol "${symbol}"`);
    }
    const entry = this.entries.get(symbol);
    let dividendYield: number | null = null;
    if (opts.useDividends) {
      dividendYield = this.dividendYield(symbol);
      if (dividendYield === null) {
        throw new ConfigError(`no dividend yield configured for ${symbol}`);
      }
    }
    return {
      symbol,
      ticker: entry?.ticker ?? symbol,
      startDate: opts.startDate,
      useDividends: opts.useDividends,
      dividendYield,
      discountMethod: opts.discountMethod,
    };
  }

  specs(opts: SpecOptions, symbols: readonly string[] = this.symbols()): TickerSpec[] {
    return symbols.map((s) => this.specFor(s, opts));
  }
}

export function parseTickerCatalog(raw: string): TickerCatalog {
  return new TickerCatalog(TickerFileSchema.parse(YAML.parse(raw)));
}

export function loadTickerCatalog(file: string): TickerCatalog {
  return parseTickerCatalog(fs.readFileSync(resolveRepoPath(file), "utf-8"));
}
