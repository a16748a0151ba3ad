import { describe, it, expect } from "vitest";
import { ConfigError } from "../batch/errors";
import { TickerCatalog, loadTickerCatalog, parseTickerCatalog } from "../config/tickerCatalog";

const catalog = parseTickerCatalog(`
SPY: { ticker: SPY, name: "S&P 500 ETF", divYield: 0.0128 }
SPX: { ticker: "^SPX", name: "S&P 500 Index", divYieldFrom: SPY }
AMZN: { ticker: AMZN, name: "Amazon" }
`);

const opts = { startDate: "2024-05-01", useDividends: false, discountMethod: "smooth" };

describe("TickerCatalog", () => {
  it("lists symbols in file order", () => {
    expect(catalog.symbols()).toEqual(["SPY", "SPX", "AMZN"]);
    expect(catalog.get("SPX")?.name).toBe("S&P 500 Index");
  });

  it("follows divYieldFrom", () => {
    expect(catalog.dividendYield("SPX")).toBe(0.0128);
    expect(catalog.dividendYield("AMZN")).toBeNull();
    expect(catalog.dividendYield("ZZZ")).toBeNull();
  });

  it("builds specs", () => {
    expect(catalog.specFor("SPX", { ...opts, useDividends: true })).toEqual({
      symbol: "SPX",
      ticker: "^SPX",
      startDate: "2024-05-01",
      useDividends: true,
      dividendYield: 0.0128,
      discountMethod: "smooth",
    });
    expect(catalog.specFor("TSLA", opts)).toMatchObject({ symbol: "TSLA", ticker: "TSLA", dividendYield: null });
    expect(catalog.specs(opts).map((s) => s.ticker)).toEqual(["SPY", "^SPX", "AMZN"]);
  });

  it("accepts only ticker-shaped symbols", () => {
    expect(catalog.specFor("BRK.B", opts).ticker).toBe("BRK.B");
    expect(() => catalog.specFor("../SECRET", opts)).toThrow(new ConfigError('invalid ticker symbol "../SECRET"'));
    expect(() => catalog.specFor("spy", opts)).toThrow(ConfigError);
    expect(() => parseTickerCatalog('"../X": { ticker: X, name: x }')).toThrow("expected an upper-case ticker symbol");
  });

  it("refuses dividends without a yield", () => {
    expect(() => catalog.specFor("AMZN", { ...opts, useDividends: true })).toThrow(
      new ConfigError("no dividend yield configured for AMZN")
    );
  });

  it("validates yield references", () => {
    expect(() => new TickerCatalog({ SPX: { ticker: "SPX", name: "x", divYieldFrom: "SPY" } })).toThrow(ConfigError);
    const looped = new TickerCatalog({
      AAA: { ticker: "AAA", name: "a", divYieldFrom: "BBB" },
      BBB: { ticker: "BBB", name: "b", divYieldFrom: "AAA" },
    });
    expect(() => looped.dividendYield("AAA")).toThrow("divYieldFrom cycle at AAA");
  });

  it("loads the shipped ticker map", () => {
    const shipped = loadTickerCatalog("config/tickers.yaml");
    expect(shipped.symbols()).toHaveLength(20);
    expect(shipped.specFor("SPX", { ...opts, useDividends: true }).dividendYield).toBe(0.0128);
  });
});
