import { describe, it, expect } from "vitest";
import type { RawSurface, SkewGrid } from "@core-types";
import { buildSkewReport } from "../src/skewReport";

const surface: RawSurface = {
  ticker: "SPY",
  observationDate: "2024-06-03",
  points: [
    { expiry: "2024-07-19", strike: 100, impliedVol: 12.4, openInterest: 18940 },
    { expiry: "2024-06-21", strike: 100, impliedVol: NaN },
  ],
  params: {
    spot: { toNumber: () => 527.8 },
    yield_curve: [[0.25, 0.05]],
    imp_vol_mid: { option_dict: { big: true }, rmse: 0.004 },
    run_at: new Date("2024-06-03T20:00:00Z"),
  },
};

const grid: SkewGrid = {
  "1M": { "80": 26.2, "90": 18.4, "100": 11.8, "110": 11.2, "120": null },
  "2M": { "80": null, "90": null, "100": null, "110": null, "120": null },
};

describe("buildSkewReport", () => {
  const report = buildSkewReport({ ticker: "SPY", startDate: "2024-05-01", surface, grid });

  it("carries the envelope keys", () => {
    expect(Object.keys(report)).toEqual(["ticker", "start_date", "data_dict", "skew_dict", "skew_data"]);
    expect(report.skew_dict).toBe(grid);
    expect(report.skew_data.ticker).toBe("SPY");
    expect(report.skew_data.start_date).toBe("2024-05-01");
  });

  it("derives skew per tenor row over a fixed 20-point divisor", () => {
    expect(report.skew_data.skew_dict["1"]).toEqual({
      "80%": 26.2,
      "90%": 18.4,
      ATM: 11.8,
      "110%": 11.2,
      "120%": null,
      "-20% Skew": 0.72,
      "-10% Skew": 0.33,
      "+10% Skew": -0.03,
      "+20% Skew": null,
      label: "1",
    });
    expect(report.skew_data.skew_dict["2"]["-20% Skew"]).toBeNull();
    expect(report.skew_data.skew_dict["2"].label).toBe("2");
  });

  it("reports coverage", () => {
    expect(report.skew_data.coverage).toEqual({ populated_cells: 4, total_cells: 10, populated_tenors: ["1M"] });
  });

  it("strips heavy tables and sanitizes the raw surface", () => {
    expect(report.data_dict.params).toEqual({
      spot: 527.8,
      imp_vol_mid: { rmse: 0.004 },
      run_at: "2024-06-03T20:00:00.000Z",
      ticker: "SPY",
      start_date: "2024-05-01",
      observation_date: "2024-06-03",
    });
    expect(report.data_dict.surface).toEqual({
      observation_date: "2024-06-03",
      expiries: ["2024-06-21", "2024-07-19"],
      points: [
        { expiry: "2024-07-19", strike: 100, implied_vol: 12.4, open_interest: 18940 },
        { expiry: "2024-06-21", strike: 100, implied_vol: null },
      ],
    });
  });

  it("falls back to the middle strike when the ATM strike is off the grid", () => {
    const off = buildSkewReport({
      ticker: "QQQ",
      startDate: "2024-05-01",
      surface: { ...surface, ticker: "QQQ" },
      grid: { "1M": { "90": 20, "95": 18, "105": 17 } },
    });
    expect(off.skew_data.skew_dict["1"]).toEqual({
      "90%": 20,
      ATM: 18,
      "105%": 17,
      "-5% Skew": 0.1,
      "+10% Skew": -0.05,
      label: "1",
    });
  });
});
