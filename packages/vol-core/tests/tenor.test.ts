import { describe, it, expect } from "vitest";
import { parseISO } from "date-fns";
import { TransformError } from "../src/errors";
import { daysFromNominal, monthDistance, tenorBucket, tenorLabel, toDate } from "../src/tenor";

const d = (s: string) => parseISO(s);

describe("monthDistance", () => {
  it("splits into whole months and days into the next", () => {
    expect(monthDistance(d("2024-03-01"), d("2024-03-31"))).toEqual({ whole: 0, daysPast: 30, spanDays: 31 });
    expect(monthDistance(d("2024-06-03"), d("2024-07-19"))).toEqual({ whole: 1, daysPast: 16, spanDays: 31 });
  });

  it("clamps month ends", () => {
    expect(monthDistance(d("2024-01-31"), d("2024-02-29"))).toEqual({ whole: 1, daysPast: 0, spanDays: 31 });
  });
});

describe("tenorBucket", () => {
  it("rounds to the nearest month", () => {
    expect(tenorBucket(d("2024-03-01"), d("2024-03-31"))).toBe(1);
    expect(tenorBucket(d("2024-06-03"), d("2024-06-21"))).toBe(1);
    expect(tenorBucket(d("2024-06-03"), d("2024-09-20"))).toBe(4);
    expect(tenorBucket(d("2024-01-15"), d("2024-02-20"))).toBe(1);
  });

  it("sends an exact half month by the rounding rule", () => {
    // 15 of April's 30 days
    expect(tenorBucket(d("2024-04-01"), d("2024-04-16"), "up")).toBe(1);
    expect(tenorBucket(d("2024-04-01"), d("2024-04-16"), "down")).toBe(0);
  });
});

describe("daysFromNominal", () => {
  it("measures calendar days to obs + bucket months", () => {
    expect(daysFromNominal(d("2024-01-15"), d("2024-02-10"), 1)).toBe(5);
    expect(daysFromNominal(d("2024-01-15"), d("2024-02-20"), 1)).toBe(5);
    expect(daysFromNominal(d("2024-01-15"), d("2024-02-14"), 1)).toBe(1);
  });
});

describe("toDate / tenorLabel", () => {
  it("rejects unparseable dates", () => {
    expect(() => toDate("2024-13-01", "expiry")).toThrow(TransformError);
    expect(() => toDate(new Date(NaN), "obs")).toThrow("Invalid date at obs");
  });

  it("labels buckets", () => {
    expect(tenorLabel(3)).toBe("3M");
  });
});
