import { describe, it, expect } from "vitest";
import fc from "fast-check";
import { sanitizeDeep, sanitizeNumber, sanitizeRecord } from "../src/sanitize";

describe("sanitizeNumber", () => {
  it("maps NaN and infinities to null", () => {
    expect(sanitizeNumber(NaN)).toBeNull();
    expect(sanitizeNumber(1.0 / 0.0)).toBeNull();
    expect(sanitizeNumber(-Infinity)).toBeNull();
    expect(sanitizeNumber(null)).toBeNull();
    expect(sanitizeNumber(undefined)).toBeNull();
  });

  it("unwraps foreign numerics", () => {
    expect(sanitizeNumber(3n)).toBe(3);
    expect(sanitizeNumber(new Number(2.5))).toBe(2.5);
    expect(sanitizeNumber({ toNumber: () => 0.123456789 })).toBe(0.123456789);
    expect(sanitizeNumber({ toNumber: () => NaN })).toBeNull();
  });

  it("keeps finite floats untouched", () => {
    fc.assert(
      fc.property(fc.double({ noNaN: true, noDefaultInfinity: true }), (x) => {
        expect(sanitizeNumber(x)).toBe(x);
      })
    );
  });
});

describe("sanitizeDeep", () => {
  it("walks nested structures", () => {
    const out = sanitizeDeep({
      a: NaN,
      b: [1, Infinity, undefined],
      c: new Date("2024-06-03T00:00:00Z"),
      d: new Map([["x", 1]]),
      e: new Set([1, 2]),
      f: undefined,
      g: () => 1,
      h: new Float64Array([1, NaN]),
      i: { j: { toNumber: () => 7 } },
    });
    expect(out).toEqual({
      a: null,
      b: [1, null, null],
      c: "2024-06-03T00:00:00.000Z",
      d: { x: 1 },
      e: [1, 2],
      h: [1, null],
      i: { j: 7 },
    });
  });

  it("reads own fields of class instances", () => {
    class Quote {
      vol = NaN;
      strike = 100;
      label = "ATM";
    }
    expect(sanitizeDeep(new Quote())).toEqual({ vol: null, strike: 100, label: "ATM" });
  });

  it("never lets a non-finite number through", () => {
    fc.assert(
      fc.property(fc.array(fc.double()), (xs) => {
        const out = sanitizeDeep(xs);
        expect(out).toEqual(xs.map((x) => (Number.isFinite(x) ? x : null)));
      })
    );
  });

  it("sanitizeRecord keeps the object shape", () => {
    expect(sanitizeRecord({ rate: -Infinity, name: "flat" })).toEqual({ rate: null, name: "flat" });
  });
});
