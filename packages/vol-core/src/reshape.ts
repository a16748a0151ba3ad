import type { RawSurfacePoint, ReshapeOptions, SkewGrid, StrikeRow } from "@core-types";
import { STRIKE_TOL_REL } from "./constants";
import { TransformError } from "./errors";
import { sanitizeNumber } from "./sanitize";
import { type DateInput, daysFromNominal, tenorBucket, tenorLabel, toDate } from "./tenor";
import { assertPositive, strikeKey } from "./utils";

type Candidate = {
  daysOff: number;
  expiryMs: number;
  vol: number;
};

function sameStrike(a: number, b: number, tolRel: number): boolean {
  return Math.abs(a - b) <= tolRel * Math.max(1, Math.abs(a));
}

function validateOptions(opts: ReshapeOptions, tol: number): void {
  if (opts.strikeGrid.length === 0) {
    throw new TransformError("strike grid is empty");
  }
  opts.strikeGrid.forEach((k, i) => {
    assertPositive(k, `strikeGrid[${i}]`);
    const dup = opts.strikeGrid.findIndex((other, j) => j < i && sameStrike(other, k, tol));
    if (dup >= 0) {
      throw new TransformError(`strikeGrid[${i}] (${k}) duplicates strikeGrid[${dup}] (${opts.strikeGrid[dup]})`);
    }
  });
  if (!Number.isInteger(opts.bucketCount) || opts.bucketCount < 1) {
    throw new TransformError(`bucketCount must be a positive integer, got ${opts.bucketCount}`);
  }
}

function gridIndex(grid: readonly number[], strike: number, tolRel: number): number {
  return grid.findIndex((k) => sameStrike(k, strike, tolRel));
}

/**
 * Reshape an (expiry × strike) surface into a tenor-bucketed grid.
 *
 * Every bucket 1..bucketCount is present and carries every grid strike; cells
 * nothing lands in are null. When two expiries in one bucket quote the same
 * strike, the one closer (in days) to the bucket's nominal month wins, with
 * `expiryTieBreak` deciding exact ties.
 */
export function reshapeSurface(
  points: readonly RawSurfacePoint[],
  observationDate: DateInput,
  opts: ReshapeOptions
): SkewGrid {
  if (points.length === 0) {
    throw new TransformError("surface has no points (zero expiries)");
  }
  const tol = opts.strikeTolerance ?? STRIKE_TOL_REL;
  validateOptions(opts, tol);

  const obs = toDate(observationDate, "observationDate");
  const rounding = opts.halfMonthRounding ?? "up";
  const preferEarlier = (opts.expiryTieBreak ?? "earlier") === "earlier";

  const best = new Map<string, Candidate>();

  points.forEach((p, i) => {
    assertPositive(p.strike, `points[${i}].strike`);
    const expiry = toDate(p.expiry, `points[${i}].expiry`);

    const vol = sanitizeNumber(p.impliedVol);
    if (vol === null) return;

    const col = gridIndex(opts.strikeGrid, p.strike, tol);
    if (col < 0) return;

    const bucket = tenorBucket(obs, expiry, rounding);
    if (bucket < 1 || bucket > opts.bucketCount) return;

    const cand: Candidate = {
      daysOff: daysFromNominal(obs, expiry, bucket),
      expiryMs: expiry.getTime(),
      vol,
    };
    const key = `${bucket}|${col}`;
    const prev = best.get(key);
    if (!prev || beats(cand, prev, preferEarlier)) {
      best.set(key, cand);
    }
  });

  const grid: SkewGrid = {};
  for (let b = 1; b <= opts.bucketCount; b++) {
    const row: StrikeRow = {};
    opts.strikeGrid.forEach((k, col) => {
      row[strikeKey(k)] = best.get(`${b}|${col}`)?.vol ?? null;
    });
    grid[tenorLabel(b)] = row;
  }
  return grid;
}

function beats(cand: Candidate, prev: Candidate, preferEarlier: boolean): boolean {
  if (cand.daysOff !== prev.daysOff) return cand.daysOff < prev.daysOff;
  if (cand.expiryMs === prev.expiryMs) return false;
  return preferEarlier ? cand.expiryMs < prev.expiryMs : cand.expiryMs > prev.expiryMs;
}
