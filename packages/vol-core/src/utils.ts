import { TransformError } from "./errors";

export function assertFinite(x: number, tag: string): void {
  if (!Number.isFinite(x)) {
    throw new TransformError(`Non-finite value at ${tag}: ${x}`);
  }
}

export function assertPositive(x: number, tag: string): void {
  assertFinite(x, tag);
  if (x <= 0) {
    throw new TransformError(`Non-positive value at ${tag}: ${x}`);
  }
}

export function roundTo(x: number, digits: number): number {
  const f = 10 ** digits;
  return Math.round(x * f) / f;
}

/** Grid key for a strike: integers print bare, everything else in shortest decimal form. */
export function strikeKey(strike: number): string {
  return Number.isInteger(strike) ? strike.toFixed(0) : String(strike);
}
