import { addMonths, differenceInCalendarDays, differenceInCalendarMonths, isValid, parseISO } from "date-fns";
import type { HalfMonthRounding, IsoDate, TenorLabel } from "@core-types";
import { TransformError } from "./errors";

export type DateInput = IsoDate | Date;

export function toDate(value: DateInput, tag: string): Date {
  const d = typeof value === "string" ? parseISO(value) : value;
  if (!isValid(d)) {
    throw new TransformError(`Invalid date at ${tag}: ${String(value)}`);
  }
  return d;
}

/**
 * Calendar distance from obs to expiry: `whole` months (end-of-month clamped, as
 * addMonths does) plus `daysPast` into a month that is `spanDays` long.
 */
export interface MonthDistance {
  whole: number;
  daysPast: number;
  spanDays: number;
}

export function monthDistance(obs: Date, expiry: Date): MonthDistance {
  let whole = differenceInCalendarMonths(expiry, obs);
  while (differenceInCalendarDays(expiry, addMonths(obs, whole)) < 0) whole--;
  while (differenceInCalendarDays(expiry, addMonths(obs, whole + 1)) >= 0) whole++;

  const anchor = addMonths(obs, whole);
  return {
    whole,
    daysPast: differenceInCalendarDays(expiry, anchor),
    spanDays: differenceInCalendarDays(addMonths(obs, whole + 1), anchor),
  };
}

/** Nearest whole month; an exact half goes by `rounding` ("up" = toward the later month). */
export function tenorBucket(obs: Date, expiry: Date, rounding: HalfMonthRounding = "up"): number {
  const { whole, daysPast, spanDays } = monthDistance(obs, expiry);
  const twice = 2 * daysPast;
  if (twice > spanDays) return whole + 1;
  if (twice < spanDays) return whole;
  return rounding === "up" ? whole + 1 : whole;
}

/** Days between an expiry and the bucket's nominal date (obs + bucket months). */
export function daysFromNominal(obs: Date, expiry: Date, bucket: number): number {
  return Math.abs(differenceInCalendarDays(expiry, addMonths(obs, bucket)));
}

export function tenorLabel(bucket: number): TenorLabel {
  return `${bucket}M`;
}
