import type { DiscountInputs, IsoDate, RawSurface } from "@core-types";

export interface SurfaceRequest {
  ticker: string;
  startDate: IsoDate;
  discount: DiscountInputs;
}

/** Option-data + vol-surface collaborator: raw implied-vol points for one ticker. */
export interface SurfaceSource {
  readonly name: string;
  fetchSurface(req: SurfaceRequest, signal: AbortSignal): Promise<RawSurface>;
}

export interface DiscountRequest {
  ticker: string;
  /** null when dividends are not used. */
  dividendYield: number | null;
  method: string;
}

/** Dividend / discount-curve collaborator. */
export interface DiscountSource {
  getDiscountInputs(req: DiscountRequest, signal: AbortSignal): Promise<DiscountInputs>;
}
