import type { DiscountInputs, RatePoint } from "@core-types";
import { UpstreamError } from "../batch/errors";
import type { DiscountRequest, DiscountSource } from "./types";

export interface ConfiguredDiscountOptions {
  interestRate: number;
  curves: Readonly<Record<string, readonly RatePoint[]>>;
}

/**
 * Discount inputs from configuration: with a dividend yield, a flat
 * (q, r) pair; otherwise the named method's rate curve.
 */
export class ConfiguredDiscountSource implements DiscountSource {
  constructor(private readonly opts: ConfiguredDiscountOptions) {}

  async getDiscountInputs(req: DiscountRequest, signal: AbortSignal): Promise<DiscountInputs> {
    signal.throwIfAborted();

    if (req.dividendYield !== null) {
      return {
        method: "dividend",
        dividendYield: req.dividendYield,
        interestRate: this.opts.interestRate,
        curve: [],
      };
    }

    const curve = this.opts.curves[req.method];
    if (!curve) {
      throw new UpstreamError(`unknown discount method "${req.method}" for ${req.ticker}`, "not_found");
    }
    return {
      method: req.method,
      dividendYield: null,
      interestRate: null,
      curve: curve.map((p) => ({ ...p })),
    };
  }
}
