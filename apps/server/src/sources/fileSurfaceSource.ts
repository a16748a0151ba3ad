import { readFile } from "fs/promises";
import { format } from "date-fns";
import { z } from "zod";
import type { RawSurface, RawSurfacePoint } from "@core-types";
import { UpstreamError } from "../batch/errors";
import { pathInside } from "../config/configManager";
import type { SurfaceRequest, SurfaceSource } from "./types";

const IsoDateSchema = z.string().regex(/^\d{4}-\d{2}-\d{2}$/, "expected YYYY-MM-DD");

const SurfacePointSchema = z.object({
  expiry: IsoDateSchema,
  strike: z.number(),
  // null stands in for NaN in stored JSON
  implied_vol: z.number().nullable(),
  open_interest: z.number().optional(),
  last_trade_date: IsoDateSchema.optional(),
});

const SurfaceFileSchema = z.object({
  observation_date: IsoDateSchema.optional(),
  points: z.array(SurfacePointSchema),
  params: z.record(z.string(), z.unknown()).optional(),
});

export type SurfaceFile = z.infer<typeof SurfaceFileSchema>;

function isErrnoException(err: unknown): err is NodeJS.ErrnoException {
  return err instanceof Error && "code" in err;
}

/**
 * Reads pre-computed surfaces from `<dir>/<TICKER>.json`, e.g. exported by an
 * offline vol-surface run.
 */
export class FileSurfaceSource implements SurfaceSource {
  readonly name = "file";

  constructor(
    private readonly dir: string,
    private readonly today: () => Date = () => new Date()
  ) {}

  fileFor(ticker: string): string {
    const file = pathInside(this.dir, `${ticker}.json`);
    if (file === null) {
      throw new UpstreamError(`ticker ${ticker} does not name a file inside ${this.dir}`, "malformed");
    }
    return file;
  }

  async fetchSurface(req: SurfaceRequest, signal: AbortSignal): Promise<RawSurface> {
    const file = this.fileFor(req.ticker);

    let raw: string;
    try {
      raw = await readFile(file, { encoding: "utf-8", signal });
    } catch (err) {
      if (signal.aborted) throw err;
      if (isErrnoException(err) && err.code === "ENOENT") {
        throw new UpstreamError(`no surface for ${req.ticker} at ${file}`, "not_found", { cause: err });
      }
      throw new UpstreamError(`reading ${file} failed: ${String(err)}`, "network", { cause: err });
    }

    let parsed: SurfaceFile;
    try {
      parsed = SurfaceFileSchema.parse(JSON.parse(raw));
    } catch (err) {
      const detail = err instanceof z.ZodError
        ? err.issues.map((i) => `${i.path.join(".")}: ${i.message}`).join("; ")
        : String(err);
      throw new UpstreamError(`malformed surface file ${file}: ${detail}`, "malformed", { cause: err });
    }

    const points: RawSurfacePoint[] = parsed.points
      .filter((p) => p.last_trade_date === undefined || p.last_trade_date >= req.startDate)
      .map((p) => ({
        expiry: p.expiry,
        strike: p.strike,
        impliedVol: p.implied_vol ?? Number.NaN,
        openInterest: p.open_interest,
        lastTradeDate: p.last_trade_date,
      }));

    return {
      ticker: req.ticker,
      observationDate: parsed.observation_date ?? format(this.today(), "yyyy-MM-dd"),
      points,
      params: {
        ...parsed.params,
        source: this.name,
        discount: req.discount,
      },
    };
  }
}
