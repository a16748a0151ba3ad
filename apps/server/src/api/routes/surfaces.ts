import type { FastifyInstance } from "fastify";
import { z } from "zod";
import type { BatchEntry } from "@core-types";
import { TickerSymbolSchema, type TickerCatalog } from "../../config/tickerCatalog";
import type { VolBatchService } from "../../service/volBatchService";

const IsoDate = z.string().regex(/^\d{4}-\d{2}-\d{2}$/, "expected YYYY-MM-DD");

const TickerParams = z.object({ ticker: TickerSymbolSchema });

const TickerBody = z.object({
  startDate: IsoDate,
  useDividends: z.boolean().optional(),
  save: z.boolean().optional(),
});

const BatchBody = TickerBody.extend({
  tickers: z.array(z.string().min(1)).min(1).optional(),
});

export function statusFor(entry: BatchEntry): number {
  const r = entry.result;
  if (r.ok) return 200;
  switch (r.error.kind) {
    case "timeout": return 504;
    case "upstream": return 502;
    case "transform": return 422;
  }
}

export async function surfaceRoutes(
  f: FastifyInstance,
  deps: { service: VolBatchService; catalog: TickerCatalog }
) {
  f.get("/tickers", async () =>
    deps.catalog.symbols().map((symbol) => ({ symbol, ...deps.catalog.get(symbol) }))
  );

  f.post<{ Params: { ticker: string } }>("/surfaces/:ticker", async (req, reply) => {
    const { ticker } = TickerParams.parse({ ticker: req.params.ticker.toUpperCase() });
    const body = TickerBody.parse(req.body);
    const report = await deps.service.processSingleTicker(ticker, body);
    const r = report.entry.result;
    return reply.code(statusFor(report.entry)).send(r.ok ? { ...r.value, saved: report.saved } : r.error);
  });

  f.post("/batch", async (req) => {
    const body = BatchBody.parse(req.body);
    const report = await deps.service.processBatch({
      ...body,
      tickers: body.tickers?.map((t) => t.toUpperCase()),
    });
    return report;
  });
}
