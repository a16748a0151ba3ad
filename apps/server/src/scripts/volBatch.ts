#!/usr/bin/env tsx
/**
 * Volatility skew batch.
 *
 * Run:
 *   npx tsx apps/server/src/scripts/volBatch.ts ticker SPY --start-date 2024-06-03 --save
 *   npx tsx apps/server/src/scripts/volBatch.ts batch --divs --tickers SPY QQQ
 */

import "dotenv/config";
import { format } from "date-fns";
import yargs from "yargs";
import { hideBin } from "yargs/helpers";
import type { BatchEntry } from "@core-types";
import { ConfigError } from "../batch/errors";
import { loadConfig } from "../config/configManager";
import { createLogger } from "../logging/logger";
import { createServices } from "../service/bootstrap";
import type { ProcessOptions } from "../service/volBatchService";

const log = createLogger("volbatch");

type CommonArgs = {
  config?: string;
  startDate: string;
  divs: boolean;
  save?: boolean;
};

function describeEntry(e: BatchEntry): string {
  const r = e.result;
  if (r.ok) {
    const { populated_cells, total_cells } = r.value.skew_data.coverage;
    return `${e.symbol.padEnd(8)} ok        ${populated_cells}/${total_cells} cells`;
  }
  const reason = r.error.kind === "timeout" ? `${r.error.elapsedMs}ms` : r.error.reason;
  return `${e.symbol.padEnd(8)} ${r.error.kind.padEnd(9)} ${reason}`;
}

function printSummary(entries: readonly BatchEntry[]) {
  console.log("\n" + "=".repeat(60));
  entries.forEach((e) => console.log(describeEntry(e)));
  console.log("=".repeat(60));
  if (!entries.some((e) => e.result.ok)) process.exitCode = 1;
}

function setup(args: CommonArgs) {
  const { service } = createServices(loadConfig(args.config));
  const opts: ProcessOptions = { startDate: args.startDate, useDividends: args.divs, save: args.save };
  return { service, opts };
}

yargs(hideBin(process.argv))
  .scriptName("volbatch")
  .option("config", { type: "string", desc: "config YAML (default config/default.yaml)" })
  .option("start-date", { type: "string", default: format(new Date(), "yyyy-MM-dd"), desc: "first trade date to include" })
  .option("divs", { type: "boolean", default: false, desc: "use configured dividend yields" })
  .option("save", { type: "boolean", desc: "write <TICKER>.json artifacts" })
  .command(
    "ticker <symbol>",
    "process one ticker",
    (y) => y.positional("symbol", { type: "string", demandOption: true }),
    async (args) => {
      const { service, opts } = setup(args);
      const report = await service.processSingleTicker(args.symbol.toUpperCase(), opts);
      printSummary([report.entry]);
    }
  )
  .command(
    "batch",
    "process the ticker map",
    (y) => y.option("tickers", { type: "string", array: true, desc: "subset of symbols" }),
    async (args) => {
      const { service, opts } = setup(args);
      const tickers = args.tickers?.map((t) => t.toUpperCase());
      const report = await service.processBatch({ ...opts, tickers });
      printSummary(report.outcome.entries);
    }
  )
  .demandCommand(1)
  .strict()
  .help()
  .parseAsync()
  .catch((err: unknown) => {
    if (err instanceof ConfigError) {
      log.error("config error:", err.message);
    } else {
      log.error("FATAL:", err);
    }
    process.exit(1);
  });
