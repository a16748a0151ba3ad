import type { AppConfig } from "../config/schema";
import { loadTickerCatalog, type TickerCatalog } from "../config/tickerCatalog";
import { createLogger } from "../logging/logger";
import { ArtifactWriter } from "../output/artifactWriter";
import { DeribitSurfaceSource } from "../sources/deribitSurfaceSource";
import { ConfiguredDiscountSource } from "../sources/discountSources";
import { FileSurfaceSource } from "../sources/fileSurfaceSource";
import type { SurfaceSource } from "../sources/types";
import { VolBatchService } from "./volBatchService";

export function surfaceSourceFor(config: AppConfig): SurfaceSource {
  const { source, surface } = config;
  if (source.kind === "deribit") {
    return new DeribitSurfaceSource(
      { ...source.deribit, strikeGrid: surface.strikeGrid },
      createLogger("deribit", config.logLevel)
    );
  }
  return new FileSurfaceSource(source.dir);
}

/** Wire the service (and the catalog it reads) from a loaded config. */
export function createServices(config: AppConfig): { service: VolBatchService; catalog: TickerCatalog } {
  const catalog = loadTickerCatalog(config.tickersFile);
  const service = new VolBatchService({
    config,
    catalog,
    surfaces: surfaceSourceFor(config),
    discounts: new ConfiguredDiscountSource(config.discount),
    writer: new ArtifactWriter(config.output.dir),
  });
  return { service, catalog };
}
