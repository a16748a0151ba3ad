import Fastify, { type FastifyInstance } from "fastify";
import cors from "@fastify/cors";
import "dotenv/config";
import { ZodError } from "zod";
import { surfaceRoutes } from "./api/routes/surfaces";
import { ConfigError } from "./batch/errors";
import { loadConfig } from "./config/configManager";
import type { TickerCatalog } from "./config/tickerCatalog";
import { createLogger } from "./logging/logger";
import { createServices } from "./service/bootstrap";
import type { VolBatchService } from "./service/volBatchService";

export async function buildServer(deps: { service: VolBatchService; catalog: TickerCatalog }): Promise<FastifyInstance> {
  const app = Fastify({ logger: false });
  await app.register(cors, { origin: true });

  app.setErrorHandler((err, _req, reply) => {
    if (err instanceof ZodError) {
      return reply.code(400).send({ error: "invalid request", issues: err.issues });
    }
    if (err instanceof ConfigError) {
      return reply.code(400).send({ error: err.message });
    }
    return reply.code(500).send({ error: err.message });
  });

  app.get("/health", async () => ({ ok: true, ts: Date.now() }));
  await app.register(surfaceRoutes, deps);

  return app;
}

export async function startServer() {
  const config = loadConfig();
  const log = createLogger("server", config.logLevel);
  const app = await buildServer(createServices(config));
  const port = Number(process.env.PORT || 3001);
  await app.listen({ port, host: "0.0.0.0" });
  log.info(`server up http://localhost:${port} (source=${config.source.kind})`);
}
