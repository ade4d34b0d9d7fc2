import "dotenv/config";

import { JsonlRecordStore } from "./analytics/jsonlRecordStore";
import { createMetricsEngine } from "./analytics/metricsEngine";
import { createApp } from "./app";
import { loadConfig } from "./config";
import { logger } from "./utils/logger";

const config = loadConfig();

const store = new JsonlRecordStore({ dataDir: config.dataDir });
const engine = createMetricsEngine(config, store);

const app = createApp({ engine, corsOrigins: config.corsOrigins });

const server = app.listen(config.port, () => {
  logger.info({ port: config.port, dataDir: config.dataDir, env: process.env.NODE_ENV ?? "development" }, "server_listening");
});

const shutdown = (signal: string) => {
  logger.info({ signal }, "server_shutdown_start");
  server.close((err) => {
    if (err) {
      logger.error({ err }, "server_shutdown_error");
      process.exitCode = 1;
      return process.exit();
    }
    logger.info("server_shutdown_complete");
    process.exit();
  });
};

process.on("SIGHUP", () => {
  store
    .reload()
    .then(() => engine.invalidate())
    .catch((err: unknown) => logger.error({ err }, "records_reload_failed"));
});

process.on("SIGINT", () => shutdown("SIGINT"));
process.on("SIGTERM", () => shutdown("SIGTERM"));
