/**
 * Study Loop Backend
 *
 * Entry point: loads configuration, opens the store, runs the startup
 * steps and serves the REST API. SIGINT and SIGTERM end the active session
 * and close the store before exiting.
 */

import { serve } from "@hono/node-server";
import { loadConfig } from "./config.js";
import { serverLog as log } from "./logger.js";
import { createApp } from "./server.js";
import { createStudyContext } from "./study-context.js";

async function main(): Promise<void> {
  const config = await loadConfig();
  log.info(`Data directory: ${config.dataDir} (${config.storage} storage)`);

  const study = await createStudyContext(config);
  const app = createApp(study);

  const server = serve(
    { fetch: app.fetch, port: config.server.port, hostname: config.server.host },
    (info) => {
      const displayHost = info.address === "0.0.0.0" ? "localhost" : info.address;
      log.info(`Study Loop Backend running at http://${displayHost}:${info.port}`);
      log.info(`Health check at http://${displayHost}:${info.port}/api/health`);
    }
  );

  const stop = (signal: string) => {
    log.info(`${signal} received, shutting down`);
    server.close(() => {
      const result = study.shutdown();
      process.exit(result.success ? 0 : 1);
    });
  };
  process.once("SIGINT", () => stop("SIGINT"));
  process.once("SIGTERM", () => stop("SIGTERM"));
}

main().catch((error: unknown) => {
  const message = error instanceof Error ? error.message : String(error);
  log.error(`Failed to start: ${message}`);
  process.exit(1);
});
