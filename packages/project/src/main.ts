/**
 * Start the tracker server.
 *
 * Run with:
 *   npm start
 */

import { createLogger } from "@tracker/core";
import { createTrackerApp } from "./app.ts";
import { loadConfig } from "./config.ts";

async function main(): Promise<void> {
  const config = loadConfig();
  const { app, logger } = createTrackerApp(config);

  const server = await app.listen({
    port: config.port,
    hostname: config.hostname,
  });

  const shutdown = (signal: string) => {
    logger.info("Shutting down", { signal });
    server.close().then(
      () => process.exit(0),
      (error: unknown) => {
        logger.error("Shutdown failed", { error: String(error) });
        process.exit(1);
      },
    );
  };

  process.once("SIGINT", () => shutdown("SIGINT"));
  process.once("SIGTERM", () => shutdown("SIGTERM"));
}

main().catch((error: unknown) => {
  createLogger({ name: "tracker" }).fatal("Failed to start", {
    error: error instanceof Error ? error.message : String(error),
  });
  process.exit(1);
});
