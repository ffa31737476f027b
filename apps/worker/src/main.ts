import { parseEnv } from "@kindex/config";
import { createLogger } from "@kindex/logger";
import { createContainer } from "./container.js";
import { scheduleStatusCleanup } from "./housekeeping.js";

async function main(): Promise<void> {
  const config = parseEnv();
  const logger = createLogger({ level: config.logLevel, service: "kindex-worker" });
  const container = await createContainer(config, logger);

  container.pool.start();
  const stopCleanup = scheduleStatusCleanup(container.queue, { logger });

  let shuttingDown = false;
  const shutdown = async (signal: string): Promise<void> => {
    if (shuttingDown) return;
    shuttingDown = true;
    logger.info({ signal }, "Shutting down");

    stopCleanup();
    container.queue.close();
    await container.pool.stop();
    await container.close();

    logger.info("Shutdown complete");
    process.exit(0);
  };

  const onSignal = (signal: NodeJS.Signals): void => {
    shutdown(signal).catch((err: unknown) => {
      logger.fatal({ err }, "Shutdown failed");
      process.exit(1);
    });
  };
  process.on("SIGTERM", onSignal);
  process.on("SIGINT", onSignal);

  if (config.ingestion.reindexOnStartup) {
    const result = await container.reindex.reindex();
    logger.info(
      {
        batchId: result.batchId,
        enqueued: result.enqueuedCount,
        skipped: result.skippedCount,
        failed: result.failedCount,
      },
      "Startup reindex submitted",
    );
  }
}

main().catch((err: unknown) => {
  createLogger({ service: "kindex-worker" }).fatal({ err }, "Worker failed to start");
  process.exit(1);
});
