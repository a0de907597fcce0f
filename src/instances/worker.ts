/**
 * Worker Instance
 *
 * Runs the overdue payment sweep on its schedule until SIGINT / SIGTERM.
 *
 * Run with: node dist/instances/worker.js
 */

import { ENV } from "../config/env";
import { logger } from "../infra/logger-instance";
import { closePool } from "../infra/postgres/connection";
import { bootstrap } from "../bootstrap";

async function main() {
  logger.info("Starting Worker Instance...");
  const engine = await bootstrap();

  if (!ENV.SCHEDULER_ENABLED) {
    logger.warn("Scheduler disabled (SCHEDULER_ENABLED=false), nothing to run");
    await closePool();
    return;
  }

  const controller = new AbortController();
  engine.processor.start(controller.signal);
  logger.info(
    { cron: ENV.SCHEDULER_CRON, intervalMs: ENV.SCHEDULER_CRON ? undefined : ENV.SCHEDULER_INTERVAL_MS },
    "Overdue payment processor scheduled"
  );

  const shutdown = async (signal: NodeJS.Signals) => {
    logger.info(`${signal} received, shutting down...`);
    controller.abort();
    await engine.processor.stop();
    await closePool();
    process.exit(0);
  };

  const onSignal = (signal: NodeJS.Signals) => {
    shutdown(signal).catch((error: unknown) => {
      logger.error({ error }, "Shutdown failed");
      process.exit(1);
    });
  };

  process.once("SIGTERM", onSignal);
  process.once("SIGINT", onSignal);
}

main().catch((error: unknown) => {
  logger.error({ error }, "Failed to start worker instance");
  process.exit(1);
});
