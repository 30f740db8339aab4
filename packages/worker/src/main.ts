/**
 * Worker entry point
 */

import { createPool, fromPool } from "@tool-agents/db";
import { getLogger, toError } from "@tool-agents/runtime";
import { loadWorkerConfig } from "./config";
import { setupErrorBoundary } from "./error-boundary";
import { ToolWorker } from "./index";

async function main(): Promise<void> {
  const config = loadWorkerConfig();

  const logger = getLogger();
  logger.setLevel(config.logLevel);
  logger.setDefaultContext({ service: "tool-agents-worker" });

  const pool = config.databaseUrl ? createPool(config.databaseUrl) : undefined;
  const worker = new ToolWorker({ config, db: pool ? fromPool(pool) : undefined });

  setupErrorBoundary({
    onShutdown: async () => {
      await worker.shutdown();
      await pool?.end();
    },
  });

  await worker.start();
}

main().catch((error: unknown) => {
  getLogger().fatal("Worker failed to start", toError(error));
  process.exit(1);
});
