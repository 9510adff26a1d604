/**
 * Standalone background worker process.
 *
 * Runs the archive job worker next to an internal metrics server.
 *
 * Usage:
 *   npm run worker
 *   # or with nice for lower CPU priority:
 *   nice -n 10 npm run worker
 *
 * Environment variables:
 *   DATABASE_URL - PostgreSQL connection string (required)
 *   WORKER_POLL_INTERVAL_MS - Polling interval in ms (default: 5000)
 *   WORKER_CONCURRENCY - Max concurrent jobs (default: 3)
 *   METRICS_PORT - Internal metrics port (default: 9092)
 *   SENTRY_DSN - Enables error reporting when set
 *   ARCHIVE_* - Archive settings, see src/server/config/env.ts
 */

import * as Sentry from "@sentry/node";

import { errorMessage, logger } from "../src/lib/logger";
import { createArchiver } from "../src/server/archive/archiver";
import { loadArchiveConfig, loadWorkerConfig } from "../src/server/config/env";
import { createDatabase } from "../src/server/db";
import { startWorkerWithSignalHandling } from "../src/server/jobs/worker";
import { startMetricsServer, stopMetricsServer } from "../src/server/metrics";

if (process.env.SENTRY_DSN) {
  Sentry.init({
    dsn: process.env.SENTRY_DSN,
    environment: process.env.NODE_ENV,
    release: process.env.GIT_COMMIT_SHA,
    tracesSampleRate: 0,
  });
}

async function main(): Promise<void> {
  const workerConfig = loadWorkerConfig();
  const archiveConfig = loadArchiveConfig();

  logger.info("Starting standalone worker", {
    pollIntervalMs: workerConfig.pollIntervalMs,
    concurrency: workerConfig.concurrency,
    archivalEnabled: archiveConfig.enabled,
    pid: process.pid,
  });

  const { db, close } = createDatabase({
    connectionString: workerConfig.databaseUrl,
    max: workerConfig.poolMax,
  });

  startMetricsServer(db, workerConfig.metricsPort);

  await startWorkerWithSignalHandling(
    {
      db,
      archiver: createArchiver({ db, config: archiveConfig }),
      archiveConfig,
      pollIntervalMs: workerConfig.pollIntervalMs,
      concurrency: workerConfig.concurrency,
    },
    async () => {
      await stopMetricsServer();
      await close();
      await Sentry.close(2000);
    }
  );

  logger.info("Worker started successfully");
}

main().catch((error: unknown) => {
  logger.error("Failed to start worker", { error: errorMessage(error) });
  process.exit(1);
});
