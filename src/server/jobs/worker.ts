/**
 * Background worker for processing jobs from the queue.
 *
 * Features:
 * - Polls for due jobs at configurable intervals
 * - Supports concurrent job processing
 * - Graceful shutdown on SIGTERM/SIGINT
 * - Stale job recovery (handled automatically in claim query)
 * - Jobs that keep throwing are discarded after maxRetries attempts
 */

import * as Sentry from "@sentry/node";

import { logger as appLogger, errorMessage } from "@/lib/logger";
import type { Archiver } from "../archive/archiver";
import type { ArchiveConfig } from "../config/env";
import type { Database } from "../db";
import type { Job } from "../db/schema";
import { trackJobProcessed, type JobStatus } from "../metrics/metrics";
import { discardArchiveJob, handleArchiveContent, type JobHandlerResult } from "./handlers";
import { claimJob, finishJob, type JobType } from "./queue";
import { createWorkerCore, type ClaimJobFn, type Worker, type WorkerLogger } from "./worker-core";

/** Delay before retrying a job whose handler threw. */
const EXCEPTION_RETRY_DELAY_MS = 60 * 1000;

export interface WorkerConfig {
  db: Database;
  archiver: Archiver;
  archiveConfig: ArchiveConfig;
  /** Polling interval in milliseconds (default: 5000) */
  pollIntervalMs?: number;
  /** Maximum concurrent jobs to process (default: 3) */
  concurrency?: number;
  /** Job types to process (default: all types) */
  jobTypes?: JobType[];
  logger?: WorkerLogger;
  /**
   * Override for claiming jobs (for testing).
   * @internal
   */
  _claimJob?: ClaimJobFn;
}

const defaultLogger: WorkerLogger = appLogger.child({ component: "worker" });

function jobStatus(result: JobHandlerResult): JobStatus {
  if (result.success) return "success";
  return result.nextRunAt ? "retry" : "failure";
}

/**
 * Creates a new background worker.
 */
export function createWorker(config: WorkerConfig): Worker {
  const {
    db,
    archiver,
    archiveConfig,
    pollIntervalMs = 5000,
    concurrency = 3,
    jobTypes,
    logger = defaultLogger,
  } = config;

  async function runHandler(job: Job): Promise<JobHandlerResult> {
    switch (job.type) {
      case "archive_content":
        return handleArchiveContent({ db, archiver, config: archiveConfig }, job);
      default:
        return {
          success: false,
          nextRunAt: null,
          error: `Unknown job type: ${job.type}`,
        };
    }
  }

  /**
   * Processes a single job.
   */
  async function processJob(job: Job): Promise<void> {
    const startTime = Date.now();

    try {
      logger.info(`Processing job ${job.id}`, {
        type: job.type,
        consecutiveFailures: job.consecutiveFailures,
      });

      const result = await runHandler(job);
      const duration = Date.now() - startTime;

      await finishJob(db, job.id, {
        success: result.success,
        nextRunAt: result.nextRunAt,
        error: result.error,
      });

      const status = jobStatus(result);
      trackJobProcessed(job.type, status, duration);

      const details = {
        type: job.type,
        durationMs: duration,
        nextRunAt: result.nextRunAt?.toISOString() ?? null,
        metadata: result.metadata,
      };
      if (status === "success") {
        logger.info(`Job ${job.id} completed`, details);
      } else {
        logger.warn(`Job ${job.id} ${status === "retry" ? "rescheduled" : "failed"}`, {
          ...details,
          error: result.error,
        });
      }
    } catch (error) {
      const duration = Date.now() - startTime;
      const message = errorMessage(error);
      const attempt = job.consecutiveFailures + 1;
      const discard = attempt >= archiveConfig.maxRetries;

      logger.error(`Job ${job.id} threw exception`, {
        type: job.type,
        durationMs: duration,
        attempt,
        error: message,
      });

      Sentry.captureException(error, {
        tags: { jobType: job.type },
        extra: {
          jobId: job.id,
          consecutiveFailures: job.consecutiveFailures,
          payload: job.payload,
          durationMs: duration,
        },
      });

      try {
        if (discard && job.type === "archive_content") {
          await discardArchiveJob(db, job, `Job discarded after ${attempt} attempts: ${message}`);
        }
        await finishJob(db, job.id, {
          success: false,
          nextRunAt: discard ? null : new Date(Date.now() + EXCEPTION_RETRY_DELAY_MS),
          error: message,
        });
      } catch (finishError) {
        logger.error("Failed to finish job after exception", {
          jobId: job.id,
          originalError: message,
          finishError: errorMessage(finishError),
        });
      }

      trackJobProcessed(job.type, discard ? "failure" : "retry", duration);
      throw error;
    }
  }

  return createWorkerCore({
    pollIntervalMs,
    concurrency,
    jobTypes,
    logger,
    claimJob: config._claimJob ?? ((options) => claimJob(db, options)),
    processJob,
  });
}

/**
 * Creates and starts a worker with signal handling for graceful shutdown.
 *
 * @param onShutdown runs after the worker has drained, before the process exits
 */
export async function startWorkerWithSignalHandling(
  config: WorkerConfig,
  onShutdown?: () => Promise<void>
): Promise<Worker> {
  const worker = createWorker(config);
  const logger = config.logger ?? defaultLogger;

  const shutdown = async (signal: string) => {
    logger.info(`Received ${signal}, initiating graceful shutdown...`);

    await worker.stop();
    await onShutdown?.();
    process.exit(0);
  };

  const handle = (signal: string) => {
    shutdown(signal).catch((error: unknown) => {
      logger.error("Shutdown failed", { error: errorMessage(error) });
      process.exit(1);
    });
  };

  process.once("SIGTERM", () => handle("SIGTERM"));
  process.once("SIGINT", () => handle("SIGINT"));

  await worker.start();

  return worker;
}
