/**
 * Core background worker loop without database dependencies.
 *
 * Claiming and processing are injected, so the loop can be unit tested with
 * plain functions. `createWorker` in ./worker wires it to the job queue.
 */

import type { Logger } from "@/lib/logger";
import type { Job } from "../db/schema";
import type { JobType } from "./queue";

/**
 * Claims the next due job, or returns null when none is available.
 */
export type ClaimJobFn = (options: { types?: JobType[] }) => Promise<Job | null>;

/**
 * Processes a claimed job. Rejections are logged and counted as failures.
 */
export type ProcessJobFn = (job: Job) => Promise<void>;

export type WorkerLogger = Pick<Logger, "info" | "warn" | "error">;

/**
 * Background job worker.
 *
 * Usage:
 * ```typescript
 * const worker = createWorker({ db, archiver, archiveConfig, concurrency: 3 });
 * await worker.start();
 *
 * // Later, to stop gracefully:
 * await worker.stop();
 * ```
 */
export interface Worker {
  /** Start the worker */
  start: () => Promise<void>;
  /** Stop the worker, waiting for in-flight jobs */
  stop: () => Promise<void>;
  isRunning: () => boolean;
  getStats: () => WorkerStats;
}

export interface WorkerStats {
  running: boolean;
  /** Number of jobs currently being processed */
  activeJobs: number;
  /** Total jobs processed since start */
  totalProcessed: number;
  totalSucceeded: number;
  totalFailed: number;
}

export interface WorkerCoreConfig {
  pollIntervalMs: number;
  concurrency: number;
  /** Job types to process (default: all types) */
  jobTypes?: JobType[];
  logger: WorkerLogger;
  claimJob: ClaimJobFn;
  processJob: ProcessJobFn;
  onJobError?: (job: Job, error: unknown) => void;
}

interface WorkerState {
  running: boolean;
  shuttingDown: boolean;
  currentlyExecuting: Set<Promise<void>>;
  runLoopPromise: Promise<void> | null;
  /** Wakes the loop early from its poll sleep on shutdown */
  wake: (() => void) | null;
}

export function createWorkerCore(config: WorkerCoreConfig): Worker {
  const { pollIntervalMs, concurrency, jobTypes, logger, claimJob, processJob, onJobError } =
    config;

  const state: WorkerState = {
    running: false,
    shuttingDown: false,
    currentlyExecuting: new Set(),
    runLoopPromise: null,
    wake: null,
  };

  let totalProcessed = 0;
  let totalSucceeded = 0;
  let totalFailed = 0;

  function sleep(ms: number): Promise<void> {
    return new Promise((resolve) => {
      const timer = setTimeout(done, ms);
      function done() {
        clearTimeout(timer);
        if (state.wake === done) state.wake = null;
        resolve();
      }
      state.wake = done;
    });
  }

  async function claimNext(): Promise<Job | null> {
    try {
      return await claimJob({ types: jobTypes });
    } catch (error) {
      logger.error("Failed to claim job", {
        error: error instanceof Error ? error.message : "Unknown error",
      });
      return null;
    }
  }

  /**
   * Main run loop - claims and processes jobs continuously.
   */
  async function runLoop(): Promise<void> {
    while (!state.shuttingDown) {
      // Fill up to capacity
      while (state.currentlyExecuting.size < concurrency && !state.shuttingDown) {
        const job = await claimNext();
        if (job === null) break;

        // Keep rejections out of Promise.race()/Promise.all() below
        const promise = processJob(job)
          .then(() => {
            totalSucceeded++;
          })
          .catch((error: unknown) => {
            totalFailed++;
            logger.error("Unexpected error in job execution", {
              jobId: job.id,
              error: error instanceof Error ? error.message : "Unknown error",
            });
            onJobError?.(job, error);
          })
          .finally(() => {
            totalProcessed++;
            state.currentlyExecuting.delete(promise);
          });
        state.currentlyExecuting.add(promise);
      }

      if (state.shuttingDown) break;

      if (state.currentlyExecuting.size >= concurrency) {
        // At capacity: wait for a slot to free up
        await Promise.race(state.currentlyExecuting);
      } else if (state.currentlyExecuting.size > 0) {
        await Promise.race([Promise.race(state.currentlyExecuting), sleep(pollIntervalMs)]);
      } else {
        await sleep(pollIntervalMs);
      }
    }

    if (state.currentlyExecuting.size > 0) {
      logger.info(`Waiting for ${state.currentlyExecuting.size} active jobs to complete...`);
      await Promise.all(state.currentlyExecuting);
    }
  }

  async function start(): Promise<void> {
    if (state.running) {
      logger.warn("Worker is already running");
      return;
    }

    state.running = true;
    state.shuttingDown = false;

    logger.info("Worker starting", {
      pollIntervalMs,
      concurrency,
      jobTypes: jobTypes ?? "all",
    });

    // Runs in the background until stop()
    state.runLoopPromise = runLoop();

    logger.info("Worker started");
  }

  async function stop(): Promise<void> {
    if (!state.running) {
      logger.warn("Worker is not running");
      return;
    }

    logger.info("Worker stopping...");

    state.shuttingDown = true;
    state.wake?.();

    if (state.runLoopPromise) {
      await state.runLoopPromise;
      state.runLoopPromise = null;
    }

    state.running = false;
    state.shuttingDown = false;

    logger.info("Worker stopped", {
      totalProcessed,
      totalSucceeded,
      totalFailed,
    });
  }

  return {
    start,
    stop,
    isRunning: () => state.running,
    getStats: () => ({
      running: state.running,
      activeJobs: state.currentlyExecuting.size,
      totalProcessed,
      totalSucceeded,
      totalFailed,
    }),
  };
}
