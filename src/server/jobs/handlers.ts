/**
 * Job handlers for processing different job types.
 *
 * Each handler executes a specific job type and returns a result that includes
 * the next run time for the job. The worker uses this to update the job record;
 * a null nextRunAt disables the job for good.
 */

import type { ArchiveConfig } from "../config/env";
import type { Database } from "../db";
import type { Job } from "../db/schema";
import type { Archiver } from "../archive/archiver";
import { ArchiveTimeoutError, RecordNotFoundError } from "../archive/errors";
import { failArchive } from "../archive/state-machine";
import { findArchiveTarget } from "../services/archives";
import { createJobLogger, errorMessage } from "@/lib/logger";
import { getJobPayload } from "./queue";

/**
 * Result of a job handler execution.
 */
export interface JobHandlerResult {
  /** Whether the job completed successfully */
  success: boolean;
  /** When the job should next run; null when the job is finished */
  nextRunAt: Date | null;
  /** Error message if the job failed */
  error?: string;
  /** Any additional metadata about the job execution */
  metadata?: Record<string, unknown>;
}

export interface ArchiveJobContext {
  db: Database;
  archiver: Archiver;
  config: ArchiveConfig;
  /** Jitter source (default: Math.random) */
  random?: () => number;
}

/** Upper bound of the random jitter added to a retry delay. */
const MAX_JITTER_RATIO = 0.15;

/**
 * Retry delay after a failed attempt: `baseMs × 2^(attempt-1)` plus up to 15%
 * jitter.
 *
 * @param attempt 1-based number of the attempt that just failed
 */
export function computeRetryDelayMs(
  attempt: number,
  baseMs: number,
  random: () => number = Math.random
): number {
  const delay = baseMs * 2 ** Math.max(0, attempt - 1);
  return Math.round(delay + delay * MAX_JITTER_RATIO * random());
}

/**
 * Handler for archive_content jobs.
 *
 * Loads the archive fresh by bookmark id and runs one attempt. Timeouts are
 * rescheduled with backoff until maxRetries attempts have been made; the
 * last one drives the archive to `failed`. Every other outcome is final.
 */
export async function handleArchiveContent(
  ctx: ArchiveJobContext,
  job: Job
): Promise<JobHandlerResult> {
  const { db, archiver, config } = ctx;
  const log = createJobLogger({ jobId: job.id, jobType: job.type });

  let bookmarkId: string;
  try {
    bookmarkId = getJobPayload(job, "archive_content").bookmarkId;
  } catch (error) {
    log.warn("Discarding job with unreadable payload", { error: errorMessage(error) });
    return {
      success: false,
      nextRunAt: null,
      error: `Invalid payload: ${errorMessage(error)}`,
    };
  }

  const target = await findArchiveTarget(db, bookmarkId);
  if (!target) {
    const notFound = new RecordNotFoundError("Bookmark archive", bookmarkId);
    log.warn("Discarding job for missing archive", { bookmarkId });
    return { success: false, nextRunAt: null, error: notFound.message };
  }

  const attempt = job.consecutiveFailures + 1;

  try {
    const result = await archiver.call(target);

    if (result.ok) {
      return {
        success: true,
        nextRunAt: null,
        metadata: { archiveId: target.archiveId, state: result.value.state, attempt },
      };
    }

    // Nothing left to do when the archive was finished or taken by another attempt
    const settled = result.error.reason === "skipped" || result.error.reason === "conflict";
    return {
      success: settled,
      nextRunAt: null,
      error: settled ? undefined : result.error.message,
      metadata: {
        archiveId: target.archiveId,
        state: result.error.state,
        reason: result.error.reason,
        attempt,
      },
    };
  } catch (error) {
    if (!(error instanceof ArchiveTimeoutError)) {
      throw error;
    }

    if (attempt < config.maxRetries) {
      const delayMs = computeRetryDelayMs(attempt, config.retryBackoffBaseMs, ctx.random);
      log.info("Archive attempt timed out, retrying", { attempt, delayMs, phase: error.phase });
      return {
        success: false,
        nextRunAt: new Date(Date.now() + delayMs),
        error: error.message,
        metadata: { archiveId: target.archiveId, attempt, delayMs },
      };
    }

    log.warn("Archive retries exhausted", { attempt, maxRetries: config.maxRetries });
    await failArchive(db, target.archiveId, {
      error_reason: "retries_exhausted",
      error_message: `Gave up after ${attempt} attempts: ${error.message}`,
      retry_count: attempt,
    });
    return {
      success: false,
      nextRunAt: null,
      error: error.message,
      metadata: { archiveId: target.archiveId, state: "failed", attempt },
    };
  }
}

/**
 * Gives up on a job that cannot be completed. A non-terminal archive is
 * driven to `failed` so it does not stay `processing` forever. Jobs whose
 * payload or archive is gone are left alone.
 *
 * @returns true if an archive was failed
 */
export async function discardArchiveJob(
  db: Database,
  job: Job,
  reason: string
): Promise<boolean> {
  let bookmarkId: string;
  try {
    bookmarkId = getJobPayload(job, "archive_content").bookmarkId;
  } catch {
    return false;
  }

  const target = await findArchiveTarget(db, bookmarkId);
  if (!target) {
    return false;
  }

  const transition = await failArchive(db, target.archiveId, {
    error_reason: "discarded",
    error_message: reason,
    retry_count: job.consecutiveFailures + 1,
  });
  return transition !== null;
}
