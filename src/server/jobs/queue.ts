/**
 * Postgres-based job queue implementation.
 *
 * Uses a "one job per task" model where jobs are persistent scheduled tasks
 * rather than ephemeral run records. Each bookmark has exactly one
 * archive_content job that is rescheduled after a transient failure and
 * disabled once the archive reaches its final outcome.
 *
 * Uses row locking (SELECT FOR UPDATE SKIP LOCKED) for concurrent job claiming,
 * ensuring only one worker can process a job at a time.
 */

import { and, asc, eq, inArray, isNull, lt, lte, or, sql } from "drizzle-orm";
import { z } from "zod";

import type { Database } from "../db";
import { jobs, type Job } from "../db/schema";
import { generateUuidv7 } from "@/lib/uuidv7";

/**
 * Job payload types for different job types.
 */
export interface JobPayloads {
  archive_content: { bookmarkId: string };
}

export type JobType = keyof JobPayloads;

const jobPayloadSchemas: { [K in JobType]: z.ZodType<JobPayloads[K]> } = {
  archive_content: z.object({ bookmarkId: z.string().uuid() }),
};

/**
 * Stale job threshold in milliseconds.
 * Jobs running longer than this are assumed to have crashed and can be reclaimed.
 */
export const STALE_JOB_THRESHOLD_MS = 5 * 60 * 1000; // 5 minutes

export interface CreateJobOptions<T extends JobType> {
  type: T;
  payload: JobPayloads[T];
  nextRunAt?: Date;
  enabled?: boolean;
}

export interface ClaimJobOptions {
  types?: JobType[];
  /** Current time (default: new Date()) */
  now?: Date;
}

export interface FinishJobOptions {
  success: boolean;
  /** When to run next; null disables the job */
  nextRunAt: Date | null;
  error?: string;
}

/**
 * Creates a new job in the queue.
 */
export async function createJob<T extends JobType>(
  db: Database,
  options: CreateJobOptions<T>
): Promise<Job> {
  const { type, payload, nextRunAt = new Date(), enabled = true } = options;
  const now = new Date();

  const [job] = await db
    .insert(jobs)
    .values({
      id: generateUuidv7(),
      type,
      payload: JSON.stringify(payload),
      enabled,
      nextRunAt,
      createdAt: now,
      updatedAt: now,
    })
    .returning();

  return job;
}

/**
 * Claims a due job for processing using row locking.
 *
 * Jobs are claimed if:
 * - enabled = true
 * - next_run_at <= now
 * - running_since is NULL OR older than the stale threshold
 *
 * @returns The claimed job, or null if no jobs are available
 */
export async function claimJob(db: Database, options: ClaimJobOptions = {}): Promise<Job | null> {
  const { types, now = new Date() } = options;
  const staleThreshold = new Date(now.getTime() - STALE_JOB_THRESHOLD_MS);

  return db.transaction(async (tx) => {
    const [candidate] = await tx
      .select({ id: jobs.id })
      .from(jobs)
      .where(
        and(
          eq(jobs.enabled, true),
          lte(jobs.nextRunAt, now),
          or(isNull(jobs.runningSince), lt(jobs.runningSince, staleThreshold)),
          types && types.length > 0 ? inArray(jobs.type, types) : undefined
        )
      )
      .orderBy(asc(jobs.nextRunAt))
      .limit(1)
      .for("update", { skipLocked: true });

    if (!candidate) {
      return null;
    }

    const [job] = await tx
      .update(jobs)
      .set({ runningSince: now, updatedAt: now })
      .where(eq(jobs.id, candidate.id))
      .returning();

    return job ?? null;
  });
}

/**
 * Finishes a job after execution, updating its state for the next run.
 *
 * On success consecutive_failures resets to 0; on failure it is incremented
 * and last_error recorded. A null nextRunAt disables the job.
 *
 * @throws Error if the job no longer exists
 */
export async function finishJob(
  db: Database,
  jobId: string,
  options: FinishJobOptions
): Promise<Job> {
  const { success, nextRunAt, error } = options;
  const now = new Date();

  const [job] = await db
    .update(jobs)
    .set({
      runningSince: null,
      lastRunAt: now,
      nextRunAt,
      enabled: nextRunAt !== null,
      lastError: success ? null : (error ?? "Unknown error"),
      consecutiveFailures: success ? 0 : sql`${jobs.consecutiveFailures} + 1`,
      updatedAt: now,
    })
    .where(eq(jobs.id, jobId))
    .returning();

  if (!job) {
    throw new Error(`Job not found: ${jobId}`);
  }

  return job;
}

export async function getJob(db: Database, jobId: string): Promise<Job | null> {
  const [job] = await db.select().from(jobs).where(eq(jobs.id, jobId)).limit(1);

  return job ?? null;
}

/**
 * Parses and validates the payload of a job.
 *
 * @throws ZodError or SyntaxError when the payload does not match the type
 */
export function getJobPayload<T extends JobType>(job: Job, type: T): JobPayloads[T] {
  return jobPayloadSchemas[type].parse(JSON.parse(job.payload));
}

function archiveJobCondition(bookmarkId: string) {
  return and(
    eq(jobs.type, "archive_content"),
    sql`${jobs.payload}::json->>'bookmarkId' = ${bookmarkId}`
  );
}

/**
 * Gets the archive job of a bookmark.
 */
export async function getArchiveJob(db: Database, bookmarkId: string): Promise<Job | null> {
  const [job] = await db.select().from(jobs).where(archiveJobCondition(bookmarkId)).limit(1);

  return job ?? null;
}

/**
 * Queues archival of a bookmark's content, due immediately.
 */
export async function enqueueArchiveJob(db: Database, bookmarkId: string): Promise<Job> {
  return createJob(db, {
    type: "archive_content",
    payload: { bookmarkId },
    nextRunAt: new Date(),
  });
}

/**
 * Deletes the archive job of a bookmark.
 *
 * @returns number of deleted jobs
 */
export async function deleteArchiveJob(db: Database, bookmarkId: string): Promise<number> {
  const deleted = await db
    .delete(jobs)
    .where(archiveJobCondition(bookmarkId))
    .returning({ id: jobs.id });
  return deleted.length;
}

/**
 * Lists jobs with optional filtering, oldest first.
 */
export async function listJobs(
  db: Database,
  options: {
    enabled?: boolean;
    type?: JobType;
    limit?: number;
  } = {}
): Promise<Job[]> {
  const { enabled, type, limit = 100 } = options;

  return db
    .select()
    .from(jobs)
    .where(
      and(
        enabled !== undefined ? eq(jobs.enabled, enabled) : undefined,
        type ? eq(jobs.type, type) : undefined
      )
    )
    .orderBy(asc(jobs.createdAt), asc(jobs.id))
    .limit(limit);
}
