/**
 * Integration tests for the Postgres-based job queue.
 *
 * These tests use an in-process database to verify job queue behavior,
 * including claiming with row locking and stale job recovery.
 */

import { describe, it, expect, beforeAll, beforeEach, afterAll } from "vitest";

import { createTestDatabase, resetDatabase, type TestDatabase } from "../utils/test-db";
import { jobs } from "../../src/server/db/schema";
import {
  claimJob,
  createJob,
  deleteArchiveJob,
  enqueueArchiveJob,
  finishJob,
  getArchiveJob,
  getJob,
  getJobPayload,
  listJobs,
  STALE_JOB_THRESHOLD_MS,
} from "../../src/server/jobs";
import { generateUuidv7 } from "../../src/lib/uuidv7";

// A valid UUID that doesn't exist in the database
const NON_EXISTENT_JOB_ID = "00000000-0000-7000-8000-000000000000";

let testDb: TestDatabase;

beforeAll(async () => {
  testDb = await createTestDatabase();
});

afterAll(async () => {
  await testDb.close();
});

describe("Job Queue", () => {
  beforeEach(async () => {
    await resetDatabase(testDb.db);
  });

  describe("createJob", () => {
    it("creates a job with default values", async () => {
      const bookmarkId = generateUuidv7();
      const before = Date.now();

      const job = await createJob(testDb.db, {
        type: "archive_content",
        payload: { bookmarkId },
      });

      expect(job.type).toBe("archive_content");
      expect(JSON.parse(job.payload)).toEqual({ bookmarkId });
      expect(job.enabled).toBe(true);
      expect(job.runningSince).toBeNull();
      expect(job.consecutiveFailures).toBe(0);
      expect(job.nextRunAt?.getTime()).toBeGreaterThanOrEqual(before);
    });

    it("honors nextRunAt and enabled", async () => {
      const nextRunAt = new Date(Date.now() + 60_000);

      const job = await createJob(testDb.db, {
        type: "archive_content",
        payload: { bookmarkId: generateUuidv7() },
        nextRunAt,
        enabled: false,
      });

      expect(job.enabled).toBe(false);
      expect(job.nextRunAt?.getTime()).toBe(nextRunAt.getTime());
    });
  });

  describe("claimJob", () => {
    it("claims a due job and marks it running", async () => {
      const created = await enqueueArchiveJob(testDb.db, generateUuidv7());
      const now = new Date(Date.now() + 1000);

      const claimed = await claimJob(testDb.db, { now });

      expect(claimed?.id).toBe(created.id);
      expect(claimed?.runningSince?.getTime()).toBe(now.getTime());
    });

    it("returns null when no job is available", async () => {
      expect(await claimJob(testDb.db)).toBeNull();
    });

    it("skips jobs scheduled in the future", async () => {
      await createJob(testDb.db, {
        type: "archive_content",
        payload: { bookmarkId: generateUuidv7() },
        nextRunAt: new Date(Date.now() + 60 * 60 * 1000),
      });

      expect(await claimJob(testDb.db)).toBeNull();
    });

    it("skips disabled jobs", async () => {
      await createJob(testDb.db, {
        type: "archive_content",
        payload: { bookmarkId: generateUuidv7() },
        enabled: false,
      });

      expect(await claimJob(testDb.db)).toBeNull();
    });

    it("claims the job that has been due longest first", async () => {
      const later = await createJob(testDb.db, {
        type: "archive_content",
        payload: { bookmarkId: generateUuidv7() },
        nextRunAt: new Date(Date.now() - 1000),
      });
      const earlier = await createJob(testDb.db, {
        type: "archive_content",
        payload: { bookmarkId: generateUuidv7() },
        nextRunAt: new Date(Date.now() - 5000),
      });

      expect((await claimJob(testDb.db))?.id).toBe(earlier.id);
      expect((await claimJob(testDb.db))?.id).toBe(later.id);
      expect(await claimJob(testDb.db)).toBeNull();
    });

    it("hands a job to only one of two concurrent claimers", async () => {
      await enqueueArchiveJob(testDb.db, generateUuidv7());
      const now = new Date(Date.now() + 1000);

      const [first, second] = await Promise.all([
        claimJob(testDb.db, { now }),
        claimJob(testDb.db, { now }),
      ]);

      expect([first, second].filter((job) => job !== null)).toHaveLength(1);
    });

    it("reclaims a job whose worker went stale", async () => {
      const created = await enqueueArchiveJob(testDb.db, generateUuidv7());
      const start = new Date(Date.now() + 1000);

      await claimJob(testDb.db, { now: start });
      expect(
        await claimJob(testDb.db, { now: new Date(start.getTime() + STALE_JOB_THRESHOLD_MS - 1) })
      ).toBeNull();

      const reclaimed = await claimJob(testDb.db, {
        now: new Date(start.getTime() + STALE_JOB_THRESHOLD_MS + 1),
      });
      expect(reclaimed?.id).toBe(created.id);
    });

    it("filters by job type", async () => {
      await enqueueArchiveJob(testDb.db, generateUuidv7());
      await testDb.db.insert(jobs).values({
        id: generateUuidv7(),
        type: "unknown_type",
        payload: "{}",
        nextRunAt: new Date(Date.now() - 10_000),
      });

      const claimed = await claimJob(testDb.db, { types: ["archive_content"] });

      expect(claimed?.type).toBe("archive_content");
      expect(await claimJob(testDb.db, { types: ["archive_content"] })).toBeNull();
    });
  });

  describe("finishJob", () => {
    it("resets failures on success", async () => {
      const job = await enqueueArchiveJob(testDb.db, generateUuidv7());
      await finishJob(testDb.db, job.id, {
        success: false,
        nextRunAt: new Date(),
        error: "timed out",
      });

      const finished = await finishJob(testDb.db, job.id, { success: true, nextRunAt: null });

      expect(finished.consecutiveFailures).toBe(0);
      expect(finished.lastError).toBeNull();
      expect(finished.lastRunAt).not.toBeNull();
    });

    it("counts failures and keeps a rescheduled job enabled", async () => {
      const job = await enqueueArchiveJob(testDb.db, generateUuidv7());
      await claimJob(testDb.db, { now: new Date(Date.now() + 1000) });
      const nextRunAt = new Date(Date.now() + 30_000);

      await finishJob(testDb.db, job.id, { success: false, nextRunAt, error: "first" });
      const finished = await finishJob(testDb.db, job.id, {
        success: false,
        nextRunAt,
        error: "second",
      });

      expect(finished.consecutiveFailures).toBe(2);
      expect(finished.lastError).toBe("second");
      expect(finished.enabled).toBe(true);
      expect(finished.runningSince).toBeNull();
      expect(finished.nextRunAt?.getTime()).toBe(nextRunAt.getTime());
    });

    it("records a placeholder error when none is given", async () => {
      const job = await enqueueArchiveJob(testDb.db, generateUuidv7());

      const finished = await finishJob(testDb.db, job.id, { success: false, nextRunAt: null });

      expect(finished.lastError).toBe("Unknown error");
    });

    it("disables the job when nextRunAt is null", async () => {
      const job = await enqueueArchiveJob(testDb.db, generateUuidv7());

      const finished = await finishJob(testDb.db, job.id, { success: true, nextRunAt: null });

      expect(finished.enabled).toBe(false);
      expect(finished.nextRunAt).toBeNull();
      expect(await claimJob(testDb.db, { now: new Date(Date.now() + 60_000) })).toBeNull();
    });

    it("throws for a missing job", async () => {
      await expect(
        finishJob(testDb.db, NON_EXISTENT_JOB_ID, { success: true, nextRunAt: null })
      ).rejects.toThrow(`Job not found: ${NON_EXISTENT_JOB_ID}`);
    });
  });

  describe("getJob", () => {
    it("returns null for a missing job", async () => {
      expect(await getJob(testDb.db, NON_EXISTENT_JOB_ID)).toBeNull();
    });
  });

  describe("getJobPayload", () => {
    it("returns the parsed payload", async () => {
      const bookmarkId = generateUuidv7();
      const job = await enqueueArchiveJob(testDb.db, bookmarkId);

      expect(getJobPayload(job, "archive_content")).toEqual({ bookmarkId });
    });

    it("rejects payloads that do not match the job type", async () => {
      const [job] = await testDb.db
        .insert(jobs)
        .values({
          id: generateUuidv7(),
          type: "archive_content",
          payload: JSON.stringify({ bookmarkId: "not-a-uuid" }),
        })
        .returning();

      expect(() => getJobPayload(job, "archive_content")).toThrow();
    });

    it("rejects payloads that are not JSON", async () => {
      const [job] = await testDb.db
        .insert(jobs)
        .values({ id: generateUuidv7(), type: "archive_content", payload: "{" })
        .returning();

      expect(() => getJobPayload(job, "archive_content")).toThrow(SyntaxError);
    });
  });

  describe("archive jobs", () => {
    it("finds and deletes the job of a bookmark", async () => {
      const bookmarkId = generateUuidv7();
      const otherBookmarkId = generateUuidv7();
      const job = await enqueueArchiveJob(testDb.db, bookmarkId);
      const other = await enqueueArchiveJob(testDb.db, otherBookmarkId);

      expect((await getArchiveJob(testDb.db, bookmarkId))?.id).toBe(job.id);

      expect(await deleteArchiveJob(testDb.db, bookmarkId)).toBe(1);
      expect(await getArchiveJob(testDb.db, bookmarkId)).toBeNull();
      expect((await getArchiveJob(testDb.db, otherBookmarkId))?.id).toBe(other.id);
    });

    it("deletes nothing for a bookmark without a job", async () => {
      expect(await deleteArchiveJob(testDb.db, generateUuidv7())).toBe(0);
    });
  });

  describe("listJobs", () => {
    it("filters by enabled state", async () => {
      const active = await enqueueArchiveJob(testDb.db, generateUuidv7());
      const done = await enqueueArchiveJob(testDb.db, generateUuidv7());
      await finishJob(testDb.db, done.id, { success: true, nextRunAt: null });

      expect((await listJobs(testDb.db, { enabled: true })).map((j) => j.id)).toEqual([active.id]);
      expect((await listJobs(testDb.db, { enabled: false })).map((j) => j.id)).toEqual([done.id]);
      expect(await listJobs(testDb.db, { type: "archive_content" })).toHaveLength(2);
      expect(await listJobs(testDb.db, { limit: 1 })).toHaveLength(1);
    });
  });
});
