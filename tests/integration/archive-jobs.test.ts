/**
 * Integration tests for archive jobs: the archive_content handler, job
 * discarding, and the worker running jobs against the queue.
 */

import { describe, it, expect, beforeAll, beforeEach, afterAll, afterEach, vi } from "vitest";
import { eq } from "drizzle-orm";

import { createTestDatabase, resetDatabase, type TestDatabase } from "../utils/test-db";
import { createBookmarkWithArchive } from "../utils/fixtures";
import {
  ARTICLE_HTML,
  fakeFetch,
  hangingResponse,
  htmlResponse,
  testArchiveConfig,
  testResolveHost,
  type Route,
} from "../utils/fake-http";
import { createArchiver, type Archiver } from "../../src/server/archive/archiver";
import { getCurrentState, getTransitionHistory } from "../../src/server/archive/state-machine";
import type { ArchiveConfig } from "../../src/server/config/env";
import { jobs, type Job } from "../../src/server/db/schema";
import {
  createJob,
  createWorker,
  discardArchiveJob,
  enqueueArchiveJob,
  getJob,
  handleArchiveContent,
  type Worker,
} from "../../src/server/jobs";
import type { ArchiveTarget } from "../../src/server/services/archives";
import { generateUuidv7 } from "../../src/lib/uuidv7";

const TIMEOUT_MESSAGE = "Timed out after 50ms (connect) fetching https://example.com/article";

let testDb: TestDatabase;

beforeAll(async () => {
  testDb = await createTestDatabase();
});

afterAll(async () => {
  await testDb.close();
});

beforeEach(async () => {
  await resetDatabase(testDb.db);
});

function archiverFor(routes: Record<string, Route>, config: ArchiveConfig): Archiver {
  const { fetchFn } = fakeFetch(routes);
  return createArchiver({ db: testDb.db, config, fetchFn, resolveHost: testResolveHost });
}

async function queuedArchive(): Promise<{ target: ArchiveTarget; job: Job }> {
  const target = await createBookmarkWithArchive(testDb.db);
  const job = await enqueueArchiveJob(testDb.db, target.bookmarkId);
  return { target, job };
}

async function withFailures(job: Job, consecutiveFailures: number): Promise<Job> {
  const [updated] = await testDb.db
    .update(jobs)
    .set({ consecutiveFailures })
    .where(eq(jobs.id, job.id))
    .returning();
  return updated;
}

describe("handleArchiveContent", () => {
  it("completes the job when the archive succeeds", async () => {
    const { target, job } = await queuedArchive();
    const config = testArchiveConfig();
    const archiver = archiverFor(
      { "https://example.com/article": htmlResponse(ARTICLE_HTML) },
      config
    );

    const result = await handleArchiveContent({ db: testDb.db, archiver, config }, job);

    expect(result).toEqual({
      success: true,
      nextRunAt: null,
      metadata: { archiveId: target.archiveId, state: "success", attempt: 1 },
    });
  });

  it("finishes the job on a permanent failure", async () => {
    const { target, job } = await queuedArchive();
    const config = testArchiveConfig();
    const archiver = archiverFor(
      { "https://example.com/article": htmlResponse("gone", 410) },
      config
    );

    const result = await handleArchiveContent({ db: testDb.db, archiver, config }, job);

    expect(result).toEqual({
      success: false,
      nextRunAt: null,
      error: "HTTP 410",
      metadata: { archiveId: target.archiveId, state: "failed", reason: "http_error", attempt: 1 },
    });
  });

  it("treats an already finished archive as done", async () => {
    const { target, job } = await queuedArchive();
    const config = testArchiveConfig();
    const archiver = archiverFor(
      { "https://example.com/article": htmlResponse(ARTICLE_HTML) },
      config
    );
    await archiver.call(target);

    const result = await handleArchiveContent({ db: testDb.db, archiver, config }, job);

    expect(result.success).toBe(true);
    expect(result.nextRunAt).toBeNull();
    expect(result.error).toBeUndefined();
  });

  it("treats an archive taken over by another attempt as done", async () => {
    const { target, job } = await queuedArchive();
    const config = testArchiveConfig();
    const archiver: Archiver = {
      call: async () => ({
        ok: false,
        error: {
          state: "processing",
          reason: "conflict",
          message: `Cannot transition archive ${target.archiveId} from processing to processing`,
        },
      }),
    };

    const result = await handleArchiveContent({ db: testDb.db, archiver, config }, job);

    expect(result).toEqual({
      success: true,
      nextRunAt: null,
      metadata: {
        archiveId: target.archiveId,
        state: "processing",
        reason: "conflict",
        attempt: 1,
      },
    });
  });

  it("reschedules a timed out attempt with backoff", async () => {
    const { target, job } = await queuedArchive();
    const config = testArchiveConfig({ maxRetries: 3, retryBackoffBaseMs: 1000 });
    const archiver = archiverFor({ "https://example.com/article": hangingResponse }, config);
    const before = Date.now();

    const result = await handleArchiveContent(
      { db: testDb.db, archiver, config, random: () => 0 },
      await withFailures(job, 1)
    );

    expect(result.success).toBe(false);
    expect(result.error).toBe(TIMEOUT_MESSAGE);
    expect(result.metadata).toEqual({ archiveId: target.archiveId, attempt: 2, delayMs: 2000 });
    expect(result.nextRunAt?.getTime()).toBeGreaterThanOrEqual(before + 2000);
    expect(await getCurrentState(testDb.db, target.archiveId)).toBe("processing");
  });

  it("fails the archive once retries are exhausted", async () => {
    const { target, job } = await queuedArchive();
    const config = testArchiveConfig({ maxRetries: 3 });
    const archiver = archiverFor({ "https://example.com/article": hangingResponse }, config);

    const result = await handleArchiveContent(
      { db: testDb.db, archiver, config },
      await withFailures(job, 2)
    );

    expect(result).toEqual({
      success: false,
      nextRunAt: null,
      error: TIMEOUT_MESSAGE,
      metadata: { archiveId: target.archiveId, state: "failed", attempt: 3 },
    });

    const history = await getTransitionHistory(testDb.db, target.archiveId);
    expect(history.map((t) => t.toState)).toEqual(["pending", "processing", "failed"]);
    expect(history[2].metadata).toEqual({
      error_reason: "retries_exhausted",
      error_message: `Gave up after 3 attempts: ${TIMEOUT_MESSAGE}`,
      retry_count: 3,
    });
  });

  it("discards a job whose archive no longer exists", async () => {
    const bookmarkId = generateUuidv7();
    const job = await enqueueArchiveJob(testDb.db, bookmarkId);
    const config = testArchiveConfig();
    const archiver = archiverFor({}, config);

    const result = await handleArchiveContent({ db: testDb.db, archiver, config }, job);

    expect(result).toEqual({
      success: false,
      nextRunAt: null,
      error: `Bookmark archive not found: ${bookmarkId}`,
    });
  });

  it("discards a job with an unreadable payload", async () => {
    const [job] = await testDb.db
      .insert(jobs)
      .values({ id: generateUuidv7(), type: "archive_content", payload: "{}" })
      .returning();
    const config = testArchiveConfig();

    const result = await handleArchiveContent(
      { db: testDb.db, archiver: archiverFor({}, config), config },
      job
    );

    expect(result.success).toBe(false);
    expect(result.nextRunAt).toBeNull();
    expect(result.error?.startsWith("Invalid payload: ")).toBe(true);
  });

  it("lets unexpected errors propagate", async () => {
    const { job } = await queuedArchive();
    const config = testArchiveConfig();
    const archiver: Archiver = {
      call: async () => {
        throw new Error("connection reset");
      },
    };

    await expect(
      handleArchiveContent({ db: testDb.db, archiver, config }, job)
    ).rejects.toThrow("connection reset");
  });
});

describe("discardArchiveJob", () => {
  it("fails a pending archive", async () => {
    const { target, job } = await queuedArchive();

    expect(await discardArchiveJob(testDb.db, job, "Worker gave up")).toBe(true);

    const history = await getTransitionHistory(testDb.db, target.archiveId);
    expect(history.map((t) => t.toState)).toEqual(["pending", "processing", "failed"]);
    expect(history[2].metadata).toEqual({
      error_reason: "discarded",
      error_message: "Worker gave up",
      retry_count: 1,
    });
  });

  it("leaves a finished archive alone", async () => {
    const { target, job } = await queuedArchive();
    const config = testArchiveConfig();
    await archiverFor(
      { "https://example.com/article": htmlResponse(ARTICLE_HTML) },
      config
    ).call(target);

    expect(await discardArchiveJob(testDb.db, job, "Worker gave up")).toBe(false);
    expect(await getCurrentState(testDb.db, target.archiveId)).toBe("success");
  });

  it("returns false when the archive is gone", async () => {
    const job = await createJob(testDb.db, {
      type: "archive_content",
      payload: { bookmarkId: generateUuidv7() },
    });

    expect(await discardArchiveJob(testDb.db, job, "Worker gave up")).toBe(false);
  });
});

describe("createWorker", () => {
  const silentLogger = { info: vi.fn(), warn: vi.fn(), error: vi.fn() };
  let worker: Worker | null = null;

  afterEach(async () => {
    await worker?.stop();
    worker = null;
  });

  function startWorker(archiver: Archiver, archiveConfig: ArchiveConfig): Promise<void> {
    worker = createWorker({
      db: testDb.db,
      archiver,
      archiveConfig,
      pollIntervalMs: 10,
      concurrency: 1,
      logger: silentLogger,
    });
    return worker.start();
  }

  async function waitUntilDisabled(jobId: string): Promise<Job> {
    return vi.waitFor(
      async () => {
        const job = await getJob(testDb.db, jobId);
        if (!job || job.enabled) throw new Error("job still enabled");
        return job;
      },
      { timeout: 10_000, interval: 20 }
    );
  }

  it("archives a queued bookmark", async () => {
    const { target, job } = await queuedArchive();
    const config = testArchiveConfig();
    await startWorker(
      archiverFor({ "https://example.com/article": htmlResponse(ARTICLE_HTML) }, config),
      config
    );

    const finished = await waitUntilDisabled(job.id);

    expect(finished.consecutiveFailures).toBe(0);
    expect(finished.lastError).toBeNull();
    expect(finished.runningSince).toBeNull();
    expect(await getCurrentState(testDb.db, target.archiveId)).toBe("success");
  });

  it("retries timeouts until the archive fails", async () => {
    const { target, job } = await queuedArchive();
    const config = testArchiveConfig({ maxRetries: 2, retryBackoffBaseMs: 0 });
    await startWorker(archiverFor({ "https://example.com/article": hangingResponse }, config), config);

    const finished = await waitUntilDisabled(job.id);

    expect(finished.consecutiveFailures).toBe(2);
    expect(finished.lastError).toBe(TIMEOUT_MESSAGE);

    const history = await getTransitionHistory(testDb.db, target.archiveId);
    expect(history.map((t) => t.toState)).toEqual(["pending", "processing", "failed"]);
    expect(history[2].metadata).toMatchObject({
      error_reason: "retries_exhausted",
      retry_count: 2,
    });
  });

  it("discards a job that keeps throwing", async () => {
    const { target, job } = await queuedArchive();
    const config = testArchiveConfig({ maxRetries: 1 });
    const archiver: Archiver = {
      call: async () => {
        throw new Error("connection reset");
      },
    };
    await startWorker(archiver, config);

    const finished = await waitUntilDisabled(job.id);

    expect(finished.consecutiveFailures).toBe(1);
    expect(finished.lastError).toBe("connection reset");

    const history = await getTransitionHistory(testDb.db, target.archiveId);
    expect(history[history.length - 1].metadata).toEqual({
      error_reason: "discarded",
      error_message: "Job discarded after 1 attempts: connection reset",
      retry_count: 1,
    });
  });
});
