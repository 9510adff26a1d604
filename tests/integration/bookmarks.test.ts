/**
 * Integration tests for the bookmarks service: archive scheduling on create
 * and cleanup on delete.
 */

import { describe, it, expect, beforeAll, beforeEach, afterAll, vi } from "vitest";
import { ZodError } from "zod";

import { createTestDatabase, resetDatabase, type TestDatabase } from "../utils/test-db";
import { getTransitionHistory } from "../../src/server/archive/state-machine";
import { contentArchiveTransitions } from "../../src/server/db/schema";
import { getArchiveJob } from "../../src/server/jobs";
import { findArchiveByBookmarkId } from "../../src/server/services/archives";
import {
  createBookmark,
  deleteBookmark,
  getBookmark,
} from "../../src/server/services/bookmarks";
import { generateUuidv7 } from "../../src/lib/uuidv7";
import type { Logger } from "../../src/lib/logger";

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

describe("createBookmark", () => {
  it("stores the normalized URL next to what was submitted", async () => {
    const bookmark = await createBookmark(
      testDb.db,
      { url: "  https://example.com/article#comments ", note: "read later" },
      { enabled: false }
    );

    expect(bookmark.url).toBe("https://example.com/article");
    expect(bookmark.submittedUrl).toBe("https://example.com/article#comments");
    expect(bookmark.note).toBe("read later");
    expect(await getBookmark(testDb.db, bookmark.id)).toEqual(bookmark);
  });

  it("creates a pending archive and a due job when archival is enabled", async () => {
    const before = Date.now();

    const bookmark = await createBookmark(
      testDb.db,
      { url: "https://example.com/article" },
      { enabled: true }
    );

    const archive = await findArchiveByBookmarkId(testDb.db, bookmark.id);
    expect(archive?.state).toBe("pending");
    if (archive) {
      const history = await getTransitionHistory(testDb.db, archive.id);
      expect(history.map((t) => t.toState)).toEqual(["pending"]);
    }

    const job = await getArchiveJob(testDb.db, bookmark.id);
    expect(job?.enabled).toBe(true);
    expect(job?.nextRunAt?.getTime()).toBeGreaterThanOrEqual(before);
    expect(job ? JSON.parse(job.payload) : null).toEqual({ bookmarkId: bookmark.id });
  });

  it("creates neither archive nor job when archival is disabled", async () => {
    const bookmark = await createBookmark(
      testDb.db,
      { url: "https://example.com/article" },
      { enabled: false }
    );

    expect(await findArchiveByBookmarkId(testDb.db, bookmark.id)).toBeNull();
    expect(await getArchiveJob(testDb.db, bookmark.id)).toBeNull();
  });

  it("stores URLs the archiver will reject", async () => {
    const bookmark = await createBookmark(
      testDb.db,
      { url: "ftp://example.com/file" },
      { enabled: true }
    );

    expect(bookmark.url).toBe("ftp://example.com/file");
    expect((await findArchiveByBookmarkId(testDb.db, bookmark.id))?.state).toBe("pending");
  });

  it("rejects an empty URL", async () => {
    await expect(
      createBookmark(testDb.db, { url: "   " }, { enabled: true })
    ).rejects.toBeInstanceOf(ZodError);
  });

  it("keeps the bookmark when scheduling the archive fails", async () => {
    const logger: Logger = {
      debug: vi.fn(),
      info: vi.fn(),
      warn: vi.fn(),
      error: vi.fn(),
      child: vi.fn(),
    };
    // createArchive fails while the table is missing
    await testDb.client.exec("ALTER TABLE content_archives RENAME TO content_archives_moved");

    try {
      const bookmark = await createBookmark(
        testDb.db,
        { url: "https://example.com/article" },
        { enabled: true, logger }
      );

      expect(await getBookmark(testDb.db, bookmark.id)).not.toBeNull();
      expect(await getArchiveJob(testDb.db, bookmark.id)).toBeNull();
      expect(logger.error).toHaveBeenCalledWith(
        "Failed to schedule content archive",
        expect.objectContaining({ bookmarkId: bookmark.id })
      );
    } finally {
      await testDb.client.exec("ALTER TABLE content_archives_moved RENAME TO content_archives");
    }
  });
});

describe("deleteBookmark", () => {
  it("removes the bookmark, its archive, transitions and job", async () => {
    const bookmark = await createBookmark(
      testDb.db,
      { url: "https://example.com/article" },
      { enabled: true }
    );
    const other = await createBookmark(
      testDb.db,
      { url: "https://example.com/other" },
      { enabled: true }
    );

    expect(await deleteBookmark(testDb.db, bookmark.id)).toBe(true);

    expect(await getBookmark(testDb.db, bookmark.id)).toBeNull();
    expect(await findArchiveByBookmarkId(testDb.db, bookmark.id)).toBeNull();
    expect(await getArchiveJob(testDb.db, bookmark.id)).toBeNull();

    expect(await getArchiveJob(testDb.db, other.id)).not.toBeNull();
    expect(await testDb.db.select().from(contentArchiveTransitions)).toHaveLength(1);
  });

  it("returns false for an unknown bookmark", async () => {
    expect(await deleteBookmark(testDb.db, generateUuidv7())).toBe(false);
  });
});
