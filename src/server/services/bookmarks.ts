/**
 * Bookmarks Service
 *
 * Bookmark lifecycle as seen by the archival pipeline. Creating a bookmark
 * sets up its archive and queues the archive job; deleting one removes the
 * job, and the archive with its transitions goes by foreign key cascade.
 */

import { eq } from "drizzle-orm";
import { z } from "zod";

import type { Database } from "@/server/db";
import { bookmarks, type Bookmark } from "@/server/db/schema";
import { createArchive } from "@/server/services/archives";
import { deleteArchiveJob, enqueueArchiveJob } from "@/server/jobs/queue";
import { generateUuidv7 } from "@/lib/uuidv7";
import { normalizeUrl } from "@/lib/url";
import { logger as defaultLogger, errorMessage, type Logger } from "@/lib/logger";

// ============================================================================
// Types
// ============================================================================

export const createBookmarkSchema = z.object({
  url: z.string().trim().min(1, "URL is required").max(2048, "URL is too long"),
  note: z.string().max(10_000).nullish(),
});

export type CreateBookmarkParams = z.input<typeof createBookmarkSchema>;

export interface CreateBookmarkDeps {
  /** Whether content archival is enabled */
  enabled: boolean;
  logger?: Logger;
}

// ============================================================================
// Operations
// ============================================================================

/**
 * Creates a bookmark and, when archival is enabled, its archive and archive
 * job. The archive step runs in its own transaction after the bookmark is
 * stored; if it fails the bookmark is kept and the error is only logged.
 *
 * @throws ZodError if the params are invalid
 */
export async function createBookmark(
  db: Database,
  params: CreateBookmarkParams,
  deps: CreateBookmarkDeps
): Promise<Bookmark> {
  const { url, note } = createBookmarkSchema.parse(params);
  const log = deps.logger ?? defaultLogger;
  const now = new Date();

  const [bookmark] = await db
    .insert(bookmarks)
    .values({
      id: generateUuidv7(),
      url: normalizeUrl(url),
      submittedUrl: url,
      note: note ?? null,
      createdAt: now,
      updatedAt: now,
    })
    .returning();

  if (!deps.enabled) {
    return bookmark;
  }

  try {
    await db.transaction(async (tx) => {
      await createArchive(tx, bookmark.id);
      await enqueueArchiveJob(tx, bookmark.id);
    });
  } catch (error) {
    log.error("Failed to schedule content archive", {
      bookmarkId: bookmark.id,
      error: errorMessage(error),
    });
  }

  return bookmark;
}

export async function getBookmark(db: Database, bookmarkId: string): Promise<Bookmark | null> {
  const [bookmark] = await db
    .select()
    .from(bookmarks)
    .where(eq(bookmarks.id, bookmarkId))
    .limit(1);

  return bookmark ?? null;
}

/**
 * Deletes a bookmark together with its queued archive job.
 *
 * @returns false if the bookmark does not exist
 */
export async function deleteBookmark(db: Database, bookmarkId: string): Promise<boolean> {
  return db.transaction(async (tx) => {
    await deleteArchiveJob(tx, bookmarkId);
    const deleted = await tx
      .delete(bookmarks)
      .where(eq(bookmarks.id, bookmarkId))
      .returning({ id: bookmarks.id });
    return deleted.length > 0;
  });
}
