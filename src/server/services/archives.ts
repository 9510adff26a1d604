/**
 * Content Archives Service
 *
 * Read surface and creation of content archives. State changes go through
 * the archive state machine; nothing here mutates an existing archive.
 */

import { and, eq, type SQL } from "drizzle-orm";

import type { Database } from "@/server/db";
import {
  bookmarks,
  contentArchives,
  contentArchiveTransitions,
  type ArchiveState,
  type ContentArchive,
} from "@/server/db/schema";
import { INITIAL_STATE, recordInitialState } from "@/server/archive/state-machine";
import { generateUuidv7 } from "@/lib/uuidv7";

// ============================================================================
// Types
// ============================================================================

/**
 * An archive as exposed to API consumers: current state plus extracted fields.
 * The raw page HTML is left out.
 */
export interface ArchiveView {
  id: string;
  bookmarkId: string;
  state: ArchiveState;
  title: string | null;
  description: string | null;
  contentText: string | null;
  contentHtml: string | null;
  imageUrl: string | null;
  metadata: Record<string, unknown> | null;
  errorMessage: string | null;
  fetchedAt: Date | null;
  createdAt: Date;
  updatedAt: Date;
}

/**
 * What the archiver needs to process one archive.
 */
export interface ArchiveTarget {
  archiveId: string;
  bookmarkId: string;
  /** Normalized bookmark URL */
  url: string;
}

// ============================================================================
// Queries
// ============================================================================

const viewColumns = {
  id: contentArchives.id,
  bookmarkId: contentArchives.bookmarkId,
  state: contentArchiveTransitions.toState,
  title: contentArchives.title,
  description: contentArchives.description,
  contentText: contentArchives.contentText,
  contentHtml: contentArchives.contentHtml,
  imageUrl: contentArchives.imageUrl,
  metadata: contentArchives.metadata,
  errorMessage: contentArchives.errorMessage,
  fetchedAt: contentArchives.fetchedAt,
  createdAt: contentArchives.createdAt,
  updatedAt: contentArchives.updatedAt,
};

async function selectView(db: Database, where: SQL): Promise<ArchiveView | null> {
  const [row] = await db
    .select(viewColumns)
    .from(contentArchives)
    .leftJoin(
      contentArchiveTransitions,
      and(
        eq(contentArchiveTransitions.contentArchiveId, contentArchives.id),
        eq(contentArchiveTransitions.mostRecent, true)
      )
    )
    .where(where)
    .limit(1);

  if (!row) {
    return null;
  }

  return { ...row, state: row.state ?? INITIAL_STATE };
}

/**
 * Creates the archive for a bookmark together with its initial `pending`
 * transition.
 */
export async function createArchive(db: Database, bookmarkId: string): Promise<ContentArchive> {
  return db.transaction(async (tx) => {
    const now = new Date();
    const [archive] = await tx
      .insert(contentArchives)
      .values({
        id: generateUuidv7(),
        bookmarkId,
        createdAt: now,
        updatedAt: now,
      })
      .returning();

    await recordInitialState(tx, archive.id);
    return archive;
  });
}

export async function getArchiveView(db: Database, archiveId: string): Promise<ArchiveView | null> {
  return selectView(db, eq(contentArchives.id, archiveId));
}

export async function findArchiveByBookmarkId(
  db: Database,
  bookmarkId: string
): Promise<ArchiveView | null> {
  return selectView(db, eq(contentArchives.bookmarkId, bookmarkId));
}

/**
 * Loads the archive of a bookmark together with the bookmark URL.
 */
export async function findArchiveTarget(
  db: Database,
  bookmarkId: string
): Promise<ArchiveTarget | null> {
  const [row] = await db
    .select({
      archiveId: contentArchives.id,
      bookmarkId: bookmarks.id,
      url: bookmarks.url,
    })
    .from(contentArchives)
    .innerJoin(bookmarks, eq(bookmarks.id, contentArchives.bookmarkId))
    .where(eq(contentArchives.bookmarkId, bookmarkId))
    .limit(1);

  return row ?? null;
}
