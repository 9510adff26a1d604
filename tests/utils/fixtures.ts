/**
 * Row builders shared by the integration tests.
 */

import type { Database } from "../../src/server/db";
import { bookmarks } from "../../src/server/db/schema";
import { createArchive, type ArchiveTarget } from "../../src/server/services/archives";
import { generateUuidv7 } from "../../src/lib/uuidv7";

/**
 * Inserts a bookmark with a pending archive and returns what the archiver
 * needs to process it.
 */
export async function createBookmarkWithArchive(
  db: Database,
  url = "https://example.com/article"
): Promise<ArchiveTarget> {
  const bookmarkId = generateUuidv7();
  await db.insert(bookmarks).values({ id: bookmarkId, url, submittedUrl: url });
  const archive = await createArchive(db, bookmarkId);
  return { archiveId: archive.id, bookmarkId, url };
}
