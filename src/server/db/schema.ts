import { sql } from "drizzle-orm";
import {
  boolean,
  index,
  integer,
  jsonb,
  pgTable,
  text,
  timestamp,
  uniqueIndex,
  uuid,
  varchar,
} from "drizzle-orm/pg-core";

// ============================================================================
// ARCHIVE STATES
// ============================================================================

/**
 * Archive lifecycle states. `pending` is the initial state; the last four are
 * terminal. Stored as text on transitions and validated in the application.
 */
export const archiveStates = [
  "pending",
  "processing",
  "success",
  "failed",
  "blocked",
  "invalid_url",
] as const;

export type ArchiveState = (typeof archiveStates)[number];

/**
 * Schema-less, additive metadata recorded on each transition.
 */
export interface TransitionMetadata {
  error_message?: string;
  error_reason?: string;
  validation_reason?: string;
  fetch_duration_ms?: number;
  retry_count?: number;
  http_status?: number;
  final_url?: string;
  [key: string]: unknown;
}

// ============================================================================
// BOOKMARKS
// ============================================================================

/**
 * Bookmarks table - one row per saved URL.
 * `url` is normalized (fragment stripped); `submittedUrl` keeps the input.
 */
export const bookmarks = pgTable(
  "bookmarks",
  {
    id: uuid("id").primaryKey(),
    url: varchar("url", { length: 2048 }).notNull(),
    submittedUrl: varchar("submitted_url", { length: 2048 }).notNull(),
    note: text("note"),

    createdAt: timestamp("created_at", { withTimezone: true }).notNull().defaultNow(),
    updatedAt: timestamp("updated_at", { withTimezone: true }).notNull().defaultNow(),
  },
  (table) => [index("idx_bookmarks_url").on(table.url)]
);

// ============================================================================
// CONTENT ARCHIVES
// ============================================================================

/**
 * Content archives - the extracted content of a bookmark's page.
 * Exactly one per bookmark. The current state is not stored here; it is the
 * `to_state` of the most recent row in content_archive_transitions.
 */
export const contentArchives = pgTable("content_archives", {
  id: uuid("id").primaryKey(),
  bookmarkId: uuid("bookmark_id")
    .notNull()
    .unique()
    .references(() => bookmarks.id, { onDelete: "cascade" }),

  title: varchar("title", { length: 500 }),
  description: text("description"),
  contentText: text("content_text"),
  contentHtml: text("content_html"), // sanitized article HTML
  rawHtml: text("raw_html"), // page as fetched
  imageUrl: varchar("image_url", { length: 2048 }),
  metadata: jsonb("metadata").$type<Record<string, unknown>>(),

  errorMessage: text("error_message"),
  fetchedAt: timestamp("fetched_at", { withTimezone: true }),

  createdAt: timestamp("created_at", { withTimezone: true }).notNull().defaultNow(),
  updatedAt: timestamp("updated_at", { withTimezone: true }).notNull().defaultNow(),
});

/**
 * Append-only audit log of archive state changes.
 * Only the most_recent flag is ever updated in place.
 */
export const contentArchiveTransitions = pgTable(
  "content_archive_transitions",
  {
    id: uuid("id").primaryKey(),
    contentArchiveId: uuid("content_archive_id")
      .notNull()
      .references(() => contentArchives.id, { onDelete: "cascade" }),
    toState: varchar("to_state", { length: 32 }).$type<ArchiveState>().notNull(),
    metadata: jsonb("metadata").$type<TransitionMetadata>().notNull().default({}),
    sortKey: integer("sort_key").notNull(),
    mostRecent: boolean("most_recent").notNull(),

    createdAt: timestamp("created_at", { withTimezone: true }).notNull().defaultNow(),
  },
  (table) => [
    uniqueIndex("idx_archive_transitions_sort").on(table.contentArchiveId, table.sortKey),
    uniqueIndex("idx_archive_transitions_most_recent")
      .on(table.contentArchiveId, table.mostRecent)
      .where(sql`${table.mostRecent}`),
  ]
);

// ============================================================================
// JOBS
// ============================================================================

/**
 * Jobs table - persistent scheduled tasks.
 * One archive_content job per bookmark; disabled once it reaches a final outcome.
 */
export const jobs = pgTable(
  "jobs",
  {
    id: uuid("id").primaryKey(),
    type: text("type").notNull(), // 'archive_content'
    payload: text("payload").notNull().default("{}"), // JSON payload

    enabled: boolean("enabled").notNull().default(true),
    nextRunAt: timestamp("next_run_at", { withTimezone: true }),
    runningSince: timestamp("running_since", { withTimezone: true }),
    lastRunAt: timestamp("last_run_at", { withTimezone: true }),
    lastError: text("last_error"),
    consecutiveFailures: integer("consecutive_failures").notNull().default(0),

    createdAt: timestamp("created_at", { withTimezone: true }).notNull().defaultNow(),
    updatedAt: timestamp("updated_at", { withTimezone: true }).notNull().defaultNow(),
  },
  (table) => [
    index("idx_jobs_polling").on(table.nextRunAt).where(sql`${table.enabled}`),
    index("idx_jobs_type").on(table.type),
  ]
);

// ============================================================================
// TYPE EXPORTS
// ============================================================================

export type Bookmark = typeof bookmarks.$inferSelect;
export type NewBookmark = typeof bookmarks.$inferInsert;

export type ContentArchive = typeof contentArchives.$inferSelect;
export type NewContentArchive = typeof contentArchives.$inferInsert;

export type ContentArchiveTransition = typeof contentArchiveTransitions.$inferSelect;
export type NewContentArchiveTransition = typeof contentArchiveTransitions.$inferInsert;

export type Job = typeof jobs.$inferSelect;
export type NewJob = typeof jobs.$inferInsert;
