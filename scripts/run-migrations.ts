/**
 * Migration runner for the SQL files under drizzle/.
 *
 * - Reads the drizzle-format journal (meta/_journal.json) and the tagged SQL files
 * - Each migration runs in its own transaction, together with its bookkeeping row
 * - Already-applied migrations are verified by hash and skipped
 *
 * Works over any drizzle Database handle, so the same runner migrates the
 * production database and the in-process database used by the tests.
 */

import * as crypto from "crypto";
import * as fs from "fs";
import * as path from "path";

import { asc, sql } from "drizzle-orm";
import { bigint, pgSchema, serial, text } from "drizzle-orm/pg-core";
import { z } from "zod";

import { createDatabase, type Database } from "../src/server/db";
import { loadWorkerConfig } from "../src/server/config/env";
import { errorMessage, logger } from "../src/lib/logger";

// ============================================================================
// Types
// ============================================================================

const journalSchema = z.object({
  version: z.string(),
  dialect: z.string(),
  entries: z.array(
    z.object({
      idx: z.number().int(),
      version: z.string(),
      when: z.number().int(),
      tag: z.string().min(1),
      breakpoints: z.boolean(),
    })
  ),
});

export type Journal = z.infer<typeof journalSchema>;
export type JournalEntry = Journal["entries"][number];

export interface MigrationOptions {
  /** Directory containing migration SQL files and meta/_journal.json */
  migrationsDir?: string;
  /** Whether to log progress (default: true) */
  verbose?: boolean;
}

const migrationsSchema = pgSchema("drizzle");

const migrationsTable = migrationsSchema.table("__drizzle_migrations", {
  id: serial("id").primaryKey(),
  hash: text("hash").notNull(),
  createdAt: bigint("created_at", { mode: "number" }),
});

// Advisory lock key for migrations; any constant unique to this application works
const MIGRATION_LOCK_ID = 4_210_338;

// ============================================================================
// Pure Functions (exported for testing)
// ============================================================================

/**
 * SHA-256 of the migration file, matching drizzle-kit's bookkeeping.
 */
export function computeHash(content: string): string {
  return crypto.createHash("sha256").update(content).digest("hex");
}

/**
 * Splits a migration file on drizzle's "--> statement-breakpoint" marker.
 */
export function splitStatements(content: string): string[] {
  return content
    .split("--> statement-breakpoint")
    .map((s) => s.trim())
    .filter((s) => s.length > 0);
}

/**
 * Parses and validates a journal file's contents.
 */
export function parseJournal(content: string): Journal {
  return journalSchema.parse(JSON.parse(content));
}

// ============================================================================
// Runner
// ============================================================================

function loadJournal(migrationsDir: string): Journal {
  return parseJournal(fs.readFileSync(path.join(migrationsDir, "meta", "_journal.json"), "utf-8"));
}

function loadMigrationSql(migrationsDir: string, tag: string): string {
  return fs.readFileSync(path.join(migrationsDir, `${tag}.sql`), "utf-8");
}

type AppliedRow = typeof migrationsTable.$inferSelect;

/**
 * Checks applied migrations against the journal and returns their tags.
 */
function verifyApplied(migrationsDir: string, journal: Journal, rows: AppliedRow[]): string[] {
  return rows.map((row, i) => {
    const entry = journal.entries[i];
    if (!entry) {
      throw new Error(
        `Migration ${i} exists in database but not in journal. ` +
          `This may indicate a corrupted migration state.`
      );
    }

    const expectedHash = computeHash(loadMigrationSql(migrationsDir, entry.tag));
    if (row.hash !== expectedHash) {
      throw new Error(
        `Hash mismatch for migration ${entry.tag}:\n` +
          `  Expected: ${expectedHash}\n` +
          `  Found:    ${row.hash}\n` +
          `This may indicate the migration file was modified after being applied.`
      );
    }

    return entry.tag;
  });
}

/**
 * Applies every pending migration from the journal.
 *
 * Each migration commits on its own, so a failure leaves the earlier ones
 * applied. Every transaction takes the same advisory lock and re-reads the
 * applied list, which makes concurrent runners safe.
 *
 * @throws Error when an applied migration's hash no longer matches its file,
 *   or when the database has more migrations than the journal lists
 */
export async function runMigrations(
  db: Database,
  options: MigrationOptions = {}
): Promise<{ applied: string[]; skipped: string[] }> {
  const migrationsDir = options.migrationsDir ?? path.join(process.cwd(), "drizzle");
  const log =
    options.verbose === false ? () => undefined : (message: string) => logger.info(message);

  await db.execute(sql`CREATE SCHEMA IF NOT EXISTS "drizzle"`);
  await db.execute(sql`
    CREATE TABLE IF NOT EXISTS "drizzle"."__drizzle_migrations" (
      id SERIAL PRIMARY KEY,
      hash text NOT NULL,
      created_at bigint
    )
  `);

  const journal = loadJournal(migrationsDir);
  const readApplied = (tx: Database) =>
    tx.select().from(migrationsTable).orderBy(asc(migrationsTable.id));

  const skipped = verifyApplied(migrationsDir, journal, await readApplied(db));
  const pendingCount = journal.entries.length - skipped.length;
  if (pendingCount <= 0) {
    log("No pending migrations.");
    return { applied: [], skipped };
  }
  log(`Found ${pendingCount} pending migration(s).`);

  const applied: string[] = [];
  for (;;) {
    const tag = await db.transaction(async (tx) => {
      await tx.execute(sql`SELECT pg_advisory_xact_lock(${MIGRATION_LOCK_ID})`);

      const rows = await readApplied(tx);
      verifyApplied(migrationsDir, journal, rows);

      const entry = journal.entries[rows.length];
      if (!entry) {
        return null;
      }

      log(`Running migration: ${entry.tag}...`);
      const content = loadMigrationSql(migrationsDir, entry.tag);
      for (const statement of splitStatements(content)) {
        await tx.execute(sql.raw(statement));
      }
      await tx.insert(migrationsTable).values({ hash: computeHash(content), createdAt: entry.when });

      return entry.tag;
    });

    if (tag === null) {
      break;
    }
    applied.push(tag);
    log(`Applied ${tag}`);
  }

  return { applied, skipped };
}

// ============================================================================
// CLI Entry Point
// ============================================================================

async function main(): Promise<void> {
  const config = loadWorkerConfig();
  const { db, close } = createDatabase({ connectionString: config.databaseUrl, max: 1 });

  try {
    const { applied, skipped } = await runMigrations(db);
    logger.info("Migrations complete", { applied: applied.length, skipped: skipped.length });
  } finally {
    await close();
  }
}

if (require.main === module) {
  main().catch((error: unknown) => {
    logger.error("Migration failed", { error: errorMessage(error) });
    process.exit(1);
  });
}
