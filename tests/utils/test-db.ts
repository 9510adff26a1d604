/**
 * In-process PostgreSQL for integration tests.
 *
 * Each test file gets its own PGlite instance with the real migrations
 * applied, so tests need no database server.
 */

import * as path from "path";

import { PGlite } from "@electric-sql/pglite";
import { sql } from "drizzle-orm";
import { drizzle } from "drizzle-orm/pglite";

import { runMigrations } from "../../scripts/run-migrations";
import type { Database } from "../../src/server/db";
import * as schema from "../../src/server/db/schema";

export const MIGRATIONS_DIR = path.resolve(__dirname, "../../drizzle");

export interface TestDatabase {
  db: Database;
  /** Raw client, for catalog queries in tests */
  client: PGlite;
  close: () => Promise<void>;
}

/**
 * Creates an empty in-memory database. Pass `migrate: false` to get a blank
 * database for migration runner tests.
 */
export async function createTestDatabase(options: { migrate?: boolean } = {}): Promise<TestDatabase> {
  const client = new PGlite();
  const db = drizzle(client, { schema });

  if (options.migrate !== false) {
    await runMigrations(db, { migrationsDir: MIGRATIONS_DIR, verbose: false });
  }

  return { db, client, close: () => client.close() };
}

/**
 * Removes all application rows. Archives and transitions go with their
 * bookmarks by cascade.
 */
export async function resetDatabase(db: Database): Promise<void> {
  await db.execute(sql`TRUNCATE jobs, bookmarks CASCADE`);
}
