import { drizzle } from "drizzle-orm/node-postgres";
import type { PgDatabase, PgQueryResultHKT } from "drizzle-orm/pg-core";
import { Pool } from "pg";
import * as Sentry from "@sentry/node";

import { logger } from "@/lib/logger";
import * as schema from "./schema";

/**
 * A drizzle handle over the project schema.
 *
 * Both the pooled node-postgres database and the in-process PGlite database
 * used by tests satisfy this type, and so does a transaction opened on
 * either, so every service can run inside an outer transaction.
 */
export type Database = PgDatabase<PgQueryResultHKT, typeof schema>;

export interface DatabaseOptions {
  connectionString: string;
  /** Maximum pool size (default 10) */
  max?: number;
}

export interface DatabaseConnection {
  db: Database;
  close: () => Promise<void>;
}

/**
 * Opens a pooled connection to PostgreSQL.
 */
export function createDatabase(options: DatabaseOptions): DatabaseConnection {
  const pool = new Pool({
    connectionString: options.connectionString,
    max: options.max ?? 10,
    // Close idle connections before typical proxy idle timeouts
    idleTimeoutMillis: 30000,
  });

  // Without this handler a dropped idle client raises uncaughtException.
  // The pool discards failed clients and opens new ones when needed.
  pool.on("error", (err: Error & { code?: string }) => {
    logger.error("Unexpected error on idle database client", {
      code: err.code,
      message: err.message,
    });
    Sentry.captureException(err, {
      tags: { source: "pg-pool" },
    });
  });

  const db = drizzle(pool, { schema });

  return {
    db,
    close: () => pool.end(),
  };
}

export { schema };
