/**
 * Gauge collection from the database, run on each /metrics scrape.
 */

import { eq, sql } from "drizzle-orm";

import type { Database } from "../db";
import { contentArchiveTransitions, jobs } from "../db/schema";
import { metricsEnabled, updateArchiveStateMetrics, updateJobQueueMetrics } from "./metrics";

/**
 * Counts enabled jobs by type, split into running and waiting.
 */
export async function collectJobQueueMetrics(db: Database): Promise<void> {
  if (!metricsEnabled) return;

  const status = sql<string>`CASE WHEN ${jobs.runningSince} IS NULL THEN 'pending' ELSE 'running' END`;
  const rows = await db
    .select({
      type: jobs.type,
      status,
      count: sql<number>`count(*)::int`,
    })
    .from(jobs)
    .where(eq(jobs.enabled, true))
    .groupBy(jobs.type, status);

  updateJobQueueMetrics(rows);
}

/**
 * Counts archives by current state (their most recent transition).
 */
export async function collectArchiveStateMetrics(db: Database): Promise<void> {
  if (!metricsEnabled) return;

  const rows = await db
    .select({
      state: contentArchiveTransitions.toState,
      count: sql<number>`count(*)::int`,
    })
    .from(contentArchiveTransitions)
    .where(eq(contentArchiveTransitions.mostRecent, true))
    .groupBy(contentArchiveTransitions.toState);

  updateArchiveStateMetrics(rows);
}

export async function collectAllMetrics(db: Database): Promise<void> {
  if (!metricsEnabled) return;

  await Promise.all([collectJobQueueMetrics(db), collectArchiveStateMetrics(db)]);
}
