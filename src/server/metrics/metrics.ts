import { Registry, collectDefaultMetrics, Counter, Histogram, Gauge } from "prom-client";

import type { ArchiveState } from "../db/schema";

/**
 * Prometheus Metrics Registry
 *
 * Metrics are only collected when METRICS_ENABLED=true to avoid
 * any overhead when metrics are disabled.
 *
 * This module provides:
 * - A shared registry for all metrics
 * - Archive outcome and fetch metrics
 * - Job processing metrics
 * - Gauges refreshed from the database on scrape (see collect.ts)
 */

/**
 * Whether metrics collection is enabled.
 */
export const metricsEnabled = process.env.METRICS_ENABLED === "true";

/**
 * Shared Prometheus registry for all metrics.
 */
export const registry = new Registry();

if (metricsEnabled) {
  collectDefaultMetrics({ register: registry });
}

// ============================================================================
// Archive Metrics
// ============================================================================

/**
 * Counter for archive transitions into terminal states.
 * Labels: state (success, failed, blocked, invalid_url), reason (error_reason or "none")
 */
export const archiveOutcomesTotal = metricsEnabled
  ? new Counter({
      name: "archive_outcomes_total",
      help: "Archives reaching a terminal state",
      labelNames: ["state", "reason"] as const,
      registers: [registry],
    })
  : null;

/**
 * Counter for archive attempts that timed out and were handed back for retry.
 */
export const archiveTimeoutsTotal = metricsEnabled
  ? new Counter({
      name: "archive_timeouts_total",
      help: "Archive fetches that timed out",
      labelNames: ["phase"] as const,
      registers: [registry],
    })
  : null;

/**
 * Histogram for page fetch duration in seconds, redirects included.
 * Labels: outcome (success, failure)
 */
export const archiveFetchDurationSeconds = metricsEnabled
  ? new Histogram({
      name: "archive_fetch_duration_seconds",
      help: "Archive page fetch duration in seconds",
      labelNames: ["outcome"] as const,
      buckets: [0.05, 0.1, 0.25, 0.5, 1, 2.5, 5, 10, 30],
      registers: [registry],
    })
  : null;

/**
 * Gauge for archives by current state.
 */
export const archivesByState = metricsEnabled
  ? new Gauge({
      name: "archives_by_state",
      help: "Number of archives by current state",
      labelNames: ["state"] as const,
      registers: [registry],
    })
  : null;

/**
 * Tracks an archive reaching a terminal state.
 */
export function trackArchiveOutcome(state: ArchiveState, reason?: string): void {
  if (!metricsEnabled) return;
  archiveOutcomesTotal?.inc({ state, reason: reason ?? "none" });
}

export function trackArchiveTimeout(phase: "connect" | "read"): void {
  if (!metricsEnabled) return;
  archiveTimeoutsTotal?.inc({ phase });
}

export function trackArchiveFetch(outcome: "success" | "failure", durationMs: number): void {
  if (!metricsEnabled) return;
  archiveFetchDurationSeconds?.observe({ outcome }, durationMs / 1000);
}

/**
 * Creates a timer for a page fetch. Returns a no-op when metrics are disabled.
 */
export function startArchiveFetchTimer(): (outcome: "success" | "failure") => void {
  if (!metricsEnabled) {
    return () => {};
  }

  const startTime = performance.now();
  return (outcome) => trackArchiveFetch(outcome, performance.now() - startTime);
}

export function updateArchiveStateMetrics(counts: Array<{ state: string; count: number }>): void {
  if (!metricsEnabled) return;

  archivesByState?.reset();
  for (const { state, count } of counts) {
    archivesByState?.set({ state }, count);
  }
}

// ============================================================================
// Job Processing Metrics
// ============================================================================

/**
 * Job processing status values.
 * - success: Job completed (the archive reached a final state)
 * - retry: Job rescheduled after a transient failure
 * - failure: Job failed unexpectedly or was discarded
 */
export type JobStatus = "success" | "retry" | "failure";

/**
 * Counter for total jobs processed.
 * Labels: type (archive_content), status (success, retry, failure)
 */
export const jobProcessedTotal = metricsEnabled
  ? new Counter({
      name: "job_processed_total",
      help: "Total jobs processed",
      labelNames: ["type", "status"] as const,
      registers: [registry],
    })
  : null;

/**
 * Histogram for job processing duration in seconds.
 */
export const jobDurationSeconds = metricsEnabled
  ? new Histogram({
      name: "job_duration_seconds",
      help: "Job processing duration in seconds",
      labelNames: ["type"] as const,
      buckets: [0.01, 0.05, 0.1, 0.25, 0.5, 1, 2.5, 5, 10, 30, 60],
      registers: [registry],
    })
  : null;

/**
 * Gauge for current job queue size.
 * Labels: type, status (pending, running)
 */
export const jobQueueSize = metricsEnabled
  ? new Gauge({
      name: "job_queue_size",
      help: "Current job queue size by type and status",
      labelNames: ["type", "status"] as const,
      registers: [registry],
    })
  : null;

export function trackJobProcessed(type: string, status: JobStatus, durationMs: number): void {
  if (!metricsEnabled) return;

  jobProcessedTotal?.inc({ type, status });
  jobDurationSeconds?.observe({ type }, durationMs / 1000);
}

export function updateJobQueueMetrics(
  counts: Array<{ type: string; status: string; count: number }>
): void {
  if (!metricsEnabled) return;

  jobQueueSize?.reset();
  for (const { type, status, count } of counts) {
    jobQueueSize?.set({ type, status }, count);
  }
}
