/**
 * Metrics module exports
 *
 * Prometheus metrics for the archival pipeline. Metrics are disabled by
 * default and can be enabled by setting METRICS_ENABLED=true.
 */

export {
  // Core
  metricsEnabled,
  registry,

  // Archive metrics
  archiveOutcomesTotal,
  archiveTimeoutsTotal,
  archiveFetchDurationSeconds,
  archivesByState,
  trackArchiveOutcome,
  trackArchiveTimeout,
  trackArchiveFetch,
  startArchiveFetchTimer,
  updateArchiveStateMetrics,

  // Job metrics
  jobProcessedTotal,
  jobDurationSeconds,
  jobQueueSize,
  trackJobProcessed,
  updateJobQueueMetrics,
  type JobStatus,
} from "./metrics";

export { collectAllMetrics, collectArchiveStateMetrics, collectJobQueueMetrics } from "./collect";

export { startMetricsServer, stopMetricsServer } from "./server";
