/**
 * Job queue module exports.
 */

export {
  // Core queue functions
  createJob,
  claimJob,
  finishJob,
  getJob,
  getJobPayload,
  listJobs,
  STALE_JOB_THRESHOLD_MS,

  // Archive job functions
  getArchiveJob,
  enqueueArchiveJob,
  deleteArchiveJob,

  // Types
  type JobPayloads,
  type JobType,
  type CreateJobOptions,
  type ClaimJobOptions,
  type FinishJobOptions,
} from "./queue";

export {
  // Job handlers
  handleArchiveContent,
  discardArchiveJob,
  computeRetryDelayMs,

  // Types
  type ArchiveJobContext,
  type JobHandlerResult,
} from "./handlers";

export { createWorker, startWorkerWithSignalHandling, type WorkerConfig } from "./worker";

export {
  createWorkerCore,
  type ClaimJobFn,
  type ProcessJobFn,
  type Worker,
  type WorkerCoreConfig,
  type WorkerLogger,
  type WorkerStats,
} from "./worker-core";
