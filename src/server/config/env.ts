/**
 * Environment Configuration
 *
 * Configuration is parsed from the environment once, at process start, into
 * plain typed objects. Those objects are then passed to the components that
 * need them (validator, fetcher, archiver, worker) instead of being read
 * from globals at call time, so tests can build a config with tighter limits.
 */

import { z } from "zod";

/**
 * Raised when the environment does not describe a usable configuration.
 */
export class ConfigError extends Error {
  constructor(
    message: string,
    public readonly issues: string[]
  ) {
    super(`${message}: ${issues.join("; ")}`);
    this.name = "ConfigError";
  }
}

const MEGABYTE = 1024 * 1024;

/** Parses an optional integer env var, keeping the default when unset or blank. */
const intFromEnv = (fallback: number) =>
  z.preprocess(
    (value) => (typeof value === "string" && value.trim() !== "" ? Number(value) : undefined),
    z.number().int().nonnegative().default(fallback)
  );

/** Parses an optional boolean env var ("true"/"false"/"1"/"0"). */
const booleanFromEnv = (fallback: boolean) =>
  z.preprocess((value) => {
    if (typeof value !== "string" || value.trim() === "") return undefined;
    const normalized = value.trim().toLowerCase();
    if (["1", "true", "yes", "on"].includes(normalized)) return true;
    if (["0", "false", "no", "off"].includes(normalized)) return false;
    return value;
  }, z.boolean().default(fallback));

const optionalString = z.preprocess(
  (value) => (typeof value === "string" && value.trim() !== "" ? value.trim() : undefined),
  z.string().optional()
);

// ============================================================================
// Archive configuration
// ============================================================================

const archiveEnvSchema = z.object({
  NODE_ENV: optionalString,
  ARCHIVE_ENABLED: booleanFromEnv(true),
  ARCHIVE_CONNECT_TIMEOUT_MS: intFromEnv(10_000),
  ARCHIVE_READ_TIMEOUT_MS: intFromEnv(15_000),
  ARCHIVE_MAX_REDIRECTS: intFromEnv(5),
  ARCHIVE_MAX_CONTENT_SIZE_BYTES: intFromEnv(10 * MEGABYTE),
  ARCHIVE_MAX_RETRIES: intFromEnv(3),
  ARCHIVE_RETRY_BACKOFF_BASE_MS: intFromEnv(2_000),
  ARCHIVE_USER_AGENT_CONTACT_URL: optionalString.pipe(z.string().url().optional()),
  GIT_COMMIT_SHA: optionalString,
});

/**
 * Settings for the content archival pipeline.
 */
export interface ArchiveConfig {
  /** Global switch; when false no archives are created or processed. */
  enabled: boolean;
  /** Time allowed until response headers arrive. */
  connectTimeoutMs: number;
  /** Time allowed for downloading the response body. */
  readTimeoutMs: number;
  maxRedirects: number;
  maxContentSizeBytes: number;
  /** Total attempts for an archive job, including the first. */
  maxRetries: number;
  /** Base delay for the exponential retry backoff. */
  retryBackoffBaseMs: number;
  /** Contact URL advertised in the User-Agent. Required in production. */
  userAgentContactUrl?: string;
  /** Short commit SHA appended to the User-Agent version, if known. */
  commitSha?: string;
}

export const DEFAULT_ARCHIVE_CONFIG: ArchiveConfig = {
  enabled: true,
  connectTimeoutMs: 10_000,
  readTimeoutMs: 15_000,
  maxRedirects: 5,
  maxContentSizeBytes: 10 * MEGABYTE,
  maxRetries: 3,
  retryBackoffBaseMs: 2_000,
};

function formatIssues(error: z.ZodError): string[] {
  return error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`);
}

/**
 * Builds the archive configuration from environment variables.
 *
 * @throws ConfigError when a value does not parse, or when running in
 *   production without ARCHIVE_USER_AGENT_CONTACT_URL
 */
export function loadArchiveConfig(env: NodeJS.ProcessEnv = process.env): ArchiveConfig {
  const parsed = archiveEnvSchema.safeParse(env);
  if (!parsed.success) {
    throw new ConfigError("Invalid archive configuration", formatIssues(parsed.error));
  }

  const values = parsed.data;
  if (values.NODE_ENV === "production" && !values.ARCHIVE_USER_AGENT_CONTACT_URL) {
    throw new ConfigError("Invalid archive configuration", [
      "ARCHIVE_USER_AGENT_CONTACT_URL: Required in production",
    ]);
  }

  return {
    enabled: values.ARCHIVE_ENABLED,
    connectTimeoutMs: values.ARCHIVE_CONNECT_TIMEOUT_MS,
    readTimeoutMs: values.ARCHIVE_READ_TIMEOUT_MS,
    maxRedirects: values.ARCHIVE_MAX_REDIRECTS,
    maxContentSizeBytes: values.ARCHIVE_MAX_CONTENT_SIZE_BYTES,
    maxRetries: Math.max(1, values.ARCHIVE_MAX_RETRIES),
    retryBackoffBaseMs: values.ARCHIVE_RETRY_BACKOFF_BASE_MS,
    userAgentContactUrl: values.ARCHIVE_USER_AGENT_CONTACT_URL,
    commitSha: values.GIT_COMMIT_SHA?.slice(0, 7),
  };
}

// ============================================================================
// Worker and database configuration
// ============================================================================

const workerEnvSchema = z.object({
  DATABASE_URL: optionalString,
  PG_POOL_MAX: intFromEnv(10),
  WORKER_POLL_INTERVAL_MS: intFromEnv(5_000),
  WORKER_CONCURRENCY: intFromEnv(3),
  METRICS_PORT: intFromEnv(9092),
});

export interface WorkerEnvConfig {
  databaseUrl: string;
  poolMax: number;
  pollIntervalMs: number;
  concurrency: number;
  metricsPort: number;
}

/**
 * Builds the worker process configuration from environment variables.
 *
 * @throws ConfigError when DATABASE_URL is missing or a number does not parse
 */
export function loadWorkerConfig(env: NodeJS.ProcessEnv = process.env): WorkerEnvConfig {
  const parsed = workerEnvSchema.safeParse(env);
  if (!parsed.success) {
    throw new ConfigError("Invalid worker configuration", formatIssues(parsed.error));
  }

  const values = parsed.data;
  if (!values.DATABASE_URL) {
    throw new ConfigError("Invalid worker configuration", ["DATABASE_URL: Required"]);
  }

  return {
    databaseUrl: values.DATABASE_URL,
    poolMax: values.PG_POOL_MAX,
    pollIntervalMs: values.WORKER_POLL_INTERVAL_MS,
    concurrency: Math.max(1, values.WORKER_CONCURRENCY),
    metricsPort: values.METRICS_PORT,
  };
}
