/**
 * Archiver
 *
 * Runs one archive attempt end to end: validate the bookmark URL, fetch the
 * page, extract its content and record the outcome as a state transition.
 *
 * Every outcome except a timeout ends in a terminal state, including
 * unexpected exceptions, which are recorded as `failed` rather than thrown.
 * ArchiveTimeoutError is the one error that propagates; it leaves the
 * archive in `processing` for the job runner to retry. An attempt whose
 * transition is rejected because another attempt got there first returns a
 * `conflict` failure and writes nothing.
 */

import * as Sentry from "@sentry/node";

import { createArchiveLogger, errorMessage, type Logger } from "@/lib/logger";
import { err, ok, type Result } from "@/lib/result";
import type { ArchiveConfig } from "../config/env";
import type { Database } from "../db";
import type { ArchiveState } from "../db/schema";
import { decodeBody } from "../http/html";
import { isHtmlContent } from "../http/fetch";
import { buildUserAgent } from "../http/user-agent";
import {
  startArchiveFetchTimer,
  trackArchiveOutcome,
  trackArchiveTimeout,
} from "../metrics/metrics";
import { getArchiveView, type ArchiveTarget, type ArchiveView } from "../services/archives";
import {
  ArchiveNotFoundError,
  ArchiveTimeoutError,
  ConcurrentTransitionError,
  InvalidTransitionError,
} from "./errors";
import { extractContent } from "./extractor";
import { fetchPage, type FetchFn } from "./fetcher";
import {
  failArchive,
  getCurrentState,
  isTerminalState,
  transitionTo,
  type ArchiveUpdate,
} from "./state-machine";
import { validateUrl, validationReasonToState, type HostResolver } from "./url-validator";

/**
 * Why an attempt did not produce a successful archive.
 * `skipped` means the archive was already in a terminal state; `conflict`
 * means another attempt moved it first and this one wrote nothing.
 */
export interface ArchiveFailure {
  state: ArchiveState;
  reason: string;
  message: string;
}

export interface ArchiverDeps {
  db: Database;
  config: ArchiveConfig;
  fetchFn?: FetchFn;
  resolveHost?: HostResolver;
}

export interface Archiver {
  /**
   * @throws ArchiveTimeoutError when the fetch timed out; no transition is written
   */
  call: (target: ArchiveTarget) => Promise<Result<ArchiveView, ArchiveFailure>>;
}

/** Number of leading body bytes inspected when the Content-Type is missing. */
const SNIFF_BYTES = 256;

export function createArchiver(deps: ArchiverDeps): Archiver {
  const { db, config } = deps;
  const userAgent = buildUserAgent({
    commitSha: config.commitSha,
    contactUrl: config.userAgentContactUrl,
  });

  async function fail(
    target: ArchiveTarget,
    state: Exclude<ArchiveState, "pending" | "processing" | "success">,
    failure: { reason: string; message: string },
    extraMetadata: Record<string, unknown> = {},
    archiveUpdate: ArchiveUpdate = {}
  ): Promise<Result<ArchiveView, ArchiveFailure>> {
    await transitionTo(
      db,
      target.archiveId,
      state,
      { error_reason: failure.reason, error_message: failure.message, ...extraMetadata },
      { errorMessage: failure.message, ...archiveUpdate }
    );
    trackArchiveOutcome(state, failure.reason);
    return err({ state, ...failure });
  }

  async function run(
    target: ArchiveTarget,
    log: Logger
  ): Promise<Result<ArchiveView, ArchiveFailure>> {
    let state = await getCurrentState(db, target.archiveId);

    if (isTerminalState(state)) {
      log.info("Archive already finished, skipping", { state });
      return err({ state, reason: "skipped", message: `Archive is already ${state}` });
    }

    if (!config.enabled) {
      const message = "Content archival is disabled";
      await failArchive(db, target.archiveId, {
        error_reason: "disabled",
        error_message: message,
      });
      trackArchiveOutcome("failed", "disabled");
      log.info("Archival disabled, marking archive failed");
      return err({ state: "failed", reason: "disabled", message });
    }

    const validation = await validateUrl(target.url, { resolveHost: deps.resolveHost });
    if (!validation.ok) {
      const { reason, message } = validation.error;
      const rejected = validationReasonToState(reason);
      // invalid_url is only reachable from pending; a retried attempt records failed
      const toState = state === "pending" || rejected === "blocked" ? rejected : "failed";

      log.info("URL rejected", { reason, state: toState });
      return fail(target, toState, { reason, message }, { validation_reason: reason });
    }

    if (state === "pending") {
      await transitionTo(db, target.archiveId, "processing");
      state = "processing";
    }

    const endFetchTimer = startArchiveFetchTimer();
    let fetched;
    try {
      fetched = await fetchPage(validation.value.url, {
        connectTimeoutMs: config.connectTimeoutMs,
        readTimeoutMs: config.readTimeoutMs,
        maxRedirects: config.maxRedirects,
        maxContentSizeBytes: config.maxContentSizeBytes,
        userAgent,
        fetchFn: deps.fetchFn,
        resolveHost: deps.resolveHost,
      });
    } catch (error) {
      endFetchTimer("failure");
      throw error;
    }
    const fetchedAt = new Date();

    if (!fetched.ok) {
      endFetchTimer("failure");
      const failure = fetched.error;
      const metadata: Record<string, unknown> = { fetch_url: failure.url };
      if (failure.httpStatus !== undefined) metadata.http_status = failure.httpStatus;
      if (failure.validationReason) metadata.validation_reason = failure.validationReason;

      log.info("Fetch failed", { reason: failure.reason, httpStatus: failure.httpStatus });
      return fail(
        target,
        failure.reason === "blocked" ? "blocked" : "failed",
        { reason: failure.reason, message: failure.message },
        metadata,
        { fetchedAt }
      );
    }

    endFetchTimer("success");
    const page = fetched.value;
    const mediaType = page.contentType.split(";")[0].trim().toLowerCase();

    let update: ArchiveUpdate;
    if (isHtmlContent(mediaType, page.body.subarray(0, SNIFF_BYTES).toString("latin1"))) {
      const html = decodeBody(page.body, page.contentType);
      const extracted = extractContent({ html, url: page.finalUrl });
      update = {
        title: extracted.title,
        description: extracted.description,
        contentHtml: extracted.contentHtml,
        contentText: extracted.contentText,
        rawHtml: html,
        imageUrl: extracted.imageUrl,
        metadata: extracted.metadata,
        errorMessage: null,
        fetchedAt,
      };
    } else {
      update = {
        metadata: { content_type: mediaType || "unknown", final_url: page.finalUrl },
        errorMessage: null,
        fetchedAt,
      };
    }

    await transitionTo(
      db,
      target.archiveId,
      "success",
      {
        fetch_duration_ms: page.durationMs,
        final_url: page.finalUrl,
        http_status: page.status,
      },
      update
    );
    trackArchiveOutcome("success");
    log.info("Archive completed", {
      finalUrl: page.finalUrl,
      redirects: page.redirectCount,
      durationMs: page.durationMs,
    });

    const view = await getArchiveView(db, target.archiveId);
    if (!view) {
      throw new ArchiveNotFoundError(target.archiveId);
    }
    return ok(view);
  }

  async function recordUnexpected(
    target: ArchiveTarget,
    error: unknown,
    log: Logger
  ): Promise<Result<ArchiveView, ArchiveFailure>> {
    const message = `Unexpected error: ${errorMessage(error)}`;
    log.error("Archive attempt failed unexpectedly", { error: errorMessage(error) });
    Sentry.captureException(error, {
      tags: { source: "archiver" },
      extra: { archiveId: target.archiveId, bookmarkId: target.bookmarkId },
    });

    try {
      await failArchive(db, target.archiveId, {
        error_reason: "unexpected_error",
        error_message: message,
      });
      trackArchiveOutcome("failed", "unexpected_error");
    } catch (recordError) {
      log.error("Failed to record unexpected archive failure", {
        error: errorMessage(recordError),
      });
    }

    return err({ state: "failed", reason: "unexpected_error", message });
  }

  return {
    async call(target) {
      const log = createArchiveLogger({
        archiveId: target.archiveId,
        bookmarkId: target.bookmarkId,
      });

      try {
        return await run(target, log);
      } catch (error) {
        if (error instanceof ArchiveTimeoutError) {
          trackArchiveTimeout(error.phase);
          log.warn("Archive fetch timed out", { phase: error.phase, url: error.url });
          throw error;
        }
        if (error instanceof InvalidTransitionError || error instanceof ConcurrentTransitionError) {
          // Another attempt owns the archive now; leave its transitions alone
          const state =
            error instanceof InvalidTransitionError
              ? error.from
              : await getCurrentState(db, target.archiveId);
          log.warn("Archive changed by a concurrent attempt", { state, error: error.message });
          return err({ state, reason: "conflict", message: error.message });
        }
        return recordUnexpected(target, error, log);
      }
    },
  };
}
