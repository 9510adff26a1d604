/**
 * Errors raised by the archival pipeline.
 *
 * Only ArchiveTimeoutError crosses the Archiver boundary: it is the transient
 * condition the job handler retries. Every other failure is recorded as a
 * terminal state on the archive.
 */

import type { ArchiveState } from "../db/schema";

/**
 * A fetch exceeded its connect or read timeout. Retryable.
 */
export class ArchiveTimeoutError extends Error {
  constructor(
    public readonly url: string,
    public readonly phase: "connect" | "read",
    public readonly timeoutMs: number
  ) {
    super(`Timed out after ${timeoutMs}ms (${phase}) fetching ${url}`);
    this.name = "ArchiveTimeoutError";
  }
}

/**
 * The requested state change is not in the transition table.
 */
export class InvalidTransitionError extends Error {
  constructor(
    public readonly archiveId: string,
    public readonly from: ArchiveState,
    public readonly to: ArchiveState
  ) {
    super(`Cannot transition archive ${archiveId} from ${from} to ${to}`);
    this.name = "InvalidTransitionError";
  }
}

/**
 * Another transition for the same archive was committed first.
 */
export class ConcurrentTransitionError extends Error {
  constructor(
    public readonly archiveId: string,
    options?: { cause?: unknown }
  ) {
    super(`Concurrent transition detected for archive ${archiveId}`, options);
    this.name = "ConcurrentTransitionError";
  }
}

/**
 * A connection was about to be opened to a non-public address. Raised from
 * the pinned DNS lookup, after the URL itself passed validation.
 */
export class BlockedAddressError extends Error {
  constructor(
    public readonly hostname: string,
    public readonly address: string,
    public readonly reason: "private_ip" | "loopback"
  ) {
    super(`Host ${hostname} resolved to non-public address ${address} at connect time`);
    this.name = "BlockedAddressError";
  }
}

export class ArchiveNotFoundError extends Error {
  constructor(public readonly archiveId: string) {
    super(`Archive not found: ${archiveId}`);
    this.name = "ArchiveNotFoundError";
  }
}

/**
 * A job refers to a record that no longer exists. The job is discarded.
 */
export class RecordNotFoundError extends Error {
  constructor(
    public readonly entity: string,
    public readonly id: string
  ) {
    super(`${entity} not found: ${id}`);
    this.name = "RecordNotFoundError";
  }
}
