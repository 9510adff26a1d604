/**
 * Content Fetcher
 *
 * Downloads a page over HTTP(S) with bounded time and size. Redirects are
 * followed by hand so every hop can be re-validated: a redirect into a
 * private network is refused the same way a private URL would be.
 *
 * Permanent problems come back as a FetchFailure. Timeouts are transient and
 * are thrown as ArchiveTimeoutError so the job runner can retry them.
 */

import { Agent, type Dispatcher } from "undici";

import { err, ok, type Result } from "@/lib/result";
import {
  ACCEPT_ENCODING,
  ContentTooLargeError,
  HTML_ACCEPT_HEADER,
  isRedirectStatus,
  readResponseBufferWithSizeLimit,
} from "../http/fetch";
import { ArchiveTimeoutError, BlockedAddressError } from "./errors";
import {
  createPinnedLookup,
  validateUrl,
  validationReasonToState,
  type HostResolver,
} from "./url-validator";

export type FetchFailureReason =
  | "http_error"
  | "size_limit"
  | "too_many_redirects"
  | "invalid_redirect"
  | "blocked"
  | "network_error";

export interface FetchFailure {
  reason: FetchFailureReason;
  message: string;
  /** URL of the request that failed */
  url: string;
  httpStatus?: number;
  /** Set when a redirect target failed validation */
  validationReason?: string;
}

export interface FetchedPage {
  body: Buffer;
  status: number;
  finalUrl: string;
  /** Content-Type header, or "" when absent */
  contentType: string;
  redirectCount: number;
  durationMs: number;
}

export type FetchFn = (input: string, init: RequestInit) => Promise<Response>;

export interface FetchPageOptions {
  /** Time allowed until response headers arrive */
  connectTimeoutMs: number;
  /** Time allowed for the body download */
  readTimeoutMs: number;
  maxRedirects: number;
  maxContentSizeBytes: number;
  userAgent: string;
  fetchFn?: FetchFn;
  resolveHost?: HostResolver;
}

interface DispatchedRequestInit extends RequestInit {
  dispatcher?: Dispatcher;
}

let pinnedAgent: Agent | null = null;

/**
 * Global fetch sent through an undici agent whose DNS lookup refuses
 * non-public addresses, so the socket connects to an address that was
 * checked rather than whatever a second resolution returns.
 */
export const pinnedFetch: FetchFn = (input, init) => {
  if (!pinnedAgent) {
    pinnedAgent = new Agent({ connect: { lookup: createPinnedLookup() } });
  }
  const pinnedInit: DispatchedRequestInit = { ...init, dispatcher: pinnedAgent };
  return fetch(input, pinnedInit);
};

function findBlockedAddress(error: unknown): BlockedAddressError | null {
  if (error instanceof BlockedAddressError) return error;
  if (error instanceof Error && error.cause !== undefined) return findBlockedAddress(error.cause);
  return null;
}

/** Socket-level timeout codes reported by undici and the OS. */
const TIMEOUT_CODES = new Set([
  "UND_ERR_CONNECT_TIMEOUT",
  "UND_ERR_HEADERS_TIMEOUT",
  "UND_ERR_BODY_TIMEOUT",
  "ETIMEDOUT",
]);

function isRuntimeTimeout(error: unknown): boolean {
  if (typeof error !== "object" || error === null) return false;
  if ("code" in error && typeof error.code === "string" && TIMEOUT_CODES.has(error.code)) {
    return true;
  }
  if (error instanceof Error && error.name === "TimeoutError") return true;
  return "cause" in error && isRuntimeTimeout(error.cause);
}

function describeError(error: unknown): string {
  if (error instanceof Error) {
    const cause = error.cause instanceof Error ? `: ${error.cause.message}` : "";
    return `${error.message}${cause}`;
  }
  return String(error);
}

/**
 * Fetches a page, following up to `maxRedirects` validated redirects.
 *
 * @throws ArchiveTimeoutError when the connect or read timeout elapses
 */
export async function fetchPage(
  url: string,
  options: FetchPageOptions
): Promise<Result<FetchedPage, FetchFailure>> {
  const fetchFn = options.fetchFn ?? pinnedFetch;
  const startedAt = Date.now();
  let currentUrl = url;
  let redirectCount = 0;

  while (true) {
    const controller = new AbortController();
    const connectTimer = setTimeout(
      () =>
        controller.abort(new ArchiveTimeoutError(currentUrl, "connect", options.connectTimeoutMs)),
      options.connectTimeoutMs
    );

    let response: Response;
    try {
      response = await fetchFn(currentUrl, {
        method: "GET",
        headers: {
          "User-Agent": options.userAgent,
          Accept: HTML_ACCEPT_HEADER,
          "Accept-Encoding": ACCEPT_ENCODING,
        },
        redirect: "manual",
        signal: controller.signal,
      });
    } catch (error) {
      if (controller.signal.reason instanceof ArchiveTimeoutError) {
        throw controller.signal.reason;
      }
      if (isRuntimeTimeout(error)) {
        throw new ArchiveTimeoutError(currentUrl, "connect", options.connectTimeoutMs);
      }
      const blocked = findBlockedAddress(error);
      if (blocked) {
        return err({
          reason: "blocked",
          url: currentUrl,
          validationReason: blocked.reason,
          message: blocked.message,
        });
      }
      return err({ reason: "network_error", url: currentUrl, message: describeError(error) });
    } finally {
      clearTimeout(connectTimer);
    }

    if (isRedirectStatus(response.status)) {
      await response.body?.cancel();

      if (redirectCount >= options.maxRedirects) {
        return err({
          reason: "too_many_redirects",
          url: currentUrl,
          httpStatus: response.status,
          message: `Exceeded ${options.maxRedirects} redirects`,
        });
      }

      const location = response.headers.get("location");
      if (!location) {
        return err({
          reason: "invalid_redirect",
          url: currentUrl,
          httpStatus: response.status,
          message: `Redirect (HTTP ${response.status}) without a Location header`,
        });
      }

      let target: string;
      try {
        target = new URL(location, currentUrl).href;
      } catch {
        return err({
          reason: "invalid_redirect",
          url: currentUrl,
          httpStatus: response.status,
          message: `Redirect to unparseable location ${location}`,
        });
      }

      const validation = await validateUrl(target, { resolveHost: options.resolveHost });
      if (!validation.ok) {
        const blocked = validationReasonToState(validation.error.reason) === "blocked";
        return err({
          reason: blocked ? "blocked" : "invalid_redirect",
          url: currentUrl,
          httpStatus: response.status,
          validationReason: validation.error.reason,
          message: `Redirect to ${target} rejected: ${validation.error.message}`,
        });
      }

      currentUrl = validation.value.url;
      redirectCount++;
      continue;
    }

    if (!response.ok) {
      await response.body?.cancel();
      return err({
        reason: "http_error",
        url: currentUrl,
        httpStatus: response.status,
        message: `HTTP ${response.status}${response.statusText ? ` ${response.statusText}` : ""}`,
      });
    }

    const readTimer = setTimeout(
      () => controller.abort(new ArchiveTimeoutError(currentUrl, "read", options.readTimeoutMs)),
      options.readTimeoutMs
    );

    let body: Buffer;
    try {
      body = await readResponseBufferWithSizeLimit(
        response,
        options.maxContentSizeBytes,
        currentUrl
      );
    } catch (error) {
      if (controller.signal.reason instanceof ArchiveTimeoutError) {
        throw controller.signal.reason;
      }
      if (error instanceof ContentTooLargeError) {
        return err({
          reason: "size_limit",
          url: currentUrl,
          httpStatus: response.status,
          message: error.message,
        });
      }
      if (isRuntimeTimeout(error)) {
        throw new ArchiveTimeoutError(currentUrl, "read", options.readTimeoutMs);
      }
      return err({ reason: "network_error", url: currentUrl, message: describeError(error) });
    } finally {
      clearTimeout(readTimer);
    }

    return ok({
      body,
      status: response.status,
      finalUrl: currentUrl,
      contentType: response.headers.get("content-type") ?? "",
      redirectCount,
      durationMs: Date.now() - startedAt,
    });
  }
}
