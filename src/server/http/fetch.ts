/**
 * HTTP Fetch Utilities
 *
 * Shared pieces for outgoing requests: error types, request headers and
 * size-limited body reading.
 */

// ============================================================================
// Custom Errors
// ============================================================================

/**
 * Error thrown when a response body exceeds the maximum allowed size.
 * Checked during streaming to avoid loading the full body into memory.
 */
export class ContentTooLargeError extends Error {
  constructor(
    public readonly url: string,
    public readonly maxBytes: number,
    public readonly receivedBytes: number
  ) {
    super(`Response body exceeds maximum size of ${maxBytes} bytes`);
    this.name = "ContentTooLargeError";
  }
}

// ============================================================================
// Constants
// ============================================================================

/**
 * Accept-Encoding header for outgoing requests.
 *
 * Node's fetch only advertises "gzip, deflate" by default but decodes
 * brotli as well.
 */
export const ACCEPT_ENCODING = "gzip, deflate, br";

/**
 * Accept header for HTML page requests.
 */
export const HTML_ACCEPT_HEADER =
  "text/html,application/xhtml+xml,application/xml;q=0.9,*/*;q=0.8";

const REDIRECT_STATUSES = new Set([301, 302, 303, 307, 308]);

// ============================================================================
// Helpers
// ============================================================================

export function isRedirectStatus(status: number): boolean {
  return REDIRECT_STATUSES.has(status);
}

/**
 * Whether a response is an HTML document. The Content-Type decides when
 * present; otherwise the start of the body is sniffed for a doctype or an
 * <html> tag.
 */
export function isHtmlContent(contentType: string, bodyStart = ""): boolean {
  const mediaType = contentType.split(";")[0].trim().toLowerCase();
  if (mediaType) {
    return mediaType === "text/html" || mediaType === "application/xhtml+xml";
  }
  return /^\s*(<!doctype html|<html[\s>])/i.test(bodyStart.replace(/^\uFEFF/, ""));
}

/**
 * Reads a response body as a Buffer with a streaming size limit.
 * Cancels the download as soon as the response exceeds maxBytes.
 *
 * Checks Content-Length header first for an early rejection, then
 * enforces the limit while streaming chunks.
 *
 * @throws ContentTooLargeError if the response exceeds the limit
 */
export async function readResponseBufferWithSizeLimit(
  response: Response,
  maxBytes: number,
  url: string
): Promise<Buffer> {
  const contentLength = response.headers.get("content-length");
  if (contentLength) {
    const declaredSize = parseInt(contentLength, 10);
    if (!isNaN(declaredSize) && declaredSize > maxBytes) {
      await response.body?.cancel();
      throw new ContentTooLargeError(url, maxBytes, declaredSize);
    }
  }

  if (!response.body) {
    return Buffer.alloc(0);
  }

  const reader = response.body.getReader();
  const chunks: Uint8Array[] = [];
  let receivedBytes = 0;

  while (true) {
    const { done, value } = await reader.read();
    if (done) break;

    receivedBytes += value.byteLength;
    if (receivedBytes > maxBytes) {
      await reader.cancel();
      throw new ContentTooLargeError(url, maxBytes, receivedBytes);
    }

    chunks.push(value);
  }

  return Buffer.concat(chunks, receivedBytes);
}
