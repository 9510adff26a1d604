/**
 * URL manipulation utilities.
 */

/**
 * Normalizes a bookmark URL before it is stored.
 *
 * Trims surrounding whitespace and strips the fragment, since two URLs that
 * differ only by `#section` point to the same page. Input that does not parse
 * is returned trimmed but otherwise untouched; the archive validator is what
 * rejects it.
 *
 * @example
 * normalizeUrl("  https://example.com/article#section-2 ")
 * // => "https://example.com/article"
 */
export function normalizeUrl(url: string): string {
  const trimmed = url.trim();
  try {
    const parsed = new URL(trimmed);
    parsed.hash = "";
    return parsed.href;
  } catch {
    return trimmed;
  }
}

/**
 * Resolves a possibly relative URL against a base, returning null when the
 * result is not an http(s) URL.
 */
export function resolveHttpUrl(value: string, base: string): string | null {
  try {
    const resolved = new URL(value, base);
    if (resolved.protocol !== "http:" && resolved.protocol !== "https:") {
      return null;
    }
    return resolved.href;
  } catch {
    return null;
  }
}
