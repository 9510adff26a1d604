/**
 * User-Agent header utilities.
 *
 * Format: Linkshelf/1.0[-COMMIT] (+CONTACT_URL)
 *
 * The contact URL lets site operators reach us about the crawler. It is
 * mandatory in production (enforced by the config loader); elsewhere the
 * comment is left out when no URL is configured.
 */

const APP_NAME_VERSION = "Linkshelf/1.0";

export interface UserAgentOptions {
  /** Short git commit SHA appended to the version */
  commitSha?: string;
  /** Contact URL, given the "+" prefix */
  contactUrl?: string;
}

/**
 * Builds the User-Agent string for outgoing archive requests.
 *
 * @example
 * buildUserAgent({ commitSha: "abc1234", contactUrl: "https://linkshelf.example/bot" })
 * // => "Linkshelf/1.0-abc1234 (+https://linkshelf.example/bot)"
 */
export function buildUserAgent(options: UserAgentOptions = {}): string {
  let ua = APP_NAME_VERSION;
  if (options.commitSha) {
    ua += `-${options.commitSha}`;
  }

  if (options.contactUrl) {
    ua += ` (+${options.contactUrl})`;
  }

  return ua;
}
