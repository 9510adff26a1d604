/**
 * URL Validator
 *
 * Decides whether a URL may be fetched. Syntax and scheme are checked before
 * any network access; the host is then classified, either directly when it is
 * an IP literal or through every address DNS returns for it. A single
 * non-public address rejects the URL.
 *
 * Uses ipaddr.js for IPv4/IPv6 classification. Only the `unicast` range counts
 * as public; loopback is reported separately, and every other range
 * (private, link-local incl. cloud metadata at 169.254.169.254, unique-local,
 * carrier-grade NAT, multicast, unspecified, reserved) is `private_ip`.
 */

import { promises as dns } from "dns";
import type { LookupAddress } from "dns";
import type { LookupFunction } from "net";
import * as ipaddr from "ipaddr.js";

import { err, ok, type Result } from "@/lib/result";
import type { ArchiveState } from "../db/schema";
import { BlockedAddressError } from "./errors";

export type UrlValidationReason =
  | "invalid_format"
  | "unsupported_scheme"
  | "private_ip"
  | "loopback"
  | "dns_resolution_failed";

export interface UrlValidationFailure {
  reason: UrlValidationReason;
  message: string;
  url: string;
}

export interface ValidatedUrl {
  /** Serialized URL as it will be requested */
  url: string;
  hostname: string;
  /** Addresses the host resolved to (the literal itself for IP hosts) */
  addresses: string[];
}

/**
 * Resolves a hostname to all of its addresses.
 */
export type HostResolver = (hostname: string) => Promise<string[]>;

export interface ValidateUrlOptions {
  resolveHost?: HostResolver;
}

const ALLOWED_SCHEMES = new Set(["http:", "https:"]);

export const MAX_URL_LENGTH = 2048;

/**
 * Default resolver: every A and AAAA record the system resolver returns.
 */
export const systemResolveHost: HostResolver = async (hostname) => {
  const records = await dns.lookup(hostname, { all: true, verbatim: true });
  return records.map((record) => record.address);
};

/**
 * Classifies a single IP address.
 *
 * @returns null for public addresses, otherwise the rejection reason
 */
export function classifyAddress(address: string): "private_ip" | "loopback" | null {
  if (!ipaddr.isValid(address)) {
    return "private_ip";
  }

  // process() unwraps IPv4-mapped IPv6 (::ffff:127.0.0.1) to IPv4
  const range = ipaddr.process(address).range();
  if (range === "unicast") return null;
  if (range === "loopback") return "loopback";
  return "private_ip";
}

function stripBrackets(hostname: string): string {
  return hostname.startsWith("[") && hostname.endsWith("]") ? hostname.slice(1, -1) : hostname;
}

function failure(
  reason: UrlValidationReason,
  url: string,
  message: string
): Result<ValidatedUrl, UrlValidationFailure> {
  return err({ reason, url, message });
}

/**
 * Validates a URL for fetching.
 */
export async function validateUrl(
  rawUrl: string,
  options: ValidateUrlOptions = {}
): Promise<Result<ValidatedUrl, UrlValidationFailure>> {
  const input = rawUrl.trim();
  if (input.length === 0) {
    return failure("invalid_format", rawUrl, "URL is empty");
  }
  if (input.length > MAX_URL_LENGTH) {
    return failure("invalid_format", rawUrl, `URL exceeds ${MAX_URL_LENGTH} characters`);
  }

  let parsed: URL;
  try {
    parsed = new URL(input);
  } catch {
    return failure("invalid_format", rawUrl, "URL could not be parsed");
  }

  if (!ALLOWED_SCHEMES.has(parsed.protocol)) {
    return failure(
      "unsupported_scheme",
      rawUrl,
      `Scheme ${parsed.protocol.replace(/:$/, "")} is not allowed`
    );
  }

  const hostname = stripBrackets(parsed.hostname);
  if (hostname.length === 0) {
    return failure("invalid_format", rawUrl, "URL has no host");
  }

  let addresses: string[];
  if (ipaddr.isValid(hostname)) {
    addresses = [hostname];
  } else {
    const resolveHost = options.resolveHost ?? systemResolveHost;
    try {
      addresses = await resolveHost(hostname);
    } catch (error) {
      const detail = error instanceof Error ? error.message : String(error);
      return failure("dns_resolution_failed", rawUrl, `Could not resolve ${hostname}: ${detail}`);
    }
    if (addresses.length === 0) {
      return failure("dns_resolution_failed", rawUrl, `No addresses found for ${hostname}`);
    }
  }

  for (const address of addresses) {
    const reason = classifyAddress(address);
    if (reason === "loopback") {
      return failure("loopback", rawUrl, `Host ${hostname} resolves to loopback address ${address}`);
    }
    if (reason === "private_ip") {
      return failure(
        "private_ip",
        rawUrl,
        `Host ${hostname} resolves to non-public address ${address}`
      );
    }
  }

  return ok({ url: parsed.href, hostname, addresses });
}

/**
 * Archive state a validation failure leads to.
 */
export function validationReasonToState(
  reason: UrlValidationReason
): Extract<ArchiveState, "blocked" | "invalid_url"> {
  return reason === "private_ip" || reason === "loopback" ? "blocked" : "invalid_url";
}

async function resolvePinned(
  hostname: string,
  family: number,
  resolveHost: HostResolver
): Promise<LookupAddress[]> {
  const records: LookupAddress[] = [];
  for (const address of await resolveHost(hostname)) {
    const reason = classifyAddress(address);
    if (reason) {
      throw new BlockedAddressError(hostname, address, reason);
    }
    records.push({ address, family: ipaddr.parse(address).kind() === "ipv6" ? 6 : 4 });
  }

  const usable = family === 4 || family === 6 ? records.filter((r) => r.family === family) : records;
  if (usable.length === 0) {
    throw Object.assign(new Error(`getaddrinfo ENOTFOUND ${hostname}`), {
      code: "ENOTFOUND",
      hostname,
    });
  }
  return usable;
}

/**
 * DNS lookup for outgoing sockets that re-checks every address it hands
 * out. Validation and connection each resolve the host, so a rebinding
 * name that answered publicly the first time is still refused here.
 */
export function createPinnedLookup(resolveHost: HostResolver = systemResolveHost): LookupFunction {
  return (hostname, options, callback) => {
    const requested: unknown = options.family;
    const family =
      requested === 4 || requested === "IPv4" ? 4 : requested === 6 || requested === "IPv6" ? 6 : 0;

    void resolvePinned(hostname, family, resolveHost).then(
      (records) => {
        if (options.all) {
          callback(null, records);
        } else {
          callback(null, records[0].address, records[0].family);
        }
      },
      (error: unknown) => {
        callback(error instanceof Error ? error : new Error(String(error)), "");
      }
    );
  };
}
