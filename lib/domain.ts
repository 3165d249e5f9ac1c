import punycode from "punycode";
import { parse as parseDomain } from "tldts";
import { EnrichmentError } from "./errors";

const SCHEME = /^[a-z][a-z0-9+.-]*:\/\//i;
const BARE_HOST = /^([^/ :]+)(?::\d+)?(?:\/.*)?$/;

function toAsciiHost(host: string): string {
  // DNS answers and user input may carry leading/trailing dots
  return punycode.toASCII(host).toLowerCase().replace(/^\.+|\.+$/g, "");
}

/**
 * Lowercase ASCII host of a URL, a host:port/path string or a bare name
 * (as returned by NS or CNAME answers). Throws when nothing host-like is found.
 */
export function normalizeDomain(input: string): string {
  const s = input.trim();
  if (!s) throw new Error("Invalid input");

  try {
    return toAsciiHost(new URL(SCHEME.test(s) ? s : `http://${s}`).hostname);
  } catch {
    const m = BARE_HOST.exec(s.replace(SCHEME, ""));
    if (!m) throw new Error(`Unable to normalize domain: ${input}`);
    return toAsciiHost(m[1]);
  }
}

/**
 * True when `host` is a syntactically sane name ending in a listed public
 * suffix (ICANN or private section). A host that is itself a suffix, such as
 * "carrd.co" or "github.io", is valid.
 */
export function isValidHost(host: string): boolean {
  const cleaned = host.trim().toLowerCase();
  if (!cleaned || /\s/.test(cleaned)) return false;
  let ascii: string;
  try {
    ascii = punycode.toASCII(cleaned);
  } catch {
    return false;
  }
  if (ascii.length > 255) return false;

  // unlisted suffixes (".toto") come back with neither flag set
  const parsed = parseDomain(ascii, { allowPrivateDomains: true });
  return !parsed.isIp && !!parsed.publicSuffix && (parsed.isIcann === true || parsed.isPrivate === true);
}

/**
 * Host part of an origin URL (no scheme, no port), lowercase ASCII.
 * Throws `InvalidURL` when the string does not parse or has no host, and
 * `InvalidHostname` when the host has no listed public suffix.
 */
export function extractHostname(origin: string): string {
  let url: URL;
  try {
    url = new URL(origin.trim());
  } catch (err) {
    throw new EnrichmentError("InvalidURL", `Failed to parse URL: ${origin}`, { cause: err });
  }

  const host = url.hostname.replace(/\.$/, "").toLowerCase();
  if (!host) {
    throw new EnrichmentError("InvalidURL", `URL has no host: ${origin}`);
  }
  if (!isValidHost(host)) {
    throw new EnrichmentError("InvalidHostname", `Invalid hostname in URL: ${origin}`);
  }
  return host;
}

/**
 * Registrable domain of a hostname under ICANN public-suffix rules only
 * (private-section suffixes such as hosting.ovh.net are ignored):
 * "www.example.co.uk" → "example.co.uk", "phpmyadmin.hosting.ovh.net" → "ovh.net".
 * `undefined` for unlisted suffixes, IP literals and bare labels.
 */
export function extractDomain(hostname: string): string | undefined {
  const parsed = parseDomain(hostname, { allowPrivateDomains: false });
  if (parsed.isIp || !parsed.isIcann || !parsed.domain) return undefined;
  return parsed.domain;
}
