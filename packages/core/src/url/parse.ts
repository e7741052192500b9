/**
 * Stream URL parsing.
 *
 * Accepts exactly `http://<host>:<port>/<mount>`. The host runs up to the
 * first `:`, the port up to the next `/`, and the mount is everything from
 * that `/` on, so `http://host:8000/` yields the mount `/`. No userinfo,
 * query handling or bracketed IPv6 hosts.
 */

import { InvalidUrlError } from "../errors/catalog.js";
import type { Logger } from "../logger/index.js";

export interface StreamUrl {
  host: string;
  port: number;
  mount: string;
}

const SCHEME = "http://";

/** Five digits cover 65535; anything longer cannot be a port. */
const PORT_MAX_DIGITS = 5;
const PORT_MIN = 1;
const PORT_MAX = 65535;

/** Leading blanks and a sign, as strtoll accepts them. */
const INTEGER_RE = /^\s*[+-]?\d+$/;

/** Parse a stream URL, throwing {@link InvalidUrlError} on any defect. */
export function parseStreamUrl(url: string): StreamUrl {
  if (!url.startsWith(SCHEME)) {
    throw new InvalidUrlError("NOT_HTTP", "not an HTTP address", { url });
  }

  const hostStart = SCHEME.length;
  const colon = url.indexOf(":", hostStart);
  if (colon === -1) {
    throw new InvalidUrlError("MISSING_PORT", "missing port", { url });
  }
  if (colon === hostStart) {
    throw new InvalidUrlError("MISSING_HOST", "missing host", { url });
  }
  const host = url.slice(hostStart, colon);

  const slash = url.indexOf("/", colon + 1);
  if (slash === -1 || slash - (colon + 1) > PORT_MAX_DIGITS) {
    throw new InvalidUrlError(
      "MISSING_MOUNT",
      "mountpoint missing, or port number too long",
      { url },
    );
  }

  const portText = url.slice(colon + 1, slash);
  const problem = checkPort(portText);
  if (problem) {
    throw new InvalidUrlError(
      "PORT_INVALID",
      `port: ${portText} is ${problem}`,
      { url, port: portText },
    );
  }

  return {
    host,
    port: Number(portText.trim()),
    mount: url.slice(slash),
  };
}

/** strtonum-style verdict on a port string, or null when it is usable. */
function checkPort(text: string): string | null {
  if (!INTEGER_RE.test(text)) {
    return "invalid";
  }
  const value = Number(text.trim());
  if (value < PORT_MIN) {
    return "too small";
  }
  if (value > PORT_MAX) {
    return "too large";
  }
  return null;
}

/**
 * Parse a stream URL for callers that only need success or failure.
 * Defects are logged at error level and yield null.
 */
export function urlParse(url: string, logger: Logger): StreamUrl | null {
  try {
    return parseStreamUrl(url);
  } catch (err) {
    if (err instanceof InvalidUrlError) {
      logger.error({ url, reason: err.reason }, err.message);
      return null;
    }
    throw err;
  }
}
