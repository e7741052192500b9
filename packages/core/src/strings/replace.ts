import { shellQuote } from "../shell/quote.js";

/**
 * Replace the first occurrence of `from` in `source` with `to`, quoted as a
 * shell word. Later occurrences are left alone; without a match `source`
 * comes back unchanged.
 */
export function replaceString(source: string, from: string, to: string): string {
  const at = source.indexOf(from);
  if (at === -1) {
    return source;
  }
  return source.slice(0, at) + shellQuote(to) + source.slice(at + from.length);
}
