/**
 * Locale codeset resolution.
 *
 * Follows the precedence of setlocale(LC_CTYPE, ""): LC_ALL, then LC_CTYPE,
 * then LANG. Only the environment is read, so the result reflects whatever
 * the variables hold at call time; callers that rewrite them concurrently
 * get whichever value wins.
 */

/** Codeset of the portable "C"/"POSIX" locale. */
export const PORTABLE_CODESET = "US-ASCII";

/** glibc's codeset for a named locale that carries none, e.g. `de_DE`. */
export const LEGACY_CODESET = "ISO-8859-1";

export function resolveLocalEncoding(
  env: NodeJS.ProcessEnv = process.env,
): string {
  const locale = env.LC_ALL || env.LC_CTYPE || env.LANG || "";
  if (locale === "" || locale === "C" || locale === "POSIX") {
    return PORTABLE_CODESET;
  }

  const dot = locale.indexOf(".");
  if (dot === -1) {
    return LEGACY_CODESET;
  }

  // "de_DE.ISO-8859-15@euro" -> "ISO-8859-15"
  const codeset = locale.slice(dot + 1).split("@")[0];
  if (codeset === "") {
    return LEGACY_CODESET;
  }
  return /^utf-?8$/i.test(codeset) ? "UTF-8" : codeset;
}
