/**
 * Quote text as a single POSIX shell word.
 *
 * Inside single quotes nothing is special except the closing quote, so each
 * `'` closes the quoted run, emits an escaped quote, and reopens it:
 * `it's` becomes `'it'\''s'`. Backslashes are copied as-is.
 */
export function shellQuote(text: string): string {
  return `'${text.replaceAll("'", "'\\''")}'`;
}
