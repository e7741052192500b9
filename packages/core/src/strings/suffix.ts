const ASCII_UPPER = /[A-Z]/g;

/**
 * Compare the tail of `s` with `suffix`, byte for byte in UTF-8.
 *
 * Returns 0 on a match, 1 when `suffix` is longer than `s`, and otherwise
 * the sign of the byte comparison. Only zero versus non-zero is meaningful.
 */
export function compareSuffix(s: string, suffix: string): number {
  const bytes = Buffer.from(s, "utf8");
  const tail = Buffer.from(suffix, "utf8");
  if (tail.length > bytes.length) {
    return 1;
  }
  return Buffer.compare(bytes.subarray(bytes.length - tail.length), tail);
}

/** Like {@link compareSuffix}, folding ASCII letters to lower case first. */
export function compareSuffixIgnoreCase(s: string, suffix: string): number {
  return compareSuffix(asciiLower(s), asciiLower(suffix));
}

function asciiLower(text: string): string {
  return text.replace(ASCII_UPPER, (ch) => ch.toLowerCase());
}
