import type { ConversionMode } from "../schemas/util-config.js";

export type { ConversionMode } from "../schemas/util-config.js";

/**
 * Transcodes text between two named encodings.
 *
 * Implementations never throw for conversion problems: they log and return
 * a copy of the input instead. The returned buffer is always a fresh copy
 * the caller owns, and `null` input yields an empty buffer.
 */
export interface TextRecoder {
  readonly name: string;
  convert(
    input: Buffer | null,
    from: string,
    to: string,
    mode?: ConversionMode,
  ): Buffer;
}
