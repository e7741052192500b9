import type { Logger } from "../logger/index.js";
import type { CharsetConfig } from "../schemas/util-config.js";
import { IconvRecoder } from "./iconv-recoder.js";
import { resolveLocalEncoding } from "./locale.js";
import { PassthroughRecoder } from "./passthrough.js";
import type { ConversionMode, TextRecoder } from "./types.js";

export type { ConversionMode, TextRecoder } from "./types.js";
export {
  IconvRecoder,
  CHUNK_SIZE,
  transliterate,
  type IconvRecoderOptions,
  type CodecFactory,
  type StreamDecoder,
  type StreamEncoder,
} from "./iconv-recoder.js";
export { PassthroughRecoder } from "./passthrough.js";
export {
  resolveLocalEncoding,
  PORTABLE_CODESET,
  LEGACY_CODESET,
} from "./locale.js";

export const UTF8 = "UTF-8";

/**
 * Pick the recoder strategy once, from configuration. The configured mode
 * applies to every conversion that does not name its own.
 */
export function createRecoder(
  config: Pick<CharsetConfig, "converter" | "localEncoding"> &
    Partial<Pick<CharsetConfig, "mode">>,
  logger: Logger,
): TextRecoder {
  switch (config.converter) {
    case "passthrough":
      return new PassthroughRecoder();
    case "iconv":
      return new IconvRecoder({
        logger,
        defaultEncoding: config.localEncoding ?? resolveLocalEncoding(),
        defaultMode: config.mode,
      });
  }
}

/** Locale-encoded bytes to UTF-8. */
export function localToUtf8(
  recoder: TextRecoder,
  input: Buffer | null,
  mode?: ConversionMode,
  localEncoding: string = resolveLocalEncoding(),
): Buffer {
  return recoder.convert(input, localEncoding, UTF8, mode);
}

/** UTF-8 bytes to the locale encoding. */
export function utf8ToLocal(
  recoder: TextRecoder,
  input: Buffer | null,
  mode?: ConversionMode,
  localEncoding: string = resolveLocalEncoding(),
): Buffer {
  return recoder.convert(input, UTF8, localEncoding, mode);
}
