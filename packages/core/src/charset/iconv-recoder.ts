/**
 * Transcoding backed by iconv-lite.
 *
 * Input is fed through a streaming decoder in fixed 1024-byte chunks so
 * multi-byte sequences may straddle chunk boundaries. Every decoded
 * character passes a per-mode filter before it reaches the encoder:
 *
 * | Character                       | replace | ignore  | translit            |
 * |---------------------------------|---------|---------|---------------------|
 * | invalid input sequence (U+FFFD) | `?`     | `?`     | `?`                 |
 * | not representable in target     | `?`     | dropped | decomposed, else `?`|
 *
 * A U+FFFD that the input itself carries is an ordinary character: it only
 * counts as an invalid sequence when the input does not survive a decode
 * and re-encode in its own encoding.
 */

import iconv from "iconv-lite";
import type { Logger } from "../logger/index.js";
import type { ConversionMode, TextRecoder } from "./types.js";

export const CHUNK_SIZE = 1024;

const SUBSTITUTE = "?";
const DECODE_ERROR = "\uFFFD";
const COMBINING_MARKS = /\p{M}/gu;

export interface StreamDecoder {
  write(chunk: Buffer): string;
  end(): string | undefined;
}

export interface StreamEncoder {
  write(text: string): Buffer;
  end(): Buffer | undefined;
}

/** Source of the streaming codecs, iconv-lite unless overridden. */
export interface CodecFactory {
  getDecoder(encoding: string): StreamDecoder;
  getEncoder(encoding: string): StreamEncoder;
}

export interface IconvRecoderOptions {
  logger: Logger;
  /** Used in place of an encoding that cannot be opened. Default: UTF-8 */
  defaultEncoding?: string;
  /** Applied when `convert` is called without a mode. Default: "replace" */
  defaultMode?: ConversionMode;
  codecs?: CodecFactory;
}

interface ConversionPair {
  from: string;
  to: string;
}

export class IconvRecoder implements TextRecoder {
  readonly name = "iconv";

  private readonly logger: Logger;
  private readonly defaultEncoding: string;
  private readonly defaultMode: ConversionMode;
  private readonly codecs: CodecFactory;

  constructor(options: IconvRecoderOptions) {
    this.logger = options.logger;
    this.defaultEncoding = options.defaultEncoding ?? "UTF-8";
    this.defaultMode = options.defaultMode ?? "replace";
    this.codecs = options.codecs ?? iconv;
  }

  convert(
    input: Buffer | null,
    from: string,
    to: string,
    mode?: ConversionMode,
  ): Buffer {
    if (input === null) {
      return Buffer.alloc(0);
    }

    const pair = this.open(from, to);
    if (!pair) {
      this.logger.error(
        { from, to },
        `cannot convert from ${from} to ${to}: unsupported encoding`,
      );
      return Buffer.from(input);
    }

    const source = input;
    let decodedCleanly: boolean | undefined;
    const filter = characterFilter(
      pair.to,
      mode ?? this.defaultMode,
      () => (decodedCleanly ??= roundTrips(source, pair.from)),
    );
    const output: Buffer[] = [];

    try {
      const decoder = this.codecs.getDecoder(pair.from);
      const encoder = this.codecs.getEncoder(pair.to);

      // A surrogate pair split by a chunk boundary is joined before filtering
      let pending = "";
      for (let offset = 0; offset < input.length; offset += CHUNK_SIZE) {
        const text =
          pending + decoder.write(input.subarray(offset, offset + CHUNK_SIZE));
        const cut = endsWithHighSurrogate(text) ? text.length - 1 : text.length;
        pending = text.slice(cut);
        output.push(encoder.write(filter(text.slice(0, cut))));
      }

      const rest = pending + (decoder.end() ?? "");
      if (rest) {
        output.push(encoder.write(filter(rest)));
      }
      const tail = encoder.end();
      if (tail) {
        output.push(tail);
      }
    } catch (err) {
      this.logger.error(
        { err, from: pair.from, to: pair.to },
        "charset conversion did not complete, keeping original text",
      );
      return Buffer.from(input);
    }

    return Buffer.concat(output);
  }

  /** First openable pair of: as asked, default target, default source. */
  private open(from: string, to: string): ConversionPair | null {
    const attempts: ConversionPair[] = [
      { from, to },
      { from, to: this.defaultEncoding },
      { from: this.defaultEncoding, to },
    ];
    for (const attempt of attempts) {
      if (iconv.encodingExists(attempt.from) && iconv.encodingExists(attempt.to)) {
        if (attempt.from !== from || attempt.to !== to) {
          this.logger.debug(
            { from, to, using: attempt },
            "falling back to the default encoding",
          );
        }
        return attempt;
      }
    }
    return null;
  }
}

function endsWithHighSurrogate(text: string): boolean {
  const last = text.charCodeAt(text.length - 1);
  return last >= 0xd800 && last <= 0xdbff;
}

/** Whether `input` decodes without loss, so any U+FFFD in it is genuine. */
function roundTrips(input: Buffer, encoding: string): boolean {
  const text = iconv.decode(input, encoding, { stripBOM: false });
  return iconv.encode(text, encoding, { addBOM: false }).equals(input);
}

function characterFilter(
  target: string,
  mode: ConversionMode,
  decodedCleanly: () => boolean,
): (text: string) => string {
  const seen = new Map<string, boolean>();
  const encodable = (ch: string): boolean => {
    let ok = seen.get(ch);
    if (ok === undefined) {
      ok = iconv.decode(iconv.encode(ch, target), target) === ch;
      seen.set(ch, ok);
    }
    return ok;
  };

  return (text) => {
    let out = "";
    for (const ch of text) {
      if (ch === DECODE_ERROR && !decodedCleanly()) {
        out += SUBSTITUTE;
      } else if (encodable(ch)) {
        out += ch;
      } else if (mode === "ignore") {
        continue;
      } else if (mode === "translit") {
        const approx = transliterate(ch);
        out += approx !== "" && Array.from(approx).every(encodable)
          ? approx
          : SUBSTITUTE;
      } else {
        out += SUBSTITUTE;
      }
    }
    return out;
  };
}

/** "é" -> "e", "ﬁ" -> "fi"; "" when nothing but marks remains. */
export function transliterate(ch: string): string {
  return ch.normalize("NFKD").replace(COMBINING_MARKS, "");
}
