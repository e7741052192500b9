import type { ConversionMode, TextRecoder } from "./types.js";

/** Identity recoder for hosts that opt out of transcoding. */
export class PassthroughRecoder implements TextRecoder {
  readonly name = "passthrough";

  convert(
    input: Buffer | null,
    _from?: string,
    _to?: string,
    _mode?: ConversionMode,
  ): Buffer {
    return input === null ? Buffer.alloc(0) : Buffer.from(input);
  }
}
