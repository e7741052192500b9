/**
 * sourcecast: utility layer for a streaming source client.
 *
 * @example
 * ```ts
 * import {
 *   createLogger,
 *   loadConfig,
 *   resolvePidFilePath,
 *   urlParse,
 *   writePidFile,
 * } from "sourcecast";
 *
 * const config = await loadConfig();
 * const logger = createLogger(config.logging);
 * writePidFile(resolvePidFilePath(config.pidFile.path), logger);
 * const target = urlParse("http://localhost:8000/live.ogg", logger);
 * ```
 */

export {
  DEFAULT_ROOT_PATH,
  DEFAULT_CONFIG_PATH,
  expandHomePath,
  loadConfig,
  saveConfig,
  resolveRootPath,
  resolvePidFilePath,
  type LoadConfigOptions,
} from "@sourcecast/core/config";
export type {
  UtilConfig,
  CharsetConfig,
  ConversionMode,
} from "@sourcecast/core/schemas";
export { createLogger, type Logger } from "@sourcecast/core/logger";
export {
  SourcecastError,
  InvalidUrlError,
  PidFileError,
} from "@sourcecast/core/errors";
export {
  createRecoder,
  localToUtf8,
  utf8ToLocal,
  resolveLocalEncoding,
  IconvRecoder,
  PassthroughRecoder,
  type TextRecoder,
} from "@sourcecast/core/charset";
export { shellQuote } from "@sourcecast/core/shell";
export {
  replaceString,
  compareSuffix,
  compareSuffixIgnoreCase,
} from "@sourcecast/core/strings";
export {
  parseStreamUrl,
  urlParse,
  type StreamUrl,
} from "@sourcecast/core/url";
export {
  PidFileManager,
  writePidFile,
  cleanupPidFile,
  type PidFileManagerOptions,
} from "@sourcecast/runtime";
