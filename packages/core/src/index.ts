export {
  createRecoder,
  localToUtf8,
  utf8ToLocal,
  resolveLocalEncoding,
  IconvRecoder,
  PassthroughRecoder,
  transliterate,
  CHUNK_SIZE,
  UTF8,
  PORTABLE_CODESET,
  LEGACY_CODESET,
  type TextRecoder,
  type IconvRecoderOptions,
  type CodecFactory,
} from "./charset/index.js";
export {
  DEFAULT_ROOT_PATH,
  DEFAULT_CONFIG_PATH,
  loadConfig,
  saveConfig,
  expandHomePath,
  resolveRootPath,
  resolvePidFilePath,
  type LoadConfigOptions,
} from "./config/index.js";
export {
  SourcecastError,
  InvalidUrlError,
  PidFileError,
  errorCodeOf,
  type UrlErrorReason,
} from "./errors/catalog.js";
export {
  createLogger,
  type Logger,
  type DestinationStream,
} from "./logger/index.js";
export {
  DEFAULTS,
  ConverterKind,
  ConversionModeSchema,
  UtilConfigSchema,
  type UtilConfig,
  type LoggingConfig,
  type CharsetConfig,
  type ConversionMode,
} from "./schemas/index.js";
export { shellQuote } from "./shell/index.js";
export {
  replaceString,
  compareSuffix,
  compareSuffixIgnoreCase,
} from "./strings/index.js";
export { parseStreamUrl, urlParse, type StreamUrl } from "./url/index.js";
