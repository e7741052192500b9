export {
  DEFAULTS,
  ConverterKind,
  ConversionModeSchema,
  UtilConfigSchema,
  type UtilConfig,
  type LoggingConfig,
  type CharsetConfig,
  type ConversionMode,
} from "./util-config.js";
