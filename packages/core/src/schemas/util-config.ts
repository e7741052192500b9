import { z } from "zod";

export const DEFAULTS = {
  logging: {
    level: "info" as const,
    pretty: false,
  },
  charset: {
    converter: "iconv" as const,
    mode: "replace" as const,
  },
  pidFile: {
    path: null,
  },
};

export const ConverterKind = z.enum(["iconv", "passthrough"]);

export const ConversionModeSchema = z.enum(["translit", "ignore", "replace"]);

export const UtilConfigSchema = z.object({
  logging: z
    .object({
      level: z
        .enum(["fatal", "error", "warn", "info", "debug"])
        .default(DEFAULTS.logging.level),
      pretty: z.boolean().default(DEFAULTS.logging.pretty),
    })
    .default(DEFAULTS.logging),
  charset: z
    .object({
      converter: ConverterKind.default(DEFAULTS.charset.converter),
      mode: ConversionModeSchema.default(DEFAULTS.charset.mode),
      localEncoding: z
        .string()
        .min(1)
        .optional()
        .describe("Overrides the codeset resolved from LC_ALL/LC_CTYPE/LANG"),
    })
    .default(DEFAULTS.charset),
  pidFile: z
    .object({
      path: z
        .string()
        .min(1)
        .nullable()
        .default(DEFAULTS.pidFile.path)
        .describe("Run without a PID file when null"),
    })
    .default(DEFAULTS.pidFile),
});

export type UtilConfig = z.infer<typeof UtilConfigSchema>;
export type LoggingConfig = UtilConfig["logging"];
export type CharsetConfig = UtilConfig["charset"];
export type ConversionMode = z.infer<typeof ConversionModeSchema>;
