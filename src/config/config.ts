// Centralized configuration access. All environment lookups happen here.

import { z } from "zod";

export const LOG_LEVEL_NAMES = ["silly", "trace", "debug", "info", "warn", "error", "fatal"] as const;
export type LogLevelName = (typeof LOG_LEVEL_NAMES)[number];

export const LOG_FORMATS = ["pretty", "json", "hidden"] as const;
export type LogFormat = (typeof LOG_FORMATS)[number];

const lowercase = (value: unknown) => (typeof value === "string" ? value.trim().toLowerCase() : value);

const EnvConfigSchema = z.object({
  CHATBOT_I18N_LOCALE: z.string().trim().min(1).optional().catch(undefined),
  CHATBOT_I18N_LOG_LEVEL: z.preprocess(lowercase, z.enum(LOG_LEVEL_NAMES)).catch("info"),
  CHATBOT_I18N_LOG_FORMAT: z.preprocess(lowercase, z.enum(LOG_FORMATS)).catch("pretty"),
});

export type EnvConfig = {
  /** Preferred locale, consulted before LANG / LC_* */
  locale?: string;
  logLevel: LogLevelName;
  logFormat: LogFormat;
};

/**
 * Read package settings from the environment. Unknown or malformed values
 * fall back to their defaults.
 */
export function resolveEnvConfig(env: NodeJS.ProcessEnv = process.env): EnvConfig {
  const parsed = EnvConfigSchema.parse(env);
  return {
    locale: parsed.CHATBOT_I18N_LOCALE,
    logLevel: parsed.CHATBOT_I18N_LOG_LEVEL,
    logFormat: parsed.CHATBOT_I18N_LOG_FORMAT,
  };
}

/**
 * Instance-wide defaults for text resolution. Per-call options override them.
 */
export const I18nOptionsSchema = z
  .object({
    useTranslations: z.boolean().default(true),
    shouldFallback: z.boolean().default(true),
    raiseOnEmpty: z.boolean().default(true),
  })
  .strict();

export type I18nDefaults = z.output<typeof I18nOptionsSchema>;
export type I18nDefaultsInput = z.input<typeof I18nOptionsSchema>;

export const DocumentOptionsSchema = z
  .object({
    delimiter: z.string().default("."),
  })
  .strict();

export type DocumentOptionsInput = z.input<typeof DocumentOptionsSchema>;
