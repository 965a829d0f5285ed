import { Logger, type ILogObj } from "tslog";
import { resolveEnvConfig, type LogFormat, type LogLevelName } from "../config/config.js";

/**
 * Minimal logger surface used across the package. Anything with these
 * methods (a tslog sub-logger, a host application's logger, a test spy) fits.
 */
export type I18nLogger = {
  debug?: (message: string) => void;
  warn: (message: string) => void;
};

const LOG_LEVEL_IDS: Record<LogLevelName, number> = {
  silly: 0,
  trace: 1,
  debug: 2,
  info: 3,
  warn: 4,
  error: 5,
  fatal: 6,
};

export type RootLoggerOptions = {
  level?: LogLevelName;
  format?: LogFormat;
};

let rootLogger: Logger<ILogObj> | null = null;

/**
 * Create the package root logger. Settings not given explicitly come from
 * CHATBOT_I18N_LOG_LEVEL / CHATBOT_I18N_LOG_FORMAT.
 */
export function createRootLogger(options: RootLoggerOptions = {}): Logger<ILogObj> {
  const env = resolveEnvConfig();
  return new Logger<ILogObj>({
    name: "chatbot-i18n",
    minLevel: LOG_LEVEL_IDS[options.level ?? env.logLevel],
    type: options.format ?? env.logFormat,
  });
}

export function getRootLogger(): Logger<ILogObj> {
  if (!rootLogger) {
    rootLogger = createRootLogger();
  }
  return rootLogger;
}

/**
 * Replace the root logger, e.g. to attach a transport. Child loggers created
 * afterwards inherit its settings.
 */
export function setRootLogger(logger: Logger<ILogObj>): void {
  rootLogger = logger;
}

/**
 * Adapt a tslog logger to the package logger surface.
 */
export function toI18nLogger(logger: Logger<ILogObj>): I18nLogger {
  return {
    debug: (message) => {
      logger.debug(message);
    },
    warn: (message) => {
      logger.warn(message);
    },
  };
}

export function getChildLogger(bindings: { subsystem: string }): I18nLogger {
  return toI18nLogger(getRootLogger().getSubLogger({ name: bindings.subsystem }));
}
