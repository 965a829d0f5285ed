export * from "./i18n/index.js";
export { resolveEnvConfig, type EnvConfig, type LogFormat, type LogLevelName } from "./config/config.js";
export {
  createRootLogger,
  getChildLogger,
  setRootLogger,
  type I18nLogger,
  type RootLoggerOptions,
} from "./logging/logger.js";
