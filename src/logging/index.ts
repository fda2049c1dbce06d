/**
 * Logging subsystem for logtune.
 *
 * A tree of named loggers with per-node levels and record filters, plus
 * console and JSON-lines file output.
 */
export { LevelTable, STANDARD_LEVELS, isUpperCaseName } from "./levels.js";
export type { StandardLevelName } from "./levels.js";
export { Logger, LoggerRegistry, ROOT_LOGGER_NAME } from "./logger.js";
export type { LoggerRegistryOptions } from "./logger.js";
export { FunctionNameFilter } from "./function-filter.js";
export {
  ConsoleHandler,
  FileHandler,
  FORMATS,
  defaultFormat,
  verboseFormat,
  isFormatName,
} from "./handlers.js";
export type { ConsoleHandlerOptions, FileHandlerOptions, FormatName } from "./handlers.js";
export { callerFunctionName, functionNameFromFrame, TOP_LEVEL_FUNCTION } from "./caller.js";
export { withConsoleRedirect } from "./console-redirect.js";
export { createRegistry } from "./setup.js";
export type { RegistrySettings } from "./setup.js";
export type { Formatter, Handler, LogRecord, RecordFilter } from "./types.js";
