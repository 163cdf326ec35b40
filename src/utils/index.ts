/**
 * Utility module exports.
 */

export {
  logger,
  configureLogger,
  resetLogger,
  formatMessage,
  debug,
  info,
  warn,
  error,
  type LogLevel,
  type LogSink,
  type LoggerConfig,
} from "./logging.js";

export {
  createLineReader,
  InputClosedError,
  type PromptReader,
} from "./line-reader.js";
