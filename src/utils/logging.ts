/**
 * Logging utilities with color support.
 *
 * Diagnostics are written to stderr so that stdout carries only the
 * prompts and the rendered report.
 */

import chalk from "chalk";

/**
 * Log levels.
 */
export type LogLevel = "debug" | "info" | "warn" | "error";

/**
 * Destination for formatted log lines.
 */
export type LogSink = (line: string, ...args: unknown[]) => void;

/**
 * Logger configuration.
 */
export interface LoggerConfig {
  level: LogLevel;
  timestamps: boolean;
  colors: boolean;
  sink: LogSink;
}

/**
 * Write to stderr through the console so test spies can observe it.
 */
const stderrSink: LogSink = (line, ...args) => {
  console.error(line, ...args);
};

/**
 * Default logger configuration.
 */
const defaultConfig: LoggerConfig = {
  level: "info",
  timestamps: false,
  colors: true,
  sink: stderrSink,
};

/**
 * Current logger configuration.
 */
let config: LoggerConfig = { ...defaultConfig };

/**
 * Log level priorities.
 */
const LOG_LEVELS: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

const LEVEL_COLORS: Record<LogLevel, (text: string) => string> = {
  debug: chalk.gray,
  info: chalk.blue,
  warn: chalk.yellow,
  error: chalk.red,
};

/**
 * Configure the logger.
 *
 * @param newConfig - Partial configuration to apply
 */
export function configureLogger(newConfig: Partial<LoggerConfig>): void {
  config = { ...config, ...newConfig };
}

/**
 * Restore the default configuration.
 */
export function resetLogger(): void {
  config = { ...defaultConfig };
}

/**
 * Check if a log level should be output.
 */
function shouldLog(level: LogLevel): boolean {
  return LOG_LEVELS[level] >= LOG_LEVELS[config.level];
}

/**
 * Format a log message.
 *
 * @param level - Log level
 * @param message - Message to format
 * @returns Formatted message
 */
export function formatMessage(level: LogLevel, message: string): string {
  let prefix = "";

  if (config.timestamps) {
    prefix += `[${new Date().toISOString()}] `;
  }

  const tag = `[${level.toUpperCase()}]`;
  prefix += config.colors ? LEVEL_COLORS[level](tag) : tag;

  return `${prefix} ${message}`;
}

function log(level: LogLevel, message: string, args: unknown[]): void {
  if (shouldLog(level)) {
    config.sink(formatMessage(level, message), ...args);
  }
}

/**
 * Log a debug message.
 */
export function debug(message: string, ...args: unknown[]): void {
  log("debug", message, args);
}

/**
 * Log an info message.
 */
export function info(message: string, ...args: unknown[]): void {
  log("info", message, args);
}

/**
 * Log a warning message.
 */
export function warn(message: string, ...args: unknown[]): void {
  log("warn", message, args);
}

/**
 * Log an error message.
 */
export function error(message: string, ...args: unknown[]): void {
  log("error", message, args);
}

/**
 * Default logger instance.
 */
export const logger = {
  debug,
  info,
  warn,
  error,
  configure: configureLogger,
  reset: resetLogger,
};
