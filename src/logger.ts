/**
 * Unified logging abstraction for imgspec.
 *
 * Centralizes all console output with consistent styling and log levels.
 * Uses picocolors for terminal styling.
 *
 * IMPORTANT: All imgspec output MUST go through this module.
 * Never use console.log/console.error directly in other modules.
 */

import pc from "picocolors";

/** Log levels in order of verbosity (debug is most verbose). */
export enum LogLevel {
  DEBUG = 0,
  INFO = 1,
  WARN = 2,
  ERROR = 3,
  SILENT = 4,
}

/** Logger configuration. */
interface LoggerConfig {
  level: LogLevel;
  /** If true, prefix messages with [imgspec] */
  prefix: boolean;
  /** If true, suppress ALL output including errors */
  quiet: boolean;
}

const config: LoggerConfig = {
  level: LogLevel.INFO,
  prefix: false,
  quiet: false,
};

const LEVEL_NAMES: Record<string, LogLevel> = {
  debug: LogLevel.DEBUG,
  info: LogLevel.INFO,
  warn: LogLevel.WARN,
  warning: LogLevel.WARN,
  error: LogLevel.ERROR,
  silent: LogLevel.SILENT,
};

function canOutput(level: LogLevel): boolean {
  return !config.quiet && config.level <= level;
}

/**
 * Enable quiet mode: suppress ALL output.
 * Only exit codes communicate success/failure.
 */
export function enableQuietMode(): void {
  config.quiet = true;
  config.level = LogLevel.SILENT;
}

/** Disable quiet mode: restore normal output. */
export function disableQuietMode(): void {
  config.quiet = false;
  config.level = LogLevel.INFO;
}

export function isQuiet(): boolean {
  return config.quiet;
}

/** Set the minimum log level. Messages below this level are suppressed. */
export function setLogLevel(level: LogLevel): void {
  config.level = level;
}

export function getLogLevel(): LogLevel {
  return config.level;
}

/**
 * Parse a level name such as "debug" or "WARN".
 * Returns undefined for unknown names so callers can keep their default.
 */
export function parseLogLevel(name: string | undefined): LogLevel | undefined {
  if (!name) {
    return undefined;
  }
  return LEVEL_NAMES[name.trim().toLowerCase()];
}

/** Enable or disable the [imgspec] prefix on all messages. */
export function setPrefix(enabled: boolean): void {
  config.prefix = enabled;
}

function formatMessage(message: string): string {
  return config.prefix ? `[imgspec] ${message}` : message;
}

/**
 * Logger object with level-aware methods.
 *
 * Usage:
 *   log.debug("verbose info")
 *   log.info("normal output")
 *   log.warn("warning message")
 *   log.error("error message")
 *   log.success("completed!")
 */
export const log = {
  /** Debug-level message, styled dim. */
  debug(message: string): void {
    if (canOutput(LogLevel.DEBUG)) {
      console.log(pc.dim(formatMessage(message)));
    }
  },

  info(message: string): void {
    if (canOutput(LogLevel.INFO)) {
      console.log(formatMessage(message));
    }
  },

  /** Warning-level message, yellow, to stderr. */
  warn(message: string): void {
    if (canOutput(LogLevel.WARN)) {
      console.warn(pc.yellow(formatMessage(message)));
    }
  },

  /** Error-level message, red, to stderr. */
  error(message: string): void {
    if (canOutput(LogLevel.ERROR)) {
      console.error(pc.red(formatMessage(message)));
    }
  },

  success(message: string): void {
    if (canOutput(LogLevel.INFO)) {
      console.log(pc.green(formatMessage(message)));
    }
  },

  /** Command lines about to be executed. */
  blue(message: string): void {
    if (canOutput(LogLevel.INFO)) {
      console.log(pc.blue(formatMessage(message)));
    }
  },

  /**
   * Raw output without any styling or prefix.
   * Used for machine-readable output such as a rendered Dockerfile.
   */
  raw(message: string): void {
    if (canOutput(LogLevel.INFO)) {
      console.log(message);
    }
  },
};
