/**
 * Unified logging abstraction for pipeline-docker.
 *
 * Centralizes all console output with consistent styling and log levels.
 * Uses picocolors for terminal styling.
 *
 * IMPORTANT: All plugin output MUST go through this module.
 * Never use console.log/console.error directly in other modules.
 */

import pc from "picocolors";

/** Log levels in order of verbosity (debug is most verbose). */
enum LogLevel {
  DEBUG = 0,
  INFO = 1,
  WARN = 2,
  ERROR = 3,
  SILENT = 4,
}

interface LoggerConfig {
  level: LogLevel;
  /** If true, prefix messages with [pipeline-docker] */
  prefix: boolean;
}

const config: LoggerConfig = {
  level: LogLevel.INFO,
  prefix: false,
};

function canOutput(level: LogLevel): boolean {
  return config.level <= level;
}

/**
 * Suppress all plugin output. Only exit codes communicate success/failure;
 * the Docker child keeps its inherited streams.
 */
export function enableQuietMode(): void {
  config.level = LogLevel.SILENT;
}

/** Show debug messages, including the composed Docker command. */
export function enableVerboseMode(): void {
  config.level = LogLevel.DEBUG;
}

export function isVerbose(): boolean {
  return config.level <= LogLevel.DEBUG;
}

/**
 * Enable or disable the [pipeline-docker] prefix, used when the plugin runs
 * inside a host CLI that prints its own output.
 */
export function setPrefix(enabled: boolean): void {
  config.prefix = enabled;
}

function formatMessage(message: string): string {
  return config.prefix ? `[pipeline-docker] ${message}` : message;
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
 *   log.dim("subtle info")
 */
export const log = {
  /** Debug-level message, dim gray. */
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

  /** Yellow, to stderr. */
  warn(message: string): void {
    if (canOutput(LogLevel.WARN)) {
      console.warn(pc.yellow(formatMessage(message)));
    }
  },

  /** Red, to stderr. */
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

  dim(message: string): void {
    if (canOutput(LogLevel.INFO)) {
      console.log(pc.dim(formatMessage(message)));
    }
  },

  bold(message: string): void {
    if (canOutput(LogLevel.INFO)) {
      console.log(pc.bold(formatMessage(message)));
    }
  },
};

/**
 * Styled string builders (for complex compositions).
 *
 * Usage:
 *   log.info(`Creating ${path}: ${style.green("SUCCESS")}`)
 */
export const style = {
  green: (text: string) => pc.green(text),
};
