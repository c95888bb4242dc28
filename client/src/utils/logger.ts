/**
 * Logger Utility
 *
 * Diagnostic sink for the encoder. Advisory only: nothing logged here
 * ever changes the query a caller gets back.
 * Debug and info output is silent unless `debug` is enabled.
 *
 * @module utils/logger
 */

import { DEFAULTS } from "./constants";

/**
 * Logger interface
 */
export interface Logger {
  logDebug(message: string, meta?: unknown): void;
  logInfo(message: string, meta?: unknown): void;
  logWarn(message: string, meta?: unknown): void;
  logError(message: string, error?: unknown): void;
}

/**
 * Logger options
 */
export interface LoggerOptions {
  debug?: boolean;
  prefix?: string;
}

/**
 * Create a console-backed logger instance
 *
 * @param options - Logger options
 * @returns Logger instance
 */
export function createLogger(options: LoggerOptions = {}): Logger {
  const debug = options.debug ?? false;
  const prefix = options.prefix ?? DEFAULTS.LOG_PREFIX;

  return {
    logDebug: (message: string, meta?: unknown) => {
      if (!debug) {
        return;
      }
      console.debug(`${prefix} ${message}`, meta ?? "");
    },
    logInfo: (message: string, meta?: unknown) => {
      if (!debug) {
        return;
      }
      console.info(`${prefix} ${message}`, meta ?? "");
    },
    logWarn: (message: string, meta?: unknown) => {
      console.warn(`${prefix} ${message}`, meta ?? "");
    },
    logError: (message: string, error?: unknown) => {
      // Stack traces only in debug mode
      if (!debug && error instanceof Error) {
        console.error(`${prefix} ${message}`, error.message);
        return;
      }
      console.error(`${prefix} ${message}`, error ?? "");
    },
  };
}

/**
 * Wrap a logger so that a throwing sink never reaches the caller.
 *
 * A sink failure is reported on console.error and the message is dropped.
 */
export function createGuardedLogger(logger: Logger): Logger {
  const guard = (level: keyof Logger) => (...args: [message: string, meta?: unknown]) => {
    try {
      logger[level](...args);
    } catch (error) {
      console.error(`${DEFAULTS.LOG_PREFIX} Diagnostic sink failed in ${level}:`, error);
    }
  };

  return {
    logDebug: guard("logDebug"),
    logInfo: guard("logInfo"),
    logWarn: guard("logWarn"),
    logError: guard("logError"),
  };
}
