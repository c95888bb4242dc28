/**
 * Safe Wrappers
 *
 * Wrap risky operations so they degrade instead of throwing into the
 * host app's send pipeline.
 *
 * @module utils/safe
 */

import type { Logger } from "./logger";

/**
 * Safely execute a function, catching and logging errors
 *
 * @param fn - Function to execute
 * @param logger - Logger instance
 * @param context - Context for error logging
 * @returns The function's result, or undefined if it threw
 */
export function safeTry<T>(
  fn: () => T,
  logger?: Logger,
  context?: string
): T | undefined {
  try {
    return fn();
  } catch (error) {
    logger?.logError(context ?? "Unexpected error", error);
    return undefined;
  }
}
