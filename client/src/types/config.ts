/**
 * Config Types
 *
 * Type definitions for encoder configuration.
 *
 * @module types/config
 */

import type { Logger } from "../utils/logger";

/**
 * Static, operator-supplied configuration.
 *
 * These values are written into every query verbatim, without
 * percent-encoding, so they must already be URL-safe.
 */
export interface EncoderConfig {
  key: string; // Product key
  clientType: string; // Client identifier and version, e.g. "and-2.0"
  userAgent: string;
}

/**
 * Options accepted by createQueryEncoder
 */
export interface QueryEncoderOptions extends EncoderConfig {
  /**
   * Diagnostic sink. Defaults to a console logger.
   */
  logger?: Logger;
  /**
   * Enables debug output on the default console logger.
   * Ignored when a logger is injected.
   */
  debug?: boolean;
}
