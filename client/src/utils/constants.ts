/**
 * Constants
 *
 * Wire contract shared with the tracking endpoints. Paths and parameter
 * names must match the server exactly.
 *
 * @module utils/constants
 */

/**
 * Endpoint paths, one per query shape
 */
export const QUERY_PATHS = {
  ALIAS: "/a",
  EVENT: "/e",
  PROPERTIES: "/s",
} as const;

/**
 * Fixed query parameter names
 */
export const QUERY_PARAMS = {
  KEY: "_k",
  CLIENT_TYPE: "_c",
  USER_AGENT: "_u",
  PERSON: "_p",
  NAME: "_n",
  DEFAULT_TIMESTAMP: "_d",
  TIMESTAMP: "_t",
} as const;

/**
 * Property keys that, when both present, mean the caller already set a timestamp
 */
export const TIMESTAMP_KEYS = [QUERY_PARAMS.DEFAULT_TIMESTAMP, QUERY_PARAMS.TIMESTAMP] as const;

/**
 * Literal value of `_d` when the encoder injects its own timestamp
 */
export const DEFAULT_TIMESTAMP_FLAG = "1";

/**
 * Longest accepted property key, measured after percent-encoding
 */
export const MAX_ENCODED_KEY_LENGTH = 255;

/**
 * Default configuration values
 */
export const DEFAULTS = {
  LOG_PREFIX: "[trackq]",
} as const;
