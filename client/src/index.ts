/**
 * trackq client
 *
 * Query encoding layer of the mobile analytics SDK. Turns record/alias calls
 * into path+query strings for the tracking endpoints.
 *
 * @module index
 */

export { createQueryEncoder, formatTimestamp } from "./core/queryEncoder";
export type { QueryEncoder } from "./core/queryEncoder";

export { encodeQueryValue } from "./modules/percentEncoder";
export { encodeProperties } from "./modules/propertyEncoder";
export type { PropertyEncoderOptions } from "./modules/propertyEncoder";

export { createLogger, createGuardedLogger } from "./utils/logger";
export type { Logger, LoggerOptions } from "./utils/logger";
export { findUnsafeConfigFields } from "./security/inputValidation";

export {
  QUERY_PATHS,
  QUERY_PARAMS,
  TIMESTAMP_KEYS,
  DEFAULT_TIMESTAMP_FLAG,
  MAX_ENCODED_KEY_LENGTH,
} from "./utils/constants";

export type { EncoderConfig, QueryEncoderOptions } from "./types/config";
export type { PropertyMap, PropertyValue, EpochSeconds } from "./types/properties";
