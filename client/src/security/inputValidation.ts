/**
 * Input Validation
 *
 * Advisory checks on operator-supplied values. None of these change what
 * the encoder emits; they only tell the integrator something looks wrong.
 *
 * @module security/inputValidation
 */

import type { EncoderConfig } from "../types/config";

/**
 * RFC 3986 unreserved characters plus the sub-delimiters that cannot end a
 * query parameter. `&`, `=`, `#`, `?` and `%` are intentionally absent.
 */
const QUERY_SAFE_VALUE = /^[A-Za-z0-9\-._~!$'()*+,;:@/]*$/;

const CONFIG_FIELDS: ReadonlyArray<keyof EncoderConfig> = ["key", "clientType", "userAgent"];

/**
 * Find configuration fields that are not safe to place unencoded in a query
 *
 * @param config - Encoder configuration
 * @returns Names of the unsafe fields, in declaration order
 */
export function findUnsafeConfigFields(config: EncoderConfig): Array<keyof EncoderConfig> {
  return CONFIG_FIELDS.filter((field) => !QUERY_SAFE_VALUE.test(config[field]));
}
