/**
 * Query Encoder
 *
 * Builds the path+query strings the transport layer sends to the tracking
 * endpoints. Every operation is a pure string transformation over the
 * immutable configuration; no call throws and none performs I/O.
 *
 * Shape shared by all queries:
 *   {path}?_k={key}&_c={clientType}&_u={userAgent}&_p=...[&_n=...][&_d=1&_t=...][properties]
 *
 * @module core/queryEncoder
 */

import type { EncoderConfig, QueryEncoderOptions } from "../types/config";
import type { EpochSeconds, PropertyMap } from "../types/properties";
import { createGuardedLogger, createLogger, type Logger } from "../utils/logger";
import {
  DEFAULT_TIMESTAMP_FLAG,
  QUERY_PARAMS,
  QUERY_PATHS,
  TIMESTAMP_KEYS,
} from "../utils/constants";
import { encodeQueryValue } from "../modules/percentEncoder";
import { encodeProperties, hasPropertyKey } from "../modules/propertyEncoder";
import { findUnsafeConfigFields } from "../security/inputValidation";

/**
 * QueryEncoder interface
 */
export interface QueryEncoder {
  readonly config: Readonly<EncoderConfig>;
  /**
   * Alias query. Note the field order: `_p` carries the alias and `_n` the
   * identity, the reverse of event and properties queries. The server
   * contract depends on it.
   */
  createAliasQuery(alias: string, identity: string): string;
  createEventQuery(
    name: string,
    properties: PropertyMap | null | undefined,
    identity: string,
    timestamp: EpochSeconds
  ): string;
  createPropertiesQuery(
    properties: PropertyMap | null | undefined,
    identity: string,
    timestamp: EpochSeconds
  ): string;
  encode(value: string): string;
  encodeIdentity(identity: string): string;
  encodeEvent(name: string): string;
  encodeProperties(properties: PropertyMap | null | undefined): string;
}

/**
 * True if the caller already supplied both `_d` and `_t`
 */
function propertiesContainTimestamp(properties: PropertyMap | null | undefined): boolean {
  if (!properties) {
    return false;
  }
  return TIMESTAMP_KEYS.every((key) => hasPropertyKey(properties, key));
}

const INT64_MIN = -(2n ** 63n);
const INT64_MAX = 2n ** 63n - 1n;

/**
 * Decimal epoch seconds, never in exponent notation.
 * Values that do not fit a signed 64-bit integer, or numbers past
 * Number.MAX_SAFE_INTEGER, are still printed but logged.
 */
export function formatTimestamp(timestamp: EpochSeconds, logger?: Logger): string {
  if (typeof timestamp === "bigint") {
    if (timestamp < INT64_MIN || timestamp > INT64_MAX) {
      logger?.logWarn(`Timestamp ${timestamp} is outside the signed 64-bit range.`);
    }
    return timestamp.toString();
  }

  if (!Number.isFinite(timestamp)) {
    logger?.logWarn(`Timestamp ${timestamp} is not a finite number. Using the current time.`);
    return BigInt(Math.floor(Date.now() / 1000)).toString();
  }

  const seconds = Math.trunc(timestamp);
  if (!Number.isSafeInteger(seconds)) {
    logger?.logWarn(
      `Timestamp ${timestamp} is not a safe integer and may have lost precision. Pass a bigint instead.`
    );
  }
  return BigInt(seconds).toString();
}

/**
 * Create a new QueryEncoder instance
 *
 * @param options - Product key, client type, user agent and an optional diagnostic sink
 * @returns QueryEncoder instance
 *
 * @example
 * ```typescript
 * const encoder = createQueryEncoder({
 *   key: "abc123",
 *   clientType: "and-2.0",
 *   userAgent: "TestAgent/1.0",
 * });
 *
 * encoder.createAliasQuery("alias1", "user1");
 * // => "/a?_k=abc123&_c=and-2.0&_u=TestAgent/1.0&_p=alias1&_n=user1"
 * ```
 */
export function createQueryEncoder(options: QueryEncoderOptions): QueryEncoder {
  const config: Readonly<EncoderConfig> = Object.freeze({
    key: options.key,
    clientType: options.clientType,
    userAgent: options.userAgent,
  });
  const logger = createGuardedLogger(options.logger ?? createLogger({ debug: options.debug }));

  const unsafeFields = findUnsafeConfigFields(config);
  if (unsafeFields.length > 0) {
    logger.logWarn(
      "Configuration values are sent without URL encoding and contain characters unsafe in a query string.",
      { fields: unsafeFields }
    );
  }

  const encode = (value: string): string => encodeQueryValue(value, logger);
  const encodeIdentity = (identity: string): string => encode(identity);
  const encodeEvent = (name: string): string => encode(name);

  const baseQuery = (path: string, person: string): string[] => [
    `${path}?${QUERY_PARAMS.KEY}=${config.key}`,
    `&${QUERY_PARAMS.CLIENT_TYPE}=${config.clientType}`,
    `&${QUERY_PARAMS.USER_AGENT}=${config.userAgent}`,
    `&${QUERY_PARAMS.PERSON}=${person}`,
  ];

  // Default timestamp, then the caller's properties (including any _d/_t they set)
  const appendTimestampAndProperties = (
    parts: string[],
    properties: PropertyMap | null | undefined,
    timestamp: EpochSeconds
  ): string => {
    if (!propertiesContainTimestamp(properties)) {
      parts.push(
        `&${QUERY_PARAMS.DEFAULT_TIMESTAMP}=${DEFAULT_TIMESTAMP_FLAG}`,
        `&${QUERY_PARAMS.TIMESTAMP}=${formatTimestamp(timestamp, logger)}`
      );
    }
    parts.push(encodeProperties(properties, { encode, logger }));
    return parts.join("");
  };

  return {
    config,

    createAliasQuery: (alias: string, identity: string) => {
      const parts = baseQuery(QUERY_PATHS.ALIAS, encodeIdentity(alias));
      parts.push(`&${QUERY_PARAMS.NAME}=${encodeIdentity(identity)}`);
      return parts.join("");
    },

    createEventQuery: (name, properties, identity, timestamp) => {
      const parts = baseQuery(QUERY_PATHS.EVENT, encodeIdentity(identity));
      parts.push(`&${QUERY_PARAMS.NAME}=${encodeEvent(name)}`);
      return appendTimestampAndProperties(parts, properties, timestamp);
    },

    createPropertiesQuery: (properties, identity, timestamp) => {
      const parts = baseQuery(QUERY_PATHS.PROPERTIES, encodeIdentity(identity));
      return appendTimestampAndProperties(parts, properties, timestamp);
    },

    encode,
    encodeIdentity,
    encodeEvent,
    encodeProperties: (properties) => encodeProperties(properties, { encode, logger }),
  };
}
