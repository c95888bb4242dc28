/**
 * Property Encoder Module
 *
 * Turns a property map into the `&key=value` suffix of a query.
 *
 * Invalid entries are dropped one at a time with a warning:
 * - empty key, before or after encoding
 * - key longer than 255 characters once encoded
 * - absent or empty value
 *
 * A dropped entry never stops the remaining entries from being encoded.
 *
 * @module modules/propertyEncoder
 */

import type { PropertyMap, PropertyValue } from "../types/properties";
import type { Logger } from "../utils/logger";
import { MAX_ENCODED_KEY_LENGTH } from "../utils/constants";
import { encodeQueryValue } from "./percentEncoder";

/**
 * Property encoding options
 */
export interface PropertyEncoderOptions {
  encode?: (value: string) => string;
  logger?: Logger;
}

/**
 * Iterate entries of either a Map or a plain record
 */
function propertyEntries(properties: PropertyMap): Array<[string, PropertyValue]> {
  if (properties instanceof Map) {
    return Array.from(properties.entries());
  }
  return Object.entries(properties);
}

/**
 * Key presence check for either a Map or a plain record
 */
export function hasPropertyKey(properties: PropertyMap, key: string): boolean {
  if (properties instanceof Map) {
    return properties.has(key);
  }
  return Object.prototype.hasOwnProperty.call(properties, key);
}

/**
 * Encode a property map into `&key=value` segments
 *
 * @param properties - User or event properties
 * @param options - Encoder and diagnostic sink
 * @returns Concatenated segments, or "" when there is nothing to send
 */
export function encodeProperties(
  properties: PropertyMap | null | undefined,
  options: PropertyEncoderOptions = {}
): string {
  if (!properties) {
    return "";
  }

  const { logger } = options;
  const encode = options.encode ?? ((value: string) => encodeQueryValue(value, logger));
  const segments: string[] = [];

  for (const [key, value] of propertyEntries(properties)) {
    if (key.length === 0) {
      logger?.logWarn("Property keys must not be empty strings. Dropping property.");
      continue;
    }

    const encodedKey = encode(key);
    if (encodedKey.length === 0) {
      logger?.logWarn("Property key could not be URL escaped. Dropping property.", { key });
      continue;
    }

    if (encodedKey.length > MAX_ENCODED_KEY_LENGTH) {
      logger?.logWarn(
        `Property key cannot be longer than ${MAX_ENCODED_KEY_LENGTH} characters. ` +
          `When URL escaped, your key is ${encodedKey.length} characters long ` +
          `(the submitted value is ${key}, the URL escaped value is ${encodedKey}). Dropping property.`
      );
      continue;
    }

    if (value === null || value === undefined || value.length === 0) {
      logger?.logWarn("Property values must not be null or empty strings. Dropping property.", { key });
      continue;
    }

    segments.push(`&${encodedKey}=${encode(value)}`);
  }

  return segments.join("");
}
