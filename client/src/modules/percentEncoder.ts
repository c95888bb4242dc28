/**
 * Percent-Encoder Module
 *
 * Encodes per-call values (identities, event names, property keys and
 * values) for the tracking query string.
 *
 * Wire format expected by the tracking servers:
 * - alphanumerics and `-_.` pass through
 * - `~` stays literal
 * - space is `%20`, `*` is `%2A`
 * - everything else is a `%XX` UTF-8 triplet
 *
 * @module modules/percentEncoder
 */

import type { Logger } from "../utils/logger";
import { safeTry } from "../utils/safe";

/**
 * Characters encodeURIComponent leaves alone but form encoding escapes.
 * `*` is deliberately missing: form encoding keeps it literal.
 */
const FORM_RESERVED = /[!'()~]/g;

/**
 * Half of a surrogate pair with no partner, e.g. an emoji cut in two
 */
const LONE_SURROGATE = /[\uD800-\uDBFF](?![\uDC00-\uDFFF])|(?<![\uD800-\uDBFF])[\uDC00-\uDFFF]/g;

function toPercentTriplet(char: string): string {
  return `%${char.charCodeAt(0).toString(16).toUpperCase()}`;
}

/**
 * application/x-www-form-urlencoded encoding of a single value (UTF-8).
 *
 * A lone surrogate has no UTF-8 form and is written as `?` (`%3F`).
 */
export function formUrlEncode(value: string): string {
  return encodeURIComponent(value.replace(LONE_SURROGATE, "?"))
    .replace(FORM_RESERVED, toPercentTriplet)
    .replace(/%20/g, "+");
}

/**
 * Percent-encode a value for the tracking query string
 *
 * Never throws. A value that cannot be encoded is logged and
 * encoded as an empty string.
 *
 * @param value - Unencoded value
 * @param logger - Diagnostic sink
 * @returns The encoded value, or "" if encoding failed
 */
export function encodeQueryValue(value: string, logger?: Logger): string {
  const formEncoded = safeTry(
    () => formUrlEncode(value),
    logger,
    `Unable to url encode string: ${value}`
  );

  if (formEncoded === undefined) {
    return "";
  }

  return formEncoded
    .replace(/\*/g, "%2A")
    .replace(/%7E/g, "~")
    .replace(/\+/g, "%20");
}
