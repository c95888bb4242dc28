/**
 * Property Types
 *
 * @module types/properties
 */

/**
 * A property value. `null` and `undefined` count as absent and are dropped.
 */
export type PropertyValue = string | null | undefined;

/**
 * Free-form key/value attributes attached to an event or a user.
 * Iteration order carries no meaning.
 */
export type PropertyMap =
  | ReadonlyMap<string, PropertyValue>
  | Readonly<Record<string, PropertyValue>>;

/**
 * Epoch seconds. Bigint covers the full signed 64-bit range.
 */
export type EpochSeconds = number | bigint;
