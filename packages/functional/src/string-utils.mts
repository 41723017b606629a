/**
 * @module string-utils
 * @description String argument checks.
 *
 * @category Utilities
 * @since 2025-07-03
 */

import { IllegalArgumentError, NullValueError } from './errors.mjs';

/**
 * Checks that `value` is neither `null`, `undefined` nor empty, and returns it.
 * Both failures carry `message`.
 *
 * @throws {NullValueError} if `value` is `null` or `undefined`
 * @throws {IllegalArgumentError} if `value` is the empty string
 *
 * @category Guards
 * @example
 * class User {
 *   readonly name: string;
 *   constructor(name?: string) {
 *     this.name = requireNotEmpty(name, "'name' must not be empty");
 *   }
 * }
 */
export const requireNotEmpty = (value: string | null | undefined, message: string): string => {
  if (value === null || value === undefined) {
    throw new NullValueError(message);
  }
  if (value.length === 0) {
    throw new IllegalArgumentError(message);
  }
  return value;
};
