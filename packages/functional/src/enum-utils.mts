/**
 * @module enum-utils
 * @description Lookup of enum members by name that returns an Option instead of `undefined`
 * or throwing. Works with TypeScript `enum`s (string and numeric) and with `as const` objects.
 *
 * @example
 * ```typescript
 * enum DayOfWeek { MONDAY = 'MONDAY', FRIDAY = 'FRIDAY' }
 *
 * enumOf(DayOfWeek, 'FRIDAY');           // Some(DayOfWeek.FRIDAY)
 * enumOf(DayOfWeek, 'friday');           // None
 * enumOfIgnoreCase(DayOfWeek, 'friday'); // Some(DayOfWeek.FRIDAY)
 * enumOfIgnoreCase(DayOfWeek, 'Worf');   // None
 * ```
 *
 * @category Utilities
 * @since 2025-07-03
 */

import { none, some } from './option.mjs';

import type { Option } from './option.mjs';

/**
 * Shape of an enum object: member names mapped to string or numeric values.
 */
export type EnumLike = Record<string, string | number>;

/**
 * Union of the member values of an enum object.
 */
export type EnumMember<E extends EnumLike> = E[keyof E & string];

// numeric enums also carry reverse mappings: `Level[0] === 'Debug'` beside `Level.Debug === 0`
const isReverseMapping = (type: EnumLike, key: string): boolean => {
  const target = type[key];
  if (typeof target !== 'string' || !Object.hasOwn(type, target)) {
    return false;
  }
  const forward = type[target];
  return typeof forward === 'number' && String(forward) === key;
};

const memberNames = <E extends EnumLike>(type: E): (keyof E & string)[] =>
  Object.keys(type).filter((key): key is keyof E & string => !isReverseMapping(type, key));

const findMember = <E extends EnumLike>(
  type: E,
  matches: (memberName: string) => boolean,
): Option<EnumMember<E>> => {
  for (const memberName of memberNames(type)) {
    if (matches(memberName)) {
      return some(type[memberName]);
    }
  }
  return none();
};

/**
 * Returns the member of `type` named exactly `name`, or None.
 * Never throws for an unknown name.
 *
 * @category Lookup
 * @example
 * enum Level { Debug, Info }
 * enumOf(Level, 'Info');  // Some(Level.Info)
 * enumOf(Level, '1');     // None, reverse mappings are not names
 */
export const enumOf = <E extends EnumLike>(type: E, name: string): Option<EnumMember<E>> =>
  findMember(type, (memberName) => memberName === name);

/**
 * Returns the member of `type` whose name matches `name` ignoring case, or None.
 * When several names differ only in case, the first declared wins.
 *
 * @category Lookup
 * @example
 * enumOfIgnoreCase({ Red: '#f00', Green: '#0f0' } as const, 'GREEN');
 * // => Some('#0f0')
 */
export const enumOfIgnoreCase = <E extends EnumLike>(type: E, name: string): Option<EnumMember<E>> => {
  const wanted = name.toLowerCase();
  return findMember(type, (memberName) => memberName.toLowerCase() === wanted);
};
