/**
 * @module container-utils
 * @description Helpers for `Map` containers.
 * Where a helper returns a modified copy of a map, the copy is of the same class as the
 * source when {@link newInstanceOf} can construct one; otherwise it is an {@link ImmutableMap}.
 *
 * @example
 * ```typescript
 * import { transformValues, computeIfAbsent } from './container-utils.mts';
 *
 * const grades = transformValues(scores, (score) => (score >= 90 ? 'A' : 'B'));
 *
 * const cache = new Map<string, Buffer>();
 * const body = computeIfAbsent(cache, path, (p) => readFileSync(p));
 * ```
 *
 * @category Utilities
 * @since 2025-07-03
 */

import { UnsupportedOperationError } from './errors.mjs';
import { newInstanceOf } from './object-utils.mjs';
import { isSome } from './option.mjs';

/**
 * A `Map` that rejects every mutation once constructed.
 * `set`, `delete` and `clear` throw {@link UnsupportedOperationError}.
 */
export class ImmutableMap<K, V> extends Map<K, V> {
  // the Map constructor populates entries through `set`, before this field is initialised
  private readonly sealed: boolean;

  constructor(entries?: Iterable<readonly [K, V]> | null) {
    super(entries);
    this.sealed = true;
  }

  override set(key: K, value: V): this {
    if (this.sealed) {
      throw new UnsupportedOperationError('set');
    }
    return super.set(key, value);
  }

  override delete(_key: K): boolean {
    throw new UnsupportedOperationError('delete');
  }

  override clear(): void {
    throw new UnsupportedOperationError('clear');
  }
}

const isMap = <K, V>(candidate: object): candidate is Map<K, V> => candidate instanceof Map;

/**
 * Returns a new map holding the entries of `source` with `transform` applied to each value.
 * Keys and their insertion order are kept.
 *
 * If `source` is of a class that can be constructed without arguments, the result is of that
 * class. Otherwise, and for every {@link ImmutableMap} source, the result is an {@link ImmutableMap}.
 * Anything thrown by `transform` propagates and no partial map is returned.
 *
 * @category Transformation
 * @example
 * const scores = new Map([['Louis', 95], ['Mike', 71]]);
 * const grades = transformValues(scores, (score) => (score >= 90 ? 'A' : 'C'));
 * // => Map { 'Louis' => 'A', 'Mike' => 'C' }
 *
 * @see newInstanceOf
 */
export const transformValues = <K, V, R>(
  source: ReadonlyMap<K, V>,
  transform: (value: V, key: K) => R,
): Map<K, R> => {
  const created = newInstanceOf(source);
  // the fresh instance is empty, so it can hold values of any type; a sealed one cannot be filled
  const sameType: Map<K, R> | undefined =
    isSome(created) && isMap<K, R>(created.value) && !(created.value instanceof ImmutableMap)
      ? created.value
      : undefined;
  const result = sameType ?? new Map<K, R>();
  for (const [key, value] of source) {
    result.set(key, transform(value, key));
  }
  return sameType !== undefined ? result : new ImmutableMap(result);
};

/**
 * Returns the value for `key`, computing and storing it first if the map has no non-nullish value.
 *
 * If `compute` returns `null` or `undefined`, the map is not modified and that result is returned.
 * If `compute` throws, the map is not modified and the error propagates.
 *
 * Equivalent to:
 * ```typescript
 * if (map.get(key) == null) {
 *   const value = compute(key);
 *   if (value != null) map.set(key, value);
 * }
 * return map.get(key);
 * ```
 *
 * @category Caching
 * @example
 * const cache = new Map<string, string>();
 * const body = computeIfAbsent(cache, 'README.md', (file) => readFileSync(file, 'utf8'));
 */
export const computeIfAbsent = <K, V>(
  target: Map<K, V>,
  key: K,
  compute: (key: K) => V | null | undefined,
): V | null | undefined => {
  const existing = target.get(key);
  if (existing !== null && existing !== undefined) {
    return existing;
  }
  const value = compute(key);
  if (value !== null && value !== undefined) {
    target.set(key, value);
  }
  return value;
};

/**
 * Async counterpart of {@link computeIfAbsent}. The value is stored once `compute` resolves;
 * a rejection leaves the map unmodified.
 *
 * Concurrent calls for the same missing key each run `compute`; the last to resolve wins.
 *
 * @category Caching
 */
export const computeIfAbsentAsync = async <K, V>(
  target: Map<K, V>,
  key: K,
  compute: (key: K) => Promise<V | null | undefined>,
): Promise<V | null | undefined> => {
  const existing = target.get(key);
  if (existing !== null && existing !== undefined) {
    return existing;
  }
  const value = await compute(key);
  if (value !== null && value !== undefined) {
    target.set(key, value);
  }
  return value;
};
