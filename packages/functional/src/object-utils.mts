/**
 * @module object-utils
 * @description Small helpers for working with single values and instances:
 * side-effecting initialisation, null fallbacks, fallbacks on failure and conditional throws.
 *
 * ### Decision Tree
 * - Configure an object and keep using it inline? Use `poke(instance, fn)` or `tap(create, fn)`.
 * - Value may be null/undefined? `orElseGet(value, () => fallback)`.
 * - Computation may throw and a default is acceptable? `orElseOnException(fn, fallback)`.
 * - Guard a value and keep the expression flowing? `throwIf` / `throwUnless`.
 * - Need an empty instance of the same class? `newInstanceOf(obj)`.
 *
 * @example
 * ```typescript
 * import { poke, orElseGet, throwIf } from './object-utils.mts';
 *
 * const url = poke(new URL('https://example.com'), (u) => {
 *   u.pathname = '/health';
 * });
 * const name = orElseGet(input.name, () => 'anonymous');
 * const rows = throwIf(loadRows(), (r) => r.length === 0, () => new Error('no rows'));
 * ```
 *
 * @category Utilities
 * @since 2025-07-03
 */

import { none, some } from './option.mjs';

import type { Option } from './option.mjs';
import type { BaseLogger } from '@tidybits/logger';

/**
 * Options for {@link orElseOnException} and {@link orElseOnExceptionAsync}.
 */
export interface OrElseOnExceptionOptions {
  /** receives the swallowed failure at debug level */
  logger?: Pick<BaseLogger, 'debug'>;
}

const reportSwallowed = (error: unknown, options?: OrElseOnExceptionOptions): void => {
  options?.logger?.debug('computation failed, falling back to default value', { error });
};

/**
 * Passes `instance` to `consumer`, then returns `instance`.
 * Anything thrown by `consumer` propagates.
 *
 * @category Side Effects
 * @example
 * const params = poke(new URLSearchParams(), (p) => {
 *   p.set('page', '2');
 *   p.set('size', '50');
 * });
 */
export const poke = <T,>(instance: T, consumer: (instance: T) => void): T => {
  consumer(instance);
  return instance;
};

/**
 * Obtains an instance from `supplier`, passes it to `consumer`, then returns it.
 *
 * @category Side Effects
 * @example
 * const seen = tap(() => new Set<string>(), (s) => s.add('root'));
 */
export const tap = <T,>(supplier: () => T, consumer: (instance: T) => void): T =>
  poke(supplier(), consumer);

/**
 * Returns `value` unless it is `null` or `undefined`, otherwise the result of `supplier`.
 * `supplier` is not called when a value is present; anything it throws propagates.
 *
 * @category Fallbacks
 * @example
 * const homepage = orElseGet(profile.homepage, () => new URL('https://example.com'));
 */
export const orElseGet = <T,>(value: T | null | undefined, supplier: () => T): T =>
  value !== null && value !== undefined ? value : supplier();

/**
 * Returns the result of `supplier`, or `defaultValue` if it throws.
 *
 * @category Fallbacks
 * @example
 * const settings = orElseOnException(() => JSON.parse(raw) as Settings, {}, { logger });
 */
export const orElseOnException = <T,>(
  supplier: () => T,
  defaultValue: T,
  options?: OrElseOnExceptionOptions,
): T => {
  try {
    return supplier();
  } catch (error) {
    reportSwallowed(error, options);
    return defaultValue;
  }
};

/**
 * Async counterpart of {@link orElseOnException}: a rejection, or a synchronous throw
 * from `supplier`, resolves to `defaultValue`.
 *
 * @category Fallbacks
 */
export const orElseOnExceptionAsync = async <T,>(
  supplier: () => Promise<T>,
  defaultValue: T,
  options?: OrElseOnExceptionOptions,
): Promise<T> => {
  try {
    return await supplier();
  } catch (error) {
    reportSwallowed(error, options);
    return defaultValue;
  }
};

/**
 * Throws the error from `error` if `value` satisfies `predicate`; otherwise returns `value`.
 * `error` is only invoked when throwing.
 *
 * @category Guards
 * @example
 * const props = throwIf(loadProperties(), (p) => p.size === 0,
 *   () => new IllegalStateError('Properties must not be empty'));
 *
 * @see throwUnless
 */
export const throwIf = <T,>(
  value: T,
  predicate: (value: T) => boolean,
  error: () => unknown,
): T => {
  if (predicate(value)) {
    throw error();
  }
  return value;
};

/**
 * Throws the error from `error` if `value` does not satisfy `predicate`; otherwise returns `value`.
 *
 * @category Guards
 * @example
 * throwUnless(props, (p) => p.has('host'),
 *   () => new IllegalStateError('Properties must contain a host'));
 *
 * @see throwIf
 */
export const throwUnless = <T,>(
  value: T,
  predicate: (value: T) => boolean,
  error: () => unknown,
): T => throwIf(value, (v) => !predicate(v), error);

const isInstanceOfSameClass = <T extends object>(candidate: unknown, obj: T): candidate is T =>
  candidate instanceof obj.constructor;

/**
 * Creates a new instance of the same class as `obj` if possible; otherwise returns None.
 * Only classes whose constructor declares no parameters are supported, and a constructor
 * that throws yields None.
 *
 * @category Construction
 * @example
 * newInstanceOf(new Map([['a', 1]]));
 * // => Some(Map {})
 *
 * @example
 * newInstanceOf(Object.create(null));
 * // => None
 */
export const newInstanceOf = <T extends object>(obj: T): Option<T> => {
  const ctor: unknown = Object.getPrototypeOf(obj)?.constructor;
  if (typeof ctor !== 'function' || ctor.length !== 0) {
    return none();
  }
  try {
    const instance: unknown = Reflect.construct(ctor, []);
    return isInstanceOfSameClass(instance, obj) ? some(instance) : none();
  } catch {
    return none();
  }
};
