/**
 * @module option
 * @description Option type for values that may be absent.
 * Unlike a nullable value, an Option can hold `null` itself: `some(null)` is present,
 * `none()` is absent. The singleton reducers rely on that distinction.
 *
 * @example
 * ```typescript
 * import { fromNullable, map, getOrElse } from './option.mjs';
 *
 * const port = getOrElse(() => 8080)(
 *   map((raw: string) => Number(raw))(fromNullable(process.env.PORT)),
 * );
 * ```
 *
 * @category Core
 * @since 2025-07-03
 */

/**
 * Option type representing a value that may or may not exist.
 *
 * @template T - The type of the value when present
 *
 * @category Core Types
 */
export type Option<T> = Some<T> | None;

/**
 * A present value.
 *
 * @category Core Types
 */
export interface Some<T> {
  readonly _tag: 'Some';
  readonly value: T;
}

/**
 * An absent value.
 *
 * @category Core Types
 */
export interface None {
  readonly _tag: 'None';
}

/**
 * Wraps a value in Some. `null` and `undefined` are wrapped as-is.
 *
 * @category Constructors
 * @example
 * some('tuesday');
 * // => { _tag: 'Some', value: 'tuesday' }
 *
 * @see fromNullable - Treat null/undefined as absent instead
 */
export const some = <T,>(value: T): Option<T> => ({
  _tag: 'Some',
  value,
});

/**
 * The absent Option.
 *
 * @category Constructors
 */
export const none = (): Option<never> => ({
  _tag: 'None',
});

/**
 * Creates an Option from a nullable value.
 * Returns None for `null` and `undefined`, Some otherwise.
 *
 * @category Constructors
 * @example
 * fromNullable(new Map([['a', 1]]).get('b'));
 * // => None
 */
export const fromNullable = <T,>(value: T | null | undefined): Option<T> =>
  value === null || value === undefined ? none() : some(value);

/**
 * Type guard to check if an Option is Some.
 *
 * @category Type Guards
 */
export const isSome = <T,>(option: Option<T>): option is Some<T> =>
  option._tag === 'Some';

/**
 * Type guard to check if an Option is None.
 *
 * @category Type Guards
 */
export const isNone = <T,>(option: Option<T>): option is None =>
  option._tag === 'None';

/**
 * Transforms the value inside a Some; None passes through.
 *
 * @category Transformations
 * @example
 * map((day: string) => day.length)(some('friday'));
 * // => Some(6)
 */
export const map =
  <A, B>(fn: (value: A) => B) =>
  (option: Option<A>): Option<B> =>
    isSome(option) ? some(fn(option.value)) : none();

/**
 * Chains a computation that itself returns an Option.
 *
 * @category Transformations
 */
export const flatMap =
  <A, B>(fn: (value: A) => Option<B>) =>
  (option: Option<A>): Option<B> =>
    isSome(option) ? fn(option.value) : none();

/**
 * Extracts the value, or computes a default for None.
 *
 * @category Extractors
 * @example
 * getOrElse(() => 'anonymous')(none());
 * // => 'anonymous'
 */
export const getOrElse =
  <T,>(defaultValue: () => T) =>
  (option: Option<T>): T =>
    isSome(option) ? option.value : defaultValue();

/**
 * Returns the Option itself when Some, otherwise the alternative.
 *
 * @category Combinators
 */
export const orElse =
  <T,>(alternative: () => Option<T>) =>
  (option: Option<T>): Option<T> =>
    isSome(option) ? option : alternative();

/**
 * Pattern matches on an Option.
 *
 * @category Pattern Matching
 * @example
 * match({
 *   some: (n: number) => `found ${n}`,
 *   none: () => 'missing',
 * })(some(3));
 * // => 'found 3'
 */
export const match =
  <T, A, B>(patterns: {
    some: (value: T) => A;
    none: () => B;
  }) =>
  (option: Option<T>): A | B =>
    isSome(option) ? patterns.some(option.value) : patterns.none();

/**
 * Converts to a nullable value. `some(null)` and `none()` both give `null`.
 *
 * @category Conversions
 */
export const toNullable = <T,>(option: Option<T>): T | null =>
  isSome(option) ? option.value : null;

/**
 * Converts to an optional value.
 *
 * @category Conversions
 */
export const toUndefined = <T,>(option: Option<T>): T | undefined =>
  isSome(option) ? option.value : undefined;

/**
 * Option utilities namespace.
 *
 * @category Utilities
 * @example
 * import { Option } from './option.mjs';
 *
 * const label = Option.getOrElse(() => '-')(Option.fromNullable(user.nickname));
 */
export const Option = {
  some,
  none,
  fromNullable,
  isSome,
  isNone,
  map,
  flatMap,
  getOrElse,
  orElse,
  match,
  toNullable,
  toUndefined,
} as const;
