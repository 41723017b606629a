/**
 * @module singleton-reducers
 * @description Reducers that collapse a sequence holding zero or one element into that element.
 * A second element is a usage error and raises {@link CardinalityError} as soon as it is seen,
 * without pulling the rest of the sequence.
 *
 * Reducers here are sequential only. The {@link Reducer} interface has no combine step, so there
 * is no way to merge two partial accumulators that might each hold a value.
 *
 * @example
 * ```typescript
 * import { collect, toOptionalResult } from './singleton-reducers.mjs';
 *
 * const activeStep = collect(toOptionalResult<Step>())(steps.filter((step) => step.active));
 * // => Some(step) when exactly one step is active, None when none is
 * ```
 *
 * @category Reducers
 * @since 2025-07-03
 */

import { CardinalityError } from './errors.mjs';
import { isSome, none, some } from './option.mjs';

import type { Option } from './option.mjs';

/**
 * Describes a sequential reduction: create the state, feed it each element, then finish.
 *
 * @template T - The type of the input elements
 * @template A - The type of the mutable accumulation state
 * @template R - The type of the result
 */
export interface Reducer<T, A, R> {
  /** creates a fresh accumulator; called once per reduction */
  supplier(): A;
  /** folds one element into the accumulator */
  accumulator(acc: A, element: T): void;
  /** produces the result once the input is exhausted */
  finisher(acc: A): R;
}

/**
 * Single-slot holder. The slot is an Option rather than a bare value so that a
 * sole `null` or `undefined` element still counts as one element.
 */
export class Accumulator<T> {
  private slot: Option<T> = none();

  set(element: T): void {
    if (isSome(this.slot)) {
      throw new CardinalityError();
    }
    this.slot = some(element);
  }

  toOption(): Option<T> {
    return this.slot;
  }

  toNullable(): T | null {
    return isSome(this.slot) ? this.slot.value ?? null : null;
  }
}

const singletonReducer = <T, R>(
  finisher: (acc: Accumulator<T>) => R,
): Reducer<T, Accumulator<T>, R> => ({
  supplier: () => new Accumulator<T>(),
  accumulator: (acc, element) => acc.set(element),
  finisher,
});

/**
 * Reducer that yields the only element as an Option.
 * A sole `null` element gives `some(null)`, an empty input gives `none()`.
 *
 * @throws {CardinalityError} when a second element is observed
 *
 * @category Reducers
 * @example
 * collect(toOptionalResult<string>())(['one']);
 * // => { _tag: 'Some', value: 'one' }
 *
 * @see toNullableResult - Same reduction with a nullable result
 */
export const toOptionalResult = <T,>(): Reducer<T, Accumulator<T>, Option<T>> =>
  singletonReducer<T, Option<T>>((acc) => acc.toOption());

/**
 * Reducer that yields the only element, or `null` for an empty input.
 *
 * Known limitation: a sole `null` (or `undefined`) element is reported as `null`,
 * exactly like an empty input. Use {@link toOptionalResult} when elements may be nullish.
 *
 * @throws {CardinalityError} when a second element is observed
 *
 * @category Reducers
 * @example
 * collect(toNullableResult<string>())([]);
 * // => null
 */
export const toNullableResult = <T,>(): Reducer<T, Accumulator<T>, T | null> =>
  singletonReducer<T, T | null>((acc) => acc.toNullable());

/**
 * Applies a reducer to any iterable.
 * Elements are pulled one at a time; if the accumulator throws, iteration stops and
 * the iterator is closed.
 *
 * @category Reducers
 * @example
 * const names = new Set(['ada']);
 * collect(toNullableResult<string>())(names);
 * // => 'ada'
 */
export const collect =
  <T, A, R>(reducer: Reducer<T, A, R>) =>
  (source: Iterable<T>): R => {
    const acc = reducer.supplier();
    for (const element of source) {
      reducer.accumulator(acc, element);
    }
    return reducer.finisher(acc);
  };

const isAsyncIterable = <T,>(source: AsyncIterable<T> | Iterable<T>): source is AsyncIterable<T> =>
  typeof source === 'object' && Symbol.asyncIterator in source;

/**
 * Applies a reducer to an async iterable, such as an async generator or a readable stream.
 * The returned promise rejects with whatever the accumulator throws, and the source is closed.
 *
 * A synchronous iterable is reduced as by {@link collect}: its elements are not awaited,
 * so a sole promise element comes back inside the Option, unsettled.
 *
 * @category Reducers
 * @example
 * const row = await collectAsync(toOptionalResult<Row>())(queryRows(sql));
 */
export const collectAsync =
  <T, A, R>(reducer: Reducer<T, A, R>) =>
  async (source: AsyncIterable<T> | Iterable<T>): Promise<R> => {
    if (!isAsyncIterable(source)) {
      return collect(reducer)(source);
    }
    const acc = reducer.supplier();
    for await (const element of source) {
      reducer.accumulator(acc, element);
    }
    return reducer.finisher(acc);
  };

/**
 * Shorthand for `collect(toOptionalResult())(source)`.
 *
 * @category Reducers
 */
export const singleOption = <T,>(source: Iterable<T>): Option<T> =>
  collect(toOptionalResult<T>())(source);

/**
 * Shorthand for `collect(toNullableResult())(source)`.
 *
 * @category Reducers
 */
export const singleOrNull = <T,>(source: Iterable<T>): T | null =>
  collect(toNullableResult<T>())(source);
