/**
 * @module option.test
 * Tests for the Option type
 */

import { describe, it, expect, vi } from 'vitest';
import {
  Option,
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
} from './option.mjs';

describe('Option Type', () => {
  describe('Constructors', () => {
    it('some should wrap the value', () => {
      expect(some(42)).toEqual({ _tag: 'Some', value: 42 });
    });

    it('some should treat null and undefined as present values', () => {
      expect(isSome(some(null))).toBe(true);
      expect(isSome(some(undefined))).toBe(true);
    });

    it('none should create the absent variant', () => {
      expect(none()).toEqual({ _tag: 'None' });
    });

    it('fromNullable should map null and undefined to None', () => {
      expect(fromNullable(null)).toEqual(none());
      expect(fromNullable(undefined)).toEqual(none());
      expect(fromNullable(0)).toEqual(some(0));
      expect(fromNullable('')).toEqual(some(''));
    });
  });

  describe('Type Guards', () => {
    it('isSome and isNone should be mutually exclusive', () => {
      expect(isSome(some(1))).toBe(true);
      expect(isNone(some(1))).toBe(false);
      expect(isSome(none())).toBe(false);
      expect(isNone(none())).toBe(true);
    });
  });

  describe('Transformations', () => {
    it('map should transform Some and skip None', () => {
      const length = vi.fn((s: string) => s.length);
      expect(map(length)(some('friday'))).toEqual(some(6));
      expect(map(length)(none())).toEqual(none());
      expect(length).toHaveBeenCalledTimes(1);
    });

    it('flatMap should chain Option-returning functions', () => {
      const half = (n: number): Option<number> => (n % 2 === 0 ? some(n / 2) : none());
      expect(flatMap(half)(some(8))).toEqual(some(4));
      expect(flatMap(half)(some(3))).toEqual(none());
      expect(flatMap(half)(none())).toEqual(none());
    });
  });

  describe('Extractors', () => {
    it('getOrElse should only evaluate the default for None', () => {
      const fallback = vi.fn(() => 'anonymous');
      expect(getOrElse(fallback)(some('ada'))).toBe('ada');
      expect(fallback).not.toHaveBeenCalled();
      expect(getOrElse(fallback)(none())).toBe('anonymous');
      expect(fallback).toHaveBeenCalledTimes(1);
    });

    it('orElse should fall back to the alternative Option', () => {
      expect(orElse(() => some(2))(some(1))).toEqual(some(1));
      expect(orElse(() => some(2))(none())).toEqual(some(2));
    });

    it('match should dispatch on the variant', () => {
      const describeOption = match({
        some: (n: number) => `found ${n}`,
        none: () => 'missing',
      });
      expect(describeOption(some(3))).toBe('found 3');
      expect(describeOption(none())).toBe('missing');
    });
  });

  describe('Conversions', () => {
    it('toNullable should collapse some(null) and none() to null', () => {
      expect(toNullable(some('x'))).toBe('x');
      expect(toNullable(some(null))).toBeNull();
      expect(toNullable(none())).toBeNull();
    });

    it('toUndefined should return undefined for None', () => {
      expect(toUndefined(some('x'))).toBe('x');
      expect(toUndefined(none())).toBeUndefined();
    });
  });

  describe('Option namespace', () => {
    it('should expose the same functions', () => {
      expect(Option.some).toBe(some);
      expect(Option.getOrElse(() => '-')(Option.fromNullable<string>(null))).toBe('-');
    });
  });
});
