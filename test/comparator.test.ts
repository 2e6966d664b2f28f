import { defaultComparator, simpleComparator } from '../core';
import { compareAny } from '../core/compare';

describe('defaultComparator', () => {
  test('numbers', () => {
    expect(defaultComparator(1, 2)).toBeLessThan(0);
    expect(defaultComparator(2, 1)).toBeGreaterThan(0);
    expect(defaultComparator(-5, -5)).toBe(0);
    expect(defaultComparator(-Infinity, Infinity)).toBe(-1);
  });

  test('-0 and +0 are equal', () => {
    expect(defaultComparator(-0, 0) === 0).toBe(true);
  });

  test('NaN equals NaN and sorts below every other number', () => {
    expect(defaultComparator(NaN, NaN)).toBe(0);
    expect(defaultComparator(NaN, -Infinity)).toBe(-1);
    expect(defaultComparator(-Infinity, NaN)).toBe(1);
  });

  test('strings', () => {
    expect(defaultComparator('a', 'b')).toBe(-1);
    expect(defaultComparator('b', 'a')).toBe(1);
    expect(defaultComparator('ab', 'ab')).toBe(0);
  });

  test('booleans', () => {
    expect(defaultComparator(false, true)).toBe(-1);
    expect(defaultComparator(true, true)).toBe(0);
  });

  test('values of different types are ordered by type name', () => {
    expect(defaultComparator(true, 0)).toBe(-1);
    expect(defaultComparator(0, null)).toBe(-1);
    expect(defaultComparator(null, '')).toBe(-1);
    expect(defaultComparator('', undefined)).toBe(-1);
    expect(defaultComparator(null, undefined)).toBe(-1);
  });

  test('null sorts before other objects', () => {
    expect(defaultComparator(null, null)).toBe(0);
    expect(defaultComparator(null, new Date(0))).toBe(-1);
    expect(defaultComparator(new Date(0), null)).toBe(1);
  });

  test('objects compare by valueOf', () => {
    expect(defaultComparator(new Date(2000, 0, 1), new Date(2000, 0, 1))).toBe(0);
    expect(defaultComparator(new Date(1999, 0, 1), new Date(2000, 0, 1))).toBe(-1);
    expect(defaultComparator({ valueOf: () => 'b' }, { valueOf: () => 'a' })).toBe(1);
  });

  test('an object and a primitive with the same value differ', () => {
    expect(defaultComparator(new Date(5), 5)).toBeGreaterThan(0);
  });

  test('arrays compare by their string form', () => {
    expect(defaultComparator([1], ['1'])).toBe(0);
    expect(defaultComparator([1, 2], [1, 3])).toBe(-1);
    expect(defaultComparator(['b'], ['a', 'z'])).toBe(1);
  });
});

describe('compareAny', () => {
  test('bigints', () => {
    expect(compareAny(BigInt(1), BigInt(2))).toBe(-1);
    expect(compareAny(BigInt(3), BigInt(3))).toBe(0);
  });

  test('identical objects are equal', () => {
    const o = {};
    expect(compareAny(o, o)).toBe(0);
  });

  test('unrelated objects cannot be ordered', () => {
    expect(compareAny(Symbol('a'), Symbol('b'))).toBeNaN();
  });
});

describe('simpleComparator', () => {
  test('uses < and >', () => {
    expect(simpleComparator(1, 2)).toBe(-1);
    expect(simpleComparator('b', 'a')).toBe(1);
    expect(simpleComparator(new Date(7), new Date(7))).toBe(0);
    expect(simpleComparator([1, 2], [1, 2])).toBe(0);
  });
});
