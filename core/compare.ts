/**
 * Types that a TwoThreeMap supports by default
 */
export type DefaultComparable = number | string | Date | boolean | null | undefined | (number | string)[] |
               { valueOf: () => number | string | Date | boolean | null | undefined | (number | string)[] };

/**
 * Compares DefaultComparables to form a strict partial ordering.
 *
 * Handles +/-0 and NaN like Map: NaN is equal to NaN, and -0 is equal to +0.
 * NaN sorts below all other numbers.
 *
 * Arrays are compared by their string form, which may cause unexpected
 * equality: for example [1] will be considered equal to ['1'].
 *
 * Values of different types are ordered by the name of their type, so that
 * types can be mixed in one map. Two objects with equal valueOf compare the
 * same, but compare unequal to primitives that have the same value.
 */
export function defaultComparator(a: DefaultComparable, b: DefaultComparable): number {
  return compareAny(a, b);
}

/**
 * Same order as `defaultComparator` over arbitrary values. Values it cannot
 * order (two distinct symbols, say) give NaN, which breaks the comparator
 * precondition of every tree operation.
 * @internal
 */
export function compareAny(a: unknown, b: unknown): number {
  // Special case finite numbers first for performance.
  if (typeof a === 'number' && typeof b === 'number' && Number.isFinite(a) && Number.isFinite(b))
    return a - b;

  let ta = typeof a, tb = typeof b;
  if (ta !== tb)
    return ta < tb ? -1 : 1;

  if (ta === 'object') {
    // typeof null is 'object'
    if (a === null)
      return b === null ? 0 : -1;
    else if (b === null)
      return 1;
    a = primitiveOf(a);
    b = primitiveOf(b);
    ta = typeof a;
    tb = typeof b;
    // Deal with the two valueOf()s producing different types
    if (ta !== tb)
      return ta < tb ? -1 : 1;
  }

  if (typeof a === 'number' && typeof b === 'number')
    return compareNumbers(a, b);
  if (typeof a === 'string' && typeof b === 'string')
    return a < b ? -1 : a > b ? 1 : 0;
  if (typeof a === 'boolean' && typeof b === 'boolean')
    return a === b ? 0 : a ? 1 : -1;
  if (typeof a === 'bigint' && typeof b === 'bigint')
    return a < b ? -1 : a > b ? 1 : 0;
  if (a === b)
    return 0;
  if (Array.isArray(a) && Array.isArray(b)) {
    const sa = String(a), sb = String(b);
    return sa < sb ? -1 : sa > sb ? 1 : 0;
  }
  // Two objects (or symbols) that aren't ordered
  return Number.NaN;
}

function primitiveOf(v: unknown): unknown {
  return v instanceof Object ? v.valueOf() : v;
}

function compareNumbers(a: number, b: number): number {
  if (a < b) return -1;
  if (a > b) return 1;
  if (a === b) return 0;
  // Order NaN less than other numbers
  if (Number.isNaN(a))
    return Number.isNaN(b) ? 0 : -1;
  return 1;
}

/**
 * Compares items using the < and > operators. This function is probably slightly
 * faster than the defaultComparator for Dates and strings. Unlike
 * defaultComparator, this comparator doesn't support mixed types correctly,
 * i.e. use it with `TwoThreeMap<string>` or `TwoThreeMap<number>` but not
 * `TwoThreeMap<string|number>`.
 *
 * NaN is not supported.
 */
export function simpleComparator(a: string, b: string): number;
export function simpleComparator(a: number, b: number): number;
export function simpleComparator(a: Date, b: Date): number;
export function simpleComparator(a: (number|string)[], b: (number|string)[]): number;
export function simpleComparator(a: string | number | Date | (number|string)[],
                                 b: string | number | Date | (number|string)[]): number {
  return a > b ? 1 : a < b ? -1 : 0;
}
