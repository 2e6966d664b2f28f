import type { BreakResult, Comparator, Tree } from './core/types';
import type { ISortedMap, ISortedMapF } from './interfaces';
import { compareAny } from './core/compare';
import { Leaf, height, maxPair, minPair } from './internal/nodes';
import { lookupPair } from './internal/lookup';
import { insert } from './internal/insert';
import { remove } from './internal/delete';
import { forEachPair, inOrder, mapTree, pairsOf } from './internal/traverse';
import { checkValid } from './internal/validate';
import { check } from './internal/assert';

export type {
  IMapSource, IMapSink, IMap, ISortedMapSource, ISortedMap, ISortedMapF
} from './interfaces';
export type { BreakResult, Comparator, LeafNode, Node2, Node3, Shape, Tree } from './core/types';
export type { DefaultComparable } from './core/compare';
export { defaultComparator, simpleComparator } from './core/compare';

/**
 * An ordered collection of key-value pairs, largely compatible with the
 * standard Map. It is stored as a 2-3 tree, so the collection is sorted by
 * key and get, set and delete are O(log size).
 *
 * Tree nodes are immutable: each change builds a new root that shares every
 * untouched subtree with the old one. So clone() is O(1), and an iterator
 * keeps walking the version that existed when it was created even if the
 * map is changed meanwhile.
 *
 * Out of the box, keys may be numbers, strings, arrays of numbers/strings,
 * Date, and objects that have a valueOf() method returning a number or
 * string. Other key types require a custom comparator, passed as the second
 * constructor argument (the first argument is an optional list of initial
 * pairs). The comparator must be a consistent total order over the keys in
 * use; the tree's behavior is unspecified if it is not.
 *
 * @example
 *     var map = new TwoThreeMap<{name: string, age: number}, string>(undefined, (a, b) => {
 *       if (a.name > b.name)
 *         return 1;
 *       else if (a.name < b.name)
 *         return -1;
 *       else
 *         return a.age - b.age;
 *     });
 *     map.set({name:"Bill", age:17}, "happy");
 *     map.set({name:"Fran", age:40}, "busy & stressed");
 *     map.forEachPair((k, v) => {
 *       console.log(`Name: ${k.name} Age: ${k.age} Status: ${v}`);
 *     });
 *
 * As with Map, forEach(c) calls c(value,key); forEachPair(c) calls c(key,value).
 */
export default class TwoThreeMap<K, V> implements ISortedMapF<K,V>, ISortedMap<K,V>
{
  private _root: Tree<K,V> = Leaf;
  private _size = 0;

  /** Orders the keys; see `Comparator`. */
  readonly _compare: Comparator<K>;

  /**
   * Initializes an empty map.
   * @param entries A set of key-value pairs to initialize the map
   * @param compare Custom function to compare pairs of elements in the tree.
   *   If not specified, defaultComparator will be used which is valid as long
   *   as K extends DefaultComparable.
   */
  public constructor(entries?: [K,V][], compare?: Comparator<K>) {
    this._compare = compare || compareAny;
    if (entries)
      this.setPairs(entries);
  }

  private static fromRoot<K,V>(root: Tree<K,V>, size: number, compare: Comparator<K>): TwoThreeMap<K,V> {
    const result = new TwoThreeMap<K,V>(undefined, compare);
    result._root = root;
    result._size = size;
    return result;
  }

  /////////////////////////////////////////////////////////////////////////////
  // ES6 Map<K,V> methods /////////////////////////////////////////////////////

  /** Gets the number of key-value pairs in the map. */
  get size(): number { return this._size; }
  /** Gets the number of key-value pairs in the map. */
  get length(): number { return this._size; }
  /** Returns true iff the map contains no key-value pairs. */
  get isEmpty(): boolean { return this._size === 0; }

  /** Releases the tree so that its size is 0. */
  clear() {
    this._root = Leaf;
    this._size = 0;
  }

  /** Runs a function for each key-value pair, in order from smallest to
   *  largest key. For compatibility with ES6 Map, the argument order to
   *  the callback is backwards: value first, then key. Call forEachPair
   *  instead to receive the key as the first argument.
   * @param thisArg If provided, this parameter is assigned as the `this`
   *        value for each callback.
   * @returns the number of values that were sent to the callback,
   *        or the R value if the callback returned {break:R}. */
  forEach<R=number>(callback: (v:V, k:K, map:TwoThreeMap<K,V>) => BreakResult<R>|void, thisArg?: unknown): R|number {
    if (thisArg !== undefined)
      callback = callback.bind(thisArg);
    return this.forEachPair((k, v) => callback(v, k, this));
  }

  /** Runs a function for each key-value pair, in order from smallest to
   *  largest key. The callback can return {break:R} (where R is any value
   *  except undefined) to stop immediately and return R from forEachPair.
   * @param initialCounter This is the value of the third argument of
   *        `callback` the first time it is called. The counter increases
   *        by one each time `callback` is called. Default value: 0
   * @returns the number of pairs sent to the callback (plus initialCounter,
   *        if you provided one). If the callback returned {break:R} then
   *        the R value is returned instead. */
  forEachPair<R=number>(callback: (k:K, v:V, counter:number) => BreakResult<R>|void, initialCounter?: number): R|number {
    return forEachPair(this._root, callback, initialCounter);
  }

  /**
   * Finds a pair and returns the associated value.
   * @param defaultValue a value to return if the key was not found.
   * @description Computational complexity: O(log size)
   */
  get(key: K, defaultValue?: V): V | undefined {
    const pair = lookupPair(this._root, key, this._compare);
    return pair === undefined ? defaultValue : pair[1];
  }

  /**
   * Adds or overwrites a key-value pair.
   * @param overwrite Whether to overwrite an existing key-value pair
   *        (default: true). If this is false and there is an existing
   *        key-value pair then this method has no effect.
   * @returns true if a new key-value pair was added.
   * @description Computational complexity: O(log size)
   * Note: when overwriting a previous entry, the key is updated
   * as well as the value. This has no effect unless the new key
   * has data that does not affect its sort order.
   */
  set(key: K, value: V, overwrite?: boolean): boolean {
    const found = lookupPair(this._root, key, this._compare) !== undefined;
    if (found && overwrite === false)
      return false;
    this._root = insert(this._root, key, value, this._compare);
    if (!found)
      this._size++;
    return !found;
  }

  /**
   * Returns true if the key exists, false if not. Use get() for best
   * performance; use has() if you need to distinguish between "undefined
   * value" and "key not present".
   */
  has(key: K): boolean {
    return lookupPair(this._root, key, this._compare) !== undefined;
  }

  /**
   * Removes a single key-value pair.
   * @returns true if a pair was found and removed, false otherwise.
   * @description Computational complexity: O(log size)
   */
  delete(key: K): boolean {
    const root = remove(this._root, key, this._compare);
    if (root === this._root)
      return false;
    this._root = root;
    this._size--;
    return true;
  }

  /////////////////////////////////////////////////////////////////////////////
  // Clone-mutators ///////////////////////////////////////////////////////////

  /** Returns a copy of the map with the specified key-value pair set.
   *  If overwrite is false and the key exists, returns this. */
  with<V2>(key: K, value: V2, overwrite?: boolean): TwoThreeMap<K,V|V2> {
    const nu = TwoThreeMap.fromRoot<K,V|V2>(this._root, this._size, this._compare);
    return nu.set(key, value, overwrite) || overwrite !== false ? nu : this;
  }

  /** Returns a copy of the map with the specified key-value pairs set. */
  withPairs<V2>(pairs: [K,V|V2][], overwrite: boolean): TwoThreeMap<K,V|V2> {
    const nu = TwoThreeMap.fromRoot<K,V|V2>(this._root, this._size, this._compare);
    return nu.setPairs(pairs, overwrite) !== 0 || overwrite ? nu : this;
  }

  /** Returns a copy of the map with the specified key removed.
   * @param returnThisIfUnchanged if true, returns this if the key didn't exist. */
  without(key: K, returnThisIfUnchanged?: boolean): TwoThreeMap<K,V> {
    const root = remove(this._root, key, this._compare);
    if (root === this._root)
      return returnThisIfUnchanged ? this : this.clone();
    return TwoThreeMap.fromRoot(root, this._size - 1, this._compare);
  }

  /** Returns a copy of the map with the specified keys removed.
   * @param returnThisIfUnchanged if true, returns this if none of the keys existed. */
  withoutKeys(keys: K[], returnThisIfUnchanged?: boolean): TwoThreeMap<K,V> {
    const nu = this.clone();
    return nu.deleteKeys(keys) || !returnThisIfUnchanged ? nu : this;
  }

  /** Returns a copy of the map with pairs removed whenever the callback
   *  function returns false. */
  filter(callback: (k:K, v:V, counter:number) => boolean, returnThisIfUnchanged?: boolean): TwoThreeMap<K,V> {
    const nu = this.clone();
    this.forEachPair((k, v, i) => {
      if (!callback(k, v, i))
        nu.delete(k);
    });
    if (nu._size === this._size && returnThisIfUnchanged)
      return this;
    return nu;
  }

  /** Returns a copy of the map with all values altered by a callback function.
   *  The tree keeps its shape, since no key changes. */
  mapValues<R>(callback: (v:V, k:K, counter:number) => R): TwoThreeMap<K,R> {
    return TwoThreeMap.fromRoot(mapTree(this._root, callback), this._size, this._compare);
  }

  /** Performs a reduce operation like the `reduce` method of `Array`.
   *  It is used to combine all pairs into a single value, or perform
   *  conversions. For example `map.reduce((P, pair) => P * pair[0], 1)`
   *  multiplies all keys together. */
  reduce<R>(callback: (previous:R, currentPair:[K,V], counter:number, map:TwoThreeMap<K,V>) => R, initialValue: R): R;
  reduce<R>(callback: (previous:R|undefined, currentPair:[K,V], counter:number, map:TwoThreeMap<K,V>) => R): R|undefined;
  reduce<R>(callback: (previous:R|undefined, currentPair:[K,V], counter:number, map:TwoThreeMap<K,V>) => R, initialValue?: R): R|undefined {
    let i = 0, p = initialValue;
    for (const pair of pairsOf(this._root))
      p = callback(p, pair, i++, this);
    return p;
  }

  /////////////////////////////////////////////////////////////////////////////
  // Iterator methods /////////////////////////////////////////////////////////

  /** Returns an iterator that provides pairs in ascending key order. */
  entries(): IterableIterator<[K,V]> {
    return pairsOf(this._root);
  }

  /** Returns a new iterator for iterating the keys of each pair in ascending order. */
  *keys(): IterableIterator<K> {
    for (const pair of pairsOf(this._root))
      yield pair[0];
  }

  /** Returns a new iterator for iterating the values of each pair in order by key. */
  *values(): IterableIterator<V> {
    for (const pair of pairsOf(this._root))
      yield pair[1];
  }

  /** Same as entries(). */
  [Symbol.iterator](): IterableIterator<[K,V]> {
    return this.entries();
  }

  /////////////////////////////////////////////////////////////////////////////
  // Additional methods ///////////////////////////////////////////////////////

  /** The current root. Nodes are immutable, so this is a read-only view. */
  get root(): Tree<K,V> { return this._root; }

  /** Gets the number of internal levels between the root and the leaves
   *  (zero if the map is empty). */
  get height(): number { return height(this._root); }

  /** Gets the lowest key in the map. Complexity: O(log size) */
  minKey(): K | undefined {
    const pair = minPair(this._root);
    return pair && pair[0];
  }

  /** Gets the highest key in the map. Complexity: O(log size) */
  maxKey(): K | undefined {
    const pair = maxPair(this._root);
    return pair && pair[0];
  }

  /** Gets the pair with the lowest key, or undefined if the map is empty. */
  minPair(): [K,V] | undefined { return minPair(this._root); }

  /** Gets the pair with the highest key, or undefined if the map is empty. */
  maxPair(): [K,V] | undefined { return maxPair(this._root); }

  /** Clones the map in O(1) time. Both copies remain editable, and
   *  changes to one never show up in the other. */
  clone(): TwoThreeMap<K,V> {
    return TwoThreeMap.fromRoot(this._root, this._size, this._compare);
  }

  /** Gets an array filled with the contents of the map, sorted by key */
  toArray(): [K,V][] {
    return inOrder(this._root);
  }

  /** Gets an array of all keys, sorted */
  keysArray(): K[] {
    const results: K[] = [];
    this.forEachPair(k => { results.push(k); });
    return results;
  }

  /** Gets an array of all values, sorted by key */
  valuesArray(): V[] {
    const results: V[] = [];
    this.forEachPair((k, v) => { results.push(v); });
    return results;
  }

  /** Gets a string representing the map's data based on toArray(). */
  toString() {
    return this.toArray().toString();
  }

  /** Stores a key-value pair only if the key doesn't already exist.
   * @returns true if a new key was added */
  setIfNotPresent(key: K, value: V): boolean {
    return this.set(key, value, false);
  }

  /** Changes a value only if the key already exists.
   * @returns true if the key existed */
  changeIfPresent(key: K, value: V): boolean {
    if (!this.has(key))
      return false;
    this.set(key, value, true);
    return true;
  }

  /**
   * Adds all pairs from a list of key-value pairs.
   * @param pairs Pairs to add. Any later pair with an equal key replaces
   *        an earlier one, unless overwrite is false.
   * @param overwrite Whether to overwrite pairs that already exist (if false,
   *        pairs[i] is ignored when the key already exists.)
   * @returns The number of pairs added to the collection.
   */
  setPairs(pairs: [K,V][], overwrite?: boolean): number {
    let added = 0;
    for (let i = 0; i < pairs.length; i++)
      if (this.set(pairs[i][0], pairs[i][1], overwrite))
        added++;
    return added;
  }

  /** Deletes a series of keys from the collection.
   * @returns the number of keys that were deleted */
  deleteKeys(keys: K[]): number {
    let r = 0;
    for (let i = 0; i < keys.length; i++)
      if (this.delete(keys[i]))
        r++;
    return r;
  }

  /** Makes the object read-only to ensure it is not accidentally modified.
   *  Freezing does not have to be permanent; unfreeze() reverses the effect.
   *  This is accomplished by replacing mutator functions with a function
   *  that throws an Error. Clones of a frozen map are not frozen. */
  freeze() {
    // All other mutators call set(), delete() or clear()
    this.set = this.delete = this.clear = throwFrozen;
  }

  /** Ensures mutations are allowed, reversing the effect of freeze(). */
  unfreeze() {
    for (const name of Mutators)
      Reflect.deleteProperty(this, name);
  }

  /** Returns true if the map appears to be frozen. */
  get isFrozen(): boolean {
    return Object.prototype.hasOwnProperty.call(this, 'set');
  }

  /** Scans the tree for broken invariants (order, balance) and checks the
   *  cached size. Throws if anything is wrong.
   *  Computational complexity: O(size) */
  checkValid() {
    const size = checkValid(this._root, this._compare);
    check(size === this._size, "size mismatch: counted", size, "but stored", this._size);
  }
}

const Mutators = ['set', 'delete', 'clear'] as const;

function throwFrozen(): never {
  throw new Error("Attempted to modify a frozen TwoThreeMap");
}

/** A map frozen in the empty state. */
export const EmptyTwoThreeMap = (() => { const t = new TwoThreeMap<unknown, unknown>(); t.freeze(); return t; })();
