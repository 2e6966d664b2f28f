/** Read-only map interface (i.e. a source of key-value pairs). */
export interface IMapSource<K = unknown, V = unknown>
{
  /** Returns the number of key/value pairs in the map object. */
  readonly size: number;
  /** Returns the value associated to the key, or undefined if there is none. */
  get(key: K): V | undefined;
  /** Returns a boolean asserting whether a value has been associated to the key in the map object or not. */
  has(key: K): boolean;
  /** Calls callbackFn once for each key-value pair present in the map object.
   *  The ES6 Map class sends the value to the callback before sending the key,
   *  so this interface must do likewise. */
  forEach(callbackFn: (v: V, k: K, map: IMapSource<K, V>) => void): void;
  /** Returns an iterator that provides all key-value pairs from the collection (as arrays of length 2). */
  entries(): IterableIterator<[K, V]>;
  /** Returns a new iterator for iterating the keys of each pair. */
  keys(): IterableIterator<K>;
  /** Returns a new iterator for iterating the values of each pair. */
  values(): IterableIterator<V>;
  /** Same as entries(). */
  [Symbol.iterator](): IterableIterator<[K, V]>;
}

/** Write-only map interface (i.e. a drain into which key-value pairs can be "sunk") */
export interface IMapSink<K = unknown, V = unknown>
{
  /** Returns true if an element in the map object existed and has been
   *  removed, or false if the element did not exist. */
  delete(key: K): boolean;
  /** Sets the value for the key in the map object (the return value is
   *  boolean in contrast to Map.set which returns the Map object itself). */
  set(key: K, value: V): boolean;
  /** Removes all key/value pairs from the IMap object. */
  clear(): void;
}

/** An interface compatible with ES6 Map, except that set() returns boolean. */
export interface IMap<K = unknown, V = unknown> extends IMapSource<K, V>, IMapSink<K, V> { }

/** An data source that provides read-only access to items in sorted order. */
export interface ISortedMapSource<K = unknown, V = unknown> extends IMapSource<K, V>
{
  /** Gets the lowest key in the collection. */
  minKey(): K | undefined;
  /** Gets the highest key in the collection. */
  maxKey(): K | undefined;
  /** Gets the number of levels between the root and the leaves. */
  readonly height: number;
  /** Returns all key-value pairs in ascending key order. */
  toArray(): [K, V][];
}

/** An interface for a sorted map that can be modified in place. */
export interface ISortedMap<K = unknown, V = unknown> extends IMap<K, V>, ISortedMapSource<K, V>
{
  /** Adds or overwrites a key-value pair; with overwrite=false an existing pair is left alone. */
  set(key: K, value: V, overwrite?: boolean): boolean;
  /** Adds all pairs from a list; returns the number of pairs added. */
  setPairs(pairs: [K, V][], overwrite?: boolean): number;
  /** Deletes a series of keys; returns the number of keys deleted. */
  deleteKeys(keys: K[]): number;
}

/** An interface for a functional sorted map: the "mutators" return a
 *  modified copy and leave the original unchanged. */
export interface ISortedMapF<K = unknown, V = unknown> extends ISortedMapSource<K, V>
{
  /** Returns a copy with the specified key-value pair set. */
  with<V2>(key: K, value: V2, overwrite?: boolean): ISortedMapF<K, V | V2>;
  /** Returns a copy with the specified key-value pairs set. */
  withPairs<V2>(pairs: [K, V | V2][], overwrite: boolean): ISortedMapF<K, V | V2>;
  /** Returns a copy with the specified key removed. */
  without(key: K): ISortedMapF<K, V>;
  /** Returns a copy with the specified keys removed. */
  withoutKeys(keys: K[]): ISortedMapF<K, V>;
  /** Returns a copy with pairs removed whenever the callback returns false. */
  filter(callback: (k: K, v: V, counter: number) => boolean): ISortedMapF<K, V>;
  /** Returns a copy with all values altered by a callback function. */
  mapValues<R>(callback: (v: V, k: K, counter: number) => R): ISortedMapF<K, R>;
}
