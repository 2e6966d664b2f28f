import type { IMap } from './interfaces';
import type { Comparator } from './core/types';
import { compareAny } from './core/compare';

/** A super-inefficient sorted list, used as the reference map in tests */
export default class SortedArray<K, V> implements IMap<K,V>
{
  a: [K,V][];
  cmp: Comparator<K>;

  public constructor(entries?: [K,V][], compare?: Comparator<K>) {
    this.cmp = compare || compareAny;
    this.a = [];
    if (entries !== undefined)
      for (const e of entries)
        this.set(e[0], e[1]);
  }

  get size() { return this.a.length; }
  get(key: K, defaultValue?: V): V | undefined {
    const i = this.indexOf(key, -1);
    return i < 0 ? defaultValue : this.a[i][1];
  }
  set(key: K, value: V, overwrite?: boolean): boolean {
    const i = this.indexOf(key, -1);
    if (i <= -1)
      this.a.splice(~i, 0, [key, value]);
    else if (overwrite !== false)
      this.a[i] = [key, value];
    return i <= -1;
  }
  has(key: K): boolean {
    return this.indexOf(key, -1) >= 0;
  }
  delete(key: K): boolean {
    const i = this.indexOf(key, -1);
    if (i > -1)
      this.a.splice(i, 1);
    return i > -1;
  }
  clear() { this.a = []; }
  getArray() { return this.a; }
  minKey(): K | undefined { return this.a.length ? this.a[0][0] : undefined; }
  maxKey(): K | undefined { return this.a.length ? this.a[this.a.length-1][0] : undefined; }
  forEach(callbackFn: (v:V, k:K, list:SortedArray<K,V>) => void) {
    this.a.forEach(pair => callbackFn(pair[1], pair[0], this));
  }

  [Symbol.iterator](): IterableIterator<[K,V]> { return this.a.values(); }
  entries(): IterableIterator<[K,V]> { return this.a.values(); }
  keys():    IterableIterator<K> { return this.a.map(pair => pair[0]).values(); }
  values():  IterableIterator<V> { return this.a.map(pair => pair[1]).values(); }

  // If key not found, returns i^failXor where i is the insertion index.
  indexOf(key: K, failXor: number): number {
    let lo = 0, hi = this.a.length, mid = hi >> 1;
    while(lo < hi) {
      const c = this.cmp(this.a[mid][0], key);
      if (c < 0)
        lo = mid + 1;
      else if (c > 0) // keys[mid] > key
        hi = mid;
      else if (c === 0)
        return mid;
      else
        throw new Error("Problem: compare failed");
      mid = (lo + hi) >> 1;
    }
    return mid ^ failXor;
  }
}
