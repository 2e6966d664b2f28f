import * as tt from '../core';
import {
  Leaf, Tree, checkValid, count, empty, forEachPair, height, inOrder, insert, isLeaf, lookup, lookupPair,
  maxPair, minPair, node2, node3, pairsOf, remove, shapeOf
} from '../core';
import { mapTree } from '../internal/traverse';

type T = Tree<number, string>;

function build(keys: number[]): T {
  return keys.reduce<T>((t, k) => insert(t, k, 'v' + k), empty());
}

describe('functional API', () => {
  test('insert into an empty tree, then look up', () => {
    const t = insert(empty<number, string>(), 1, 'one');
    expect(lookup(t, 1)).toBe('one');
    expect(lookup(t, 2)).toBeUndefined();
    expect(shapeOf(t)).toEqual([1]);
  });

  test('keys 5, 3, 8, 1 in that order', () => {
    const t = build([5, 3, 8, 1]);
    expect(inOrder(t)).toEqual([[1, 'v1'], [3, 'v3'], [5, 'v5'], [8, 'v8']]);
    expect(shapeOf(t)).toEqual([[1, 3], 5, [8]]);
    expect(height(t)).toBe(2);
  });

  test('deleting the root separator of that tree', () => {
    const t = remove(build([5, 3, 8, 1]), 5);
    expect(inOrder(t).map(p => p[0])).toEqual([1, 3, 8]);
    expect(shapeOf(t)).toEqual([[1], 3, [8]]);
    expect(lookup(t, 5)).toBeUndefined();
    expect(checkValid(t)).toBe(3);
  });

  test('delete is an alias of remove', () => {
    expect(tt.delete).toBe(remove);
    expect(shapeOf(tt.delete(build([1, 2, 3]), 2))).toEqual([1, 3]);
  });

  test('earlier versions are unaffected by later operations', () => {
    const v1 = build([1, 2, 3]);
    const v2 = insert(v1, 4, 'v4');
    const v3 = remove(v2, 1);
    expect(inOrder(v1).map(p => p[0])).toEqual([1, 2, 3]);
    expect(inOrder(v2).map(p => p[0])).toEqual([1, 2, 3, 4]);
    expect(inOrder(v3).map(p => p[0])).toEqual([2, 3, 4]);
  });

  test('untouched subtrees are shared between versions', () => {
    const v1 = build([1, 2, 3, 4, 5, 6, 7]);
    const v2 = insert(v1, 8, 'v8');
    if (v1.kind !== 'node2' || v2.kind !== 'node2')
      throw new Error('expected 2-node roots');
    expect(v2.left).toBe(v1.left);
    expect(v2.right).not.toBe(v1.right);
  });

  test('lookupPair returns the stored key', () => {
    const date = new Date(2020, 1, 1);
    const t = insert(empty<Date, number>(), date, 1);
    const pair = lookupPair(t, new Date(2020, 1, 1));
    expect(pair).toEqual([date, 1]);
    expect(pair && pair[0]).toBe(date);
  });

  test('undefined can be a key', () => {
    let t = empty<string | undefined, number>();
    t = insert(t, 'a', 1);
    t = insert(t, undefined, 2);
    expect(lookup(t, undefined)).toBe(2);
    expect(inOrder(t)).toEqual([['a', 1], [undefined, 2]]);
    expect(checkValid(t)).toBe(2);
  });
});

describe('measurements', () => {
  test('count, minPair and maxPair', () => {
    const t = build([40, 10, 30, 20, 50]);
    expect(count(t)).toBe(5);
    expect(minPair(t)).toEqual([10, 'v10']);
    expect(maxPair(t)).toEqual([50, 'v50']);
  });

  test('on the empty tree', () => {
    expect(count(Leaf)).toBe(0);
    expect(minPair(Leaf)).toBeUndefined();
    expect(maxPair(Leaf)).toBeUndefined();
    expect(shapeOf(Leaf)).toEqual([]);
    expect(isLeaf(empty())).toBe(true);
    expect(isLeaf(build([1]))).toBe(false);
  });
});

describe('traversal', () => {
  test('forEachPair visits in order and returns the count', () => {
    const seen: string[] = [];
    const n = forEachPair(build([3, 1, 2]), (k, v, i) => { seen.push(i + ':' + k + v); });
    expect(seen).toEqual(['0:1v1', '1:2v2', '2:3v3']);
    expect(n).toBe(3);
  });

  test('forEachPair adds the initial counter', () => {
    expect(forEachPair(build([1, 2]), () => {}, 10)).toBe(12);
  });

  test('forEachPair stops on {break}', () => {
    const seen: number[] = [];
    const result = forEachPair(build([1, 2, 3, 4, 5, 6, 7]), k => {
      seen.push(k);
      if (k === 4)
        return { break: 'stopped at ' + k };
    });
    expect(result).toBe('stopped at 4');
    expect(seen).toEqual([1, 2, 3, 4]);
  });

  test('pairsOf is lazy', () => {
    const it = pairsOf(build([1, 2, 3, 4, 5]));
    expect(it.next()).toEqual({ value: [1, 'v1'], done: false });
    expect(it.next()).toEqual({ value: [2, 'v2'], done: false });
    expect(Array.from(it)).toEqual([[3, 'v3'], [4, 'v4'], [5, 'v5']]);
  });

  test('mapTree keeps the shape', () => {
    const t = build([1, 2, 3, 4, 5]);
    const m = mapTree(t, (v, k, i) => v.length * 100 + k * 10 + i);
    expect(shapeOf(m)).toEqual(shapeOf(t));
    expect(inOrder(m)).toEqual([[1, 210], [2, 221], [3, 232], [4, 243], [5, 254]]);
  });
});

describe('checkValid', () => {
  const b = (k: number): T => node2(Leaf, k, 'v' + k, Leaf);

  test('counts the pairs of a valid tree', () => {
    expect(checkValid(Leaf)).toBe(0);
    expect(checkValid(build([1, 2, 3, 4, 5, 6, 7, 8, 9, 10]))).toBe(10);
  });

  test('reports leaves at different depths', () => {
    expect(() => checkValid(node2(b(1), 2, 'v2', Leaf)))
      .toThrow('2-3 tree leaf at depth 1 but another leaf is at depth 2');
  });

  test('reports a key on the wrong side of its separator', () => {
    expect(() => checkValid(node2(b(3), 2, 'v2', b(4))))
      .toThrow('2-3 tree sort violation at depth 1 : key 3 is not below separator 2');
  });

  test('reports the keys of a 3-node out of order', () => {
    expect(() => checkValid(node3(Leaf, 5, 'v5', Leaf, 4, 'v4', Leaf)))
      .toThrow('2-3 tree sort violation at depth 0 : key 4 is not above separator 5');
  });

  test('reports a duplicate key', () => {
    expect(() => checkValid(node2(b(2), 2, 'v2', b(3))))
      .toThrow('2-3 tree sort violation at depth 1 : key 2 is not below separator 2');
  });
});
