import TwoThreeMap, { IMap, Tree } from '../two-three-map';
import SortedArray from '../sorted-array';
import MersenneTwister from 'mersenne-twister';

const rand = new MersenneTwister(1234);

export function randInt(max: number): number {
  return rand.random_int() % max;
}

export function expectTreeEqualTo<K, V>(tree: TwoThreeMap<K, V>, list: SortedArray<K, V>): void {
  tree.checkValid();
  expect(tree.toArray()).toEqual(list.getArray());
}

export function addToBoth<K, V>(a: IMap<K, V>, b: IMap<K, V>, k: K, v: V): void {
  expect(a.set(k, v)).toEqual(b.set(k, v));
}

export function makeArray(size: number, randomOrder: boolean, spacing = 10, rng?: MersenneTwister): number[] {
  const randomIntWithMax = (max: number) =>
    rng === undefined ? randInt(max) : randomInt(rng, max);

  const keys: number[] = [];
  let current = 0;
  for (let i = 0; i < size; i++) {
    current += 1 + randomIntWithMax(spacing);
    keys[i] = current;
  }
  if (randomOrder) {
    for (let i = 0; i < size; i++)
      swap(keys, i, randomIntWithMax(size));
  }
  return keys;
}

export const randomInt = (rng: MersenneTwister, maxExclusive: number) =>
  Math.floor(rng.random() * maxExclusive);

/** Smallest h such that base**h >= x */
export function ceilLog(base: number, x: number): number {
  let h = 0;
  for (let p = 1; p < x; p *= base)
    h++;
  return h;
}

/** Depth of every leaf, left to right. */
export function leafDepths<K, V>(tree: Tree<K, V>, depth = 0, out: number[] = []): number[] {
  switch (tree.kind) {
    case 'leaf':
      out.push(depth);
      break;
    case 'node2':
      leafDepths(tree.left, depth + 1, out);
      leafDepths(tree.right, depth + 1, out);
      break;
    case 'node3':
      leafDepths(tree.left, depth + 1, out);
      leafDepths(tree.mid, depth + 1, out);
      leafDepths(tree.right, depth + 1, out);
      break;
  }
  return out;
}

function swap(keys: number[], i: number, j: number) {
  const tmp = keys[i];
  keys[i] = keys[j];
  keys[j] = tmp;
}
