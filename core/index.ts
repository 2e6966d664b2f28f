// Functional interface over immutable 2-3 trees. Every operation returns a
// new root and leaves its input untouched; unchanged subtrees are shared.
//
// Precondition for every function taking a comparator: it must be a
// deterministic total order over the keys in use. Behavior is unspecified
// otherwise; no operation checks for it.
import type { Comparator, Tree } from './types';
import { compareAny } from './compare';
import { Leaf, count, height, maxPair, minPair, shapeOf } from '../internal/nodes';
import { lookup as lookupIn, lookupPair as lookupPairIn } from '../internal/lookup';
import { insert as insertIn } from '../internal/insert';
import { remove as removeFrom } from '../internal/delete';
import { checkValid as checkTree } from '../internal/validate';
import { forEachPair, inOrder, pairsOf } from '../internal/traverse';

export type {
  Absorbed, BreakResult, Comparator, DeleteResult, InsertResult, LeafNode, Node2, Node3,
  Overflow, Shape, Tree, Underflow
} from './types';
export type { DefaultComparable } from './compare';
export { defaultComparator, simpleComparator } from './compare';
export { Leaf, isLeaf, node2, node3 } from '../internal/nodes';
export { count, height, maxPair, minPair, shapeOf, forEachPair, inOrder, pairsOf };

/** Returns the empty tree, a single leaf of height 0. */
export function empty<K, V>(): Tree<K, V> {
  return Leaf;
}

/** Returns the value stored under `key`, or undefined if the key is absent. O(log size) */
export function lookup<K, V>(tree: Tree<K, V>, key: K, compare: Comparator<K> = compareAny): V | undefined {
  return lookupIn(tree, key, compare);
}

/** Like lookup(), but returns the stored [key, value] pair. O(log size) */
export function lookupPair<K, V>(tree: Tree<K, V>, key: K, compare: Comparator<K> = compareAny): [K, V] | undefined {
  return lookupPairIn(tree, key, compare);
}

/** Returns a tree in which `key` maps to `value`, overwriting any previous value. O(log size) */
export function insert<K, V>(tree: Tree<K, V>, key: K, value: V, compare: Comparator<K> = compareAny): Tree<K, V> {
  return insertIn(tree, key, value, compare);
}

/** Returns a tree without `key`. If the key is absent, `tree` itself is returned. O(log size) */
export function remove<K, V>(tree: Tree<K, V>, key: K, compare: Comparator<K> = compareAny): Tree<K, V> {
  return removeFrom(tree, key, compare);
}

export { remove as delete };

/** Throws if an invariant is broken; otherwise returns the number of pairs. O(size) */
export function checkValid<K, V>(tree: Tree<K, V>, compare: Comparator<K> = compareAny): number {
  return checkTree(tree, compare);
}
