/**
 * Provides a total order over keys.
 * @returns a negative value if a < b, 0 if a and b are equal and a positive value if a > b
 */
export type Comparator<K> = (a: K, b: K) => number;

/** The empty subtree. Every leaf of a 2-3 tree sits at the same depth. */
export interface LeafNode {
  readonly kind: 'leaf';
}

/** An internal node with one key and two children: left < key < right. */
export interface Node2<K, V> {
  readonly kind: 'node2';
  readonly left: Tree<K, V>;
  readonly key: K;
  readonly value: V;
  readonly right: Tree<K, V>;
}

/** An internal node with two keys and three children: left < key1 < mid < key2 < right. */
export interface Node3<K, V> {
  readonly kind: 'node3';
  readonly left: Tree<K, V>;
  readonly key1: K;
  readonly value1: V;
  readonly mid: Tree<K, V>;
  readonly key2: K;
  readonly value2: V;
  readonly right: Tree<K, V>;
}

/** A 2-3 tree. Nodes are immutable, so unchanged subtrees are shared between versions. */
export type Tree<K, V> = LeafNode | Node2<K, V> | Node3<K, V>;

/** A replacement subtree with the same height as the subtree it replaces. */
export type Absorbed<K, V> = { readonly kind: 'absorbed', readonly tree: Tree<K, V> };

/**
 * Insertion result that is one level taller than the subtree it came from:
 * conceptually a Node2 that the parent must take in.
 */
export type Overflow<K, V> = {
  readonly kind: 'overflow',
  readonly left: Tree<K, V>,
  readonly key: K,
  readonly value: V,
  readonly right: Tree<K, V>
};

/** Deletion result that is one level shorter than the subtree it came from. */
export type Underflow<K, V> = { readonly kind: 'underflow', readonly tree: Tree<K, V> };

export type InsertResult<K, V> = Absorbed<K, V> | Overflow<K, V>;
export type DeleteResult<K, V> = Absorbed<K, V> | Underflow<K, V>;

/** A callback may return {break:R} to stop a scan early with result R. */
export type BreakResult<R> = { break?: R };

/**
 * Key layout of a tree: a node whose children are leaves is the array of its
 * keys; any other node alternates child shapes and keys. The empty tree is [].
 * @example [[1], 2, [3, 4]] is a Node2 keyed 2 over a Node2 and a Node3.
 */
export type Shape<K> = (K | Shape<K>)[];
