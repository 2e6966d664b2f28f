import type {
  Absorbed, LeafNode, Node2, Node3, Overflow, Shape, Tree, Underflow
} from '../core/types';

/** The one and only leaf. An empty map is just this node. */
export const Leaf: LeafNode = Object.freeze({ kind: 'leaf' as const });

export function node2<K,V>(left: Tree<K,V>, key: K, value: V, right: Tree<K,V>): Node2<K,V> {
  return { kind: 'node2', left, key, value, right };
}

export function node3<K,V>(left: Tree<K,V>, key1: K, value1: V, mid: Tree<K,V>,
                           key2: K, value2: V, right: Tree<K,V>): Node3<K,V> {
  return { kind: 'node3', left, key1, value1, mid, key2, value2, right };
}

export function absorbed<K,V>(tree: Tree<K,V>): Absorbed<K,V> {
  return { kind: 'absorbed', tree };
}

export function overflow<K,V>(left: Tree<K,V>, key: K, value: V, right: Tree<K,V>): Overflow<K,V> {
  return { kind: 'overflow', left, key, value, right };
}

export function underflow<K,V>(tree: Tree<K,V>): Underflow<K,V> {
  return { kind: 'underflow', tree };
}

export function isLeaf<K,V>(tree: Tree<K,V>): tree is LeafNode {
  return tree.kind === 'leaf';
}

/////////////////////////////////////////////////////////////////////////////
// Measurements /////////////////////////////////////////////////////////////

/** Number of internal levels above the leaves (0 for an empty tree).
 *  Complexity: O(height) since all leaves share one depth. */
export function height<K,V>(tree: Tree<K,V>): number {
  let h = 0;
  for (let node = tree; node.kind !== 'leaf'; node = node.left)
    h++;
  return h;
}

/** Number of key-value pairs. Complexity: O(size) */
export function count<K,V>(tree: Tree<K,V>): number {
  switch (tree.kind) {
    case 'leaf':  return 0;
    case 'node2': return count(tree.left) + 1 + count(tree.right);
    case 'node3': return count(tree.left) + 1 + count(tree.mid) + 1 + count(tree.right);
  }
}

/** Pair with the lowest key, or undefined if the tree is empty. */
export function minPair<K,V>(tree: Tree<K,V>): [K,V] | undefined {
  if (tree.kind === 'leaf')
    return undefined;
  let node: Node2<K,V> | Node3<K,V> = tree;
  while (node.left.kind !== 'leaf')
    node = node.left;
  return node.kind === 'node2' ? [node.key, node.value] : [node.key1, node.value1];
}

/** Pair with the highest key, or undefined if the tree is empty. */
export function maxPair<K,V>(tree: Tree<K,V>): [K,V] | undefined {
  if (tree.kind === 'leaf')
    return undefined;
  let node: Node2<K,V> | Node3<K,V> = tree;
  while (node.right.kind !== 'leaf')
    node = node.right;
  return node.kind === 'node2' ? [node.key, node.value] : [node.key2, node.value2];
}

/** Renders the key layout of a tree (see `Shape`). Values are omitted. */
export function shapeOf<K,V>(tree: Tree<K,V>): Shape<K> {
  switch (tree.kind) {
    case 'leaf':
      return [];
    case 'node2':
      if (tree.left.kind === 'leaf')
        return [tree.key];
      return [shapeOf(tree.left), tree.key, shapeOf(tree.right)];
    case 'node3':
      if (tree.left.kind === 'leaf')
        return [tree.key1, tree.key2];
      return [shapeOf(tree.left), tree.key1, shapeOf(tree.mid), tree.key2, shapeOf(tree.right)];
  }
}
