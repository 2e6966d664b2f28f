import type { Comparator, DeleteResult, Tree } from '../core/types';
import { Leaf, absorbed, node2, node3, underflow } from './nodes';
import { fail } from './assert';

/** The minimum pair of a subtree together with the subtree left behind. */
export interface MinExtraction<K,V> {
  key: K;
  value: V;
  result: DeleteResult<K,V>;
}

/**
 * Deletes `key` below `tree`. The result either has the same height as
 * `tree` (absorbed) or is an underflow one level shorter, which the caller
 * must repair. If the key is absent the result is absorbed and holds `tree`
 * itself, at every level.
 *
 * A separator key is never cut out of an internal node. It is replaced by
 * the minimum of the subtree to its right, which is then deleted from there.
 */
export function deleteFrom<K,V>(tree: Tree<K,V>, key: K, compare: Comparator<K>): DeleteResult<K,V> {
  switch (tree.kind) {
    case 'leaf':
      return absorbed(tree);

    case 'node2': {
      const { left, right } = tree;
      if (left.kind === 'leaf')
        return matches(key, tree.key, compare) ? underflow(Leaf) : absorbed(tree);
      const c = compare(key, tree.key);
      if (c < 0) {
        const r = deleteFrom(left, key, compare);
        return unchanged(r, left) ? absorbed(tree) : joinLeft2(r, tree.key, tree.value, right);
      }
      if (c > 0) {
        const r = deleteFrom(right, key, compare);
        return unchanged(r, right) ? absorbed(tree) : joinRight2(left, tree.key, tree.value, r);
      }
      const min = deleteMin(right);
      return joinRight2(left, min.key, min.value, min.result);
    }

    case 'node3': {
      const { left, key1, value1, mid, key2, value2, right } = tree;
      if (left.kind === 'leaf') {
        // a bottom 3-node just drops to a 2-node
        if (matches(key, key1, compare))
          return absorbed(node2(Leaf, key2, value2, Leaf));
        if (matches(key, key2, compare))
          return absorbed(node2(Leaf, key1, value1, Leaf));
        return absorbed(tree);
      }
      const c1 = compare(key, key1);
      if (c1 < 0) {
        const r = deleteFrom(left, key, compare);
        return unchanged(r, left) ? absorbed(tree) : joinLeft3(r, key1, value1, mid, key2, value2, right);
      }
      if (!(c1 > 0)) {
        const min = deleteMin(mid);
        return joinMid3(left, min.key, min.value, min.result, key2, value2, right);
      }
      const c2 = compare(key, key2);
      if (c2 < 0) {
        const r = deleteFrom(mid, key, compare);
        return unchanged(r, mid) ? absorbed(tree) : joinMid3(left, key1, value1, r, key2, value2, right);
      }
      if (c2 > 0) {
        const r = deleteFrom(right, key, compare);
        return unchanged(r, right) ? absorbed(tree) : joinRight3(left, key1, value1, mid, key2, value2, r);
      }
      const min = deleteMin(right);
      return joinRight3(left, key1, value1, mid, min.key, min.value, min.result);
    }
  }
}

/**
 * Removes the lowest pair of a non-empty subtree, rebalancing along the
 * left spine exactly as `deleteFrom` does.
 */
export function deleteMin<K,V>(tree: Tree<K,V>): MinExtraction<K,V> {
  switch (tree.kind) {
    case 'leaf':
      return fail('deleteMin was called on an empty subtree');

    case 'node2': {
      if (tree.left.kind === 'leaf')
        return { key: tree.key, value: tree.value, result: underflow(Leaf) };
      const min = deleteMin(tree.left);
      return { key: min.key, value: min.value, result: joinLeft2(min.result, tree.key, tree.value, tree.right) };
    }

    case 'node3': {
      const { left, key1, value1, mid, key2, value2, right } = tree;
      if (left.kind === 'leaf')
        return { key: key1, value: value1, result: absorbed(node2(Leaf, key2, value2, Leaf)) };
      const min = deleteMin(left);
      return { key: min.key, value: min.value, result: joinLeft3(min.result, key1, value1, mid, key2, value2, right) };
    }
  }
}

/** Returns a new root without `key`. Only here can the tree get shorter. */
export function remove<K,V>(tree: Tree<K,V>, key: K, compare: Comparator<K>): Tree<K,V> {
  const r = deleteFrom(tree, key, compare);
  switch (r.kind) {
    case 'absorbed':  return r.tree;
    case 'underflow': return r.tree;
  }
}

function unchanged<K,V>(r: DeleteResult<K,V>, child: Tree<K,V>): boolean {
  return r.kind === 'absorbed' && r.tree === child;
}

function matches<K>(key: K, stored: K, compare: Comparator<K>): boolean {
  const c = compare(key, stored);
  return !(c < 0 || c > 0);
}

function unbalanced(): never {
  return fail('an underflowing subtree has a leaf as its sibling; the tree is unbalanced');
}

/////////////////////////////////////////////////////////////////////////////
// Rebalancing //////////////////////////////////////////////////////////////
//
// Each join rebuilds a parent after one child came back from a deletion.
// An underflowing child d is repaired with a neighbouring sibling: a 3-node
// sibling gives up a key and a child (rotation); a 2-node sibling is merged
// with d and the separator into a 3-node (merge). A merge empties a 2-node
// parent, so it underflows in turn; a 3-node parent becomes a 2-node.

// Node2 parent, left child changed; the sibling is on the right.
function joinLeft2<K,V>(r: DeleteResult<K,V>, k: K, v: V, right: Tree<K,V>): DeleteResult<K,V> {
  if (r.kind === 'absorbed')
    return absorbed(node2(r.tree, k, v, right));
  const d = r.tree;
  switch (right.kind) {
    case 'node3':
      return absorbed(node2(node2(d, k, v, right.left), right.key1, right.value1,
                            node2(right.mid, right.key2, right.value2, right.right)));
    case 'node2':
      return underflow(node3(d, k, v, right.left, right.key, right.value, right.right));
    case 'leaf':
      return unbalanced();
  }
}

// Node2 parent, right child changed; the sibling is on the left.
function joinRight2<K,V>(left: Tree<K,V>, k: K, v: V, r: DeleteResult<K,V>): DeleteResult<K,V> {
  if (r.kind === 'absorbed')
    return absorbed(node2(left, k, v, r.tree));
  const d = r.tree;
  switch (left.kind) {
    case 'node3':
      return absorbed(node2(node2(left.left, left.key1, left.value1, left.mid), left.key2, left.value2,
                            node2(left.right, k, v, d)));
    case 'node2':
      return underflow(node3(left.left, left.key, left.value, left.right, k, v, d));
    case 'leaf':
      return unbalanced();
  }
}

// Node3 parent, left child changed; the sibling is the middle child.
function joinLeft3<K,V>(r: DeleteResult<K,V>, k1: K, v1: V, mid: Tree<K,V>,
                        k2: K, v2: V, right: Tree<K,V>): DeleteResult<K,V> {
  if (r.kind === 'absorbed')
    return absorbed(node3(r.tree, k1, v1, mid, k2, v2, right));
  const d = r.tree;
  switch (mid.kind) {
    case 'node3':
      return absorbed(node3(node2(d, k1, v1, mid.left), mid.key1, mid.value1,
                            node2(mid.mid, mid.key2, mid.value2, mid.right), k2, v2, right));
    case 'node2':
      return absorbed(node2(node3(d, k1, v1, mid.left, mid.key, mid.value, mid.right), k2, v2, right));
    case 'leaf':
      return unbalanced();
  }
}

// Node3 parent, middle child changed; the sibling is the left child.
function joinMid3<K,V>(left: Tree<K,V>, k1: K, v1: V, r: DeleteResult<K,V>,
                       k2: K, v2: V, right: Tree<K,V>): DeleteResult<K,V> {
  if (r.kind === 'absorbed')
    return absorbed(node3(left, k1, v1, r.tree, k2, v2, right));
  const d = r.tree;
  switch (left.kind) {
    case 'node3':
      return absorbed(node3(node2(left.left, left.key1, left.value1, left.mid), left.key2, left.value2,
                            node2(left.right, k1, v1, d), k2, v2, right));
    case 'node2':
      return absorbed(node2(node3(left.left, left.key, left.value, left.right, k1, v1, d), k2, v2, right));
    case 'leaf':
      return unbalanced();
  }
}

// Node3 parent, right child changed; the sibling is the middle child.
function joinRight3<K,V>(left: Tree<K,V>, k1: K, v1: V, mid: Tree<K,V>,
                         k2: K, v2: V, r: DeleteResult<K,V>): DeleteResult<K,V> {
  if (r.kind === 'absorbed')
    return absorbed(node3(left, k1, v1, mid, k2, v2, r.tree));
  const d = r.tree;
  switch (mid.kind) {
    case 'node3':
      return absorbed(node3(left, k1, v1, node2(mid.left, mid.key1, mid.value1, mid.mid), mid.key2, mid.value2,
                            node2(mid.right, k2, v2, d)));
    case 'node2':
      return absorbed(node2(left, k1, v1, node3(mid.left, mid.key, mid.value, mid.right, k2, v2, d)));
    case 'leaf':
      return unbalanced();
  }
}
