import type { Comparator, InsertResult, Tree } from '../core/types';
import { Leaf, absorbed, node2, node3, overflow } from './nodes';

/**
 * Inserts or overwrites a pair below `tree`. The result either has the same
 * height as `tree` (absorbed) or is an overflow one level taller, which the
 * caller must take in. An equal key stops the descent: the key and value are
 * replaced and everything below that node is reused as is.
 */
export function insertInto<K,V>(tree: Tree<K,V>, key: K, value: V, compare: Comparator<K>): InsertResult<K,V> {
  switch (tree.kind) {
    case 'leaf':
      return overflow(Leaf, key, value, Leaf);

    case 'node2': {
      const { left, right } = tree;
      const c = compare(key, tree.key);
      if (c < 0) {
        const r = insertInto(left, key, value, compare);
        switch (r.kind) {
          case 'absorbed': return absorbed(node2(r.tree, tree.key, tree.value, right));
          case 'overflow': return absorbed(node3(r.left, r.key, r.value, r.right, tree.key, tree.value, right));
        }
      }
      if (c > 0) {
        const r = insertInto(right, key, value, compare);
        switch (r.kind) {
          case 'absorbed': return absorbed(node2(left, tree.key, tree.value, r.tree));
          case 'overflow': return absorbed(node3(left, tree.key, tree.value, r.left, r.key, r.value, r.right));
        }
      }
      return absorbed(node2(left, key, value, right));
    }

    case 'node3': {
      const { left, key1, value1, mid, key2, value2, right } = tree;
      const c1 = compare(key, key1);
      if (c1 < 0) {
        const r = insertInto(left, key, value, compare);
        switch (r.kind) {
          case 'absorbed': return absorbed(node3(r.tree, key1, value1, mid, key2, value2, right));
          // a 3-node has no room for a third key: split and promote key1
          case 'overflow': return overflow(node2(r.left, r.key, r.value, r.right), key1, value1, node2(mid, key2, value2, right));
        }
      }
      if (!(c1 > 0))
        return absorbed(node3(left, key, value, mid, key2, value2, right));

      const c2 = compare(key, key2);
      if (c2 < 0) {
        const r = insertInto(mid, key, value, compare);
        switch (r.kind) {
          case 'absorbed': return absorbed(node3(left, key1, value1, r.tree, key2, value2, right));
          case 'overflow': return overflow(node2(left, key1, value1, r.left), r.key, r.value, node2(r.right, key2, value2, right));
        }
      }
      if (c2 > 0) {
        const r = insertInto(right, key, value, compare);
        switch (r.kind) {
          case 'absorbed': return absorbed(node3(left, key1, value1, mid, key2, value2, r.tree));
          case 'overflow': return overflow(node2(left, key1, value1, mid), key2, value2, node2(r.left, r.key, r.value, r.right));
        }
      }
      return absorbed(node3(left, key1, value1, mid, key, value, right));
    }
  }
}

/** Returns a new root holding the pair. Only here can the tree grow taller. */
export function insert<K,V>(tree: Tree<K,V>, key: K, value: V, compare: Comparator<K>): Tree<K,V> {
  const r = insertInto(tree, key, value, compare);
  switch (r.kind) {
    case 'absorbed': return r.tree;
    case 'overflow': return node2(r.left, r.key, r.value, r.right);
  }
}
