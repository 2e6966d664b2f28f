import type { Comparator, Tree } from '../core/types';

/**
 * Finds a key and returns the stored pair. The stored key is returned too
 * because it may be a different object that merely compares equal.
 * @description Complexity: O(height)
 */
export function lookupPair<K,V>(tree: Tree<K,V>, key: K, compare: Comparator<K>): [K,V] | undefined {
  let node = tree;
  for (;;) {
    switch (node.kind) {
      case 'leaf':
        return undefined;
      case 'node2': {
        const c = compare(key, node.key);
        if (c < 0)
          node = node.left;
        else if (c > 0)
          node = node.right;
        else
          return [node.key, node.value];
        break;
      }
      case 'node3': {
        const c1 = compare(key, node.key1);
        if (c1 < 0) {
          node = node.left;
          break;
        }
        if (!(c1 > 0))
          return [node.key1, node.value1];
        const c2 = compare(key, node.key2);
        if (c2 < 0)
          node = node.mid;
        else if (c2 > 0)
          node = node.right;
        else
          return [node.key2, node.value2];
        break;
      }
    }
  }
}

/** Returns the value associated with a key, or undefined if the key is absent. */
export function lookup<K,V>(tree: Tree<K,V>, key: K, compare: Comparator<K>): V | undefined {
  const pair = lookupPair(tree, key, compare);
  return pair === undefined ? undefined : pair[1];
}
