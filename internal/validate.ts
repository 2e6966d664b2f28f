import type { Comparator, Tree } from '../core/types';
import { check, fail } from './assert';

/**
 * Scans the tree for broken invariants and throws if one is found: keys out
 * of order or outside the range their separators allow, or leaves at
 * different depths. Arity needs no test since a node is a Node2 or a Node3
 * by construction.
 * @returns the number of pairs in the tree.
 * @description Complexity: O(size)
 */
export function checkValid<K,V>(tree: Tree<K,V>, compare: Comparator<K>): number {
  let leafDepth = -1;

  // low and high are boxed because undefined can be a key
  const inRange = (key: K, depth: number, low: [K] | undefined, high: [K] | undefined) => {
    if (low !== undefined && !(compare(low[0], key) < 0))
      fail("sort violation at depth", depth, ": key", key, "is not above separator", low[0]);
    if (high !== undefined && !(compare(key, high[0]) < 0))
      fail("sort violation at depth", depth, ": key", key, "is not below separator", high[0]);
  };

  const walk = (node: Tree<K,V>, depth: number, low: [K] | undefined, high: [K] | undefined): number => {
    switch (node.kind) {
      case 'leaf':
        if (leafDepth < 0)
          leafDepth = depth;
        check(depth === leafDepth, "leaf at depth", depth, "but another leaf is at depth", leafDepth);
        return 0;
      case 'node2':
        inRange(node.key, depth, low, high);
        return walk(node.left, depth + 1, low, [node.key]) + 1 +
               walk(node.right, depth + 1, [node.key], high);
      case 'node3':
        inRange(node.key1, depth, low, high);
        inRange(node.key2, depth, [node.key1], high);
        return walk(node.left, depth + 1, low, [node.key1]) + 1 +
               walk(node.mid, depth + 1, [node.key1], [node.key2]) + 1 +
               walk(node.right, depth + 1, [node.key2], high);
      default:
        return fail("unknown node kind at depth", depth);
    }
  };

  return walk(tree, 0, undefined, undefined);
}
