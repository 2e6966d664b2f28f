import type { BreakResult, Tree } from '../core/types';
import { node2, node3 } from './nodes';

/** Gets all pairs of the tree in ascending key order. */
export function inOrder<K,V>(tree: Tree<K,V>): [K,V][] {
  const results: [K,V][] = [];
  forEachPair(tree, (k, v) => { results.push([k, v]); });
  return results;
}

/**
 * Sends every pair to `onFound` in ascending key order.
 * @param onFound may return {break:R} (R not undefined) to stop immediately.
 * @param initialCounter first value of the callback's `counter` argument.
 * @returns the number of pairs visited plus initialCounter, or R if the
 *          callback returned {break:R}.
 */
export function forEachPair<K,V,R=number>(tree: Tree<K,V>,
  onFound: (k: K, v: V, counter: number) => BreakResult<R> | void, initialCounter = 0): R | number
{
  let counter = initialCounter;
  const visit = (k: K, v: V): BreakResult<R> | undefined => {
    const result = onFound(k, v, counter++);
    if (result && result.break !== undefined)
      return result;
    return undefined;
  };
  // yields the callback's {break:R} if it asked to stop
  const walk = (node: Tree<K,V>): BreakResult<R> | undefined => {
    switch (node.kind) {
      case 'leaf':
        return undefined;
      case 'node2':
        return walk(node.left) || visit(node.key, node.value) || walk(node.right);
      case 'node3':
        return walk(node.left) || visit(node.key1, node.value1) || walk(node.mid) ||
               visit(node.key2, node.value2) || walk(node.right);
    }
  };
  const stopped = walk(tree);
  if (stopped !== undefined && stopped.break !== undefined)
    return stopped.break;
  return counter;
}

/** Lazily yields the pairs of the tree in ascending key order. */
export function* pairsOf<K,V>(tree: Tree<K,V>): IterableIterator<[K,V]> {
  switch (tree.kind) {
    case 'leaf':
      return;
    case 'node2':
      yield* pairsOf(tree.left);
      yield [tree.key, tree.value];
      yield* pairsOf(tree.right);
      return;
    case 'node3':
      yield* pairsOf(tree.left);
      yield [tree.key1, tree.value1];
      yield* pairsOf(tree.mid);
      yield [tree.key2, tree.value2];
      yield* pairsOf(tree.right);
      return;
  }
}

/** Same shape, every value passed through `callback` in key order. */
export function mapTree<K,V,R>(tree: Tree<K,V>, callback: (v: V, k: K, counter: number) => R): Tree<K,R> {
  let counter = 0;
  const map = (node: Tree<K,V>): Tree<K,R> => {
    switch (node.kind) {
      case 'leaf':
        return node;
      case 'node2': {
        const left = map(node.left);
        const value = callback(node.value, node.key, counter++);
        return node2(left, node.key, value, map(node.right));
      }
      case 'node3': {
        const left = map(node.left);
        const value1 = callback(node.value1, node.key1, counter++);
        const mid = map(node.mid);
        const value2 = callback(node.value2, node.key2, counter++);
        return node3(left, node.key1, value1, mid, node.key2, value2, map(node.right));
      }
    }
  };
  return map(tree);
}
