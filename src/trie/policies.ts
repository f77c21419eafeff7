/**
 * policies.ts - Sorter and joiner strategies for trie iteration
 *
 * A sorter decides the order (and may filter the set) of a node's children
 * during traversal. A joiner turns the keys on a root-to-leaf path, root key
 * included, into the value yielded for that leaf.
 */

import * as path from 'node:path';

/** Orders or filters the child keys of a node. */
export type Sorter<K> = (keys: K[]) => Iterable<K>;

/** Builds the emitted value from the keys on a root-to-leaf path. */
export type Joiner<K, T> = (keys: readonly K[]) => T;

/**
 * Leaves keys in insertion order.
 */
export function identitySorter<K>(keys: K[]): Iterable<K> {
  return keys;
}

/**
 * Sorts string keys in ascending code unit order. Returns a copy.
 */
export function lexicographicSorter(keys: string[]): Iterable<string> {
  return [...keys].sort();
}

/**
 * Yields the raw key path as an array.
 */
export function tupleJoiner<K>(keys: readonly K[]): K[] {
  return [...keys];
}

/**
 * Concatenates string keys. The root key of a string trie is '' so it
 * drops out of the result.
 */
export function stringJoiner(keys: readonly string[]): string {
  return keys.join('');
}

/**
 * Rebuilds a filesystem path from `[root, ...segments]`.
 *
 * An absolute first segment ('/', 'C:\\') loses its trailing separators so
 * that joining does not double them up. A path with no segments at all is
 * the bare root.
 */
export function pathJoiner(keys: readonly string[]): string {
  if (keys.length < 2) {
    return path.sep;
  }
  const [, first, ...rest] = keys;
  if (path.isAbsolute(first)) {
    const head = stripTrailingSeparators(first);
    if (rest.length === 0) {
      return head === '' ? path.sep : head;
    }
    return [head, ...rest].join(path.sep);
  }
  return [first, ...rest].join(path.sep);
}

function stripTrailingSeparators(segment: string): string {
  let end = segment.length;
  while (end > 0 && (segment[end - 1] === path.sep || segment[end - 1] === '/')) {
    end--;
  }
  return segment.slice(0, end);
}
