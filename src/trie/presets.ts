/**
 * presets.ts - Ready-made tries for strings and filesystem paths
 */

import * as path from 'node:path';
import { Trie } from './trie.js';
import { lexicographicSorter, pathJoiner, stringJoiner } from './policies.js';
import type { Joiner, Sorter } from './policies.js';

/**
 * Trie of strings, one node per character (code point). Iterates in
 * lexicographic order and yields whole strings.
 *
 * Usage:
 *   const words = stringTrie();
 *   words.add('card');
 *   words.contains('card'); // true
 *   [...words];             // ['card']
 */
export function stringTrie(): Trie<string, string> {
  return new Trie<string, string>({
    empty: '',
    sorter: lexicographicSorter,
    joiner: stringJoiner,
  });
}

export interface PathTrieOptions {
  /** Child ordering; defaults to lexicographic, which is case sensitive. */
  sorter?: Sorter<string>;
  joiner?: Joiner<string, string>;
}

/**
 * Trie of filesystem paths, one node per path segment. Relative and
 * absolute paths can live in the same trie; store them with
 * {@link pathSegments} so the joiner can tell them apart.
 */
export function pathTrie(options: PathTrieOptions = {}): Trie<string, string> {
  return new Trie<string, string>({
    empty: '',
    sorter: options.sorter ?? lexicographicSorter,
    joiner: options.joiner ?? pathJoiner,
  });
}

/**
 * Split a path into trie segments. An absolute path keeps its root
 * ('/' or 'C:\\') as the first segment; empty segments are dropped.
 *
 * @example pathSegments('/usr/lib') // ['/', 'usr', 'lib']
 */
export function pathSegments(filePath: string): string[] {
  const { root } = path.parse(filePath);
  const separators = path.sep === '/' ? /\/+/ : /[\\/]+/;
  const rest = filePath.slice(root.length).split(separators).filter(segment => segment !== '');
  return root === '' ? rest : [root, ...rest];
}
