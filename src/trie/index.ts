/**
 * trie/index.ts - Prefix tree over sequences of keys
 *
 * Usage:
 *   import { Trie, stringTrie, pathTrie, pathSegments } from './trie/index.js';
 *
 *   const keys = Trie.tuples('');
 *   keys.add(['server', 'port']);
 *   keys.contains(['server', 'port']); // true
 *
 *   const paths = pathTrie();
 *   paths.add(pathSegments('/usr/lib'));
 *   [...paths]; // ['/usr/lib']
 */

export { TrieNode } from './node.js';
export { Trie } from './trie.js';
export type { TrieOptions, IterOptions } from './trie.js';

export {
  identitySorter,
  lexicographicSorter,
  tupleJoiner,
  stringJoiner,
  pathJoiner,
} from './policies.js';
export type { Sorter, Joiner } from './policies.js';

export { stringTrie, pathTrie, pathSegments } from './presets.js';
export type { PathTrieOptions } from './presets.js';
