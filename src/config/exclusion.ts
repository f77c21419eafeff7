/**
 * exclusion.ts - Key-path filters for configuration output
 *
 * An exclusion is either a top-level key ('password') or a list of keys
 * naming a nested entry (['database', 'password']).
 */

import { Trie } from '../trie/index.js';

export type ExcludeItem = string | readonly string[];

export type ExclusionTrie = Trie<string, string[]>;

export function makeExclusionTrie(items: Iterable<ExcludeItem>): ExclusionTrie {
  const trie = Trie.tuples('');
  for (const item of items) {
    trie.add(typeof item === 'string' ? [item] : item);
  }
  return trie;
}
