/**
 * trie.ts - General purpose prefix tree over sequences of keys
 *
 * Stores sequences (strings, path segments, key lists) so that shared
 * prefixes share nodes. Supports:
 * - add / remove / contains on whole sequences
 * - O(1) leaf count
 * - lazy depth-first or breadth-first iteration with pluggable
 *   sorter (child order) and joiner (emitted value)
 *
 * A leaf marks the end of an inserted sequence and may still have
 * children when one inserted sequence is a prefix of another. The root can
 * be a leaf too: adding the empty sequence marks it.
 *
 * Removal prunes bottom-up: after unmarking a leaf, every node on the way
 * up that is neither a leaf nor has children is detached from its parent.
 */

import { TrieNode } from './node.js';
import { identitySorter, tupleJoiner } from './policies.js';
import type { Joiner, Sorter } from './policies.js';

export interface TrieOptions<K, T> {
  /** Key of the root node, e.g. '' for string tries. */
  empty: K;
  /** Child ordering used by default iteration. Defaults to insertion order. */
  sorter?: Sorter<K>;
  /** Builds the value yielded for each leaf. */
  joiner: Joiner<K, T>;
}

export interface IterOptions<K, T> {
  sorter?: Sorter<K>;
  joiner?: Joiner<K, T>;
  /** Depth-first when true (the default), breadth-first otherwise. */
  depthFirst?: boolean;
}

export class Trie<K, T> implements Iterable<T> {
  readonly root: TrieNode<K>;
  readonly sorter: Sorter<K>;
  readonly joiner: Joiner<K, T>;
  private leafCount: number = 0;

  constructor(options: TrieOptions<K, T>) {
    this.root = new TrieNode(options.empty, null);
    this.sorter = options.sorter ?? identitySorter;
    this.joiner = options.joiner;
  }

  /**
   * Create a trie that yields each stored sequence as an array of keys,
   * root key first.
   */
  static tuples<K>(empty: K, sorter?: Sorter<K>): Trie<K, K[]> {
    return new Trie<K, K[]>({ empty, sorter, joiner: tupleJoiner });
  }

  /** Number of stored sequences (leaf nodes). */
  get size(): number {
    return this.leafCount;
  }

  /**
   * Add a sequence, creating nodes as needed.
   *
   * @returns true if a new leaf was marked, false if it was already present
   */
  add(item: Iterable<K>): boolean {
    let node = this.root;
    for (const key of item) {
      node = node.child(key);
    }
    if (node.isLeaf) {
      return false;
    }
    node.isLeaf = true;
    this.leafCount++;
    return true;
  }

  /**
   * Add several sequences.
   *
   * @returns Number of sequences that were not already present
   */
  addAll(items: Iterable<Iterable<K>>): number {
    let added = 0;
    for (const item of items) {
      if (this.add(item)) added++;
    }
    return added;
  }

  /**
   * Remove a sequence and prune the nodes that no longer lead to a leaf.
   *
   * @returns true if the sequence was present, false otherwise
   */
  remove(item: Iterable<K>): boolean {
    const found = this.find(item);
    if (found === undefined || !found.isLeaf) {
      return false;
    }

    found.isLeaf = false;
    this.leafCount--;

    let node = found;
    while (!node.shouldExist && node.parent !== null) {
      node.parent.removeChild(node.key);
      node = node.parent;
    }
    return true;
  }

  /**
   * Check whether a sequence was added. A node that only exists as the
   * prefix of longer sequences does not count.
   */
  contains(item: Iterable<K>): boolean {
    const node = this.find(item);
    return node !== undefined && node.isLeaf;
  }

  [Symbol.iterator](): Iterator<T> {
    return this.iter();
  }

  /**
   * Lazily walk the leaves, yielding `joiner(node.hierarchy)` for each.
   *
   * Depth-first order emits a leaf before its descendants. Breadth-first
   * order visits level by level. Within a node, children are visited in
   * the order returned by `sorter`. Every call starts a fresh traversal.
   */
  iter(options?: IterOptions<K, T>): Generator<T, void, undefined>;
  iter<U>(options: IterOptions<K, U> & { joiner: Joiner<K, U> }): Generator<U, void, undefined>;
  *iter<U>(options: IterOptions<K, T | U> = {}): Generator<T | U, void, undefined> {
    const sorter = options.sorter ?? this.sorter;
    const joiner: Joiner<K, T | U> = options.joiner ?? this.joiner;
    const nodes = options.depthFirst === false
      ? this.breadthFirst(sorter)
      : this.depthFirst(sorter);

    for (const node of nodes) {
      yield joiner(node.hierarchy);
    }
  }

  /**
   * Multi-line dump of the node structure, indented two spaces per level.
   */
  toString(): string {
    const lines: string[] = [`Trie(${this.leafCount})`, '  ' + this.root.toString()];
    const stack: { children: Iterator<TrieNode<K>>; indent: number }[] = [
      { children: this.sortedChildren(this.root, this.sorter), indent: 4 },
    ];
    while (stack.length > 0) {
      const frame = stack[stack.length - 1];
      const next = frame.children.next();
      if (next.done) {
        stack.pop();
        continue;
      }
      lines.push(' '.repeat(frame.indent) + next.value.toString());
      stack.push({ children: this.sortedChildren(next.value, this.sorter), indent: frame.indent + 2 });
    }
    return lines.join('\n');
  }

  private find(item: Iterable<K>): TrieNode<K> | undefined {
    let node = this.root;
    for (const key of item) {
      const next = node.getChild(key);
      if (next === undefined) {
        return undefined;
      }
      node = next;
    }
    return node;
  }

  // Explicit stack of child iterators, so deep sequences do not recurse.
  private *depthFirst(sorter: Sorter<K>): Generator<TrieNode<K>, void, undefined> {
    if (this.root.isLeaf) {
      yield this.root;
    }
    const stack: Iterator<TrieNode<K>>[] = [this.sortedChildren(this.root, sorter)];
    while (stack.length > 0) {
      const next = stack[stack.length - 1].next();
      if (next.done) {
        stack.pop();
        continue;
      }
      const node = next.value;
      if (node.isLeaf) {
        yield node;
      }
      stack.push(this.sortedChildren(node, sorter));
    }
  }

  private *breadthFirst(sorter: Sorter<K>): Generator<TrieNode<K>, void, undefined> {
    const queue: TrieNode<K>[] = [this.root];
    // head marks the front of the queue
    for (let head = 0; head < queue.length; head++) {
      const node = queue[head];
      if (node.isLeaf) {
        yield node;
      }
      for (const child of this.sortedChildren(node, sorter)) {
        queue.push(child);
      }
    }
  }

  // Keys the sorter returns that are not children are skipped.
  private *sortedChildren(node: TrieNode<K>, sorter: Sorter<K>): Generator<TrieNode<K>, void, undefined> {
    for (const key of sorter(node.childKeys)) {
      const child = node.getChild(key);
      if (child !== undefined) {
        yield child;
      }
    }
  }
}
