/**
 * node.ts - A single vertex of a Trie
 *
 * Each node knows its key, its parent and whether an inserted sequence ends
 * on it. Children live in a Map keyed by child key that is only allocated
 * while the node has at least one child.
 *
 * The parent link is a plain back reference used to rebuild paths and to
 * prune upward after a removal. Ownership runs strictly downward, through
 * the children map.
 */

import { inspect } from 'node:util';

export class TrieNode<K> {
  readonly key: K;
  readonly parent: TrieNode<K> | null;
  isLeaf: boolean;
  private children: Map<K, TrieNode<K>> | null = null;

  constructor(key: K, parent: TrieNode<K> | null, isLeaf: boolean = false) {
    this.key = key;
    this.parent = parent;
    this.isLeaf = isLeaf;
  }

  /**
   * Get the child under `key`, creating a non-leaf child if there is none.
   */
  child(key: K): TrieNode<K> {
    if (this.children === null) {
      this.children = new Map();
    }
    let node = this.children.get(key);
    if (node === undefined) {
      node = new TrieNode(key, this);
      this.children.set(key, node);
    }
    return node;
  }

  /**
   * Get the child under `key` without creating it.
   */
  getChild(key: K): TrieNode<K> | undefined {
    return this.children?.get(key);
  }

  hasChild(key: K): boolean {
    return this.children !== null && this.children.has(key);
  }

  /**
   * Drop the child under `key`. Missing keys are ignored. The children map
   * is released once it is empty.
   */
  removeChild(key: K): void {
    if (this.children === null) return;
    this.children.delete(key);
    if (this.children.size === 0) {
      this.children = null;
    }
  }

  get isEmpty(): boolean {
    return this.children === null;
  }

  get isRoot(): boolean {
    return this.parent === null;
  }

  /**
   * False for a node that has lost every reason to be in the tree: not a
   * leaf, no children, and not the root. Such nodes get pruned.
   */
  get shouldExist(): boolean {
    return this.isLeaf || !this.isEmpty || this.isRoot;
  }

  get childCount(): number {
    return this.children === null ? 0 : this.children.size;
  }

  /** Child keys in insertion order. */
  get childKeys(): K[] {
    return this.children === null ? [] : Array.from(this.children.keys());
  }

  /** Keys from the root down to this node, root first. */
  get hierarchy(): K[] {
    const keys: K[] = [];
    for (let node: TrieNode<K> | null = this; node !== null; node = node.parent) {
      keys.push(node.key);
    }
    return keys.reverse();
  }

  /** The key, followed by '*' on a leaf. */
  toString(): string {
    const label = inspect(this.key);
    return this.isLeaf ? `${label}*` : label;
  }
}
