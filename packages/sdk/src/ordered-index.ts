/**
 * Ordered index: an unbalanced binary search tree with a comparison counter
 *
 * Invariants:
 * - At most one node per key (insert is an upsert)
 * - Every node exclusively owns its children; there are no parent links
 * - `comparisons` only moves forward, except through `resetMetrics()`
 * - Erasing a node with two children promotes its in-order successor
 *
 * The tree never rebalances. Depth follows insertion order, so sorted input
 * produces a linked list and the counter makes that cost visible.
 */

import type { Comparator, RangeVisitor } from "./types.js";

/**
 * Keys that JavaScript's relational operators already order totally
 */
export type NaturalKey = number | string | bigint;

/**
 * Comparator for numbers, bigints and strings (UTF-16 code unit order)
 */
export function naturalOrder<K extends NaturalKey>(a: K, b: K): number {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}

interface BstNode<K, V> {
  key: K;
  value: V;
  left?: BstNode<K, V>;
  right?: BstNode<K, V>;
}

interface RangeFrame<K, V> {
  node: BstNode<K, V>;
  inRange: boolean;
  descendRight: boolean;
}

export class OrderedIndex<K, V> {
  #root: BstNode<K, V> | undefined;
  #size = 0;
  #comparisons = 0;
  readonly #compare: Comparator<K>;

  constructor(compare: Comparator<K>) {
    this.#compare = compare;
  }

  /**
   * Create an index over numbers, bigints or strings using natural order
   */
  static natural<K extends NaturalKey, V>(): OrderedIndex<K, V> {
    return new OrderedIndex<K, V>(naturalOrder);
  }

  /**
   * Key comparisons performed since the last `resetMetrics()`
   */
  get comparisons(): number {
    return this.#comparisons;
  }

  /**
   * Number of keys in the index
   */
  get size(): number {
    return this.#size;
  }

  resetMetrics(): void {
    this.#comparisons = 0;
  }

  /**
   * Insert a key, or replace the value of an existing key in place
   */
  insert(key: K, value: V): void {
    let parent: BstNode<K, V> | undefined;
    let node = this.#root;
    let cmp = 0;

    while (node) {
      cmp = this.#cmp(key, node.key);
      if (cmp === 0) {
        node.value = value;
        return;
      }
      parent = node;
      node = cmp < 0 ? node.left : node.right;
    }

    const leaf: BstNode<K, V> = { key, value };
    if (!parent) {
      this.#root = leaf;
    } else if (cmp < 0) {
      parent.left = leaf;
    } else {
      parent.right = leaf;
    }
    this.#size++;
  }

  /**
   * Look up a key. Object values are returned by reference, so callers may
   * mutate them in place (the last-name index appends to its buckets this way).
   */
  find(key: K): V | undefined {
    let node = this.#root;
    while (node) {
      const cmp = this.#cmp(key, node.key);
      if (cmp === 0) return node.value;
      node = cmp < 0 ? node.left : node.right;
    }
    return undefined;
  }

  /**
   * Remove a key
   * @returns false when the key is absent
   */
  erase(key: K): boolean {
    let parent: BstNode<K, V> | undefined;
    let node = this.#root;

    while (node) {
      const cmp = this.#cmp(key, node.key);
      if (cmp === 0) break;
      parent = node;
      node = cmp < 0 ? node.left : node.right;
    }
    if (!node) return false;

    const { left, right } = node;
    if (left && right) {
      // Leftmost node of the right subtree; reached without comparing keys
      let successorParent: BstNode<K, V> = node;
      let successor: BstNode<K, V> = right;
      while (successor.left) {
        successorParent = successor;
        successor = successor.left;
      }

      node.key = successor.key;
      node.value = successor.value;

      // The successor has no left child, so it unlinks by the one-child rule
      if (successorParent === node) {
        successorParent.right = successor.right;
      } else {
        successorParent.left = successor.right;
      }
    } else {
      this.#relink(parent, node, left ?? right);
    }

    this.#size--;
    return true;
  }

  /**
   * Visit every key in [lo, hi] in ascending order.
   *
   * Each visited node costs two comparisons (against `lo` and `hi`). Left
   * subtrees are skipped once a key is at or below `lo`, right subtrees once
   * a key is at or above `hi`.
   */
  rangeApply(lo: K, hi: K, visit: RangeVisitor<K, V>): void {
    const pending: Array<RangeFrame<K, V>> = [];
    let node = this.#root;

    for (;;) {
      while (node) {
        const fromLo = this.#cmp(node.key, lo);
        const toHi = this.#cmp(node.key, hi);
        pending.push({ node, inRange: fromLo >= 0 && toHi <= 0, descendRight: toHi < 0 });
        node = fromLo > 0 ? node.left : undefined;
      }

      const frame = pending.pop();
      if (!frame) return;

      if (frame.inRange) {
        visit(frame.node.key, frame.node.value);
      }
      node = frame.descendRight ? frame.node.right : undefined;
    }
  }

  /**
   * All keys in ascending order (uncounted)
   */
  keys(): K[] {
    const result: K[] = [];
    const pending: Array<BstNode<K, V>> = [];
    let node = this.#root;

    while (node || pending.length > 0) {
      while (node) {
        pending.push(node);
        node = node.left;
      }
      const next = pending.pop();
      if (!next) break;
      result.push(next.key);
      node = next.right;
    }
    return result;
  }

  /**
   * Number of nodes on the longest root-to-leaf path (uncounted)
   */
  height(): number {
    let level: Array<BstNode<K, V>> = this.#root ? [this.#root] : [];
    let height = 0;

    while (level.length > 0) {
      height++;
      const next: Array<BstNode<K, V>> = [];
      for (const node of level) {
        if (node.left) next.push(node.left);
        if (node.right) next.push(node.right);
      }
      level = next;
    }
    return height;
  }

  #cmp(a: K, b: K): number {
    this.#comparisons++;
    return this.#compare(a, b);
  }

  #relink(
    parent: BstNode<K, V> | undefined,
    node: BstNode<K, V>,
    child: BstNode<K, V> | undefined
  ): void {
    if (!parent) {
      this.#root = child;
    } else if (parent.left === node) {
      parent.left = child;
    } else {
      parent.right = child;
    }
  }
}
