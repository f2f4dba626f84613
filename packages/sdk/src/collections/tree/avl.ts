/**
 * AVL tree over an index arena
 *
 * Nodes live in an arena (a FreeList in production) and refer to their children
 * by slot index, so every structural change is a sequence of slot writes. Nodes
 * are never mutated in place: each change writes a fresh node object.
 *
 * Invariants after every insertNode/removeNode:
 * - in-order traversal yields keys in strictly increasing comparator order
 * - every node's stored height is 1 + max(child heights), leaves have height 1
 * - the heights of a node's two subtrees differ by at most 1
 */

import type { Comparator, Direction } from "../../types.js";
import { InconsistentStateError } from "../../errors.js";

export interface TreeNode<K> {
  key: K;
  left: number | null;
  right: number | null;
  height: number;
}

/**
 * Slot storage the tree allocates nodes from
 */
export interface NodeArena<K> {
  get(index: number): TreeNode<K> | undefined;
  replace(index: number, node: TreeNode<K>): TreeNode<K>;
  insert(node: TreeNode<K>): number;
  remove(index: number): TreeNode<K> | undefined;
  /** Number of live nodes */
  len(): number;
}

export interface TreeContext<K> {
  arena: NodeArena<K>;
  compare: Comparator<K>;
}

export interface KeyBounds<K> {
  from?: K;
  to?: K;
  fromInclusive: boolean;
  toInclusive: boolean;
}

export interface AvlReport {
  height: number;
  size: number;
}

function nodeAt<K>(arena: NodeArena<K>, index: number): TreeNode<K> {
  const node = arena.get(index);
  if (!node) {
    throw new InconsistentStateError(`tree node ${index} is missing`);
  }
  return node;
}

function heightOf<K>(arena: NodeArena<K>, index: number | null): number {
  return index === null ? 0 : nodeAt(arena, index).height;
}

function makeNode<K>(
  arena: NodeArena<K>,
  key: K,
  left: number | null,
  right: number | null
): TreeNode<K> {
  return { key, left, right, height: 1 + Math.max(heightOf(arena, left), heightOf(arena, right)) };
}

function requireChild(index: number | null, parent: number): number {
  if (index === null) {
    throw new InconsistentStateError(`tree node ${parent} is unbalanced toward a missing child`);
  }
  return index;
}

function rotateRight<K>(arena: NodeArena<K>, index: number): number {
  const node = nodeAt(arena, index);
  const pivot = requireChild(node.left, index);
  const pivotNode = nodeAt(arena, pivot);

  arena.replace(index, makeNode(arena, node.key, pivotNode.right, node.right));
  arena.replace(pivot, makeNode(arena, pivotNode.key, pivotNode.left, index));
  return pivot;
}

function rotateLeft<K>(arena: NodeArena<K>, index: number): number {
  const node = nodeAt(arena, index);
  const pivot = requireChild(node.right, index);
  const pivotNode = nodeAt(arena, pivot);

  arena.replace(index, makeNode(arena, node.key, node.left, pivotNode.left));
  arena.replace(pivot, makeNode(arena, pivotNode.key, index, pivotNode.right));
  return pivot;
}

/**
 * Restore the height and balance of a node whose subtrees are already balanced
 * @returns Index of the subtree's new root
 */
function rebalance<K>(arena: NodeArena<K>, index: number): number {
  const node = nodeAt(arena, index);
  const balance = heightOf(arena, node.left) - heightOf(arena, node.right);

  if (balance > 1) {
    const left = requireChild(node.left, index);
    const leftNode = nodeAt(arena, left);
    if (heightOf(arena, leftNode.left) < heightOf(arena, leftNode.right)) {
      arena.replace(index, makeNode(arena, node.key, rotateLeft(arena, left), node.right));
    }
    return rotateRight(arena, index);
  }

  if (balance < -1) {
    const right = requireChild(node.right, index);
    const rightNode = nodeAt(arena, right);
    if (heightOf(arena, rightNode.right) < heightOf(arena, rightNode.left)) {
      arena.replace(index, makeNode(arena, node.key, node.left, rotateRight(arena, right)));
    }
    return rotateLeft(arena, index);
  }

  const fixed = makeNode(arena, node.key, node.left, node.right);
  if (fixed.height !== node.height) {
    arena.replace(index, fixed);
  }
  return index;
}

/**
 * Insert a key; an existing equal key leaves the tree untouched
 * @returns The new root and whether a node was added
 */
export function insertNode<K>(
  ctx: TreeContext<K>,
  root: number | null,
  key: K
): { root: number; inserted: boolean } {
  const { arena, compare } = ctx;
  let inserted = false;

  const insertAt = (index: number | null): number => {
    if (index === null) {
      inserted = true;
      return arena.insert({ key, left: null, right: null, height: 1 });
    }

    const node = nodeAt(arena, index);
    const order = compare(key, node.key);
    if (order === 0) return index;

    if (order < 0) {
      const left = insertAt(node.left);
      if (left !== node.left) arena.replace(index, makeNode(arena, node.key, left, node.right));
    } else {
      const right = insertAt(node.right);
      if (right !== node.right) arena.replace(index, makeNode(arena, node.key, node.left, right));
    }
    return rebalance(arena, index);
  };

  const newRoot = insertAt(root);
  return { root: newRoot, inserted };
}

/**
 * Remove a key. A node with two children takes its in-order successor's key,
 * and the successor's node is freed instead.
 * @returns The new root (null when the tree becomes empty) and whether a key was removed
 */
export function removeNode<K>(
  ctx: TreeContext<K>,
  root: number | null,
  key: K
): { root: number | null; removed: boolean } {
  const { arena, compare } = ctx;
  let removed = false;

  const removeAt = (index: number | null, target: K): number | null => {
    if (index === null) return null;

    const node = nodeAt(arena, index);
    const order = compare(target, node.key);

    if (order < 0) {
      const left = removeAt(node.left, target);
      if (left !== node.left) arena.replace(index, makeNode(arena, node.key, left, node.right));
      return rebalance(arena, index);
    }
    if (order > 0) {
      const right = removeAt(node.right, target);
      if (right !== node.right) arena.replace(index, makeNode(arena, node.key, node.left, right));
      return rebalance(arena, index);
    }

    removed = true;
    if (node.left === null || node.right === null) {
      arena.remove(index);
      return node.left ?? node.right;
    }

    const successor = nodeAt(arena, extremeIndex(arena, node.right, "min")).key;
    const right = removeAt(node.right, successor);
    arena.replace(index, makeNode(arena, successor, node.left, right));
    return rebalance(arena, index);
  };

  const newRoot = removeAt(root, key);
  return { root: newRoot, removed };
}

function extremeIndex<K>(arena: NodeArena<K>, index: number, side: "min" | "max"): number {
  let current = index;
  for (;;) {
    const node = nodeAt(arena, current);
    const next = side === "min" ? node.left : node.right;
    if (next === null) return current;
    current = next;
  }
}

export function findNode<K>(ctx: TreeContext<K>, root: number | null, key: K): number | null {
  let current = root;
  while (current !== null) {
    const node = nodeAt(ctx.arena, current);
    const order = ctx.compare(key, node.key);
    if (order === 0) return current;
    current = order < 0 ? node.left : node.right;
  }
  return null;
}

export function minKey<K>(arena: NodeArena<K>, root: number | null): K | undefined {
  return root === null ? undefined : nodeAt(arena, extremeIndex(arena, root, "min")).key;
}

export function maxKey<K>(arena: NodeArena<K>, root: number | null): K | undefined {
  return root === null ? undefined : nodeAt(arena, extremeIndex(arena, root, "max")).key;
}

/**
 * Nearest key on one side of `key`
 * - below: greatest key < key (or <= key when inclusive)
 * - above: least key > key (or >= key when inclusive)
 */
export function neighborKey<K>(
  ctx: TreeContext<K>,
  root: number | null,
  key: K,
  side: "below" | "above",
  inclusive: boolean
): K | undefined {
  let best: K | undefined;
  let current = root;

  while (current !== null) {
    const node = nodeAt(ctx.arena, current);
    const order = ctx.compare(key, node.key);
    if (order === 0 && inclusive) return node.key;

    if (side === "below") {
      if (order > 0) {
        best = node.key;
        current = node.right;
      } else {
        current = node.left;
      }
    } else if (order < 0) {
      best = node.key;
      current = node.left;
    } else {
      current = node.right;
    }
  }

  return best;
}

/**
 * In-order keys within bounds, pruning subtrees outside them
 *
 * Lazy: each step reads only the nodes on the current path. The tree must not
 * be modified while the walk is in progress.
 */
export function* walkKeys<K>(
  ctx: TreeContext<K>,
  root: number | null,
  bounds: KeyBounds<K>,
  direction: Direction
): Generator<K> {
  const { arena, compare } = ctx;

  const aboveLower = (key: K): boolean => {
    if (bounds.from === undefined) return true;
    const order = compare(key, bounds.from);
    return order > 0 || (order === 0 && bounds.fromInclusive);
  };
  const belowUpper = (key: K): boolean => {
    if (bounds.to === undefined) return true;
    const order = compare(key, bounds.to);
    return order < 0 || (order === 0 && bounds.toInclusive);
  };

  const forward = direction === "forward";
  const stack: TreeNode<K>[] = [];

  // Push the path toward the first in-range key of a subtree
  const descend = (start: number | null): void => {
    let current = start;
    while (current !== null) {
      const node = nodeAt(arena, current);
      if (forward ? aboveLower(node.key) : belowUpper(node.key)) {
        stack.push(node);
        current = forward ? node.left : node.right;
      } else {
        current = forward ? node.right : node.left;
      }
    }
  };

  descend(root);
  for (let node = stack.pop(); node !== undefined; node = stack.pop()) {
    if (!(forward ? belowUpper(node.key) : aboveLower(node.key))) return;
    yield node.key;
    descend(forward ? node.right : node.left);
  }
}

/**
 * Verify order, stored heights, balance and node count
 * @throws {InconsistentStateError} On the first violation found
 */
export function checkAvl<K>(ctx: TreeContext<K>, root: number | null): AvlReport {
  const { arena, compare } = ctx;
  const limit = arena.len();
  let size = 0;

  const check = (
    index: number | null,
    lower: { key: K } | null,
    upper: { key: K } | null
  ): number => {
    if (index === null) return 0;

    size++;
    if (size > limit) {
      throw new InconsistentStateError(`tree reaches more than ${limit} node(s)`);
    }

    const node = nodeAt(arena, index);
    if (lower && compare(node.key, lower.key) <= 0) {
      throw new InconsistentStateError(`tree node ${index} is not above its lower bound`);
    }
    if (upper && compare(node.key, upper.key) >= 0) {
      throw new InconsistentStateError(`tree node ${index} is not below its upper bound`);
    }

    const leftHeight = check(node.left, lower, { key: node.key });
    const rightHeight = check(node.right, { key: node.key }, upper);

    if (node.height !== 1 + Math.max(leftHeight, rightHeight)) {
      throw new InconsistentStateError(
        `tree node ${index} stores height ${node.height}, expected ${1 + Math.max(leftHeight, rightHeight)}`
      );
    }
    if (Math.abs(leftHeight - rightHeight) > 1) {
      throw new InconsistentStateError(
        `tree node ${index} has balance factor ${leftHeight - rightHeight}`
      );
    }
    return node.height;
  };

  const height = check(root, null, null);
  if (size !== limit) {
    throw new InconsistentStateError(`tree reaches ${size} node(s) but the arena holds ${limit}`);
  }
  return { height, size };
}
