/**
 * TreeMap: LookupMap<K, V> + AVL tree of keys in a FreeList
 *
 * Layout:
 *   (prefix ++ "v") key -> value (sha256 key derivation unless told otherwise)
 *   (prefix ++ "n") free list of tree nodes
 *   prefix ++ 0xFF  root node index, absent when the map is empty
 */

import type {
  CacheStats,
  Codec,
  Direction,
  Flushable,
  FlushPlan,
  RangeOptions,
  StorageBackend,
  StorageKeyInput,
  TreeMapOptions,
} from "../types.js";
import { combineCacheStats } from "../cache.js";
import { InconsistentStateError } from "../errors.js";
import { metaKey, subPrefix, toBytes, toHex } from "../bytes.js";
import { binaryCodec, u32 } from "../codec/codecs.js";
import type { BinaryReader, BinaryWriter } from "../codec/binary.js";
import { MapEntry } from "./entry.js";
import { FreeList } from "./free-list.js";
import { mergePlans } from "./internal.js";
import { LazyOption } from "./lazy-option.js";
import { LookupMap } from "./lookup-map.js";
import {
  checkAvl,
  insertNode,
  maxKey,
  minKey,
  neighborKey,
  removeNode,
  walkKeys,
} from "./tree/avl.js";
import type { AvlReport, TreeContext, TreeNode } from "./tree/avl.js";

/**
 * Ascending order for numbers, bigints and strings (UTF-16 code unit order)
 */
export function naturalOrder<K extends number | bigint | string>(a: K, b: K): number {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}

function writeChild(w: BinaryWriter, index: number | null): void {
  if (index === null) {
    w.u8(0);
  } else {
    w.u8(1).u32(index);
  }
}

function readChild(r: BinaryReader): number | null {
  return r.tag() ? r.u32() : null;
}

/**
 * Node encoding: length-prefixed key, optional left, optional right, height (u8)
 */
export function nodeCodec<K>(key: Codec<K>): Codec<TreeNode<K>> {
  return binaryCodec<TreeNode<K>>(
    (w, node) => {
      w.bytes(key.encode(node.key));
      writeChild(w, node.left);
      writeChild(w, node.right);
      w.u8(node.height);
    },
    (r) => {
      const decoded = key.decode(r.bytes());
      const left = readChild(r);
      const right = readChild(r);
      return { key: decoded, left, right, height: r.u8() };
    }
  );
}

/**
 * Ordered map with O(log n) insert, remove and neighbor queries
 *
 * The comparator defines the order and must not change once data is stored.
 * Re-inserting an existing key replaces its value and leaves the tree as is.
 *
 * @example
 * ```typescript
 * const bids = new TreeMap(storage, "bids", {
 *   key: codecs.u64,
 *   value: codecs.string,
 *   compare: naturalOrder,
 * });
 * bids.insert(100n, "alice");
 * bids.max(); // [100n, "alice"]
 * ```
 */
export class TreeMap<K, V> implements Flushable, Iterable<[K, V]> {
  readonly prefix: Uint8Array;
  #values: LookupMap<K, V>;
  #nodes: FreeList<TreeNode<K>>;
  #root: LazyOption<number>;
  #tree: TreeContext<K>;

  constructor(storage: StorageBackend, prefix: StorageKeyInput, options: TreeMapOptions<K, V>) {
    this.prefix = toBytes(prefix);
    this.#values = new LookupMap<K, V>(storage, subPrefix(this.prefix, "v"), {
      key: options.key,
      value: options.value,
      hasher: options.hasher ?? "sha256",
      cacheSize: options.cacheSize,
    });
    this.#nodes = new FreeList<TreeNode<K>>(storage, subPrefix(this.prefix, "n"), {
      value: nodeCodec(options.key),
      cacheSize: options.cacheSize,
    });
    this.#root = new LazyOption<number>(storage, metaKey(this.prefix), { value: u32 });
    this.#tree = { arena: this.#nodes, compare: options.compare };
  }

  #rootIndex(): number | null {
    return this.#root.get() ?? null;
  }

  #setRoot(root: number | null): void {
    if (root !== this.#rootIndex()) {
      this.#root.set(root ?? undefined);
    }
  }

  #entry(key: K | undefined, mutable = false): [K, V] | undefined {
    if (key === undefined) return undefined;

    const value = mutable ? this.#values.getMut(key) : this.#values.get(key);
    if (value === undefined) {
      throw new InconsistentStateError(
        `tree map 0x${toHex(this.prefix)} orders a key that has no value`
      );
    }
    return [key, value];
  }

  get(key: K): V | undefined {
    return this.#values.get(key);
  }

  getMut(key: K): V | undefined {
    return this.#values.getMut(key);
  }

  contains(key: K): boolean {
    return this.#values.contains(key);
  }

  getKeyValue(key: K): [K, V] | undefined {
    const value = this.#values.get(key);
    return value === undefined ? undefined : [key, value];
  }

  /**
   * Handle on one key for get-or-insert and in-place updates
   */
  entry(key: K): MapEntry<K, V> {
    return new MapEntry(this, key);
  }

  /**
   * @returns The previous value
   */
  insert(key: K, value: V): V | undefined {
    const old = this.#values.set(key, value);
    if (old !== undefined) return old;

    const { root, inserted } = insertNode(this.#tree, this.#rootIndex(), key);
    if (!inserted) {
      throw new InconsistentStateError(
        `tree map 0x${toHex(this.prefix)} orders a key that had no value`
      );
    }
    this.#setRoot(root);
    return undefined;
  }

  remove(key: K): V | undefined {
    return this.removeEntry(key)?.[1];
  }

  /**
   * @returns The removed [key, value] pair
   */
  removeEntry(key: K): [K, V] | undefined {
    const old = this.#values.remove(key);
    if (old === undefined) return undefined;

    const { root, removed } = removeNode(this.#tree, this.#rootIndex(), key);
    if (!removed) {
      throw new InconsistentStateError(
        `tree map 0x${toHex(this.prefix)} holds a value for a key missing from its tree`
      );
    }
    this.#setRoot(root);
    return [key, old];
  }

  len(): number {
    return this.#nodes.len();
  }

  isEmpty(): boolean {
    return this.#nodes.isEmpty();
  }

  min(): [K, V] | undefined {
    return this.#entry(minKey(this.#nodes, this.#rootIndex()));
  }

  max(): [K, V] | undefined {
    return this.#entry(maxKey(this.#nodes, this.#rootIndex()));
  }

  /** Greatest entry with key <= `key` */
  floor(key: K): [K, V] | undefined {
    return this.#entry(neighborKey(this.#tree, this.#rootIndex(), key, "below", true));
  }

  /** Least entry with key >= `key` */
  ceiling(key: K): [K, V] | undefined {
    return this.#entry(neighborKey(this.#tree, this.#rootIndex(), key, "above", true));
  }

  /** Greatest entry with key < `key` */
  lower(key: K): [K, V] | undefined {
    return this.#entry(neighborKey(this.#tree, this.#rootIndex(), key, "below", false));
  }

  /** Least entry with key > `key` */
  higher(key: K): [K, V] | undefined {
    return this.#entry(neighborKey(this.#tree, this.#rootIndex(), key, "above", false));
  }

  *#walk(options: RangeOptions<K>, mutable: boolean): Generator<[K, V]> {
    const bounds = {
      from: options.from,
      to: options.to,
      fromInclusive: options.fromInclusive ?? true,
      toInclusive: options.toInclusive ?? false,
    };
    const keys = walkKeys(this.#tree, this.#rootIndex(), bounds, options.direction ?? "forward");
    for (const key of keys) {
      const entry = this.#entry(key, mutable);
      if (entry) yield entry;
    }
  }

  /**
   * Entries between two bounds, by default `[from, to)` ascending
   */
  range(options: RangeOptions<K> = {}): Generator<[K, V]> {
    return this.#walk(options, false);
  }

  /**
   * Like range(), but every value yielded may be mutated in place and is
   * written back on flush
   */
  rangeMut(options: RangeOptions<K> = {}): Generator<[K, V]> {
    return this.#walk(options, true);
  }

  *entries(direction: Direction = "forward"): Generator<[K, V]> {
    yield* this.range({ direction });
  }

  *entriesMut(direction: Direction = "forward"): Generator<[K, V]> {
    yield* this.rangeMut({ direction });
  }

  *keys(direction: Direction = "forward"): Generator<K> {
    yield* walkKeys(
      this.#tree,
      this.#rootIndex(),
      { fromInclusive: true, toInclusive: true },
      direction
    );
  }

  *values(direction: Direction = "forward"): Generator<V> {
    for (const [, value] of this.range({ direction })) {
      yield value;
    }
  }

  *valuesMut(direction: Direction = "forward"): Generator<V> {
    for (const [, value] of this.rangeMut({ direction })) {
      yield value;
    }
  }

  [Symbol.iterator](): Iterator<[K, V]> {
    return this.entries();
  }

  clear(): void {
    const keys = [...this.keys()];
    for (const key of keys) {
      this.#values.put(key, undefined);
    }
    this.#nodes.clear();
    this.#setRoot(null);
  }

  /**
   * Check the tree's AVL invariants and that every ordered key has a value
   * @throws {InconsistentStateError} On the first violation
   */
  checkInvariants(): AvlReport {
    const report = checkAvl(this.#tree, this.#rootIndex());
    for (const key of this.keys()) {
      if (!this.#values.contains(key)) {
        throw new InconsistentStateError(
          `tree map 0x${toHex(this.prefix)} orders a key that has no value`
        );
      }
    }
    return report;
  }

  prepareFlush(): FlushPlan {
    return mergePlans([
      this.#values.prepareFlush(),
      this.#nodes.prepareFlush(),
      this.#root.prepareFlush(),
    ]);
  }

  flush(): void {
    this.#values.flush();
    this.#nodes.flush();
    this.#root.flush();
  }

  discard(): void {
    this.#values.discard();
    this.#nodes.discard();
    this.#root.discard();
  }

  cacheStats(): CacheStats {
    return combineCacheStats([this.#values.cacheStats(), this.#nodes.cacheStats()]);
  }
}
