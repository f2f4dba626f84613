/**
 * IterableMap: LookupMap<K, index> + FreeList<[K, V]>
 *
 * Layout:
 *   (prefix ++ "m") key -> u32 slot index
 *   (prefix ++ "v") free list of [key, value] slots
 *
 * Invariant: index.get(k) === i exactly when slot i holds [k, v] for some v.
 * Every mutation below updates both halves before returning.
 */

import type {
  CacheStats,
  Direction,
  Flushable,
  FlushPlan,
  MapOptions,
  StorageBackend,
  StorageKeyInput,
} from "../types.js";
import { combineCacheStats } from "../cache.js";
import { InconsistentStateError } from "../errors.js";
import { subPrefix, toBytes, toHex } from "../bytes.js";
import { tuple, u32 } from "../codec/codecs.js";
import { MapEntry } from "./entry.js";
import { FreeList } from "./free-list.js";
import { mergePlans } from "./internal.js";
import { LookupMap } from "./lookup-map.js";

/**
 * Map with stable entry indices and forward/backward iteration
 *
 * Replacing the value of an existing key keeps its index. Iteration order is
 * slot order, which is not insertion order once slots have been reused.
 *
 * @example
 * ```typescript
 * const owners = new IterableMap(storage, "o", { key: codecs.u32, value: codecs.string });
 * owners.insert(7, "alice");
 * for (const [token, owner] of owners) console.log(token, owner);
 * ```
 */
export class IterableMap<K, V> implements Flushable, Iterable<[K, V]> {
  readonly prefix: Uint8Array;
  #index: LookupMap<K, number>;
  #slots: FreeList<[K, V]>;

  constructor(storage: StorageBackend, prefix: StorageKeyInput, options: MapOptions<K, V>) {
    this.prefix = toBytes(prefix);
    this.#index = new LookupMap<K, number>(storage, subPrefix(this.prefix, "m"), {
      key: options.key,
      value: u32,
      hasher: options.hasher,
      cacheSize: options.cacheSize,
    });
    this.#slots = new FreeList<[K, V]>(storage, subPrefix(this.prefix, "v"), {
      value: tuple(options.key, options.value),
      cacheSize: options.cacheSize,
    });
  }

  /**
   * Slot that the index says holds an entry
   */
  #occupied(index: number): [K, V] {
    const entry = this.#slots.get(index);
    if (!entry) {
      throw new InconsistentStateError(
        `iterable map 0x${toHex(this.prefix)} indexes slot ${index}, which is vacant`
      );
    }
    return entry;
  }

  get(key: K): V | undefined {
    const index = this.#index.get(key);
    return index === undefined ? undefined : this.#occupied(index)[1];
  }

  getMut(key: K): V | undefined {
    const index = this.#index.get(key);
    if (index === undefined) return undefined;

    this.#occupied(index);
    return this.#slots.getMut(index)?.[1];
  }

  contains(key: K): boolean {
    return this.#index.contains(key);
  }

  /**
   * Handle on one key for get-or-insert and in-place updates
   */
  entry(key: K): MapEntry<K, V> {
    return new MapEntry(this, key);
  }

  /**
   * Insert or replace; an existing key keeps its slot index
   * @returns The previous value
   */
  insert(key: K, value: V): V | undefined {
    const index = this.#index.get(key);
    if (index !== undefined) {
      const [, old] = this.#occupied(index);
      this.#slots.replace(index, [key, value]);
      return old;
    }

    this.#index.set(key, this.#slots.insert([key, value]));
    return undefined;
  }

  remove(key: K): V | undefined {
    return this.removeEntry(key)?.[1];
  }

  /**
   * Remove a key, freeing its slot
   * @returns The stored [key, value] pair
   */
  removeEntry(key: K): [K, V] | undefined {
    const index = this.#index.remove(key);
    if (index === undefined) return undefined;

    const entry = this.#slots.remove(index);
    if (!entry) {
      throw new InconsistentStateError(
        `iterable map 0x${toHex(this.prefix)} indexes slot ${index}, which is vacant`
      );
    }
    return entry;
  }

  /**
   * Stable index of a key's slot
   */
  indexOf(key: K): number | undefined {
    return this.#index.get(key);
  }

  entryAt(index: number): [K, V] | undefined {
    const slot = this.#slots.get(index);
    return slot ? [slot[0], slot[1]] : undefined;
  }

  len(): number {
    return this.#slots.len();
  }

  isEmpty(): boolean {
    return this.#slots.isEmpty();
  }

  clear(): void {
    for (const [key] of this.#slots.values()) {
      this.#index.put(key, undefined);
    }
    this.#slots.clear();
  }

  /**
   * Remove every entry
   * @returns The removed entries in slot order
   */
  drain(): [K, V][] {
    const entries = this.#slots.drain();
    for (const [key] of entries) {
      this.#index.put(key, undefined);
    }
    return entries;
  }

  /**
   * Keep only the entries for which `keep` returns true
   */
  retain(keep: (key: K, value: V) => boolean): void {
    const doomed: K[] = [];
    for (const [key, value] of this.#slots.values()) {
      if (!keep(key, value)) doomed.push(key);
    }
    for (const key of doomed) {
      this.remove(key);
    }
  }

  /**
   * Entries in slot order, each as a fresh [key, value] pair
   */
  *entries(direction: Direction = "forward"): Generator<[K, V]> {
    for (const [key, value] of this.#slots.values(direction)) {
      yield [key, value];
    }
  }

  /**
   * Entries whose values may be mutated in place; every value yielded is
   * written back on flush
   */
  *entriesMut(direction: Direction = "forward"): Generator<[K, V]> {
    for (const [index] of this.#slots.entries(direction)) {
      const slot = this.#slots.getMut(index);
      if (slot) yield [slot[0], slot[1]];
    }
  }

  *valuesMut(direction: Direction = "forward"): Generator<V> {
    for (const [, value] of this.entriesMut(direction)) {
      yield value;
    }
  }

  *keys(direction: Direction = "forward"): Generator<K> {
    for (const [key] of this.#slots.values(direction)) {
      yield key;
    }
  }

  *values(direction: Direction = "forward"): Generator<V> {
    for (const [, value] of this.#slots.values(direction)) {
      yield value;
    }
  }

  [Symbol.iterator](): Iterator<[K, V]> {
    return this.entries();
  }

  /**
   * Walk every occupied slot and check that its key indexes back to it
   * @throws {InconsistentStateError} On the first mismatch
   */
  checkInvariants(): void {
    let count = 0;
    for (const [index, [key]] of this.#slots.entries()) {
      const mapped = this.#index.get(key);
      if (mapped !== index) {
        throw new InconsistentStateError(
          `iterable map 0x${toHex(this.prefix)} slot ${index} holds a key indexed at ${mapped ?? "nothing"}`
        );
      }
      count++;
    }

    if (count !== this.#slots.len()) {
      throw new InconsistentStateError(
        `iterable map 0x${toHex(this.prefix)} has ${count} occupied slot(s) but records ${this.#slots.len()}`
      );
    }
  }

  prepareFlush(): FlushPlan {
    return mergePlans([this.#index.prepareFlush(), this.#slots.prepareFlush()]);
  }

  flush(): void {
    this.#index.flush();
    this.#slots.flush();
  }

  discard(): void {
    this.#index.discard();
    this.#slots.discard();
  }

  cacheStats(): CacheStats {
    return combineCacheStats([this.#index.cacheStats(), this.#slots.cacheStats()]);
  }
}
