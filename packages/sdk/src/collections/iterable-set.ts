/**
 * IterableSet: LookupMap<T, index> + FreeList<T>
 *
 * Layout:
 *   (prefix ++ "m") member -> u32 slot index
 *   (prefix ++ "v") free list of members
 */

import type {
  CacheStats,
  Direction,
  Flushable,
  FlushPlan,
  SetOptions,
  StorageBackend,
  StorageKeyInput,
} from "../types.js";
import { combineCacheStats } from "../cache.js";
import { InconsistentStateError } from "../errors.js";
import { subPrefix, toBytes, toHex } from "../bytes.js";
import { u32 } from "../codec/codecs.js";
import { FreeList } from "./free-list.js";
import { mergePlans } from "./internal.js";
import { LookupMap } from "./lookup-map.js";

export class IterableSet<T> implements Flushable, Iterable<T> {
  readonly prefix: Uint8Array;
  #index: LookupMap<T, number>;
  #slots: FreeList<T>;

  constructor(storage: StorageBackend, prefix: StorageKeyInput, options: SetOptions<T>) {
    this.prefix = toBytes(prefix);
    this.#index = new LookupMap<T, number>(storage, subPrefix(this.prefix, "m"), {
      key: options.value,
      value: u32,
      hasher: options.hasher,
      cacheSize: options.cacheSize,
    });
    this.#slots = new FreeList<T>(storage, subPrefix(this.prefix, "v"), {
      value: options.value,
      cacheSize: options.cacheSize,
    });
  }

  contains(value: T): boolean {
    return this.#index.contains(value);
  }

  /**
   * @returns true if the value was not already a member
   */
  insert(value: T): boolean {
    if (this.#index.get(value) !== undefined) return false;

    this.#index.set(value, this.#slots.insert(value));
    return true;
  }

  /**
   * @returns true if the value was a member
   */
  remove(value: T): boolean {
    const index = this.#index.remove(value);
    if (index === undefined) return false;

    if (this.#slots.remove(index) === undefined) {
      throw new InconsistentStateError(
        `iterable set 0x${toHex(this.prefix)} indexes slot ${index}, which is vacant`
      );
    }
    return true;
  }

  indexOf(value: T): number | undefined {
    return this.#index.get(value);
  }

  len(): number {
    return this.#slots.len();
  }

  isEmpty(): boolean {
    return this.#slots.isEmpty();
  }

  clear(): void {
    for (const value of this.#slots.values()) {
      this.#index.put(value, undefined);
    }
    this.#slots.clear();
  }

  drain(): T[] {
    const values = this.#slots.drain();
    for (const value of values) {
      this.#index.put(value, undefined);
    }
    return values;
  }

  retain(keep: (value: T) => boolean): void {
    const doomed = [...this.#slots.values()].filter((value) => !keep(value));
    for (const value of doomed) {
      this.remove(value);
    }
  }

  *values(direction: Direction = "forward"): Generator<T> {
    yield* this.#slots.values(direction);
  }

  [Symbol.iterator](): Iterator<T> {
    return this.values();
  }

  /** Members of this set that are not in `other` */
  *difference(other: IterableSet<T>): Generator<T> {
    for (const value of this.values()) {
      if (!other.contains(value)) yield value;
    }
  }

  /** Members of both sets */
  *intersection(other: IterableSet<T>): Generator<T> {
    for (const value of this.values()) {
      if (other.contains(value)) yield value;
    }
  }

  /** Members of this set, then members of `other` not in this set */
  *union(other: IterableSet<T>): Generator<T> {
    yield* this.values();
    yield* other.difference(this);
  }

  /** Members of exactly one of the two sets */
  *symmetricDifference(other: IterableSet<T>): Generator<T> {
    yield* this.difference(other);
    yield* other.difference(this);
  }

  isDisjoint(other: IterableSet<T>): boolean {
    const [small, large] = this.len() <= other.len() ? [this, other] : [other, this];
    for (const value of small.values()) {
      if (large.contains(value)) return false;
    }
    return true;
  }

  isSubset(other: IterableSet<T>): boolean {
    if (this.len() > other.len()) return false;

    for (const value of this.values()) {
      if (!other.contains(value)) return false;
    }
    return true;
  }

  isSuperset(other: IterableSet<T>): boolean {
    return other.isSubset(this);
  }

  /**
   * Walk every occupied slot and check that its member indexes back to it
   * @throws {InconsistentStateError} On the first mismatch
   */
  checkInvariants(): void {
    let count = 0;
    for (const [index, value] of this.#slots.entries()) {
      const mapped = this.#index.get(value);
      if (mapped !== index) {
        throw new InconsistentStateError(
          `iterable set 0x${toHex(this.prefix)} slot ${index} holds a member indexed at ${mapped ?? "nothing"}`
        );
      }
      count++;
    }

    if (count !== this.#slots.len()) {
      throw new InconsistentStateError(
        `iterable set 0x${toHex(this.prefix)} has ${count} occupied slot(s) but records ${this.#slots.len()}`
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
