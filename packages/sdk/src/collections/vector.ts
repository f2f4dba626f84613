/**
 * Vector: growable array with one storage key per element
 *
 * Layout:
 *   prefix ++ u32le(i)  element i
 *   prefix ++ 0xFF      length (u32), absent when the vector is empty
 */

import type {
  CacheStats,
  Direction,
  Flushable,
  FlushPlan,
  StorageBackend,
  StorageKeyInput,
  VectorOptions,
} from "../types.js";
import { IndexOutOfBoundsError, InconsistentStateError, StorageExhaustedError } from "../errors.js";
import { metaKey, toBytes, toHex } from "../bytes.js";
import { u32 } from "../codec/codecs.js";
import { IndexMap } from "./index-map.js";
import { LazyOption } from "./lazy-option.js";
import { isIndex, mergePlans } from "./internal.js";

/** Largest length a vector can reach */
export const MAX_VECTOR_LENGTH = 0xffff_ffff;

/**
 * Index-addressed sequence; reads are cached and writes deferred until flush()
 *
 * get/getMut return undefined outside `0..len`; every mutating access outside
 * that range throws IndexOutOfBoundsError.
 */
export class Vector<T> implements Flushable, Iterable<T> {
  readonly prefix: Uint8Array;
  #elements: IndexMap<T>;
  #length: LazyOption<number>;

  constructor(storage: StorageBackend, prefix: StorageKeyInput, options: VectorOptions<T>) {
    this.prefix = toBytes(prefix);
    this.#elements = new IndexMap<T>(storage, this.prefix, options.value, options.cacheSize);
    this.#length = new LazyOption<number>(storage, metaKey(this.prefix), { value: u32 });
  }

  len(): number {
    return this.#length.get() ?? 0;
  }

  isEmpty(): boolean {
    return this.len() === 0;
  }

  #setLength(length: number): void {
    this.#length.set(length === 0 ? undefined : length);
  }

  #checkIndex(index: number, length: number): void {
    if (!isIndex(index) || index >= length) {
      throw new IndexOutOfBoundsError(index, length);
    }
  }

  /**
   * Element at an index known to be in range
   */
  #present(index: number): T {
    const value = this.#elements.get(index);
    if (value === undefined) {
      throw new InconsistentStateError(
        `vector 0x${toHex(this.prefix)} has no element at index ${index} (length ${this.len()})`
      );
    }
    return value;
  }

  get(index: number): T | undefined {
    if (!isIndex(index) || index >= this.len()) return undefined;
    return this.#present(index);
  }

  getMut(index: number): T | undefined {
    if (!isIndex(index) || index >= this.len()) return undefined;
    this.#present(index);
    return this.#elements.getMut(index);
  }

  /**
   * Append a value without reading the target slot
   * @throws {StorageExhaustedError} If the vector already holds MAX_VECTOR_LENGTH elements
   */
  push(value: T): void {
    const length = this.len();
    if (length >= MAX_VECTOR_LENGTH) {
      throw new StorageExhaustedError(`vector 0x${toHex(this.prefix)} is full`);
    }

    this.#elements.set(length, value);
    this.#setLength(length + 1);
  }

  extend(values: Iterable<T>): void {
    for (const value of values) {
      this.push(value);
    }
  }

  pop(): T | undefined {
    const length = this.len();
    if (length === 0) return undefined;

    const last = length - 1;
    const value = this.#present(last);
    this.#elements.remove(last);
    this.#setLength(last);
    return value;
  }

  /**
   * Overwrite an element without reading it
   */
  set(index: number, value: T): void {
    this.#checkIndex(index, this.len());
    this.#elements.set(index, value);
  }

  /**
   * @returns The previous element
   */
  replace(index: number, value: T): T {
    this.#checkIndex(index, this.len());
    const old = this.#present(index);
    this.#elements.insert(index, value);
    return old;
  }

  swap(a: number, b: number): void {
    const length = this.len();
    this.#checkIndex(a, length);
    this.#checkIndex(b, length);
    this.#elements.swap(a, b);
  }

  /**
   * Remove an element in O(1) by moving the last element into its slot
   * @returns The removed element
   */
  swapRemove(index: number): T {
    const length = this.len();
    this.#checkIndex(index, length);

    const last = length - 1;
    const lastValue = this.#present(last);
    this.#elements.remove(last);
    this.#setLength(last);
    if (index === last) return lastValue;

    const removed = this.#present(index);
    this.#elements.insert(index, lastValue);
    return removed;
  }

  /**
   * Remove `[start, end)` and shift the tail down to close the gap
   *
   * `end` is clamped to the length. Draining a suffix moves nothing.
   * @returns The removed elements in order
   */
  drain(start = 0, end?: number): T[] {
    const length = this.len();
    const stop = Math.min(end ?? length, length);
    if (!isIndex(start) || start > stop) {
      throw new IndexOutOfBoundsError(start, length);
    }

    const removed: T[] = [];
    for (let i = start; i < stop; i++) {
      removed.push(this.#present(i));
    }

    const count = stop - start;
    if (count === 0) return removed;

    for (let i = stop; i < length; i++) {
      this.#elements.set(i - count, this.#present(i));
    }
    for (let i = length - count; i < length; i++) {
      this.#elements.set(i, undefined);
    }
    this.#setLength(length - count);
    return removed;
  }

  /**
   * Empty the vector. Element keys are removed on flush, one removal per
   * element, without reading them.
   */
  clear(): void {
    const length = this.len();
    for (let i = 0; i < length; i++) {
      this.#elements.set(i, undefined);
    }
    this.#setLength(0);
  }

  // The length is re-read at every step
  *#indices(direction: Direction): Generator<number> {
    if (direction === "forward") {
      for (let i = 0; i < this.len(); i++) yield i;
      return;
    }

    for (let i = this.len() - 1; i >= 0; i--) {
      if (i < this.len()) yield i;
    }
  }

  /**
   * Elements in index order
   */
  *values(direction: Direction = "forward"): Generator<T> {
    for (const index of this.#indices(direction)) {
      yield this.#present(index);
    }
  }

  /**
   * Elements for in-place mutation; every element yielded is written back on flush
   */
  *valuesMut(direction: Direction = "forward"): Generator<T> {
    for (const index of this.#indices(direction)) {
      this.#present(index);
      const value = this.#elements.getMut(index);
      if (value !== undefined) yield value;
    }
  }

  [Symbol.iterator](): Iterator<T> {
    return this.values();
  }

  toArray(): T[] {
    return [...this.values()];
  }

  prepareFlush(): FlushPlan {
    return mergePlans([this.#elements.prepareFlush(), this.#length.prepareFlush()]);
  }

  flush(): void {
    this.#elements.flush();
    this.#length.flush();
  }

  discard(): void {
    this.#elements.discard();
    this.#length.discard();
  }

  cacheStats(): CacheStats {
    return this.#elements.cacheStats();
  }
}
