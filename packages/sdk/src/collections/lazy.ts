/**
 * Lazy: a single value under one fixed storage key that must exist once used
 */

import type {
  CellOptions,
  Codec,
  Flushable,
  FlushPlan,
  StorageBackend,
  StorageKeyInput,
} from "../types.js";
import { CacheEntry } from "../cache.js";
import { MissingValueError } from "../errors.js";
import { toBytes, toHex } from "../bytes.js";
import { applyPlan, loadEntry, planWriteBack } from "./internal.js";

const KIND = "lazy";

/**
 * Deferred cell holding a value that is always present
 *
 * Constructing a cell touches no storage. The first get() performs exactly one
 * read; flush() performs exactly one write if the value was set or mutated and
 * nothing otherwise.
 *
 * @example
 * ```typescript
 * const total = Lazy.init(storage, "total", { value: codecs.u64 }, 0n);
 * total.update((n) => n + 1n);
 * total.flush();
 * ```
 */
export class Lazy<T> implements Flushable {
  readonly storageKey: Uint8Array;
  #storage: StorageBackend;
  #codec: Codec<T>;
  #keyHex: string;
  #entry: CacheEntry<T> | undefined;

  constructor(storage: StorageBackend, key: StorageKeyInput, options: CellOptions<T>) {
    this.storageKey = toBytes(key);
    this.#storage = storage;
    this.#codec = options.value;
    this.#keyHex = toHex(this.storageKey);
  }

  /**
   * Create a cell holding `value`, to be written on the next flush
   */
  static init<T>(
    storage: StorageBackend,
    key: StorageKeyInput,
    options: CellOptions<T>,
    value: T
  ): Lazy<T> {
    const cell = new Lazy(storage, key, options);
    cell.#entry = CacheEntry.modified(value);
    return cell;
  }

  #load(): CacheEntry<T> {
    if (!this.#entry) {
      this.#entry = loadEntry(this.#storage, this.storageKey, this.#codec);
    }
    return this.#entry;
  }

  get isLoaded(): boolean {
    return this.#entry !== undefined;
  }

  /**
   * @throws {MissingValueError} If nothing is stored under the key and no value was set
   */
  get(): T {
    const value = this.#load().value;
    if (value === undefined) {
      throw new MissingValueError(this.#keyHex);
    }
    return value;
  }

  /**
   * Value for in-place mutation; the cell is written back on flush
   */
  getMut(): T {
    const entry = this.#load();
    const value = entry.value;
    if (value === undefined) {
      throw new MissingValueError(this.#keyHex);
    }
    entry.valueMut();
    return value;
  }

  /**
   * Replace the value without reading the stored one
   */
  set(value: T): void {
    if (this.#entry) {
      this.#entry.replace(value);
    } else {
      this.#entry = CacheEntry.modified(value);
    }
  }

  /**
   * Apply `fn` to the current value and store the result
   * @returns The new value
   */
  update(fn: (value: T) => T): T {
    const next = fn(this.get());
    this.set(next);
    return next;
  }

  prepareFlush(): FlushPlan {
    const slots = this.#entry ? [{ entry: this.#entry, storageKey: this.storageKey }] : [];
    return planWriteBack(slots, this.#codec, KIND, this.#keyHex);
  }

  flush(): void {
    applyPlan(this.#storage, this.prepareFlush());
  }

  discard(): void {
    this.#entry = undefined;
  }
}
