/**
 * LazyOption: a single optional value under one fixed storage key
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
import { toBytes, toHex } from "../bytes.js";
import { applyPlan, loadEntry, planWriteBack } from "./internal.js";

const KIND = "lazy_option";

/**
 * Cell that may be empty; empty means the storage key is absent
 *
 * Nothing is read at construction. The first access loads the key once, and the
 * cached value is authoritative until flush() writes it back.
 */
export class LazyOption<T> implements Flushable {
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
   * Create a cell whose value will be written on the next flush, without reading
   */
  static init<T>(
    storage: StorageBackend,
    key: StorageKeyInput,
    options: CellOptions<T>,
    value: T | undefined
  ): LazyOption<T> {
    const cell = new LazyOption(storage, key, options);
    cell.#entry = CacheEntry.modified(value);
    return cell;
  }

  #load(): CacheEntry<T> {
    if (!this.#entry) {
      this.#entry = loadEntry(this.#storage, this.storageKey, this.#codec);
    }
    return this.#entry;
  }

  /** Whether the value has been loaded or set */
  get isLoaded(): boolean {
    return this.#entry !== undefined;
  }

  get(): T | undefined {
    return this.#load().value;
  }

  getMut(): T | undefined {
    const entry = this.#load();
    return entry.value === undefined ? undefined : entry.valueMut();
  }

  /**
   * Set or clear the value without reading the previous one
   */
  set(value: T | undefined): void {
    if (this.#entry) {
      this.#entry.replace(value);
    } else {
      this.#entry = CacheEntry.modified(value);
    }
  }

  /**
   * @returns The previous value
   */
  replace(value: T): T | undefined {
    return this.#load().replace(value);
  }

  /**
   * Remove the value, leaving the cell empty
   * @returns The removed value
   */
  take(): T | undefined {
    return this.#load().replace(undefined);
  }

  /**
   * @returns true if a value was present
   */
  remove(): boolean {
    return this.take() !== undefined;
  }

  isSome(): boolean {
    return this.get() !== undefined;
  }

  isNone(): boolean {
    return this.get() === undefined;
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
