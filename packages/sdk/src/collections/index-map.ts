/**
 * IndexMap: u32 index -> cached value, the element store behind Vector
 */

import type { CacheStats, Codec, Flushable, FlushPlan, StorageBackend } from "../types.js";
import { CacheEntry, EntryCache } from "../cache.js";
import type { CachedSlot } from "../cache.js";
import { indexKey, toHex } from "../bytes.js";
import { applyPlan, loadEntry, planWriteBack } from "./internal.js";

const KIND = "index_map";

export class IndexMap<T> implements Flushable {
  readonly prefix: Uint8Array;
  #storage: StorageBackend;
  #codec: Codec<T>;
  #prefixHex: string;
  #cache: EntryCache<number, T>;

  constructor(storage: StorageBackend, prefix: Uint8Array, codec: Codec<T>, cacheSize?: number) {
    this.prefix = prefix;
    this.#storage = storage;
    this.#codec = codec;
    this.#prefixHex = toHex(prefix);
    this.#cache = new EntryCache<number, T>({
      maxSize: cacheSize,
      kind: KIND,
      prefix: this.#prefixHex,
    });
  }

  #slot(index: number): CachedSlot<T> {
    const cached = this.#cache.get(index);
    if (cached) return cached;

    const storageKey = indexKey(this.prefix, index);
    const slot: CachedSlot<T> = {
      entry: loadEntry(this.#storage, storageKey, this.#codec),
      storageKey,
    };
    this.#cache.set(index, slot);
    return slot;
  }

  get(index: number): T | undefined {
    return this.#slot(index).entry.value;
  }

  getMut(index: number): T | undefined {
    const entry = this.#slot(index).entry;
    return entry.value === undefined ? undefined : entry.valueMut();
  }

  /**
   * Record a value (or removal) without reading the slot from storage
   */
  set(index: number, value: T | undefined): void {
    const cached = this.#cache.peek(index);
    if (cached) {
      cached.entry.replace(value);
      return;
    }
    this.#cache.set(index, {
      entry: CacheEntry.modified(value),
      storageKey: indexKey(this.prefix, index),
    });
  }

  insert(index: number, value: T): T | undefined {
    return this.#slot(index).entry.replace(value);
  }

  remove(index: number): T | undefined {
    return this.#slot(index).entry.replace(undefined);
  }

  swap(a: number, b: number): void {
    if (a === b) return;

    const valueA = this.remove(a);
    const valueB = this.#slot(b).entry.replace(valueA);
    this.#slot(a).entry.replace(valueB);
  }

  prepareFlush(): FlushPlan {
    return planWriteBack(this.#cache.values(), this.#codec, KIND, this.#prefixHex);
  }

  flush(): void {
    applyPlan(this.#storage, this.prepareFlush());
  }

  discard(): void {
    this.#cache.clear();
  }

  cacheStats(): CacheStats {
    return this.#cache.stats();
  }
}
