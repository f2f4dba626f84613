/**
 * LookupMap: key -> value over point storage, no iteration
 */

import type {
  CacheStats,
  Codec,
  Flushable,
  FlushPlan,
  KeyHasher,
  MapOptions,
  StorageBackend,
  StorageKeyInput,
} from "../types.js";
import { CacheEntry, EntryCache } from "../cache.js";
import type { CachedSlot } from "../cache.js";
import { toBytes, toHex } from "../bytes.js";
import { toStorageKey } from "../key.js";
import { applyPlan, loadEntry, planWriteBack } from "./internal.js";

const KIND = "lookup_map";

/**
 * Non-iterable map whose entries each live under their own storage key
 *
 * Each logical key is resolved to a storage key once per container instance and
 * its value is loaded at most once; later reads are served from the cache. All
 * writes are deferred until flush().
 *
 * @example
 * ```typescript
 * const balances = new LookupMap(storage, "b", { key: codecs.string, value: codecs.u64 });
 * balances.insert("alice", 10n);
 * balances.get("alice"); // 10n
 * balances.flush();
 * ```
 */
export class LookupMap<K, V> implements Flushable {
  readonly prefix: Uint8Array;
  readonly hasher: KeyHasher;
  #storage: StorageBackend;
  #keyCodec: Codec<K>;
  #valueCodec: Codec<V>;
  #prefixHex: string;
  // Keyed by the hex of the encoded logical key
  #cache: EntryCache<string, V>;

  constructor(storage: StorageBackend, prefix: StorageKeyInput, options: MapOptions<K, V>) {
    this.prefix = toBytes(prefix);
    this.hasher = options.hasher ?? "identity";
    this.#storage = storage;
    this.#keyCodec = options.key;
    this.#valueCodec = options.value;
    this.#prefixHex = toHex(this.prefix);
    this.#cache = new EntryCache<string, V>({
      maxSize: options.cacheSize,
      kind: KIND,
      prefix: this.#prefixHex,
    });
  }

  #resolve(key: K): { id: string; encoded: Uint8Array } {
    const encoded = this.#keyCodec.encode(key);
    return { id: toHex(encoded), encoded };
  }

  /**
   * Cached slot for a key, loading it from storage on first touch
   */
  #slot(key: K): CachedSlot<V> {
    const { id, encoded } = this.#resolve(key);
    const cached = this.#cache.get(id);
    if (cached) return cached;

    const storageKey = toStorageKey(this.hasher, this.prefix, encoded);
    const slot: CachedSlot<V> = {
      entry: loadEntry(this.#storage, storageKey, this.#valueCodec),
      storageKey,
    };
    this.#cache.set(id, slot);
    return slot;
  }

  /**
   * Get the value stored for a key
   */
  get(key: K): V | undefined {
    return this.#slot(key).entry.value;
  }

  /**
   * Get the value for in-place mutation; the entry will be rewritten on flush
   */
  getMut(key: K): V | undefined {
    const entry = this.#slot(key).entry;
    return entry.value === undefined ? undefined : entry.valueMut();
  }

  /**
   * Set or remove (undefined) the value for a key
   * @returns The previous value
   */
  set(key: K, value: V | undefined): V | undefined {
    return this.#slot(key).entry.replace(value);
  }

  insert(key: K, value: V): V | undefined {
    return this.set(key, value);
  }

  remove(key: K): V | undefined {
    return this.set(key, undefined);
  }

  /**
   * Record a value (or removal) without loading the previous one from storage
   */
  put(key: K, value: V | undefined): void {
    const { id, encoded } = this.#resolve(key);
    const cached = this.#cache.peek(id);
    if (cached) {
      cached.entry.replace(value);
      return;
    }

    this.#cache.set(id, {
      entry: CacheEntry.modified(value),
      storageKey: toStorageKey(this.hasher, this.prefix, encoded),
    });
  }

  /**
   * Check whether a key is present
   *
   * Answered from the cache when possible; otherwise asks storage with `has`
   * without decoding. A negative answer is cached as absent.
   */
  contains(key: K): boolean {
    const { id, encoded } = this.#resolve(key);
    const cached = this.#cache.get(id);
    if (cached) return cached.entry.value !== undefined;

    const storageKey = toStorageKey(this.hasher, this.prefix, encoded);
    const present = this.#storage.has(storageKey);
    if (!present) {
      this.#cache.set(id, {
        entry: CacheEntry.cached<V>(undefined, { bytes: undefined }),
        storageKey,
      });
    }
    return present;
  }

  prepareFlush(): FlushPlan {
    return planWriteBack(this.#cache.values(), this.#valueCodec, KIND, this.#prefixHex);
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
