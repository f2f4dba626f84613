/**
 * Main store implementation
 */

import type {
  CacheStats,
  CellOptions,
  Flushable,
  KeyHasher,
  MapOptions,
  SetOptions,
  StorageBackend,
  StorageKeyInput,
  Store,
  StoreOptions,
  StoreStats,
  TreeMapOptions,
  VectorOptions,
} from "./types.js";
import { combineCacheStats } from "./cache.js";
import { StoreClosedError } from "./errors.js";
import { toBytes, toHex } from "./bytes.js";
import { resolveConfig } from "./config.js";
import { logger } from "./observability/logs.js";
import { LookupMap } from "./collections/lookup-map.js";
import { LookupSet } from "./collections/lookup-set.js";
import { Vector } from "./collections/vector.js";
import { IterableMap } from "./collections/iterable-map.js";
import { IterableSet } from "./collections/iterable-set.js";
import { TreeMap } from "./collections/tree-map.js";
import { Lazy } from "./collections/lazy.js";
import { LazyOption } from "./collections/lazy-option.js";
import { applyPlanAtomically, mergePlans } from "./collections/internal.js";

interface Registration {
  container: Flushable;
  cacheStats?: () => CacheStats;
}

/**
 * Container factory over one storage backend
 *
 * Every container created here is registered so that flush(), discard() and
 * transact() reach all of them. Containers must have distinct prefixes; an exact
 * duplicate is logged, overlapping prefixes are not detected.
 *
 * @example
 * ```typescript
 * const store = openStore();
 * const counts = store.iterableMap("c", { key: codecs.string, value: codecs.u32 });
 *
 * store.transact(() => {
 *   counts.insert("visits", (counts.get("visits") ?? 0) + 1);
 * });
 * ```
 */
class LazyKvStore implements Store {
  readonly storage: StorageBackend;
  #cacheSize: number;
  #defaultHasher: KeyHasher | undefined;
  #registry: Registration[] = [];
  #prefixes = new Map<string, string>();
  #depth = 0;
  #closed = false;

  constructor(options: StoreOptions) {
    const config = resolveConfig(options);
    this.storage = config.storage;
    this.#cacheSize = config.cacheSize;
    this.#defaultHasher = config.defaultHasher;

    logger.debug("store.open", {
      details: {
        storage: this.storage.constructor.name,
        cacheSize: this.#cacheSize,
        defaultHasher: this.#defaultHasher ?? "per-container",
      },
    });
  }

  #ensureOpen(): void {
    if (this.#closed) {
      throw new StoreClosedError();
    }
  }

  #register<C extends Flushable>(
    kind: string,
    prefix: StorageKeyInput,
    container: C,
    cacheStats?: () => CacheStats
  ): C {
    const prefixHex = toHex(toBytes(prefix));
    const existing = this.#prefixes.get(prefixHex);
    if (existing !== undefined) {
      logger.warn("store.prefix.duplicate", {
        kind,
        prefix: prefixHex,
        message: `prefix already used by a ${existing}`,
      });
    } else {
      this.#prefixes.set(prefixHex, kind);
    }

    this.#registry.push({ container, cacheStats });
    return container;
  }

  #hasher(hasher: KeyHasher | undefined): KeyHasher | undefined {
    return hasher ?? this.#defaultHasher;
  }

  #cacheBound(cacheSize: number | undefined): number {
    return cacheSize ?? this.#cacheSize;
  }

  lookupMap<K, V>(prefix: StorageKeyInput, options: MapOptions<K, V>): LookupMap<K, V> {
    this.#ensureOpen();
    const map = new LookupMap<K, V>(this.storage, prefix, {
      ...options,
      hasher: this.#hasher(options.hasher),
      cacheSize: this.#cacheBound(options.cacheSize),
    });
    return this.#register("lookup_map", prefix, map, () => map.cacheStats());
  }

  lookupSet<T>(prefix: StorageKeyInput, options: SetOptions<T>): LookupSet<T> {
    this.#ensureOpen();
    const set = new LookupSet<T>(this.storage, prefix, {
      ...options,
      hasher: this.#hasher(options.hasher),
      cacheSize: this.#cacheBound(options.cacheSize),
    });
    return this.#register("lookup_set", prefix, set, () => set.cacheStats());
  }

  vector<T>(prefix: StorageKeyInput, options: VectorOptions<T>): Vector<T> {
    this.#ensureOpen();
    const vector = new Vector<T>(this.storage, prefix, {
      ...options,
      cacheSize: this.#cacheBound(options.cacheSize),
    });
    return this.#register("vector", prefix, vector, () => vector.cacheStats());
  }

  iterableMap<K, V>(prefix: StorageKeyInput, options: MapOptions<K, V>): IterableMap<K, V> {
    this.#ensureOpen();
    const map = new IterableMap<K, V>(this.storage, prefix, {
      ...options,
      hasher: this.#hasher(options.hasher),
      cacheSize: this.#cacheBound(options.cacheSize),
    });
    return this.#register("iterable_map", prefix, map, () => map.cacheStats());
  }

  iterableSet<T>(prefix: StorageKeyInput, options: SetOptions<T>): IterableSet<T> {
    this.#ensureOpen();
    const set = new IterableSet<T>(this.storage, prefix, {
      ...options,
      hasher: this.#hasher(options.hasher),
      cacheSize: this.#cacheBound(options.cacheSize),
    });
    return this.#register("iterable_set", prefix, set, () => set.cacheStats());
  }

  treeMap<K, V>(prefix: StorageKeyInput, options: TreeMapOptions<K, V>): TreeMap<K, V> {
    this.#ensureOpen();
    const map = new TreeMap<K, V>(this.storage, prefix, {
      ...options,
      hasher: this.#hasher(options.hasher),
      cacheSize: this.#cacheBound(options.cacheSize),
    });
    return this.#register("tree_map", prefix, map, () => map.cacheStats());
  }

  lazy<T>(key: StorageKeyInput, options: CellOptions<T>): Lazy<T> {
    this.#ensureOpen();
    return this.#register("lazy", key, new Lazy<T>(this.storage, key, options));
  }

  lazyOption<T>(key: StorageKeyInput, options: CellOptions<T>): LazyOption<T> {
    this.#ensureOpen();
    return this.#register("lazy_option", key, new LazyOption<T>(this.storage, key, options));
  }

  /**
   * Run `fn` as one all-or-nothing call
   *
   * On return every container is flushed as one batch; on throw, from `fn` or
   * from the flush, every container's cache is discarded and the error is
   * rethrown, so nothing the call changed reaches storage. A call nested inside
   * another joins the outer one.
   */
  transact<T>(fn: () => T): T {
    this.#ensureOpen();
    if (this.#depth > 0) {
      return fn();
    }

    this.#depth++;
    try {
      const result = fn();
      this.flush();
      return result;
    } catch (err) {
      this.discard();
      logger.warn("store.transact.abort", {
        message: err instanceof Error ? err.message : String(err),
      });
      throw err;
    } finally {
      this.#depth--;
    }
  }

  /**
   * Write back every container in one batch
   *
   * Every value is encoded before the first write. If a write fails, the keys
   * already written are restored and every entry stays modified.
   */
  flush(): void {
    this.#ensureOpen();
    const plan = mergePlans(this.#registry.map(({ container }) => container.prepareFlush()));
    applyPlanAtomically(this.storage, plan);
  }

  discard(): void {
    for (const { container } of this.#registry) {
      container.discard();
    }
  }

  /**
   * Flush every container, then refuse further use
   */
  close(): void {
    if (this.#closed) return;

    this.flush();
    this.#closed = true;
    logger.debug("store.close", { details: { containers: this.#registry.length } });
  }

  stats(): StoreStats {
    const caches: CacheStats[] = [];
    for (const { cacheStats } of this.#registry) {
      if (cacheStats) caches.push(cacheStats());
    }

    return {
      containers: this.#registry.length,
      cache: combineCacheStats(caches),
      inTransaction: this.#depth > 0,
    };
  }
}

/**
 * Open a store over a storage backend
 *
 * @param options.storage - Backend to read and write (default: a new MemoryStorage)
 * @param options.cacheSize - Default per-container cache bound (default: 0, unbounded)
 * @param options.defaultHasher - Hasher for containers whose options name none
 * @returns Store instance ready for use
 * @throws {ConfigError} If an option or LAZYKV_* environment variable is invalid
 *
 * @example
 * ```typescript
 * const storage = new MemoryStorage();
 * const store = openStore({ storage, defaultHasher: "keccak256" });
 * ```
 */
export function openStore(options: StoreOptions = {}): Store {
  return new LazyKvStore(options);
}
