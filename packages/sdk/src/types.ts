/**
 * Core types for lazykv
 */

import type { LookupMap } from "./collections/lookup-map.js";
import type { LookupSet } from "./collections/lookup-set.js";
import type { Vector } from "./collections/vector.js";
import type { IterableMap } from "./collections/iterable-map.js";
import type { IterableSet } from "./collections/iterable-set.js";
import type { TreeMap } from "./collections/tree-map.js";
import type { Lazy } from "./collections/lazy.js";
import type { LazyOption } from "./collections/lazy-option.js";

/**
 * Prefix or storage key given as UTF-8 text or raw bytes
 */
export type StorageKeyInput = string | Uint8Array;

/**
 * Point-access key-value byte store the collections are built on
 *
 * Every call is synchronous and may be individually metered by the host.
 * A backend that cannot satisfy a call throws (typically `StorageExhaustedError`).
 */
export interface StorageBackend {
  /**
   * Read the bytes stored under a key
   * @returns Stored bytes, or undefined if the key is absent
   */
  read(key: Uint8Array): Uint8Array | undefined;

  /**
   * Store bytes under a key, replacing any previous value
   */
  write(key: Uint8Array, value: Uint8Array): void;

  /**
   * Remove a key (no-op if absent)
   */
  remove(key: Uint8Array): void;

  /**
   * Check whether a key is present without transferring its value
   */
  has(key: Uint8Array): boolean;
}

/**
 * The four calls a storage backend answers
 */
export type StorageOp = "read" | "write" | "remove" | "has";

/**
 * Binary codec for values and logical keys
 *
 * `encode` must be deterministic: equal values produce equal bytes.
 * `decode` throws `CodecError` on malformed input.
 */
export interface Codec<T> {
  encode(value: T): Uint8Array;
  decode(bytes: Uint8Array): T;
}

/**
 * Key derivation strategy, fixed for a container's lifetime
 * - identity: prefix ++ encode(key)
 * - sha256 / keccak256: prefix ++ H(prefix ++ encode(key))
 */
export type KeyHasher = "identity" | "sha256" | "keccak256";

/**
 * Iteration direction for iterable containers
 */
export type Direction = "forward" | "backward";

/**
 * Total order over keys; negative, zero or positive like Array.prototype.sort
 */
export type Comparator<K> = (a: K, b: K) => number;

/**
 * One storage mutation a flush will make
 */
export interface PendingWrite {
  storageKey: Uint8Array;
  /** Encoded value, or undefined to remove the key */
  bytes: Uint8Array | undefined;
  /** What storage held before, when the cache already knows it */
  prior?: { bytes: Uint8Array | undefined };
}

/**
 * Encoded writes collected from one or more containers, not yet applied
 */
export interface FlushPlan {
  writes: PendingWrite[];
  /** Mark every planned entry clean; call only once all writes have landed */
  commit(): void;
}

/**
 * Anything holding cached state that can be written back or dropped
 */
export interface Flushable {
  /** Write every modified cache entry to storage */
  flush(): void;
  /** Drop every cache entry without writing (abort semantics) */
  discard(): void;
  /** Encode every modified cache entry without touching storage */
  prepareFlush(): FlushPlan;
}

/**
 * Options shared by containers that cache many entries
 */
export interface CacheBoundOptions {
  /**
   * Maximum number of clean cache entries kept per container (0 = unbounded, default)
   * Modified entries are never evicted before flush.
   */
  cacheSize?: number;
}

export interface MapOptions<K, V> extends CacheBoundOptions {
  /** Codec for logical keys (must be deterministic) */
  key: Codec<K>;
  /** Codec for values */
  value: Codec<V>;
  /** Key derivation strategy (default depends on the container) */
  hasher?: KeyHasher;
}

export interface SetOptions<T> extends CacheBoundOptions {
  /** Codec for members (must be deterministic) */
  value: Codec<T>;
  hasher?: KeyHasher;
}

export interface VectorOptions<T> extends CacheBoundOptions {
  value: Codec<T>;
}

export interface TreeMapOptions<K, V> extends MapOptions<K, V> {
  /** Total order over keys; must never change once data is stored */
  compare: Comparator<K>;
}

export interface CellOptions<T> {
  value: Codec<T>;
}

/**
 * Inclusive/exclusive bounds for ordered range queries
 */
export interface RangeOptions<K> {
  /** Lower bound (unbounded if omitted) */
  from?: K;
  /** Upper bound (unbounded if omitted) */
  to?: K;
  /** Include `from` itself (default: true) */
  fromInclusive?: boolean;
  /** Include `to` itself (default: false) */
  toInclusive?: boolean;
  /** Iteration direction (default: "forward") */
  direction?: Direction;
}

/**
 * Cache statistics for monitoring and debugging
 */
export interface CacheStats {
  /** Current number of cached entries */
  size: number;
  /** Number of modified entries awaiting flush */
  modified: number;
  /** Lookups served from the cache */
  hits: number;
  /** Lookups that went to storage */
  misses: number;
  /** Cache hit rate (hits / total lookups) */
  hitRate: number;
  /** Cache miss rate (misses / total lookups) */
  missRate: number;
  /** Total number of evictions performed */
  evicted: number;
}

/**
 * Options accepted by openStore()
 */
export interface StoreOptions {
  /** Backing key-value store (default: a fresh MemoryStorage) */
  storage?: StorageBackend;
  /** Default per-container cache bound (0 = unbounded) */
  cacheSize?: number;
  /** Hasher used by factories when a container's options name none */
  defaultHasher?: KeyHasher;
}

/**
 * Aggregate store statistics
 */
export interface StoreStats {
  /** Number of containers created through this store */
  containers: number;
  /** Cache entries summed over every container that caches entries */
  cache: CacheStats;
  /** Whether a transact() call is in progress */
  inTransaction: boolean;
}

/**
 * Container factory and call boundary over one storage backend
 */
export interface Store {
  /** The backend every container of this store reads and writes */
  readonly storage: StorageBackend;

  lookupMap<K, V>(prefix: StorageKeyInput, options: MapOptions<K, V>): LookupMap<K, V>;
  lookupSet<T>(prefix: StorageKeyInput, options: SetOptions<T>): LookupSet<T>;
  vector<T>(prefix: StorageKeyInput, options: VectorOptions<T>): Vector<T>;
  iterableMap<K, V>(prefix: StorageKeyInput, options: MapOptions<K, V>): IterableMap<K, V>;
  iterableSet<T>(prefix: StorageKeyInput, options: SetOptions<T>): IterableSet<T>;
  treeMap<K, V>(prefix: StorageKeyInput, options: TreeMapOptions<K, V>): TreeMap<K, V>;
  lazy<T>(key: StorageKeyInput, options: CellOptions<T>): Lazy<T>;
  lazyOption<T>(key: StorageKeyInput, options: CellOptions<T>): LazyOption<T>;

  /**
   * Run one logical call: flush every container on return, discard every cache on throw
   * @param fn - Synchronous body of the call
   * @returns Whatever fn returns
   */
  transact<T>(fn: () => T): T;

  /**
   * Write back every container's modified entries as one batch; if a write
   * fails, storage is restored and the entries stay modified
   */
  flush(): void;

  /** Drop every container's cached state without writing */
  discard(): void;

  /** Flush, then reject further use */
  close(): void;

  stats(): StoreStats;
}
