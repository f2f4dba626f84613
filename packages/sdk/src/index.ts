/**
 * lazykv SDK
 *
 * Cache-backed persistent collections over a point key-value byte store
 */

// Re-export types
export type {
  StorageKeyInput,
  StorageBackend,
  Codec,
  KeyHasher,
  Direction,
  Comparator,
  Flushable,
  FlushPlan,
  PendingWrite,
  CacheBoundOptions,
  MapOptions,
  SetOptions,
  VectorOptions,
  TreeMapOptions,
  CellOptions,
  RangeOptions,
  CacheStats,
  StoreOptions,
  StoreStats,
  Store,
} from "./types.js";

// Store
export { openStore } from "./store.js";
export { resolveConfig, isStorageBackend } from "./config.js";
export type { ResolvedConfig } from "./config.js";

// Collections
export { LookupMap } from "./collections/lookup-map.js";
export { LookupSet } from "./collections/lookup-set.js";
export { Vector, MAX_VECTOR_LENGTH } from "./collections/vector.js";
export { FreeList } from "./collections/free-list.js";
export type { Slot, FreeListState } from "./collections/free-list.js";
export { IterableMap } from "./collections/iterable-map.js";
export { MapEntry } from "./collections/entry.js";
export type { EntryHost } from "./collections/entry.js";
export { IterableSet } from "./collections/iterable-set.js";
export { TreeMap, naturalOrder } from "./collections/tree-map.js";
export type { AvlReport, TreeNode } from "./collections/tree/avl.js";
export { Lazy } from "./collections/lazy.js";
export { LazyOption } from "./collections/lazy-option.js";

// Cache and key derivation
export { CacheEntry, EntryCache, combineCacheStats } from "./cache.js";
export type { EntryState, EntryCacheOptions } from "./cache.js";
export { toStorageKey, deriveStorageKey, isKeyHasher, KEY_HASHERS } from "./key.js";

// Storage backends
export { MemoryStorage } from "./storage/memory.js";
export type { MemoryStorageOptions } from "./storage/memory.js";
export { RecordingStorage } from "./storage/recording.js";
export type { StorageCall, StorageOp, StorageCallCounts } from "./storage/recording.js";

// Codecs
export * as codecs from "./codec/codecs.js";
export { BinaryReader, BinaryWriter } from "./codec/binary.js";
export { canonicalStringify } from "./codec/canonical.js";

// Errors
export {
  CollectionError,
  InconsistentStateError,
  IndexOutOfBoundsError,
  StorageExhaustedError,
  CodecError,
  MissingValueError,
  StoreClosedError,
  ConfigError,
} from "./errors.js";

// Observability
export { logger } from "./observability/logs.js";
export type { LogLevel, LogEntry } from "./observability/logs.js";
export { metrics, MAX_TRACKED_CONTAINERS } from "./observability/metrics.js";
export type { CollectionMetrics, FlushReport } from "./observability/metrics.js";
