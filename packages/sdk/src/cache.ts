/**
 * Per-container cache of decoded storage values with dirty tracking
 */

import type { CacheStats } from "./types.js";
import { metrics } from "./observability/metrics.js";

export type EntryState = "cached" | "modified";

/**
 * Bytes storage held for an entry when it was last loaded or written
 * (`bytes` undefined = key absent)
 */
export interface StoredBytes {
  bytes: Uint8Array | undefined;
}

/**
 * One cached storage slot: the decoded value (undefined = absent) and whether it
 * differs from what storage holds
 */
export class CacheEntry<T> {
  #value: T | undefined;
  #state: EntryState;
  #stored: StoredBytes | undefined;

  constructor(value: T | undefined, state: EntryState, stored?: StoredBytes) {
    this.#value = value;
    this.#state = state;
    this.#stored = stored;
  }

  /** Entry mirroring what storage holds */
  static cached<T>(value: T | undefined, stored?: StoredBytes): CacheEntry<T> {
    return new CacheEntry(value, "cached", stored);
  }

  /** Entry that must be written back */
  static modified<T>(value: T | undefined): CacheEntry<T> {
    return new CacheEntry(value, "modified");
  }

  get value(): T | undefined {
    return this.#value;
  }

  get state(): EntryState {
    return this.#state;
  }

  /** Storage contents behind this entry, unknown for blind writes */
  get stored(): StoredBytes | undefined {
    return this.#stored;
  }

  get isModified(): boolean {
    return this.#state === "modified";
  }

  /**
   * Mutable access: the caller may change the returned value in place, so the
   * entry is marked modified unconditionally
   */
  valueMut(): T | undefined {
    this.#state = "modified";
    return this.#value;
  }

  /**
   * Replace the value, returning the old one. Marks the entry modified if either
   * the old or the new value is present.
   */
  replace(value: T | undefined): T | undefined {
    const old = this.#value;
    this.#value = value;

    if (old !== undefined || value !== undefined) {
      this.#state = "modified";
    }

    return old;
  }

  /** Record that storage now matches the cached value */
  markCached(stored?: StoredBytes): void {
    this.#state = "cached";
    this.#stored = stored;
  }
}

/**
 * Cache slot: the entry plus the storage key it was resolved to
 */
export interface CachedSlot<T> {
  entry: CacheEntry<T>;
  storageKey: Uint8Array;
}

/**
 * Configuration options for an entry cache
 */
export interface EntryCacheOptions {
  /** Maximum number of entries to keep (0 or omitted = unbounded) */
  maxSize?: number;
  /** Container kind reported to metrics */
  kind?: string;
  /** Container prefix (hex) reported to metrics */
  prefix?: string;
}

/**
 * Insertion-ordered cache table owned by exactly one container
 *
 * Uses native Map insertion order for O(1) LRU touches. When bounded, only clean
 * entries are evicted: a modified entry stays until it is flushed or discarded.
 */
export class EntryCache<Id extends string | number, T> {
  private cache = new Map<Id, CachedSlot<T>>();
  private maxSize: number;
  private hits = 0;
  private misses = 0;
  private evicted = 0;
  private kind: string | undefined;
  private prefix: string | undefined;

  constructor(options: EntryCacheOptions = {}) {
    this.maxSize = options.maxSize ?? 0;
    this.kind = options.kind;
    this.prefix = options.prefix;
  }

  get size(): number {
    return this.cache.size;
  }

  /**
   * Look up a slot, counting a hit or miss
   */
  get(id: Id): CachedSlot<T> | undefined {
    const slot = this.cache.get(id);

    if (!slot) {
      this.misses++;
      if (this.kind !== undefined && this.prefix !== undefined) {
        metrics.recordMiss(this.kind, this.prefix);
      }
      return undefined;
    }

    if (this.maxSize > 0) {
      // LRU: move to end (most recently used)
      this.cache.delete(id);
      this.cache.set(id, slot);
    }

    this.hits++;
    if (this.kind !== undefined && this.prefix !== undefined) {
      metrics.recordHit(this.kind, this.prefix);
    }
    return slot;
  }

  /**
   * Look up a slot without touching statistics or recency
   */
  peek(id: Id): CachedSlot<T> | undefined {
    return this.cache.get(id);
  }

  set(id: Id, slot: CachedSlot<T>): void {
    this.cache.delete(id);
    // Make room first so the slot being inserted is never the one evicted
    this.evictIfNeeded(1);
    this.cache.set(id, slot);
  }

  delete(id: Id): void {
    this.cache.delete(id);
  }

  /**
   * Drop every entry, modified or not
   */
  clear(): void {
    this.cache.clear();
  }

  /**
   * All slots without their ids, oldest first
   */
  values(): IterableIterator<CachedSlot<T>> {
    return this.cache.values();
  }

  stats(): CacheStats {
    const total = this.hits + this.misses;
    let modified = 0;
    for (const slot of this.cache.values()) {
      if (slot.entry.isModified) modified++;
    }

    return {
      size: this.cache.size,
      modified,
      hits: this.hits,
      misses: this.misses,
      hitRate: total > 0 ? this.hits / total : 0,
      missRate: total > 0 ? this.misses / total : 0,
      evicted: this.evicted,
    };
  }

  /**
   * Evict least recently used clean entries until `reserve` more fit within the limit
   */
  evictIfNeeded(reserve = 0): void {
    const limit = this.maxSize - reserve;
    if (this.maxSize <= 0 || this.cache.size <= limit) return;

    for (const [id, slot] of this.cache) {
      if (this.cache.size <= limit) break;
      if (slot.entry.isModified) continue;

      this.cache.delete(id);
      this.evicted++;
    }
  }
}

/**
 * Sum the statistics of several caches, recomputing the rates from the counts
 */
export function combineCacheStats(stats: Iterable<CacheStats>): CacheStats {
  const total: CacheStats = {
    size: 0,
    modified: 0,
    hits: 0,
    misses: 0,
    hitRate: 0,
    missRate: 0,
    evicted: 0,
  };

  for (const s of stats) {
    total.size += s.size;
    total.modified += s.modified;
    total.hits += s.hits;
    total.misses += s.misses;
    total.evicted += s.evicted;
  }

  const lookups = total.hits + total.misses;
  total.hitRate = lookups > 0 ? total.hits / lookups : 0;
  total.missRate = lookups > 0 ? total.misses / lookups : 0;
  return total;
}
