/**
 * LookupSet: membership over point storage, no iteration
 */

import type {
  CacheStats,
  Flushable,
  FlushPlan,
  KeyHasher,
  SetOptions,
  StorageBackend,
  StorageKeyInput,
} from "../types.js";
import { unit } from "../codec/codecs.js";
import { LookupMap } from "./lookup-map.js";

/**
 * Set whose members are stored as empty values under their derived keys
 */
export class LookupSet<T> implements Flushable {
  #map: LookupMap<T, null>;

  constructor(storage: StorageBackend, prefix: StorageKeyInput, options: SetOptions<T>) {
    this.#map = new LookupMap<T, null>(storage, prefix, {
      key: options.value,
      value: unit,
      hasher: options.hasher,
      cacheSize: options.cacheSize,
    });
  }

  get prefix(): Uint8Array {
    return this.#map.prefix;
  }

  get hasher(): KeyHasher {
    return this.#map.hasher;
  }

  contains(value: T): boolean {
    return this.#map.contains(value);
  }

  /**
   * @returns true if the value was not already a member
   */
  insert(value: T): boolean {
    return this.#map.set(value, null) === undefined;
  }

  /**
   * @returns true if the value was a member
   */
  remove(value: T): boolean {
    return this.#map.remove(value) !== undefined;
  }

  /**
   * Add or remove a member without checking storage first
   */
  put(value: T, present: boolean): void {
    this.#map.put(value, present ? null : undefined);
  }

  prepareFlush(): FlushPlan {
    return this.#map.prepareFlush();
  }

  flush(): void {
    this.#map.flush();
  }

  discard(): void {
    this.#map.discard();
  }

  cacheStats(): CacheStats {
    return this.#map.cacheStats();
  }
}
