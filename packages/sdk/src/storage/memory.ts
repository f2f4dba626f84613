/**
 * In-memory storage backend
 *
 * Simple Map-based implementation for tests, embedding and development.
 * No persistence - data is lost when the instance is garbage collected.
 */

import type { StorageBackend } from "../types.js";
import { StorageExhaustedError } from "../errors.js";
import { toHex } from "../bytes.js";
import { logger } from "../observability/logs.js";

export interface MemoryStorageOptions {
  /** Maximum total bytes of keys plus values (unbounded if omitted) */
  quotaBytes?: number;
}

/**
 * In-memory StorageBackend keyed by the hex form of each storage key
 */
export class MemoryStorage implements StorageBackend {
  private store = new Map<string, { key: Uint8Array; value: Uint8Array }>();
  private usedBytes = 0;
  private quotaBytes: number | undefined;

  constructor(options: MemoryStorageOptions = {}) {
    this.quotaBytes = options.quotaBytes;
  }

  read(key: Uint8Array): Uint8Array | undefined {
    const record = this.store.get(toHex(key));
    // Return a copy to prevent external mutation
    return record ? new Uint8Array(record.value) : undefined;
  }

  write(key: Uint8Array, value: Uint8Array): void {
    const id = toHex(key);
    const previous = this.store.get(id);
    const previousBytes = previous ? previous.key.length + previous.value.length : 0;
    const nextUsed = this.usedBytes - previousBytes + key.length + value.length;

    if (this.quotaBytes !== undefined && nextUsed > this.quotaBytes) {
      logger.warn("storage.quota.exceeded", {
        op: "write",
        storageKey: id,
        details: { quotaBytes: this.quotaBytes, requestedBytes: nextUsed },
      });
      throw new StorageExhaustedError(
        `write of ${value.length} byte(s) would use ${nextUsed} of ${this.quotaBytes} byte(s)`
      );
    }

    // Store a copy to prevent external mutation
    this.store.set(id, { key: new Uint8Array(key), value: new Uint8Array(value) });
    this.usedBytes = nextUsed;
  }

  remove(key: Uint8Array): void {
    const id = toHex(key);
    const previous = this.store.get(id);
    if (previous) {
      this.usedBytes -= previous.key.length + previous.value.length;
      this.store.delete(id);
    }
  }

  has(key: Uint8Array): boolean {
    return this.store.has(toHex(key));
  }

  /**
   * Number of stored keys
   */
  get size(): number {
    return this.store.size;
  }

  /**
   * Total bytes of keys plus values currently stored
   */
  get bytesUsed(): number {
    return this.usedBytes;
  }

  /**
   * Copy of every record, keyed by hex storage key
   */
  snapshot(): Map<string, Uint8Array> {
    const out = new Map<string, Uint8Array>();
    for (const [id, record] of this.store) {
      out.set(id, new Uint8Array(record.value));
    }
    return out;
  }

  /**
   * Remove every record
   */
  clear(): void {
    this.store.clear();
    this.usedBytes = 0;
  }
}
