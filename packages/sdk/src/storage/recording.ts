/**
 * Storage wrapper that counts and records every call it forwards
 */

import type { StorageBackend, StorageOp } from "../types.js";
import { toHex } from "../bytes.js";
import { logger } from "../observability/logs.js";

export type { StorageOp };

export interface StorageCall {
  op: StorageOp;
  /** Hex form of the storage key */
  key: string;
}

export type StorageCallCounts = Record<StorageOp, number>;

/**
 * Forwards to an inner backend and keeps a log of calls, for measuring how many
 * round trips a sequence of container operations costs
 */
export class RecordingStorage implements StorageBackend {
  #inner: StorageBackend;
  #calls: StorageCall[] = [];

  constructor(inner: StorageBackend) {
    this.#inner = inner;
  }

  #record(op: StorageOp, key: Uint8Array): void {
    const call: StorageCall = { op, key: toHex(key) };
    this.#calls.push(call);
    logger.debug("storage.call", { op, storageKey: call.key });
  }

  read(key: Uint8Array): Uint8Array | undefined {
    this.#record("read", key);
    return this.#inner.read(key);
  }

  write(key: Uint8Array, value: Uint8Array): void {
    this.#record("write", key);
    this.#inner.write(key, value);
  }

  remove(key: Uint8Array): void {
    this.#record("remove", key);
    this.#inner.remove(key);
  }

  has(key: Uint8Array): boolean {
    this.#record("has", key);
    return this.#inner.has(key);
  }

  /**
   * Calls recorded since construction or the last reset()
   */
  get calls(): readonly StorageCall[] {
    return this.#calls;
  }

  counts(): StorageCallCounts {
    const counts: StorageCallCounts = { read: 0, write: 0, remove: 0, has: 0 };
    for (const call of this.#calls) {
      counts[call.op]++;
    }
    return counts;
  }

  reset(): void {
    this.#calls = [];
  }
}
