/**
 * Load and write-back helpers shared by every container
 */

import { performance } from "node:perf_hooks";
import type { Codec, FlushPlan, PendingWrite, StorageBackend } from "../types.js";
import { CacheEntry } from "../cache.js";
import type { CachedSlot } from "../cache.js";
import type { FlushReport } from "../observability/metrics.js";
import { CodecError, InconsistentStateError } from "../errors.js";
import { toHex } from "../bytes.js";
import { logger } from "../observability/logs.js";
import { metrics } from "../observability/metrics.js";

/**
 * Decode bytes this library wrote earlier; a failure means storage no longer
 * holds what the container expects
 */
export function decodeStored<T>(codec: Codec<T>, raw: Uint8Array, storageKey: Uint8Array): T {
  try {
    return codec.decode(raw);
  } catch (err) {
    if (err instanceof CodecError) {
      throw new InconsistentStateError(`cannot decode value at 0x${toHex(storageKey)}`, {
        cause: err,
      });
    }
    throw err;
  }
}

/**
 * Read one storage key into a clean cache entry that remembers the raw bytes
 */
export function loadEntry<T>(
  storage: StorageBackend,
  storageKey: Uint8Array,
  codec: Codec<T>
): CacheEntry<T> {
  const raw = storage.read(storageKey);
  const value = raw === undefined ? undefined : decodeStored(codec, raw, storageKey);
  return CacheEntry.cached(value, { bytes: raw });
}

/**
 * Encode every modified slot without touching storage
 *
 * Encoding failures surface here, before any write. commit() marks the planned
 * entries clean and reports the flush.
 */
export function planWriteBack<T>(
  slots: Iterable<CachedSlot<T>>,
  codec: Codec<T>,
  kind: string,
  prefixHex: string
): FlushPlan {
  const start = performance.now();
  const planned: [CacheEntry<T>, PendingWrite][] = [];

  for (const { entry, storageKey } of slots) {
    if (!entry.isModified) continue;

    const value = entry.value;
    planned.push([
      entry,
      {
        storageKey,
        bytes: value === undefined ? undefined : codec.encode(value),
        prior: entry.stored,
      },
    ]);
  }

  return {
    writes: planned.map(([, write]) => write),
    commit: () => {
      let removes = 0;
      for (const [entry, write] of planned) {
        entry.markCached({ bytes: write.bytes });
        if (write.bytes === undefined) removes++;
      }
      recordFlush(kind, prefixHex, {
        writes: planned.length - removes,
        removes,
        ms: performance.now() - start,
      });
    },
  };
}

/**
 * Join several plans into one batch, committed together
 */
export function mergePlans(plans: FlushPlan[]): FlushPlan {
  return {
    writes: plans.flatMap((plan) => plan.writes),
    commit: () => {
      for (const plan of plans) plan.commit();
    },
  };
}

function applyWrite(
  storage: StorageBackend,
  storageKey: Uint8Array,
  bytes: Uint8Array | undefined
): void {
  if (bytes === undefined) {
    storage.remove(storageKey);
  } else {
    storage.write(storageKey, bytes);
  }
}

/**
 * Apply a plan write by write, then commit it
 *
 * A failing write leaves the earlier ones in storage and every entry still
 * modified.
 */
export function applyPlan(storage: StorageBackend, plan: FlushPlan): void {
  for (const write of plan.writes) {
    applyWrite(storage, write.storageKey, write.bytes);
  }
  plan.commit();
}

/**
 * Apply a plan as one unit: if any write throws, every earlier write is
 * reverted to the key's prior contents before the error is rethrown
 *
 * Priors the cache does not know are read before the first write.
 *
 * @throws {InconsistentStateError} If reverting fails too
 */
export function applyPlanAtomically(storage: StorageBackend, plan: FlushPlan): void {
  const priors = plan.writes.map(
    (write) => write.prior ?? { bytes: storage.read(write.storageKey) }
  );

  let applied = 0;
  try {
    for (const write of plan.writes) {
      applyWrite(storage, write.storageKey, write.bytes);
      applied++;
    }
  } catch (err) {
    logger.warn("flush.rollback", {
      message: err instanceof Error ? err.message : String(err),
      details: { applied, planned: plan.writes.length },
    });
    revert(storage, plan.writes, priors, applied);
    throw err;
  }

  plan.commit();
}

function revert(
  storage: StorageBackend,
  writes: PendingWrite[],
  priors: { bytes: Uint8Array | undefined }[],
  applied: number
): void {
  // Newest first, so a key written twice ends at its oldest prior
  for (let i = applied - 1; i >= 0; i--) {
    const write = writes[i];
    const prior = priors[i];
    if (!write || !prior) continue;

    try {
      applyWrite(storage, write.storageKey, prior.bytes);
    } catch (err) {
      logger.error("flush.rollback.failed", {
        op: prior.bytes === undefined ? "remove" : "write",
        storageKey: toHex(write.storageKey),
        message: err instanceof Error ? err.message : String(err),
      });
      throw new InconsistentStateError(
        `could not restore 0x${toHex(write.storageKey)} after a failed flush`,
        { cause: err }
      );
    }
  }
}

/**
 * Report a flush to metrics and the debug log
 */
export function recordFlush(kind: string, prefixHex: string, report: FlushReport): void {
  if (report.writes === 0 && report.removes === 0) return;

  metrics.recordFlush(kind, prefixHex, report);
  logger.debug("collection.flush", {
    kind,
    prefix: prefixHex,
    details: { writes: report.writes, removes: report.removes, ms: report.ms },
  });
}

/**
 * Check that an index argument is a u32
 */
export function isIndex(index: number): boolean {
  return Number.isInteger(index) && index >= 0 && index <= 0xffff_ffff;
}
