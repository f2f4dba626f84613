/**
 * FreeList: stable-index slot array with a free list threaded through vacant slots
 *
 * Layout:
 *   (prefix ++ "e") vector of slots
 *   prefix ++ 0xFF  { occupiedCount, firstFree }
 *
 * An index stays bound to its value until remove(index). A removed slot becomes
 * the new free-list head, and the next insert reuses it before the array grows.
 */

import type {
  CacheStats,
  Codec,
  Direction,
  Flushable,
  FlushPlan,
  StorageBackend,
  StorageKeyInput,
  VectorOptions,
} from "../types.js";
import { IndexOutOfBoundsError, InconsistentStateError } from "../errors.js";
import { metaKey, subPrefix, toBytes, toHex } from "../bytes.js";
import { binaryCodec } from "../codec/codecs.js";
import { mergePlans } from "./internal.js";
import { LazyOption } from "./lazy-option.js";
import { Vector } from "./vector.js";

export type Slot<T> = { occupied: true; value: T } | { occupied: false; nextFree: number | null };

export interface FreeListState {
  firstFree: number | null;
  occupiedCount: number;
}

/**
 * Slot encoding: tag 1 + value, or tag 0 + optional u32 next-free index
 */
export function slotCodec<T>(inner: Codec<T>): Codec<Slot<T>> {
  return binaryCodec<Slot<T>>(
    (w, slot) => {
      if (slot.occupied) {
        w.u8(1).raw(inner.encode(slot.value));
      } else if (slot.nextFree === null) {
        w.u8(0).u8(0);
      } else {
        w.u8(0).u8(1).u32(slot.nextFree);
      }
    },
    (r) => {
      if (r.tag()) return { occupied: true, value: inner.decode(r.rest()) };
      return { occupied: false, nextFree: r.tag() ? r.u32() : null };
    }
  );
}

const stateCodec: Codec<FreeListState> = binaryCodec<FreeListState>(
  (w, state) => {
    w.u32(state.occupiedCount);
    if (state.firstFree === null) {
      w.u8(0);
    } else {
      w.u8(1).u32(state.firstFree);
    }
  },
  (r) => {
    const occupiedCount = r.u32();
    const firstFree = r.tag() ? r.u32() : null;
    return { firstFree, occupiedCount };
  }
);

const EMPTY: FreeListState = { firstFree: null, occupiedCount: 0 };

export class FreeList<T> implements Flushable {
  readonly prefix: Uint8Array;
  #slots: Vector<Slot<T>>;
  #state: LazyOption<FreeListState>;

  constructor(storage: StorageBackend, prefix: StorageKeyInput, options: VectorOptions<T>) {
    this.prefix = toBytes(prefix);
    this.#slots = new Vector<Slot<T>>(storage, subPrefix(this.prefix, "e"), {
      value: slotCodec(options.value),
      cacheSize: options.cacheSize,
    });
    this.#state = new LazyOption<FreeListState>(storage, metaKey(this.prefix), {
      value: stateCodec,
    });
  }

  #current(): FreeListState {
    return this.#state.get() ?? EMPTY;
  }

  #update(state: FreeListState): void {
    const empty = state.occupiedCount === 0 && state.firstFree === null;
    this.#state.set(empty ? undefined : state);
  }

  /** Number of occupied slots */
  len(): number {
    return this.#current().occupiedCount;
  }

  isEmpty(): boolean {
    return this.len() === 0;
  }

  /** Number of slots ever allocated, vacant ones included */
  slotCount(): number {
    return this.#slots.len();
  }

  get(index: number): T | undefined {
    const slot = this.#slots.get(index);
    return slot?.occupied === true ? slot.value : undefined;
  }

  getMut(index: number): T | undefined {
    if (this.get(index) === undefined) return undefined;

    const slot = this.#slots.getMut(index);
    return slot?.occupied === true ? slot.value : undefined;
  }

  /**
   * Replace the value in an occupied slot
   * @throws {IndexOutOfBoundsError} If the slot is vacant or was never allocated
   */
  replace(index: number, value: T): T {
    const old = this.get(index);
    if (old === undefined) {
      throw new IndexOutOfBoundsError(index, this.#slots.len());
    }
    this.#slots.set(index, { occupied: true, value });
    return old;
  }

  /**
   * Store a value in the free-list head, or a new slot if there is none
   * @returns The value's index
   */
  insert(value: T): number {
    const state = this.#current();

    if (state.firstFree === null) {
      const index = this.#slots.len();
      this.#slots.push({ occupied: true, value });
      this.#update({ firstFree: null, occupiedCount: state.occupiedCount + 1 });
      return index;
    }

    const index = state.firstFree;
    const head = this.#slots.get(index);
    if (!head || head.occupied) {
      throw new InconsistentStateError(
        `free list 0x${toHex(this.prefix)} head ${index} is not a vacant slot`
      );
    }
    this.#slots.set(index, { occupied: true, value });
    this.#update({ firstFree: head.nextFree, occupiedCount: state.occupiedCount + 1 });
    return index;
  }

  /**
   * Free a slot, making it the next one insert() reuses
   * @returns The removed value, or undefined if the slot was not occupied
   */
  remove(index: number): T | undefined {
    const slot = this.#slots.get(index);
    if (slot?.occupied !== true) return undefined;

    const state = this.#current();
    this.#slots.set(index, { occupied: false, nextFree: state.firstFree });
    this.#update({ firstFree: index, occupiedCount: state.occupiedCount - 1 });
    return slot.value;
  }

  /**
   * Occupied slots as [index, value], skipping vacant ones
   *
   * Freeing a slot other than the one just yielded is safe mid-iteration.
   */
  *entries(direction: Direction = "forward"): Generator<[number, T]> {
    if (direction === "forward") {
      for (let i = 0; i < this.#slots.len(); i++) {
        const slot = this.#slots.get(i);
        if (slot?.occupied === true) yield [i, slot.value];
      }
      return;
    }

    for (let i = this.#slots.len() - 1; i >= 0; i--) {
      const slot = this.#slots.get(i);
      if (slot?.occupied === true) yield [i, slot.value];
    }
  }

  *values(direction: Direction = "forward"): Generator<T> {
    for (const [, value] of this.entries(direction)) {
      yield value;
    }
  }

  clear(): void {
    this.#slots.clear();
    this.#state.set(undefined);
  }

  /**
   * Remove every value
   * @returns The removed values in index order
   */
  drain(): T[] {
    const values = [...this.values()];
    this.clear();
    return values;
  }

  prepareFlush(): FlushPlan {
    return mergePlans([this.#slots.prepareFlush(), this.#state.prepareFlush()]);
  }

  flush(): void {
    this.#slots.flush();
    this.#state.flush();
  }

  discard(): void {
    this.#slots.discard();
    this.#state.discard();
  }

  cacheStats(): CacheStats {
    return this.#slots.cacheStats();
  }
}
