/**
 * Tests for IterableMap
 */

import { describe, it, expect, beforeEach, vi } from "vitest";
import { z } from "zod";
import { IterableMap } from "./iterable-map.js";
import { MemoryStorage } from "../storage/memory.js";
import * as codecs from "../codec/codecs.js";
import { InconsistentStateError } from "../errors.js";

// Small deterministic PRNG (mulberry32) for repeatable operation sequences
function seeded(seed: number): () => number {
  let state = seed >>> 0;
  return () => {
    state = (state + 0x6d2b79f5) >>> 0;
    let t = state;
    t = Math.imul(t ^ (t >>> 15), t | 1);
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  };
}

describe("IterableMap", () => {
  let storage: MemoryStorage;

  const open = (): IterableMap<number, string> =>
    new IterableMap(storage, "im", { key: codecs.u32, value: codecs.string });

  beforeEach(() => {
    storage = new MemoryStorage();
  });

  describe("Map operations", () => {
    it("should insert, get and count entries", () => {
      const map = open();
      expect(map.insert(1, "a")).toBeUndefined();
      expect(map.insert(2, "b")).toBeUndefined();

      expect(map.get(1)).toBe("a");
      expect(map.get(3)).toBeUndefined();
      expect(map.contains(2)).toBe(true);
      expect(map.len()).toBe(2);
    });

    it("should forget removed keys", () => {
      const map = open();
      map.insert(1, "a");
      expect(map.remove(1)).toBe("a");
      expect(map.remove(1)).toBeUndefined();
      expect(map.get(1)).toBeUndefined();
      expect(map.isEmpty()).toBe(true);
    });

    it("should return the removed pair from removeEntry", () => {
      const map = open();
      map.insert(4, "d");
      expect(map.removeEntry(4)).toEqual([4, "d"]);
    });

    it("should persist across instances", () => {
      const map = open();
      map.insert(1, "a");
      map.insert(2, "b");
      map.flush();

      const reopened = open();
      expect(reopened.len()).toBe(2);
      expect(reopened.get(2)).toBe("b");
      expect([...reopened.keys()]).toEqual([1, 2]);
    });
  });

  describe("Index stability", () => {
    it("should keep a key's index when its value is replaced", () => {
      const map = open();
      map.insert(1, "a");
      map.insert(2, "b");
      const index = map.indexOf(2);

      expect(map.insert(2, "B")).toBe("b");
      expect(map.indexOf(2)).toBe(index);
      expect(map.entryAt(1)).toEqual([2, "B"]);
    });

    it("should not move other entries when one is removed", () => {
      const map = open();
      map.insert(1, "a");
      map.insert(2, "b");
      map.insert(3, "c");
      map.remove(2);

      expect(map.indexOf(1)).toBe(0);
      expect(map.indexOf(3)).toBe(2);
      expect(map.entryAt(1)).toBeUndefined();
    });

    it("should reuse the freed index for the next new key", () => {
      const map = open();
      map.insert(1, "a");
      map.insert(2, "b");
      map.remove(1);
      map.insert(9, "z");

      expect(map.indexOf(9)).toBe(0);
    });
  });

  describe("Iteration", () => {
    it("should iterate in slot order both ways", () => {
      const map = open();
      map.insert(10, "a");
      map.insert(20, "b");
      map.insert(30, "c");
      map.remove(10);
      map.insert(40, "d");

      expect([...map]).toEqual([
        [40, "d"],
        [20, "b"],
        [30, "c"],
      ]);
      expect([...map.values("backward")]).toEqual(["c", "b", "d"]);
    });

    it("should allow removing a key other than the current one", () => {
      const map = open();
      for (let k = 1; k <= 4; k++) map.insert(k, `v${k}`);

      const seen: number[] = [];
      for (const [key] of map.entries()) {
        seen.push(key);
        if (key === 1) map.remove(3);
      }
      expect(seen).toEqual([1, 2, 4]);
      map.checkInvariants();
    });
  });

  describe("Yielded pairs", () => {
    it("should hand out copies, so reassigning a key leaves the index intact", () => {
      const map = open();
      map.insert(1, "a");
      map.insert(2, "b");

      for (const entry of map.entries()) entry[0] = 99;
      const first = map.entryAt(0);
      if (first) first[0] = 42;

      expect([...map.keys()]).toEqual([1, 2]);
      expect(map.entryAt(0)).toEqual([1, "a"]);
      expect(() => map.checkInvariants()).not.toThrow();
    });
  });

  describe("Mutable iteration", () => {
    const counter = codecs.json(z.object({ n: z.number() }));
    const openCounters = () => new IterableMap(storage, "c", { key: codecs.u32, value: counter });

    beforeEach(() => {
      const map = openCounters();
      map.insert(1, { n: 1 });
      map.insert(2, { n: 2 });
      map.flush();
    });

    it("should write back values changed through entriesMut", () => {
      const map = openCounters();
      for (const [key, value] of map.entriesMut()) value.n = key * 100;
      map.flush();

      const reopened = openCounters();
      expect(reopened.get(1)).toEqual({ n: 100 });
      expect(reopened.get(2)).toEqual({ n: 200 });
    });

    it("should write back values changed through valuesMut", () => {
      const map = openCounters();
      for (const value of map.valuesMut("backward")) value.n += 1;
      map.flush();

      expect([...openCounters().values()]).toEqual([{ n: 2 }, { n: 3 }]);
    });

    it("should mark slots modified only for mutable iteration", () => {
      const map = openCounters();
      expect([...map.entries()]).toHaveLength(2);
      expect(map.cacheStats().modified).toBe(0);

      expect([...map.entriesMut()]).toHaveLength(2);
      expect(map.cacheStats().modified).toBe(2);
    });

    it("should persist a value mutated through an entry", () => {
      const map = openCounters();
      map.entry(1).orInsertWith(() => ({ n: 0 })).n += 5;
      map.entry(3).orInsertWith(() => ({ n: 0 })).n += 7;
      map.flush();

      const reopened = openCounters();
      expect(reopened.get(1)).toEqual({ n: 6 });
      expect(reopened.get(3)).toEqual({ n: 7 });
      reopened.checkInvariants();
    });
  });

  describe("Entry API", () => {
    it("should insert into a vacant key and return the existing value otherwise", () => {
      const map = open();
      expect(map.entry(1).isOccupied()).toBe(false);
      expect(map.entry(1).orInsert("a")).toBe("a");
      expect(map.entry(1).orInsert("b")).toBe("a");

      expect(map.get(1)).toBe("a");
      expect(map.entry(1).isOccupied()).toBe(true);
    });

    it("should call the factory only for a vacant key", () => {
      const map = open();
      map.insert(1, "a");
      const make = vi.fn(() => "made");

      expect(map.entry(1).orInsertWith(make)).toBe("a");
      expect(make).not.toHaveBeenCalled();
      expect(map.entry(2).orInsertWith(make)).toBe("made");
      expect(make).toHaveBeenCalledTimes(1);
      expect(map.entry(3).orInsertWithKey((key) => `k${key}`)).toBe("k3");
    });

    it("should count occurrences with andModify and orInsert", () => {
      const counts = new IterableMap(storage, "w", { key: codecs.string, value: codecs.u32 });
      for (const word of ["a", "b", "a", "a"]) {
        counts.entry(word).andModify((n) => n + 1).orInsert(1);
      }

      expect(counts.get("a")).toBe(3);
      expect(counts.get("b")).toBe(1);
      expect(counts.indexOf("a")).toBe(0);
    });

    it("should replace and remove through the entry", () => {
      const map = open();
      map.insert(1, "a");
      const entry = map.entry(1);

      expect(entry.insert("z")).toBe("a");
      expect(entry.get()).toBe("z");
      expect(entry.remove()).toBe("z");
      expect(entry.get()).toBeUndefined();
      expect(map.len()).toBe(0);
    });
  });

  describe("Bulk operations", () => {
    it("should leave storage empty after clear and flush", () => {
      const map = open();
      map.insert(1, "a");
      map.insert(2, "b");
      map.flush();

      const reopened = open();
      reopened.clear();
      reopened.flush();

      expect(storage.size).toBe(0);
      expect(open().get(1)).toBeUndefined();
    });

    it("should drain every entry", () => {
      const map = open();
      map.insert(1, "a");
      map.insert(2, "b");

      expect(map.drain()).toEqual([
        [1, "a"],
        [2, "b"],
      ]);
      expect(map.contains(1)).toBe(false);
      expect(map.len()).toBe(0);
    });

    it("should retain matching entries", () => {
      const map = open();
      for (let k = 1; k <= 6; k++) map.insert(k, `v${k}`);
      map.retain((key) => key % 3 === 0);

      expect([...map.keys()]).toEqual([3, 6]);
      map.checkInvariants();
    });
  });

  describe("Invariants", () => {
    it("should hold the bijection after random inserts and removes", () => {
      const map = open();
      const model = new Map<number, string>();
      const random = seeded(42);

      for (let step = 0; step < 2000; step++) {
        const key = Math.floor(random() * 200);
        if (random() < 0.6) {
          const value = `s${step}`;
          expect(map.insert(key, value)).toBe(model.get(key));
          model.set(key, value);
        } else {
          expect(map.remove(key)).toBe(model.get(key));
          model.delete(key);
        }
      }

      map.checkInvariants();
      expect(map.len()).toBe(model.size);
      expect(new Map(map.entries())).toEqual(model);

      map.flush();
      const reopened = open();
      reopened.checkInvariants();
      expect(new Map(reopened.entries())).toEqual(model);
    });

    it("should raise InconsistentStateError when the index points at a vacant slot", () => {
      const map = open();
      map.insert(1, "a");
      map.flush();

      // "imm" ++ u32le(2) -> slot 5, which was never allocated
      storage.write(Uint8Array.of(0x69, 0x6d, 0x6d, 2, 0, 0, 0), codecs.u32.encode(5));

      const reopened = open();
      expect(() => reopened.get(2)).toThrow(InconsistentStateError);
      expect(() => reopened.remove(2)).toThrow(InconsistentStateError);
    });
  });
});
