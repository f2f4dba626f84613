/**
 * Tests for TreeMap
 */

import { describe, it, expect, beforeEach, vi } from "vitest";
import { z } from "zod";
import { TreeMap, naturalOrder, nodeCodec } from "./tree-map.js";
import { MemoryStorage } from "../storage/memory.js";
import * as codecs from "../codec/codecs.js";
import { toHex } from "../bytes.js";
import { InconsistentStateError } from "../errors.js";

describe("TreeMap", () => {
  let storage: MemoryStorage;

  const open = (): TreeMap<number, string> =>
    new TreeMap(storage, "t", {
      key: codecs.u32,
      value: codecs.string,
      compare: naturalOrder,
    });

  const filled = (count: number): TreeMap<number, string> => {
    const map = open();
    for (let k = 1; k <= count; k++) map.insert(k, `v${k}`);
    return map;
  };

  beforeEach(() => {
    storage = new MemoryStorage();
  });

  describe("Map operations", () => {
    it("should order keys and replace values of repeated keys", () => {
      const map = open();
      expect(map.insert(5, "a")).toBeUndefined();
      expect(map.insert(1, "b")).toBeUndefined();
      expect(map.insert(4, "c")).toBeUndefined();
      expect(map.insert(1, "d")).toBe("b");
      expect(map.insert(5, "e")).toBe("a");
      expect(map.insert(9, "f")).toBeUndefined();

      expect(map.len()).toBe(4);
      expect([...map]).toEqual([
        [1, "d"],
        [4, "c"],
        [5, "e"],
        [9, "f"],
      ]);
      expect(map.min()).toEqual([1, "d"]);
      expect(map.max()).toEqual([9, "f"]);
    });

    it("should remove keys and keep the rest ordered", () => {
      const map = filled(6);
      expect(map.remove(3)).toBe("v3");
      expect(map.remove(3)).toBeUndefined();
      expect(map.contains(3)).toBe(false);
      expect([...map.keys()]).toEqual([1, 2, 4, 5, 6]);
      expect(map.checkInvariants().size).toBe(5);
    });

    it("should report empty bounds on an empty map", () => {
      const map = open();
      expect(map.isEmpty()).toBe(true);
      expect(map.min()).toBeUndefined();
      expect(map.max()).toBeUndefined();
      expect(map.floor(3)).toBeUndefined();
      expect([...map]).toEqual([]);
    });

    it("should order string keys", () => {
      const map = new TreeMap(storage, "s", {
        key: codecs.string,
        value: codecs.u32,
        compare: naturalOrder,
      });
      map.insert("pear", 1);
      map.insert("apple", 2);
      map.insert("fig", 3);
      expect([...map.keys()]).toEqual(["apple", "fig", "pear"]);
      expect([...map.values("backward")]).toEqual([1, 3, 2]);
    });

    it("should write back in-place mutation through getMut", () => {
      const counter = codecs.json(z.object({ hits: z.number() }));
      const map = new TreeMap(storage, "c", { key: codecs.u32, value: counter, compare: naturalOrder });
      map.insert(1, { hits: 0 });
      map.flush();

      const reopened = new TreeMap(storage, "c", {
        key: codecs.u32,
        value: counter,
        compare: naturalOrder,
      });
      const entry = reopened.getMut(1);
      if (entry) entry.hits += 1;
      reopened.flush();

      expect(
        new TreeMap(storage, "c", { key: codecs.u32, value: counter, compare: naturalOrder }).get(1)
      ).toEqual({ hits: 1 });
    });
  });

  describe("Key-value access", () => {
    it("should return the pair for a present key", () => {
      const map = filled(3);
      expect(map.getKeyValue(2)).toEqual([2, "v2"]);
      expect(map.getKeyValue(7)).toBeUndefined();
    });

    it("should remove a key and return its pair", () => {
      const map = filled(3);
      expect(map.removeEntry(2)).toEqual([2, "v2"]);
      expect(map.removeEntry(2)).toBeUndefined();
      expect([...map.keys()]).toEqual([1, 3]);
      expect(map.checkInvariants().size).toBe(2);
    });
  });

  describe("Entry API", () => {
    it("should insert only into a vacant key", () => {
      const map = filled(2);
      const make = vi.fn(() => "new");

      expect(map.entry(2).orInsertWith(make)).toBe("v2");
      expect(make).not.toHaveBeenCalled();
      expect(map.entry(5).orInsert("v5")).toBe("v5");
      expect([...map.keys()]).toEqual([1, 2, 5]);
      expect(map.checkInvariants().size).toBe(3);
    });

    it("should update an occupied key in place of inserting", () => {
      const map = filled(2);
      map.entry(1).andModify((value) => value.toUpperCase()).orInsert("unused");
      map.entry(9).andModify((value) => value.toUpperCase()).orInsert("v9");

      expect(map.get(1)).toBe("V1");
      expect(map.get(9)).toBe("v9");
      expect(map.len()).toBe(3);
    });
  });

  describe("Mutable iteration", () => {
    const counter = codecs.json(z.object({ hits: z.number() }));
    const openCounters = () =>
      new TreeMap(storage, "c", { key: codecs.u32, value: counter, compare: naturalOrder });

    beforeEach(() => {
      const map = openCounters();
      for (let k = 1; k <= 5; k++) map.insert(k, { hits: k });
      map.flush();
    });

    it("should write back values changed through entriesMut", () => {
      const map = openCounters();
      for (const [key, value] of map.entriesMut("backward")) value.hits = key * 10;
      map.flush();

      const hits = [...openCounters().values()].map((value) => value.hits);
      expect(hits).toEqual([10, 20, 30, 40, 50]);
    });

    it("should write back only the values inside a mutable range", () => {
      const map = openCounters();
      for (const [, value] of map.rangeMut({ from: 2, to: 4 })) value.hits = 0;
      expect(map.cacheStats().modified).toBe(2);
      map.flush();

      const hits = [...openCounters().values()].map((value) => value.hits);
      expect(hits).toEqual([1, 0, 0, 4, 5]);
    });

    it("should write back values changed through valuesMut", () => {
      const map = openCounters();
      for (const value of map.valuesMut()) value.hits += 1;
      map.flush();

      expect(openCounters().get(5)).toEqual({ hits: 6 });
    });

    it("should leave values untouched by read-only iteration clean", () => {
      const map = openCounters();
      expect([...map.entries()]).toHaveLength(5);
      expect(map.cacheStats().modified).toBe(0);
    });
  });

  describe("Neighbor queries", () => {
    let map: TreeMap<number, string>;

    beforeEach(() => {
      map = open();
      map.insert(10, "a");
      map.insert(20, "b");
      map.insert(30, "c");
    });

    it("should find floor and ceiling", () => {
      expect(map.floor(25)).toEqual([20, "b"]);
      expect(map.floor(20)).toEqual([20, "b"]);
      expect(map.floor(5)).toBeUndefined();
      expect(map.ceiling(21)).toEqual([30, "c"]);
      expect(map.ceiling(31)).toBeUndefined();
    });

    it("should find strict lower and higher keys", () => {
      expect(map.lower(20)).toEqual([10, "a"]);
      expect(map.lower(10)).toBeUndefined();
      expect(map.higher(20)).toEqual([30, "c"]);
      expect(map.higher(30)).toBeUndefined();
    });
  });

  describe("Ranges", () => {
    let map: TreeMap<number, string>;

    const keysOf = (entries: Iterable<[number, string]>): number[] =>
      [...entries].map(([key]) => key);

    beforeEach(() => {
      map = filled(10);
    });

    it("should default to a half-open ascending range", () => {
      expect(keysOf(map.range({ from: 3, to: 6 }))).toEqual([3, 4, 5]);
    });

    it("should honor inclusive and exclusive bounds", () => {
      expect(keysOf(map.range({ from: 3, to: 6, toInclusive: true }))).toEqual([3, 4, 5, 6]);
      expect(keysOf(map.range({ from: 3, to: 6, fromInclusive: false }))).toEqual([4, 5]);
    });

    it("should iterate a range backward", () => {
      expect(keysOf(map.range({ from: 3, to: 6, direction: "backward" }))).toEqual([5, 4, 3]);
    });

    it("should leave a missing bound open", () => {
      expect(keysOf(map.range({ from: 8 }))).toEqual([8, 9, 10]);
      expect(keysOf(map.range({ to: 3 }))).toEqual([1, 2]);
      expect(keysOf(map.range())).toHaveLength(10);
    });

    it("should iterate entries backward", () => {
      expect(keysOf(map.entries("backward")).slice(0, 3)).toEqual([10, 9, 8]);
    });
  });

  describe("Persistence", () => {
    it("should reload the same ordered contents", () => {
      const map = open();
      for (const key of [8, 3, 11, 1, 6, 14, 4, 7, 13]) map.insert(key, `v${key}`);
      map.flush();

      const reopened = open();
      expect(reopened.len()).toBe(9);
      expect([...reopened.keys()]).toEqual([1, 3, 4, 6, 7, 8, 11, 13, 14]);
      expect(reopened.checkInvariants().size).toBe(9);
      expect(reopened.floor(12)).toEqual([11, "v11"]);
    });

    it("should leave storage empty after clear and flush", () => {
      filled(5).flush();

      const reopened = open();
      reopened.clear();
      expect(reopened.len()).toBe(0);
      reopened.flush();

      expect(storage.size).toBe(0);
      expect(open().get(1)).toBeUndefined();
    });

    it("should derive value keys with sha256 by default", () => {
      const map = open();
      map.insert(1, "a");
      map.flush();

      const valueKeys = [...storage.snapshot().keys()].filter((hex) => hex.startsWith("7476"));
      expect(valueKeys).toHaveLength(1);
      expect(valueKeys[0]?.length).toBe((2 + 32) * 2);
    });

    it("should store the root index under the metadata key", () => {
      const map = open();
      map.insert(1, "a");
      map.flush();

      expect(storage.read(Uint8Array.of(0x74, 0xff))).toEqual(codecs.u32.encode(0));
    });
  });

  describe("Node encoding", () => {
    it("should encode key, children and height", () => {
      const codec = nodeCodec(codecs.u32);
      const node = { key: 7, left: 2, right: null, height: 2 };

      expect(toHex(codec.encode(node))).toBe("040000000700000001020000000002");
      expect(codec.decode(codec.encode(node))).toEqual(node);
    });
  });

  describe("Corruption", () => {
    it("should raise InconsistentStateError for an ordered key without a value", () => {
      const map = new TreeMap(storage, "t", {
        key: codecs.u32,
        value: codecs.string,
        compare: naturalOrder,
        hasher: "identity",
      });
      map.insert(1, "a");
      map.insert(2, "b");
      map.flush();

      // "tv" ++ u32le(1)
      storage.remove(Uint8Array.of(0x74, 0x76, 1, 0, 0, 0));

      const reopened = new TreeMap(storage, "t", {
        key: codecs.u32,
        value: codecs.string,
        compare: naturalOrder,
        hasher: "identity",
      });
      expect(() => reopened.min()).toThrow(InconsistentStateError);
      expect(() => reopened.checkInvariants()).toThrow("orders a key that has no value");
    });
  });
});
