import { describe, it, expect, beforeEach, afterEach, vi } from "vitest";
import { openStore } from "./store.js";
import { MemoryStorage } from "./storage/memory.js";
import * as codecs from "./codec/codecs.js";
import { naturalOrder } from "./collections/tree-map.js";
import { toBytes } from "./bytes.js";
import { StoreClosedError } from "./errors.js";
import type { Store } from "./types.js";

describe("Store", () => {
  let storage: MemoryStorage;
  let store: Store;

  beforeEach(() => {
    storage = new MemoryStorage();
    store = openStore({ storage });
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  describe("factories", () => {
    it("should create every container over the store's backend", () => {
      store.lookupMap("a", { key: codecs.string, value: codecs.u32 }).insert("x", 1);
      store.lookupSet("b", { value: codecs.string }).insert("x");
      store.vector("c", { value: codecs.u32 }).push(1);
      store.iterableMap("d", { key: codecs.string, value: codecs.u32 }).insert("x", 1);
      store.iterableSet("e", { value: codecs.string }).insert("x");
      store.treeMap("f", { key: codecs.u32, value: codecs.u32, compare: naturalOrder }).insert(1, 1);
      store.lazy("g", { value: codecs.u32 }).set(1);
      store.lazyOption("h", { value: codecs.u32 }).set(1);

      expect(store.storage).toBe(storage);
      expect(store.stats().containers).toBe(8);
      expect(storage.size).toBe(0);

      store.flush();
      expect(storage.size).toBeGreaterThan(8);
    });

    it("should apply the default hasher where a container names none", () => {
      const hashed = openStore({ storage, defaultHasher: "keccak256" });

      expect(hashed.lookupMap("m", { key: codecs.u32, value: codecs.u32 }).hasher).toBe(
        "keccak256"
      );
      expect(
        hashed.lookupMap("n", { key: codecs.u32, value: codecs.u32, hasher: "identity" }).hasher
      ).toBe("identity");
    });

    it("should leave each container's own default without a store default", () => {
      expect(store.lookupMap("m", { key: codecs.u32, value: codecs.u32 }).hasher).toBe("identity");
    });

    it("should apply the default cache bound", () => {
      const bounded = openStore({ storage, cacheSize: 2 });
      const map = bounded.lookupMap("m", { key: codecs.u32, value: codecs.u32 });
      for (let k = 0; k < 5; k++) map.get(k);

      expect(map.cacheStats()).toMatchObject({ size: 2, evicted: 3, misses: 5 });
    });

    it("should warn when a prefix is reused", () => {
      const warn = vi.spyOn(console, "warn").mockImplementation(() => {});
      store.vector("p", { value: codecs.u32 });
      store.lookupMap("p", { key: codecs.u32, value: codecs.u32 });

      expect(warn).toHaveBeenCalledTimes(1);
      expect(warn).toHaveBeenCalledWith(expect.stringContaining("[store.prefix.duplicate]"));
      expect(warn).toHaveBeenCalledWith(
        expect.stringContaining("lookup_map@70 prefix already used by a vector")
      );
    });
  });

  describe("transact()", () => {
    it("should flush every container when the call returns", () => {
      const counter = store.lazy("n", { value: codecs.u32 });
      const result = store.transact(() => {
        counter.set(1);
        return "done";
      });

      expect(result).toBe("done");
      expect(storage.read(toBytes("n"))).toEqual(codecs.u32.encode(1));
    });

    it("should discard every change when the call throws", () => {
      vi.spyOn(console, "warn").mockImplementation(() => {});
      const counter = store.lazy("n", { value: codecs.u32 });
      const names = store.vector("v", { value: codecs.string });
      store.transact(() => counter.set(1));

      expect(() =>
        store.transact(() => {
          counter.set(2);
          names.push("ghost");
          throw new Error("boom");
        })
      ).toThrow("boom");

      expect(storage.read(toBytes("n"))).toEqual(codecs.u32.encode(1));
      expect(counter.get()).toBe(1);
      expect(names.len()).toBe(0);
    });

    it("should log an aborted call", () => {
      const warn = vi.spyOn(console, "warn").mockImplementation(() => {});
      expect(() =>
        store.transact(() => {
          throw new Error("boom");
        })
      ).toThrow("boom");

      expect(warn).toHaveBeenCalledWith(expect.stringContaining("[store.transact.abort] boom"));
    });

    it("should let a nested call join the enclosing one", () => {
      const counter = store.lazy("n", { value: codecs.u32 });

      store.transact(() => {
        store.transact(() => counter.set(5));
        expect(store.stats().inTransaction).toBe(true);
        expect(storage.size).toBe(0);
      });

      expect(store.stats().inTransaction).toBe(false);
      expect(storage.read(toBytes("n"))).toEqual(codecs.u32.encode(5));
    });

    it("should keep a nested call's changes when the enclosing call recovers", () => {
      const counter = store.lazy("n", { value: codecs.u32 });

      store.transact(() => {
        try {
          store.transact(() => {
            counter.set(7);
            throw new Error("inner");
          });
        } catch {
          // the enclosing call decides
        }
      });

      expect(storage.read(toBytes("n"))).toEqual(codecs.u32.encode(7));
    });
  });

  describe("discard()", () => {
    it("should drop unflushed changes", () => {
      const map = store.iterableMap("m", { key: codecs.string, value: codecs.u32 });
      map.insert("a", 1);
      store.discard();

      expect(map.len()).toBe(0);
      expect(storage.size).toBe(0);
    });
  });

  describe("close()", () => {
    it("should flush pending changes", () => {
      store.lazyOption("o", { value: codecs.string }).set("kept");
      store.close();
      expect(storage.read(toBytes("o"))).toEqual(codecs.string.encode("kept"));
    });

    it("should refuse further use", () => {
      store.close();
      store.close();

      expect(() => store.vector("v", { value: codecs.u32 })).toThrow(StoreClosedError);
      expect(() => store.flush()).toThrow(StoreClosedError);
      expect(() => store.transact(() => 1)).toThrow("Store is closed");
    });
  });

  describe("stats()", () => {
    it("should sum cache statistics across containers", () => {
      const left = store.lookupMap("l", { key: codecs.u32, value: codecs.u32 });
      const right = store.lookupMap("r", { key: codecs.u32, value: codecs.u32 });
      left.get(1);
      left.get(1);
      right.insert(2, 2);
      store.lazy("cell", { value: codecs.u32 });

      const stats = store.stats();
      expect(stats.containers).toBe(3);
      expect(stats.cache).toMatchObject({ size: 2, modified: 1, hits: 1, misses: 2 });
      expect(stats.cache.hitRate).toBeCloseTo(1 / 3);
      expect(stats.inTransaction).toBe(false);
    });
  });
});
