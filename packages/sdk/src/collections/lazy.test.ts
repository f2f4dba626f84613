/**
 * Tests for Lazy and LazyOption
 */

import { describe, it, expect, beforeEach } from "vitest";
import { z } from "zod";
import { Lazy } from "./lazy.js";
import { LazyOption } from "./lazy-option.js";
import { MemoryStorage } from "../storage/memory.js";
import { RecordingStorage } from "../storage/recording.js";
import * as codecs from "../codec/codecs.js";
import { toBytes } from "../bytes.js";
import { InconsistentStateError, MissingValueError } from "../errors.js";

describe("Lazy", () => {
  let inner: MemoryStorage;
  let storage: RecordingStorage;

  beforeEach(() => {
    inner = new MemoryStorage();
    storage = new RecordingStorage(inner);
  });

  const stored = (value: number): void => {
    inner.write(toBytes("total"), codecs.u32.encode(value));
  };

  it("should not touch storage on construction", () => {
    new Lazy(storage, "total", { value: codecs.u32 });
    expect(storage.calls).toEqual([]);
  });

  it("should read exactly once across repeated gets", () => {
    stored(7);
    const cell = new Lazy(storage, "total", { value: codecs.u32 });

    expect(cell.get()).toBe(7);
    expect(cell.get()).toBe(7);
    expect(cell.get()).toBe(7);
    cell.flush();

    expect(storage.counts()).toEqual({ read: 1, write: 0, remove: 0, has: 0 });
  });

  it("should write exactly once at flush after set", () => {
    stored(7);
    const cell = new Lazy(storage, "total", { value: codecs.u32 });

    cell.get();
    cell.set(8);
    cell.set(9);
    cell.flush();
    cell.flush();

    expect(storage.counts()).toEqual({ read: 1, write: 1, remove: 0, has: 0 });
    expect(inner.read(toBytes("total"))).toEqual(codecs.u32.encode(9));
  });

  it("should set without reading", () => {
    const cell = new Lazy(storage, "total", { value: codecs.u32 });
    cell.set(3);
    expect(cell.get()).toBe(3);
    expect(storage.calls).toEqual([]);
  });

  it("should throw MissingValueError when nothing was stored", () => {
    const cell = new Lazy(storage, "total", { value: codecs.u32 });
    expect(() => cell.get()).toThrow(MissingValueError);
    expect(() => cell.get()).toThrow(/0x746f74616c/);
  });

  it("should raise InconsistentStateError for undecodable bytes", () => {
    inner.write(toBytes("total"), Uint8Array.of(1));
    const cell = new Lazy(storage, "total", { value: codecs.u32 });
    expect(() => cell.get()).toThrow(InconsistentStateError);
  });

  it("should hold an initial value until flush", () => {
    const cell = Lazy.init(storage, "total", { value: codecs.u32 }, 1);
    expect(cell.isLoaded).toBe(true);
    expect(cell.get()).toBe(1);
    expect(storage.calls).toEqual([]);

    cell.flush();
    expect(storage.counts().write).toBe(1);
  });

  it("should apply update functions", () => {
    stored(2);
    const cell = new Lazy(storage, "total", { value: codecs.u32 });
    expect(cell.update((n) => n * 10)).toBe(20);
    cell.flush();

    expect(new Lazy(inner, "total", { value: codecs.u32 }).get()).toBe(20);
  });

  it("should write back in-place mutation", () => {
    const config = codecs.json(z.object({ tags: z.array(z.string()) }));
    const cell = Lazy.init(inner, "cfg", { value: config }, { tags: ["a"] });
    cell.flush();

    const reopened = new Lazy(inner, "cfg", { value: config });
    reopened.getMut().tags.push("b");
    reopened.flush();

    expect(new Lazy(inner, "cfg", { value: config }).get()).toEqual({ tags: ["a", "b"] });
  });

  it("should forget unflushed changes on discard", () => {
    stored(1);
    const cell = new Lazy(storage, "total", { value: codecs.u32 });
    cell.set(5);
    cell.discard();

    expect(cell.isLoaded).toBe(false);
    expect(cell.get()).toBe(1);
  });
});

describe("LazyOption", () => {
  let inner: MemoryStorage;
  let storage: RecordingStorage;

  beforeEach(() => {
    inner = new MemoryStorage();
    storage = new RecordingStorage(inner);
  });

  const open = (): LazyOption<string> => new LazyOption(storage, "owner", { value: codecs.string });

  it("should report an absent key as empty", () => {
    const cell = open();
    expect(cell.get()).toBeUndefined();
    expect(cell.isNone()).toBe(true);
    expect(cell.isSome()).toBe(false);
    expect(storage.counts().read).toBe(1);
  });

  it("should store and reload a value", () => {
    const cell = open();
    cell.set("alice");
    cell.flush();

    const reopened = open();
    expect(reopened.get()).toBe("alice");
    expect(reopened.isSome()).toBe(true);
  });

  it("should remove the key when cleared", () => {
    const cell = open();
    cell.set("alice");
    cell.flush();

    const reopened = open();
    reopened.set(undefined);
    reopened.flush();

    expect(inner.has(toBytes("owner"))).toBe(false);
    expect(storage.counts().remove).toBe(1);
  });

  it("should take the value and leave the cell empty", () => {
    LazyOption.init(inner, "owner", { value: codecs.string }, "bob").flush();

    const cell = open();
    expect(cell.take()).toBe("bob");
    expect(cell.get()).toBeUndefined();
    expect(cell.take()).toBeUndefined();
    cell.flush();

    expect(inner.has(toBytes("owner"))).toBe(false);
  });

  it("should return the previous value from replace", () => {
    const cell = open();
    expect(cell.replace("a")).toBeUndefined();
    expect(cell.replace("b")).toBe("a");
    expect(cell.get()).toBe("b");
  });

  it("should report whether remove found a value", () => {
    const cell = open();
    expect(cell.remove()).toBe(false);
    cell.set("a");
    expect(cell.remove()).toBe(true);
    expect(cell.isNone()).toBe(true);
  });

  it("should not write when nothing changed", () => {
    const cell = open();
    cell.get();
    cell.set(undefined);
    cell.flush();
    expect(storage.counts()).toEqual({ read: 1, write: 0, remove: 0, has: 0 });
  });

  it("should not touch storage when never used", () => {
    const cell = open();
    cell.flush();
    expect(storage.calls).toEqual([]);
  });
});
