/**
 * Little-endian binary writer/reader used by the built-in codecs
 *
 * Layout conventions: fixed-width little-endian integers, u32 length prefixes for
 * variable-length data, a one-byte tag (0 = absent, 1 = present) for options.
 */

import { CodecError } from "../errors.js";

const MAX_U32 = 0xffff_ffff;

export class BinaryWriter {
  #buf: Uint8Array;
  #view: DataView;
  #len = 0;

  constructor(capacity = 64) {
    this.#buf = new Uint8Array(capacity);
    this.#view = new DataView(this.#buf.buffer);
  }

  #reserve(extra: number): void {
    const needed = this.#len + extra;
    if (needed <= this.#buf.length) return;

    let capacity = this.#buf.length * 2;
    while (capacity < needed) capacity *= 2;

    const next = new Uint8Array(capacity);
    next.set(this.#buf.subarray(0, this.#len));
    this.#buf = next;
    this.#view = new DataView(next.buffer);
  }

  u8(value: number): this {
    if (!Number.isInteger(value) || value < 0 || value > 0xff) {
      throw new CodecError(`u8 out of range: ${value}`);
    }
    this.#reserve(1);
    this.#view.setUint8(this.#len, value);
    this.#len += 1;
    return this;
  }

  u32(value: number): this {
    if (!Number.isInteger(value) || value < 0 || value > MAX_U32) {
      throw new CodecError(`u32 out of range: ${value}`);
    }
    this.#reserve(4);
    this.#view.setUint32(this.#len, value, true);
    this.#len += 4;
    return this;
  }

  u64(value: bigint): this {
    if (value < 0n || value > 0xffff_ffff_ffff_ffffn) {
      throw new CodecError(`u64 out of range: ${value}`);
    }
    this.#reserve(8);
    this.#view.setBigUint64(this.#len, value, true);
    this.#len += 8;
    return this;
  }

  i64(value: bigint): this {
    if (value < -(2n ** 63n) || value >= 2n ** 63n) {
      throw new CodecError(`i64 out of range: ${value}`);
    }
    this.#reserve(8);
    this.#view.setBigInt64(this.#len, value, true);
    this.#len += 8;
    return this;
  }

  /** Raw bytes, no length prefix */
  raw(bytes: Uint8Array): this {
    this.#reserve(bytes.length);
    this.#buf.set(bytes, this.#len);
    this.#len += bytes.length;
    return this;
  }

  /** u32 length prefix followed by the bytes */
  bytes(bytes: Uint8Array): this {
    return this.u32(bytes.length).raw(bytes);
  }

  finish(): Uint8Array {
    return this.#buf.slice(0, this.#len);
  }
}

export class BinaryReader {
  #bytes: Uint8Array;
  #view: DataView;
  #pos = 0;

  constructor(bytes: Uint8Array) {
    this.#bytes = bytes;
    this.#view = new DataView(bytes.buffer, bytes.byteOffset, bytes.byteLength);
  }

  get remaining(): number {
    return this.#bytes.length - this.#pos;
  }

  #need(n: number): void {
    if (this.remaining < n) {
      throw new CodecError(`unexpected end of input: need ${n} byte(s) at offset ${this.#pos}`);
    }
  }

  u8(): number {
    this.#need(1);
    const value = this.#view.getUint8(this.#pos);
    this.#pos += 1;
    return value;
  }

  u32(): number {
    this.#need(4);
    const value = this.#view.getUint32(this.#pos, true);
    this.#pos += 4;
    return value;
  }

  u64(): bigint {
    this.#need(8);
    const value = this.#view.getBigUint64(this.#pos, true);
    this.#pos += 8;
    return value;
  }

  i64(): bigint {
    this.#need(8);
    const value = this.#view.getBigInt64(this.#pos, true);
    this.#pos += 8;
    return value;
  }

  raw(length: number): Uint8Array {
    this.#need(length);
    const out = this.#bytes.slice(this.#pos, this.#pos + length);
    this.#pos += length;
    return out;
  }

  /** Everything not yet consumed */
  rest(): Uint8Array {
    return this.raw(this.remaining);
  }

  bytes(): Uint8Array {
    return this.raw(this.u32());
  }

  /** Option tag: true if a value follows */
  tag(): boolean {
    const tag = this.u8();
    if (tag > 1) {
      throw new CodecError(`invalid option tag ${tag}`);
    }
    return tag === 1;
  }

  /**
   * Assert the whole input was consumed
   */
  end(): void {
    if (this.remaining !== 0) {
      throw new CodecError(`${this.remaining} trailing byte(s)`);
    }
  }
}
