/**
 * Built-in codecs for logical keys and values
 *
 * Integers are little-endian and fixed-width; strings and byte arrays carry a u32
 * length prefix. Every decoder rejects trailing bytes, so decode(encode(v)) == v
 * and malformed input raises CodecError rather than yielding a partial value.
 */

import type { z } from "zod";
import type { Codec } from "../types.js";
import { CodecError } from "../errors.js";
import { BinaryReader, BinaryWriter } from "./binary.js";
import { canonicalStringify } from "./canonical.js";

const utf8Encoder = new TextEncoder();
const utf8Decoder = new TextDecoder("utf-8", { fatal: true });

/**
 * Build a codec from a writer and a reader function
 */
export function binaryCodec<T>(
  write: (writer: BinaryWriter, value: T) => void,
  read: (reader: BinaryReader) => T
): Codec<T> {
  return {
    encode(value: T): Uint8Array {
      const writer = new BinaryWriter();
      write(writer, value);
      return writer.finish();
    },
    decode(bytes: Uint8Array): T {
      const reader = new BinaryReader(bytes);
      const value = read(reader);
      reader.end();
      return value;
    },
  };
}

function decodeUtf8(bytes: Uint8Array): string {
  try {
    return utf8Decoder.decode(bytes);
  } catch (err) {
    throw new CodecError("invalid UTF-8", { cause: err });
  }
}

export const u8: Codec<number> = binaryCodec(
  (w, v) => w.u8(v),
  (r) => r.u8()
);

export const u32: Codec<number> = binaryCodec(
  (w, v) => w.u32(v),
  (r) => r.u32()
);

export const u64: Codec<bigint> = binaryCodec(
  (w, v) => w.u64(v),
  (r) => r.u64()
);

export const i64: Codec<bigint> = binaryCodec(
  (w, v) => w.i64(v),
  (r) => r.i64()
);

export const bool: Codec<boolean> = binaryCodec(
  (w, v) => w.u8(v ? 1 : 0),
  (r) => {
    const byte = r.u8();
    if (byte > 1) throw new CodecError(`invalid bool byte ${byte}`);
    return byte === 1;
  }
);

export const string: Codec<string> = binaryCodec(
  (w, v) => w.bytes(utf8Encoder.encode(v)),
  (r) => decodeUtf8(r.bytes())
);

export const bytes: Codec<Uint8Array> = binaryCodec(
  (w, v) => w.bytes(v),
  (r) => r.bytes()
);

/**
 * Zero-byte value, used for set membership
 */
export const unit: Codec<null> = binaryCodec(
  () => {},
  () => null
);

/**
 * Optional value: one tag byte, then the inner encoding if present
 */
export function option<T>(inner: Codec<T>): Codec<T | null> {
  return binaryCodec<T | null>(
    (w, v) => {
      if (v === null) {
        w.u8(0);
      } else {
        w.u8(1).raw(inner.encode(v));
      }
    },
    (r) => (r.tag() ? inner.decode(r.rest()) : null)
  );
}

/**
 * Pair: the first element length-prefixed, the second filling the remainder
 */
export function tuple<A, B>(first: Codec<A>, second: Codec<B>): Codec<[A, B]> {
  return binaryCodec<[A, B]>(
    (w, [a, b]) => {
      w.bytes(first.encode(a)).raw(second.encode(b));
    },
    (r) => {
      const a = first.decode(r.bytes());
      const b = second.decode(r.rest());
      return [a, b];
    }
  );
}

/**
 * Canonical JSON (sorted object keys, UTF-8) validated by a zod schema on decode
 *
 * @example
 * ```typescript
 * const account = json(z.object({ owner: z.string(), balance: z.number() }));
 * ```
 */
export function json<S extends z.ZodTypeAny>(schema: S): Codec<z.output<S>> {
  return {
    encode(value: z.output<S>): Uint8Array {
      return utf8Encoder.encode(canonicalStringify(value));
    },
    decode(bytes: Uint8Array): z.output<S> {
      let parsed: unknown;
      try {
        parsed = JSON.parse(decodeUtf8(bytes));
      } catch (err) {
        if (err instanceof CodecError) throw err;
        throw new CodecError("malformed JSON", { cause: err });
      }

      const result = schema.safeParse(parsed);
      if (!result.success) {
        throw new CodecError(`value does not match schema: ${result.error.message}`, {
          cause: result.error,
        });
      }
      return result.data;
    },
  };
}
