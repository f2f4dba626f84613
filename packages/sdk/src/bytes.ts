/**
 * Byte helpers shared by key derivation, codecs and containers
 */

import type { StorageKeyInput } from "./types.js";

const utf8 = new TextEncoder();

/** Suffix that addresses a container's own metadata record */
export const META_SUFFIX = Uint8Array.of(0xff);

/**
 * Normalize a prefix or key given as text or bytes to a fresh byte array
 */
export function toBytes(input: StorageKeyInput): Uint8Array {
  return typeof input === "string" ? utf8.encode(input) : Uint8Array.from(input);
}

/**
 * Concatenate byte arrays into a new array
 */
export function concatBytes(...parts: Uint8Array[]): Uint8Array {
  let total = 0;
  for (const part of parts) total += part.length;

  const out = new Uint8Array(total);
  let offset = 0;
  for (const part of parts) {
    out.set(part, offset);
    offset += part.length;
  }
  return out;
}

/**
 * Append a sub-prefix (for nested containers) to a prefix
 */
export function subPrefix(prefix: Uint8Array, tag: string): Uint8Array {
  return concatBytes(prefix, utf8.encode(tag));
}

/**
 * Storage key of the element at `index`: prefix ++ u32le(index)
 */
export function indexKey(prefix: Uint8Array, index: number): Uint8Array {
  const out = new Uint8Array(prefix.length + 4);
  out.set(prefix, 0);
  new DataView(out.buffer).setUint32(prefix.length, index, true);
  return out;
}

/**
 * Storage key of a container's metadata record
 */
export function metaKey(prefix: Uint8Array): Uint8Array {
  return concatBytes(prefix, META_SUFFIX);
}

export function toHex(bytes: Uint8Array): string {
  return Buffer.from(bytes.buffer, bytes.byteOffset, bytes.byteLength).toString("hex");
}

export function bytesEqual(a: Uint8Array, b: Uint8Array): boolean {
  if (a === b) return true;
  if (a.length !== b.length) return false;

  for (let i = 0; i < a.length; i++) {
    if (a[i] !== b[i]) return false;
  }

  return true;
}
