/**
 * Key derivation: logical key + container prefix -> storage key
 *
 * Invariants:
 * - Pure: the same (hasher, prefix, key) always yields the same bytes
 * - identity is injective as long as prefixes are mutually unambiguous
 * - Digest variants are collision-resistant, not collision-free; a collision is
 *   not detected
 */

import { createHash } from "node:crypto";
import { keccak_256 } from "@noble/hashes/sha3";
import type { Codec, KeyHasher } from "./types.js";
import { concatBytes } from "./bytes.js";

export const KEY_HASHERS: readonly KeyHasher[] = ["identity", "sha256", "keccak256"];

/** Length of the digest suffix appended by the hashing strategies */
export const DIGEST_LENGTH = 32;

function sha256(data: Uint8Array): Uint8Array {
  return new Uint8Array(createHash("sha256").update(data).digest());
}

/**
 * Derive the storage key for an already-encoded logical key
 */
export function toStorageKey(
  hasher: KeyHasher,
  prefix: Uint8Array,
  encodedKey: Uint8Array
): Uint8Array {
  const material = concatBytes(prefix, encodedKey);

  switch (hasher) {
    case "identity":
      return material;
    case "sha256":
      return concatBytes(prefix, sha256(material));
    case "keccak256":
      return concatBytes(prefix, keccak_256(material));
  }
}

/**
 * Encode a logical key and derive its storage key
 *
 * A key that cannot be encoded cannot be stored at all, so the codec's error
 * propagates unchanged.
 */
export function deriveStorageKey<K>(
  hasher: KeyHasher,
  prefix: Uint8Array,
  key: K,
  codec: Codec<K>
): Uint8Array {
  return toStorageKey(hasher, prefix, codec.encode(key));
}

export function isKeyHasher(value: string): value is KeyHasher {
  return KEY_HASHERS.some((hasher) => hasher === value);
}
