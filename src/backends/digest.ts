/**
 * @module backends/digest
 * @description SHA-256 integrity digest for packets.
 *
 * Uses the synchronous @noble/hashes implementation so encode, decode and
 * verify stay plain function calls. The digest is fed incrementally:
 * header first, payload second, with no intermediate concatenation.
 */

import { sha256 } from "@noble/hashes/sha256";
import type { IntegrityHash } from "../types/branded.js";

/** Output size of the integrity digest in bytes. */
export const DIGEST_LENGTH = 32;

/**
 * SHA-256 over the concatenation of `parts`, in order.
 */
export function digestParts(...parts: Uint8Array[]): IntegrityHash {
  const hasher = sha256.create();
  for (const part of parts) {
    hasher.update(part);
  }
  return hasher.digest() as IntegrityHash;
}

/**
 * Compare two byte arrays without early exit on the first differing byte.
 */
export function bytesEqual(a: Uint8Array, b: Uint8Array): boolean {
  if (a.length !== b.length) return false;
  let diff = 0;
  for (let i = 0; i < a.length; i++) {
    diff |= (a[i] ?? 0) ^ (b[i] ?? 0);
  }
  return diff === 0;
}
