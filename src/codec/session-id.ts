/**
 * @module codec/session-id
 * @description 128-bit session identifiers.
 *
 * Identifiers are generated from a cryptographically secure entropy
 * source (one 16-byte read per id) and are reconstructed byte-for-byte
 * from storage or the wire. Equality is by raw bytes; the lowercase hex
 * form doubles as a Map key.
 */

import { bytesToHex, hexToBytes } from "@noble/hashes/utils";
import { bytesEqual } from "../backends/digest.js";
import { secureRandom } from "../backends/secure-entropy.js";
import { PacketError } from "../interfaces/codec.js";
import type { IEntropySource } from "../interfaces/entropy.js";
import type { SessionId } from "../types/branded.js";
import { SessionIdHexSchema, parseField } from "../validation.js";
import { SESSION_ID_SIZE } from "./layout.js";

/**
 * Generate a fresh session id.
 *
 * @param entropy - Source of random bytes. Default: the process CSPRNG.
 * @throws {PacketError} code=INVALID_FIELD if the source returns the wrong
 *   number of bytes.
 */
export function generateSessionId(
  entropy: IEntropySource = secureRandom
): SessionId {
  return sessionIdFromBytes(entropy.randomBytes(SESSION_ID_SIZE));
}

/**
 * Rebuild a session id from its 16 stored bytes. The input is copied.
 *
 * @throws {PacketError} code=INVALID_FIELD if `bytes` is not 16 bytes long.
 */
export function sessionIdFromBytes(bytes: Uint8Array): SessionId {
  if (bytes.length !== SESSION_ID_SIZE) {
    throw new PacketError(
      `Session id must be ${SESSION_ID_SIZE} bytes, got ${bytes.length}`,
      "INVALID_FIELD"
    );
  }
  return Uint8Array.from(bytes) as SessionId;
}

/**
 * Parse the 32-character hex form (either case).
 *
 * @throws {PacketError} code=INVALID_FIELD on any other string.
 */
export function sessionIdFromHex(hex: string): SessionId {
  const valid = parseField(SessionIdHexSchema, hex, "session id");
  return sessionIdFromBytes(hexToBytes(valid.toLowerCase()));
}

/** Lowercase hex, 32 characters. */
export function sessionIdToHex(id: SessionId): string {
  return bytesToHex(id);
}

export function sessionIdEquals(a: SessionId, b: SessionId): boolean {
  return bytesEqual(a, b);
}

/** The all-zero session id. */
export function nilSessionId(): SessionId {
  return new Uint8Array(SESSION_ID_SIZE) as SessionId;
}
