/**
 * @module types/packet
 * @description The packet record and the results of decoding one.
 *
 * Wire layout (36-byte header, payload, 32-byte trailer):
 *
 * | Offset | Size | Field                              |
 * |--------|------|------------------------------------|
 * | 0      | 1    | version                            |
 * | 1      | 16   | session id                         |
 * | 17     | 1    | intent code                        |
 * | 18     | 1    | priority                           |
 * | 19     | 1    | flags                              |
 * | 20     | 4    | sequence (big-endian)              |
 * | 24     | 4    | payload length (big-endian)        |
 * | 28     | 8    | timestamp, ms since epoch (BE)     |
 * | 36     | N    | payload                            |
 * | 36+N   | 32   | SHA-256 integrity hash             |
 */

import type { Flags } from "../codec/flags.js";
import type {
  IntegrityHash,
  Priority,
  Sequence,
  SessionId,
  UnixMillis,
} from "./branded.js";
import type { Intent } from "./vocabulary.js";

// ─── Packet ─────────────────────────────────────────────────────────

/**
 * A single protocol message. Transient value: built by a producer,
 * serialized, moved by a transport, decoded and handed to a dispatcher.
 */
export interface Packet {
  /** Protocol version. Always PROTOCOL_VERSION for packets this codec accepts. */
  readonly version: number;
  /** Connection the packet belongs to. */
  readonly sessionId: SessionId;
  /** What the sender wants done. */
  readonly intent: Intent;
  /** Scheduling hint for the receiver. Not enforced by the codec. */
  readonly priority: Priority;
  /**
   * Packed compression/encryption preference and transport bits.
   * Mutating this object in place leaves `hash` stale.
   */
  readonly flags: Flags;
  /** Assigned by the session layer; 0 until assigned. */
  readonly sequence: Sequence;
  /** Construction time. */
  readonly timestamp: UnixMillis;
  /** Opaque application bytes. */
  readonly payload: Uint8Array;
  /** SHA-256 over all preceding fields in wire order. */
  readonly hash: IntegrityHash;
}

// ─── Construction Options ───────────────────────────────────────────

/**
 * Optional overrides accepted by createPacket().
 */
export interface PacketOptions {
  /** Priority 0–255. Default: NORMAL (128). */
  priority?: number;
  /** Flag byte. Default: declared LZ4 + CHACHA20. */
  flags?: Flags;
  /** Sequence 0–2^32-1. Default: 0. */
  sequence?: number;
  /** Explicit timestamp in ms. Default: clock(). */
  timestamp?: number | bigint;
  /** Clock used when no timestamp is given. Default: Date.now. */
  clock?: () => number;
}

// ─── Decode Results ─────────────────────────────────────────────────

/** Input shorter than an empty-payload packet. */
export interface TooSmallError {
  readonly code: "TOO_SMALL";
  readonly length: number;
}

/** Input longer than the largest legal packet. */
export interface TooLargeError {
  readonly code: "TOO_LARGE";
  readonly length: number;
}

/** Version byte differs from the one supported version. */
export interface UnsupportedVersionError {
  readonly code: "UNSUPPORTED_VERSION";
  readonly version: number;
}

/** Intent byte outside the defined vocabulary. */
export interface InvalidIntentError {
  readonly code: "INVALID_INTENT";
  readonly intentCode: number;
}

/** Declared payload length disagrees with the input length. */
export interface LengthMismatchError {
  readonly code: "LENGTH_MISMATCH";
  readonly declaredPayloadLength: number;
  readonly length: number;
}

/** Recomputed digest differs from the trailing 32 bytes. */
export interface InvalidHashError {
  readonly code: "INVALID_HASH";
}

/**
 * Closed, non-overlapping set of decode failures.
 */
export type DecodeError =
  | TooSmallError
  | TooLargeError
  | UnsupportedVersionError
  | InvalidIntentError
  | LengthMismatchError
  | InvalidHashError;

/** Discriminant of DecodeError. */
export type DecodeErrorCode = DecodeError["code"];

/**
 * Outcome of decodePacket(). Failures are values, never exceptions.
 */
export type DecodeResult =
  | { readonly ok: true; readonly packet: Packet }
  | { readonly ok: false; readonly error: DecodeError };
