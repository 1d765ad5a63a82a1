/**
 * @module codec/layout
 * @description Fixed sizes and offsets of the packet wire format.
 */

import { DIGEST_LENGTH } from "../backends/digest.js";

// ─── Protocol Version ───────────────────────────────────────────────

/** The single protocol version this codec reads and writes. */
export const PROTOCOL_VERSION = 1;

// ─── Sizes ──────────────────────────────────────────────────────────

export const SESSION_ID_SIZE = 16;
export const HEADER_SIZE = 36;
/** SHA-256 trailer. */
export const HASH_SIZE = DIGEST_LENGTH;

/** An empty-payload packet: header plus hash. */
export const MIN_PACKET_SIZE = HEADER_SIZE + HASH_SIZE;

/** 10 MiB. */
export const MAX_PAYLOAD_SIZE = 10 * 1024 * 1024;

export const MAX_PACKET_SIZE = HEADER_SIZE + MAX_PAYLOAD_SIZE + HASH_SIZE;

// ─── Header Offsets ─────────────────────────────────────────────────

export const OFFSET_VERSION = 0;
export const OFFSET_SESSION_ID = 1;
export const OFFSET_INTENT = 17;
export const OFFSET_PRIORITY = 18;
export const OFFSET_FLAGS = 19;
export const OFFSET_SEQUENCE = 20;
export const OFFSET_PAYLOAD_LENGTH = 24;
export const OFFSET_TIMESTAMP = 28;

/**
 * Total encoded size of a packet carrying `payloadLength` bytes.
 */
export function packetSize(payloadLength: number): number {
  return HEADER_SIZE + payloadLength + HASH_SIZE;
}
