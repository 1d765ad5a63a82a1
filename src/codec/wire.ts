/**
 * @module codec/wire
 * @description Encode, decode and verify.
 *
 * All three are synchronous and pure: they read their input, allocate
 * their output, and share no state, so any number may run side by side.
 * Cost is dominated by hashing the payload.
 */

import { bytesEqual } from "../backends/digest.js";
import { PacketError } from "../interfaces/codec.js";
import type { IntegrityHash } from "../types/branded.js";
import type { DecodeError, DecodeResult, Packet } from "../types/packet.js";
import { Flags } from "./flags.js";
import { computePacketHash, writeHeader, type PacketFields } from "./header.js";
import {
  HEADER_SIZE,
  MAX_PACKET_SIZE,
  MIN_PACKET_SIZE,
  OFFSET_FLAGS,
  OFFSET_INTENT,
  OFFSET_PAYLOAD_LENGTH,
  OFFSET_PRIORITY,
  OFFSET_SEQUENCE,
  OFFSET_SESSION_ID,
  OFFSET_TIMESTAMP,
  OFFSET_VERSION,
  PROTOCOL_VERSION,
  SESSION_ID_SIZE,
  packetSize,
} from "./layout.js";
import { toSequence, toUnixMillis } from "./packet.js";
import { sessionIdFromBytes } from "./session-id.js";
import { intentFromCode, toPriority } from "./vocabulary.js";

// ─── Encode ─────────────────────────────────────────────────────────

/**
 * Serialize `packet` to `36 + payload.length + 32` bytes.
 *
 * The trailing hash is recomputed from the packet's current fields, so a
 * packet whose Flags were mutated after sealing still encodes to a valid
 * buffer. The packet itself is left untouched.
 */
export function encodePacket(packet: Packet): Uint8Array {
  const payloadLength = packet.payload.length;
  const buffer = new Uint8Array(packetSize(payloadLength));

  writeHeader(packet, buffer);
  buffer.set(packet.payload, HEADER_SIZE);
  buffer.set(computePacketHash(packet), HEADER_SIZE + payloadLength);

  return buffer;
}

// ─── Decode ─────────────────────────────────────────────────────────

/**
 * Parse and authenticate a wire buffer.
 *
 * Checks run in a fixed order and the first failure is returned:
 * TOO_SMALL, TOO_LARGE, UNSUPPORTED_VERSION, INVALID_INTENT,
 * LENGTH_MISMATCH, INVALID_HASH. Nothing is read past the end of `data`.
 * The returned packet owns copies of its session id, payload and hash.
 */
export function decodePacket(data: Uint8Array): DecodeResult {
  const length = data.length;

  if (length < MIN_PACKET_SIZE) {
    return reject({ code: "TOO_SMALL", length });
  }
  if (length > MAX_PACKET_SIZE) {
    return reject({ code: "TOO_LARGE", length });
  }

  const view = new DataView(data.buffer, data.byteOffset, length);

  const version = view.getUint8(OFFSET_VERSION);
  if (version !== PROTOCOL_VERSION) {
    return reject({ code: "UNSUPPORTED_VERSION", version });
  }

  const intentCode = view.getUint8(OFFSET_INTENT);
  const intent = intentFromCode(intentCode);
  if (intent === null) {
    return reject({ code: "INVALID_INTENT", intentCode });
  }

  const declaredPayloadLength = view.getUint32(OFFSET_PAYLOAD_LENGTH, false);
  if (packetSize(declaredPayloadLength) !== length) {
    return reject({ code: "LENGTH_MISMATCH", declaredPayloadLength, length });
  }

  const payloadEnd = HEADER_SIZE + declaredPayloadLength;
  // Buffer#slice returns a view, so copy through subarray instead
  const fields: PacketFields = {
    version,
    sessionId: sessionIdFromBytes(
      data.subarray(OFFSET_SESSION_ID, OFFSET_SESSION_ID + SESSION_ID_SIZE)
    ),
    intent,
    priority: toPriority(view.getUint8(OFFSET_PRIORITY)),
    flags: Flags.fromByte(view.getUint8(OFFSET_FLAGS)),
    sequence: toSequence(view.getUint32(OFFSET_SEQUENCE, false)),
    timestamp: toUnixMillis(view.getBigUint64(OFFSET_TIMESTAMP, false)),
    payload: Uint8Array.from(data.subarray(HEADER_SIZE, payloadEnd)),
  };

  const hash = Uint8Array.from(data.subarray(payloadEnd)) as IntegrityHash;
  if (!bytesEqual(computePacketHash(fields), hash)) {
    return reject({ code: "INVALID_HASH" });
  }

  return { ok: true, packet: { ...fields, hash } };
}

/**
 * decodePacket() for callers that prefer exceptions.
 *
 * @throws {PacketError} carrying the DecodeError's code.
 */
export function decodePacketOrThrow(data: Uint8Array): Packet {
  const result = decodePacket(data);
  if (!result.ok) {
    throw new PacketError(describeDecodeError(result.error), result.error.code);
  }
  return result.packet;
}

// ─── Verify ─────────────────────────────────────────────────────────

/**
 * True when `packet.hash` matches the digest of its current fields.
 * Detects in-memory tampering after sealing or decoding.
 */
export function verifyPacket(packet: Packet): boolean {
  return bytesEqual(computePacketHash(packet), packet.hash);
}

// ─── Diagnostics ────────────────────────────────────────────────────

/**
 * One-line human-readable reason for a decode failure.
 */
export function describeDecodeError(error: DecodeError): string {
  switch (error.code) {
    case "TOO_SMALL":
      return `Packet too small: ${error.length} bytes (minimum ${MIN_PACKET_SIZE})`;
    case "TOO_LARGE":
      return `Packet too large: ${error.length} bytes (maximum ${MAX_PACKET_SIZE})`;
    case "UNSUPPORTED_VERSION":
      return `Unsupported protocol version: ${error.version} (expected ${PROTOCOL_VERSION})`;
    case "INVALID_INTENT":
      return `Invalid intent code: 0x${error.intentCode.toString(16).padStart(2, "0")}`;
    case "LENGTH_MISMATCH":
      return `Length mismatch: payload length ${error.declaredPayloadLength} implies ${packetSize(error.declaredPayloadLength)} bytes, got ${error.length}`;
    case "INVALID_HASH":
      return "Integrity hash mismatch";
  }
}

function reject(error: DecodeError): DecodeResult {
  return { ok: false, error };
}
