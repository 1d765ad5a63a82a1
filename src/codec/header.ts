/**
 * @module codec/header
 * @description Header serialization and the integrity digest.
 *
 * The digest input is exactly what precedes the hash on the wire: the
 * 36-byte header followed by the payload. Encode, decode and verify all
 * derive it here, so the three can never disagree about coverage.
 */

import { digestParts } from "../backends/digest.js";
import type { IntegrityHash } from "../types/branded.js";
import type { Packet } from "../types/packet.js";
import {
  HEADER_SIZE,
  OFFSET_FLAGS,
  OFFSET_INTENT,
  OFFSET_PAYLOAD_LENGTH,
  OFFSET_PRIORITY,
  OFFSET_SEQUENCE,
  OFFSET_SESSION_ID,
  OFFSET_TIMESTAMP,
  OFFSET_VERSION,
} from "./layout.js";
import { intentToCode } from "./vocabulary.js";

/** Every packet field the digest covers. */
export type PacketFields = Omit<Packet, "hash">;

/**
 * Write the 36-byte header of `fields` into the start of `target`.
 * Multi-byte integers are big-endian.
 */
export function writeHeader(fields: PacketFields, target: Uint8Array): void {
  const view = new DataView(target.buffer, target.byteOffset, HEADER_SIZE);

  view.setUint8(OFFSET_VERSION, fields.version);
  target.set(fields.sessionId, OFFSET_SESSION_ID);
  view.setUint8(OFFSET_INTENT, intentToCode(fields.intent));
  view.setUint8(OFFSET_PRIORITY, fields.priority);
  view.setUint8(OFFSET_FLAGS, fields.flags.toByte());
  view.setUint32(OFFSET_SEQUENCE, fields.sequence, false);
  view.setUint32(OFFSET_PAYLOAD_LENGTH, fields.payload.length, false);
  view.setBigUint64(OFFSET_TIMESTAMP, fields.timestamp, false);
}

/**
 * SHA-256 over the header and payload of `fields`, as they would be
 * written by encodePacket().
 */
export function computePacketHash(fields: PacketFields): IntegrityHash {
  const header = new Uint8Array(HEADER_SIZE);
  writeHeader(fields, header);
  return digestParts(header, fields.payload);
}
