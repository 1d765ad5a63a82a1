/**
 * @module codec/packet
 * @description Packet construction and field reassignment.
 *
 * Every packet leaves this module sealed: its `hash` is the digest of its
 * own fields, so verifyPacket() holds and a round trip through the wire
 * reproduces it exactly. Reassigning a field goes through a `with*`
 * helper, which returns a new sealed packet and leaves the original as it
 * was.
 */

import { PacketError } from "../interfaces/codec.js";
import type { Sequence, SessionId, UnixMillis } from "../types/branded.js";
import type { Packet, PacketOptions } from "../types/packet.js";
import type { Intent } from "../types/vocabulary.js";
import {
  PacketOptionsSchema,
  SequenceSchema,
  TimestampSchema,
  parseField,
} from "../validation.js";
import { Flags } from "./flags.js";
import { computePacketHash, type PacketFields } from "./header.js";
import { MAX_PAYLOAD_SIZE, PROTOCOL_VERSION } from "./layout.js";
import { PRIORITY, toPriority } from "./vocabulary.js";

// ─── Branded Scalars ────────────────────────────────────────────────

/**
 * @throws {PacketError} code=INVALID_FIELD outside 0–2^32-1.
 */
export function toSequence(value: number): Sequence {
  return parseField(SequenceSchema, value, "sequence") as Sequence;
}

/**
 * @throws {PacketError} code=INVALID_FIELD if negative, fractional, or
 *   wider than 64 bits.
 */
export function toUnixMillis(value: number | bigint): UnixMillis {
  return BigInt(parseField(TimestampSchema, value, "timestamp")) as UnixMillis;
}

// ─── Construction ───────────────────────────────────────────────────

/**
 * Build a sealed packet.
 *
 * Defaults: priority NORMAL, flags declaring LZ4 + CHACHA20, sequence 0,
 * timestamp from `options.clock` (Date.now). The payload is taken as-is,
 * not copied; the caller hands over ownership.
 *
 * @throws {PacketError} code=PAYLOAD_TOO_LARGE if the payload exceeds
 *   MAX_PAYLOAD_SIZE.
 * @throws {PacketError} code=INVALID_FIELD if an option is out of range.
 *
 * @example
 * ```ts
 * const packet = createPacket(generateSessionId(), "SEARCH", query, {
 *   priority: PRIORITY.HIGH,
 * });
 * ```
 */
export function createPacket(
  sessionId: SessionId,
  intent: Intent,
  payload: Uint8Array,
  options: PacketOptions = {}
): Packet {
  if (payload.length > MAX_PAYLOAD_SIZE) {
    throw new PacketError(
      `Payload of ${payload.length} bytes exceeds maximum of ${MAX_PAYLOAD_SIZE}`,
      "PAYLOAD_TOO_LARGE"
    );
  }

  const parsed = parseField(
    PacketOptionsSchema,
    {
      priority: options.priority,
      sequence: options.sequence,
      timestamp: options.timestamp,
    },
    "packet options"
  );
  const clock = options.clock ?? Date.now;

  return sealPacket({
    version: PROTOCOL_VERSION,
    sessionId,
    intent,
    priority:
      parsed.priority === undefined
        ? PRIORITY.NORMAL
        : toPriority(parsed.priority),
    flags: options.flags ? options.flags.clone() : Flags.defaults(),
    sequence: toSequence(parsed.sequence ?? 0),
    timestamp: toUnixMillis(parsed.timestamp ?? clock()),
    payload,
  });
}

/**
 * Attach the digest of `fields` as the packet hash.
 */
export function sealPacket(fields: PacketFields): Packet {
  return { ...fields, hash: computePacketHash(fields) };
}

// ─── Reassignment ───────────────────────────────────────────────────

/** Copy of `packet` with the session layer's sequence number. */
export function withSequence(packet: Packet, sequence: number): Packet {
  return sealPacket({ ...fieldsOf(packet), sequence: toSequence(sequence) });
}

export function withPriority(packet: Packet, priority: number): Packet {
  return sealPacket({ ...fieldsOf(packet), priority: toPriority(priority) });
}

/** Copy of `packet` carrying a snapshot of `flags`. */
export function withFlags(packet: Packet, flags: Flags): Packet {
  return sealPacket({ ...fieldsOf(packet), flags: flags.clone() });
}

function fieldsOf(packet: Packet): PacketFields {
  const { hash: _hash, ...fields } = packet;
  return { ...fields, flags: fields.flags.clone() };
}
