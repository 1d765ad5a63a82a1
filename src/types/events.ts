/**
 * @module types/events
 * @description Event catalog for the packet dispatcher.
 *
 * The codec itself is pure and emits nothing. The dispatcher reports
 * every inbound buffer as exactly one of these events so that session
 * and transport layers can count drops, request retransmission, or
 * trace traffic without wrapping the dispatcher.
 */

import type { Priority, Sequence, UnixMillis } from "./branded.js";
import type { DecodeError } from "./packet.js";
import type { Intent } from "./vocabulary.js";

// ─── Dispatch Events ────────────────────────────────────────────────

/** Emitted after a decoded packet has been handed to its handler. */
export interface PacketDispatchedEvent {
  readonly type: "PACKET_DISPATCHED";
  readonly intent: Intent;
  /** Lowercase hex session id. */
  readonly sessionId: string;
  readonly sequence: Sequence;
  readonly priority: Priority;
  readonly timestamp: UnixMillis;
}

/** Emitted when a decoded packet has no registered handler. */
export interface PacketUnhandledEvent {
  readonly type: "PACKET_UNHANDLED";
  readonly intent: Intent;
  readonly sessionId: string;
  readonly sequence: Sequence;
  readonly timestamp: UnixMillis;
}

/** Emitted when an inbound buffer fails to decode. */
export interface PacketRejectedEvent {
  readonly type: "PACKET_REJECTED";
  readonly error: DecodeError;
  readonly byteLength: number;
  readonly timestamp: UnixMillis;
}

// ─── Union Types ────────────────────────────────────────────────────

/** Union of all dispatcher events. */
export type PacketEvent =
  | PacketDispatchedEvent
  | PacketUnhandledEvent
  | PacketRejectedEvent;

/**
 * Extract the event type string literal from a PacketEvent.
 */
export type PacketEventType = PacketEvent["type"];

/**
 * Map from event type string to the corresponding event interface.
 */
export type PacketEventMap = {
  PACKET_DISPATCHED: PacketDispatchedEvent;
  PACKET_UNHANDLED: PacketUnhandledEvent;
  PACKET_REJECTED: PacketRejectedEvent;
};
