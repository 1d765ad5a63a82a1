/**
 * @module interfaces/dispatcher
 * @description IPacketDispatcher — routes inbound byte buffers to the
 * handler registered for the decoded packet's intent.
 *
 * The dispatcher owns no business logic. It decodes, picks a handler by
 * Intent, and reports the outcome; everything an intent *means* lives in
 * the handler the session layer registers.
 */

import type { Packet, DecodeError } from "../types/packet.js";
import type { Intent } from "../types/vocabulary.js";
import type { IPacketEmitter } from "./event-emitter.js";

/**
 * Errors that may be thrown by IPacketDispatcher operations.
 */
export class DispatchError extends Error {
  constructor(
    message: string,
    public readonly code: "HANDLER_ALREADY_REGISTERED"
  ) {
    super(message);
    this.name = "DispatchError";
  }
}

/**
 * Callback that consumes a verified packet.
 */
export type PacketHandler = (packet: Packet) => void;

/**
 * What happened to one inbound buffer.
 */
export type DispatchOutcome =
  | { readonly status: "dispatched"; readonly packet: Packet }
  | { readonly status: "unhandled"; readonly packet: Packet }
  | { readonly status: "rejected"; readonly error: DecodeError };

/**
 * @interface IPacketDispatcher
 * @description Decode-and-route stage between a transport and the
 * domain handlers.
 */
export interface IPacketDispatcher extends IPacketEmitter {
  // ─── Commands ───────────────────────────────────────────────────

  /**
   * @command
   * @description Registers the handler for one intent.
   *
   * @param intent - Intent the handler consumes.
   * @param handler - Called synchronously with each verified packet.
   * @returns Unsubscribe function.
   * @throws {DispatchError} code=HANDLER_ALREADY_REGISTERED if the intent
   *   already has a handler.
   */
  handle(intent: Intent, handler: PacketHandler): () => void;

  /**
   * @command
   * @description Decodes one buffer and routes it.
   *
   * Rejected buffers emit PACKET_REJECTED, packets with no handler emit
   * PACKET_UNHANDLED, the rest emit PACKET_DISPATCHED after the handler
   * returns. An exception thrown by a handler propagates to the caller
   * and no event is emitted for that packet.
   */
  receive(data: Uint8Array): DispatchOutcome;

  // ─── Queries ────────────────────────────────────────────────────

  /**
   * @query
   * @description Returns the intents that currently have a handler.
   */
  handledIntents(): readonly Intent[];
}
