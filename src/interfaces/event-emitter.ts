/**
 * @module interfaces/event-emitter
 * @description Typed event emitter interface for the dispatcher's events.
 *
 * The event map ensures that listeners receive correctly-typed payloads
 * without runtime type checking.
 */

import type { PacketEventMap, PacketEventType } from "../types/events.js";

/**
 * Listener function signature for a specific event type.
 */
export type EventListener<T extends PacketEventType> = (
  event: PacketEventMap[T]
) => void;

/**
 * @interface IPacketEmitter
 * @description Typed event emitter for packet events.
 * Provides compile-time safety for event names and payload types.
 */
export interface IPacketEmitter {
  /**
   * Register a listener for a specific event type.
   * @param eventType - The event type to listen for.
   * @param listener - Callback function receiving the typed event payload.
   */
  on<T extends PacketEventType>(eventType: T, listener: EventListener<T>): void;

  /**
   * Register a one-time listener that auto-removes after first invocation.
   * Passing the same listener to off() cancels it.
   */
  once<T extends PacketEventType>(
    eventType: T,
    listener: EventListener<T>
  ): void;

  /**
   * Remove a previously registered listener.
   */
  off<T extends PacketEventType>(
    eventType: T,
    listener: EventListener<T>
  ): void;

  /**
   * Emit an event, invoking all registered listeners synchronously.
   * @param event - The typed event object to emit.
   */
  emit<T extends PacketEventType>(event: PacketEventMap[T]): void;
}
