/**
 * @module primitives/base-emitter
 * @description Base implementation of the typed event emitter.
 * The dispatcher extends this to gain event capabilities.
 */

import type {
  IPacketEmitter,
  EventListener,
} from "../interfaces/event-emitter.js";
import type {
  PacketEvent,
  PacketEventMap,
  PacketEventType,
} from "../types/events.js";

/**
 * Concrete typed event emitter for packet events.
 * Uses a Map of Sets for O(1) listener registration and removal.
 */
export class PacketEmitter implements IPacketEmitter {
  private readonly listeners = new Map<
    PacketEventType,
    Set<EventListener<PacketEventType>>
  >();
  /** once() wrappers, keyed by the listener the caller passed. */
  private readonly onceWrappers = new Map<
    PacketEventType,
    Map<EventListener<PacketEventType>, EventListener<PacketEventType>>
  >();

  on<T extends PacketEventType>(eventType: T, listener: EventListener<T>): void {
    let set = this.listeners.get(eventType);
    if (!set) {
      set = new Set();
      this.listeners.set(eventType, set);
    }
    set.add(listener as EventListener<PacketEventType>);
  }

  /**
   * The wrapper is tracked, so `off(eventType, listener)` with the original
   * listener cancels it before it fires.
   */
  once<T extends PacketEventType>(
    eventType: T,
    listener: EventListener<T>
  ): void {
    const wrapper: EventListener<T> = (event) => {
      this.off(eventType, listener);
      listener(event);
    };
    let wrappers = this.onceWrappers.get(eventType);
    if (!wrappers) {
      wrappers = new Map();
      this.onceWrappers.set(eventType, wrappers);
    }
    wrappers.set(
      listener as EventListener<PacketEventType>,
      wrapper as EventListener<PacketEventType>
    );
    this.on(eventType, wrapper);
  }

  off<T extends PacketEventType>(
    eventType: T,
    listener: EventListener<T>
  ): void {
    const key = listener as EventListener<PacketEventType>;
    const wrappers = this.onceWrappers.get(eventType);
    const wrapper = wrappers?.get(key);
    if (wrappers && wrapper) {
      wrappers.delete(key);
      if (wrappers.size === 0) {
        this.onceWrappers.delete(eventType);
      }
    }

    const set = this.listeners.get(eventType);
    if (set) {
      set.delete(wrapper ?? key);
      if (set.size === 0) {
        this.listeners.delete(eventType);
      }
    }
  }

  emit<T extends PacketEventType>(event: PacketEventMap[T]): void {
    const packetEvent: PacketEvent = event;
    const set = this.listeners.get(packetEvent.type);
    if (set) {
      for (const listener of [...set]) {
        listener(packetEvent);
      }
    }
  }

  /** Number of listeners registered for `eventType`. */
  listenerCount(eventType: PacketEventType): number {
    return this.listeners.get(eventType)?.size ?? 0;
  }
}
