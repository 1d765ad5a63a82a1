/**
 * @module primitives
 * @description Stateful building blocks around the pure codec: the typed
 * event emitter and the packet dispatcher.
 */

export { PacketEmitter } from "./base-emitter.js";
export { PacketDispatcher } from "./packet-dispatcher.js";
export type { DispatcherConfig } from "./packet-dispatcher.js";
