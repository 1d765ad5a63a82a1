/**
 * @module interfaces
 * @description Public interface exports for the Intent Wire protocol.
 */

export * from "./event-emitter.js";
export * from "./entropy.js";
export * from "./codec.js";
export * from "./dispatcher.js";
