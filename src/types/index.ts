/**
 * @module types
 * @description Public type exports for the Intent Wire protocol.
 */

export * from "./branded.js";
export * from "./vocabulary.js";
export * from "./packet.js";
export * from "./events.js";
