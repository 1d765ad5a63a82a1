/**
 * @module codec
 * @description Network Codec — the Intent Wire packet format.
 *
 * Fixed 36-byte header, opaque payload, 32-byte SHA-256 trailer. See
 * `types/packet` for the byte layout.
 */

export * from "./layout.js";
export * from "./vocabulary.js";
export { Flags } from "./flags.js";
export * from "./session-id.js";
export { computePacketHash, type PacketFields } from "./header.js";
export * from "./packet.js";
export * from "./wire.js";
