/**
 * @module intent-wire
 * @description Intent Wire Protocol — packet framing and integrity for an
 * intent-based application protocol.
 *
 * Exports the wire vocabulary, the flag byte, session identifiers, the
 * packet codec (construct, encode, decode, verify), the digest and
 * entropy backends, the packet dispatcher, and the logger.
 *
 * @version 0.1.0
 * @license MIT
 */

// ─── Types ──────────────────────────────────────────────────────────
export * from "./types/index.js";

// ─── Interfaces ─────────────────────────────────────────────────────
export * from "./interfaces/index.js";

// ─── Network Codec ──────────────────────────────────────────────────
export * from "./codec/index.js";

// ─── Backends ───────────────────────────────────────────────────────
export * from "./backends/index.js";

// ─── Primitives ─────────────────────────────────────────────────────
export * from "./primitives/index.js";

// ─── Utilities ──────────────────────────────────────────────────────
export { Logger } from "./utils/logger.js";
export type { LogLevel, LogSink, LoggerConfig } from "./utils/logger.js";
