/**
 * @module codec/vocabulary
 * @description Byte mappings for the closed header enumerations.
 *
 * Every `*FromCode` function is the inverse of its `*ToCode` partner on
 * the defined domain and returns `null` for any other byte. Nothing here
 * invents an "unknown" value; the caller decides what an undefined code
 * means (the codec rejects unknown intents, the flag byte falls back to
 * NONE for unnamed compression/encryption patterns).
 */

import type { Priority } from "../types/branded.js";
import type {
  Compression,
  EncryptionLevel,
  Intent,
  IntentCategory,
} from "../types/vocabulary.js";
import { PrioritySchema, parseField } from "../validation.js";

// ─── Intent ─────────────────────────────────────────────────────────

/** Wire code of every intent. */
export const INTENT_CODES: Readonly<Record<Intent, number>> = {
  PING: 0x01,
  PONG: 0x02,
  HANDSHAKE_INIT: 0x03,
  HANDSHAKE_ACK: 0x04,
  CLOSE: 0x05,
  SEARCH: 0x10,
  SEARCH_SUGGEST: 0x11,
  FETCH_DOCUMENT: 0x12,
  SEARCH_STREAM: 0x13,
  DATA_REQUEST: 0x20,
  DATA_PUSH: 0x21,
  DATA_DELTA: 0x22,
  DATA_VERIFY: 0x23,
  RANKING_UPDATE: 0x30,
  RANKING_REQUEST: 0x31,
  CACHE_QUERY: 0x40,
  CACHE_INVALIDATE: 0x41,
  ERROR: 0xf0,
  SUCCESS: 0xf1,
};

/** Category of every intent. */
export const INTENT_CATEGORIES: Readonly<Record<Intent, IntentCategory>> = {
  PING: "CONTROL",
  PONG: "CONTROL",
  HANDSHAKE_INIT: "CONTROL",
  HANDSHAKE_ACK: "CONTROL",
  CLOSE: "CONTROL",
  SEARCH: "SEARCH",
  SEARCH_SUGGEST: "SEARCH",
  FETCH_DOCUMENT: "SEARCH",
  SEARCH_STREAM: "SEARCH",
  DATA_REQUEST: "DATA_SYNC",
  DATA_PUSH: "DATA_SYNC",
  DATA_DELTA: "DATA_SYNC",
  DATA_VERIFY: "DATA_SYNC",
  RANKING_UPDATE: "RANKING",
  RANKING_REQUEST: "RANKING",
  CACHE_QUERY: "CACHE",
  CACHE_INVALIDATE: "CACHE",
  ERROR: "STATUS",
  SUCCESS: "STATUS",
};

/** All intents in ascending code order. */
export const INTENTS: readonly Intent[] = [
  "PING",
  "PONG",
  "HANDSHAKE_INIT",
  "HANDSHAKE_ACK",
  "CLOSE",
  "SEARCH",
  "SEARCH_SUGGEST",
  "FETCH_DOCUMENT",
  "SEARCH_STREAM",
  "DATA_REQUEST",
  "DATA_PUSH",
  "DATA_DELTA",
  "DATA_VERIFY",
  "RANKING_UPDATE",
  "RANKING_REQUEST",
  "CACHE_QUERY",
  "CACHE_INVALIDATE",
  "ERROR",
  "SUCCESS",
];

const INTENTS_BY_CODE: ReadonlyMap<number, Intent> = new Map<number, Intent>(
  INTENTS.map((intent): [number, Intent] => [INTENT_CODES[intent], intent])
);

export function intentToCode(intent: Intent): number {
  return INTENT_CODES[intent];
}

/**
 * Intent for `code`, or `null` when the byte is not a defined intent.
 */
export function intentFromCode(code: number): Intent | null {
  return INTENTS_BY_CODE.get(code) ?? null;
}

export function isIntentCode(code: number): boolean {
  return INTENTS_BY_CODE.has(code);
}

export function intentCategory(intent: Intent): IntentCategory {
  return INTENT_CATEGORIES[intent];
}

// ─── Compression ────────────────────────────────────────────────────

const COMPRESSION_CODES: Readonly<Record<Compression, number>> = {
  NONE: 0x00,
  LZ4: 0x01,
  ZSTD: 0x02,
  BROTLI: 0x03,
};

const COMPRESSIONS: readonly Compression[] = ["NONE", "LZ4", "ZSTD", "BROTLI"];

export function compressionToCode(compression: Compression): number {
  return COMPRESSION_CODES[compression];
}

export function compressionFromCode(code: number): Compression | null {
  return COMPRESSIONS.find((c) => COMPRESSION_CODES[c] === code) ?? null;
}

// ─── Encryption ─────────────────────────────────────────────────────

const ENCRYPTION_CODES: Readonly<Record<EncryptionLevel, number>> = {
  NONE: 0x00,
  CHACHA20: 0x01,
  AES256: 0x02,
};

const ENCRYPTION_LEVELS: readonly EncryptionLevel[] = [
  "NONE",
  "CHACHA20",
  "AES256",
];

export function encryptionToCode(level: EncryptionLevel): number {
  return ENCRYPTION_CODES[level];
}

export function encryptionFromCode(code: number): EncryptionLevel | null {
  return ENCRYPTION_LEVELS.find((l) => ENCRYPTION_CODES[l] === code) ?? null;
}

// ─── Priority ───────────────────────────────────────────────────────

/**
 * Brand a raw byte as a Priority. Every integer 0–255 is legal.
 *
 * @throws {PacketError} code=INVALID_FIELD outside 0–255 or non-integer.
 */
export function toPriority(value: number): Priority {
  return parseField(PrioritySchema, value, "priority") as Priority;
}

/** Named reference points; any byte between them is equally valid. */
export const PRIORITY = {
  /** Background work. */
  LOWEST: toPriority(0),
  /** Prefetching and cache warming. */
  LOW: toPriority(64),
  /** User-initiated actions. */
  NORMAL: toPriority(128),
  /** Interactive traffic. */
  HIGH: toPriority(192),
  /** System messages and errors. */
  CRITICAL: toPriority(255),
} as const;

/**
 * Total order on priorities: negative when `a` is less urgent than `b`.
 */
export function comparePriority(a: Priority, b: Priority): number {
  return a - b;
}
