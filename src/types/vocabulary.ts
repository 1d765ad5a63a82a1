/**
 * @module types/vocabulary
 * @description The closed semantic vocabulary carried in every packet header.
 *
 * | Field        | Width  | Defined values                          |
 * |--------------|--------|-----------------------------------------|
 * | Intent       | 8 bits | 19 codes across six categories          |
 * | Compression  | 3 bits | NONE, LZ4, ZSTD, BROTLI                 |
 * | Encryption   | 2 bits | NONE, CHACHA20, AES256                  |
 *
 * Compression and encryption are declarations only. The codec records the
 * sender's preference; applying the algorithm belongs to a separate stage.
 */

// ─── Intent ─────────────────────────────────────────────────────────

/**
 * Semantic operation carried by a packet, analogous to a request method.
 */
export type Intent =
  // Control
  | "PING"
  | "PONG"
  | "HANDSHAKE_INIT"
  | "HANDSHAKE_ACK"
  | "CLOSE"
  // Search
  | "SEARCH"
  | "SEARCH_SUGGEST"
  | "FETCH_DOCUMENT"
  | "SEARCH_STREAM"
  // Data sync
  | "DATA_REQUEST"
  | "DATA_PUSH"
  | "DATA_DELTA"
  | "DATA_VERIFY"
  // Ranking
  | "RANKING_UPDATE"
  | "RANKING_REQUEST"
  // Edge cache
  | "CACHE_QUERY"
  | "CACHE_INVALIDATE"
  // Status
  | "ERROR"
  | "SUCCESS";

/**
 * Grouping of intents by the kind of handler that consumes them.
 */
export type IntentCategory =
  | "CONTROL"
  | "SEARCH"
  | "DATA_SYNC"
  | "RANKING"
  | "CACHE"
  | "STATUS";

// ─── Compression ────────────────────────────────────────────────────

/**
 * Declared compression algorithm, ranked roughly by speed vs ratio.
 * - NONE: already-compressed content
 * - LZ4: fastest, real-time traffic
 * - ZSTD: balanced
 * - BROTLI: best ratio, static content
 */
export type Compression = "NONE" | "LZ4" | "ZSTD" | "BROTLI";

// ─── Encryption ─────────────────────────────────────────────────────

/**
 * Declared payload encryption.
 * - NONE: loopback and testing only
 * - CHACHA20: ChaCha20-Poly1305, the default preference
 * - AES256: AES-256-GCM
 */
export type EncryptionLevel = "NONE" | "CHACHA20" | "AES256";
