/**
 * @module types/branded
 * @description Branded types for compile-time safety across the wire protocol.
 *
 * Branded types keep raw primitives (numbers, bigints, Uint8Arrays) from
 * being passed where a protocol-level value is expected. A raw Uint8Array
 * can never be handed to the codec as a SessionId, and an arbitrary number
 * can never stand in for a Sequence without going through a constructor
 * that checks its range.
 *
 * @example
 * ```ts
 * const raw = new Uint8Array(16);
 * // Type error: Uint8Array is not assignable to SessionId
 * const id: SessionId = raw;
 * // Correct:
 * const id: SessionId = sessionIdFromBytes(raw);
 * ```
 */

/** Unique symbol for branding. Not exported — internal only. */
declare const __brand: unique symbol;

/**
 * Generic branded type utility.
 * Intersects a base type with a phantom brand field that exists only
 * at the type level, never at runtime.
 */
export type Brand<T, B extends string> = T & { readonly [__brand]: B };

// ─── Identifier Brands ──────────────────────────────────────────────

/**
 * A 16-byte (128-bit) opaque session identifier.
 * Scopes a logical connection across many packets.
 */
export type SessionId = Brand<Uint8Array, "SessionId">;

// ─── Integrity Brands ───────────────────────────────────────────────

/**
 * A 32-byte SHA-256 digest over every packet field except itself.
 */
export type IntegrityHash = Brand<Uint8Array, "IntegrityHash">;

// ─── Wire Format Brands ─────────────────────────────────────────────

/**
 * An unsigned 8-bit priority (0–255). Higher is more urgent.
 */
export type Priority = Brand<number, "Priority">;

/**
 * An unsigned 32-bit sequence number assigned by the session layer.
 */
export type Sequence = Brand<number, "Sequence">;

/**
 * Milliseconds since the Unix epoch, carried as an unsigned 64-bit
 * integer on the wire.
 */
export type UnixMillis = Brand<bigint, "UnixMillis">;
