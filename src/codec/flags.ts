/**
 * @module codec/flags
 * @description The packed flag byte at header offset 19.
 *
 * Bit layout:
 *
 * ```
 *  7   6   5   4   3   2   1   0
 * ┌───┬───┬───┬───────┬───────────┐
 * │ R │ A │ F │  enc  │   comp    │
 * └───┴───┴───┴───────┴───────────┘
 * ```
 *
 * - comp (bits 0–2): declared Compression; patterns 4–7 read as NONE
 * - enc (bits 3–4): declared EncryptionLevel; pattern 3 reads as NONE
 * - F (bit 5): packet is one fragment of a larger message
 * - A (bit 6): sender expects an acknowledgment
 * - R (bit 7): reserved; carried through untouched
 */

import type { Compression, EncryptionLevel } from "../types/vocabulary.js";
import { ByteSchema, parseField } from "../validation.js";
import {
  compressionFromCode,
  compressionToCode,
  encryptionFromCode,
  encryptionToCode,
} from "./vocabulary.js";

const COMPRESSION_MASK = 0b0000_0111;
const ENCRYPTION_MASK = 0b0001_1000;
const ENCRYPTION_SHIFT = 3;
const FRAGMENTED_BIT = 0b0010_0000;
const ACK_REQUIRED_BIT = 0b0100_0000;

/**
 * Flags — opaque single-byte wrapper with per-field accessors.
 *
 * Every setter clears and rewrites only its own bits, so fields can be
 * set in any order and the reserved bit survives all of them.
 *
 * @example
 * ```ts
 * const flags = Flags.empty()
 *   .setCompression("ZSTD")
 *   .setAckRequired(true);
 * flags.toByte(); // 0b0100_0010
 * ```
 */
export class Flags {
  private bits: number;

  private constructor(bits: number) {
    this.bits = bits;
  }

  /** All bits clear: NONE/NONE, not fragmented, no ack. */
  static empty(): Flags {
    return new Flags(0);
  }

  /** The declared preference stamped on new packets: LZ4 + CHACHA20. */
  static defaults(): Flags {
    return Flags.empty().setCompression("LZ4").setEncryption("CHACHA20");
  }

  /**
   * Wrap a raw byte, reserved and unnamed patterns included.
   *
   * @throws {PacketError} code=INVALID_FIELD if `byte` is not 0–255.
   */
  static fromByte(byte: number): Flags {
    return new Flags(parseField(ByteSchema, byte, "flags"));
  }

  toByte(): number {
    return this.bits;
  }

  clone(): Flags {
    return new Flags(this.bits);
  }

  equals(other: Flags): boolean {
    return this.bits === other.bits;
  }

  // ─── Compression (bits 0–2) ─────────────────────────────────────

  get compression(): Compression {
    return compressionFromCode(this.bits & COMPRESSION_MASK) ?? "NONE";
  }

  setCompression(compression: Compression): this {
    this.bits =
      (this.bits & ~COMPRESSION_MASK) |
      (compressionToCode(compression) & COMPRESSION_MASK);
    return this;
  }

  // ─── Encryption (bits 3–4) ──────────────────────────────────────

  get encryption(): EncryptionLevel {
    const code = (this.bits & ENCRYPTION_MASK) >> ENCRYPTION_SHIFT;
    return encryptionFromCode(code) ?? "NONE";
  }

  setEncryption(level: EncryptionLevel): this {
    this.bits =
      (this.bits & ~ENCRYPTION_MASK) |
      ((encryptionToCode(level) << ENCRYPTION_SHIFT) & ENCRYPTION_MASK);
    return this;
  }

  // ─── Fragmented (bit 5) ─────────────────────────────────────────

  get fragmented(): boolean {
    return (this.bits & FRAGMENTED_BIT) !== 0;
  }

  setFragmented(fragmented: boolean): this {
    this.bits = fragmented
      ? this.bits | FRAGMENTED_BIT
      : this.bits & ~FRAGMENTED_BIT;
    return this;
  }

  // ─── Ack Required (bit 6) ───────────────────────────────────────

  get ackRequired(): boolean {
    return (this.bits & ACK_REQUIRED_BIT) !== 0;
  }

  setAckRequired(required: boolean): this {
    this.bits = required
      ? this.bits | ACK_REQUIRED_BIT
      : this.bits & ~ACK_REQUIRED_BIT;
    return this;
  }
}
