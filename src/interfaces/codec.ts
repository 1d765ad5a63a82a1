/**
 * @module interfaces/codec
 * @description Errors raised while building packets or when a caller
 * opts into exception-style decoding.
 *
 * decodePacket() itself never throws; it returns a DecodeResult. The
 * codes below are a superset of DecodeErrorCode so a decode failure can
 * be lifted into a PacketError without translation.
 */

import type { DecodeErrorCode } from "../types/packet.js";

/**
 * Construction-time failure codes.
 */
export type PacketBuildErrorCode = "PAYLOAD_TOO_LARGE" | "INVALID_FIELD";

/**
 * Errors that may be thrown by packet construction or decodePacketOrThrow().
 */
export class PacketError extends Error {
  constructor(
    message: string,
    public readonly code: PacketBuildErrorCode | DecodeErrorCode
  ) {
    super(message);
    this.name = "PacketError";
  }
}
