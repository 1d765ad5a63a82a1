import { describe, it, expect } from "vitest";
import { bytesToHex } from "@noble/hashes/utils";
import {
  decodePacket,
  decodePacketOrThrow,
  describeDecodeError,
  encodePacket,
  verifyPacket,
} from "../src/codec/wire.js";
import { createPacket, withSequence } from "../src/codec/packet.js";
import { Flags } from "../src/codec/flags.js";
import {
  HASH_SIZE,
  HEADER_SIZE,
  MAX_PACKET_SIZE,
  MAX_PAYLOAD_SIZE,
  MIN_PACKET_SIZE,
  PROTOCOL_VERSION,
  packetSize,
} from "../src/codec/layout.js";
import {
  nilSessionId,
  sessionIdFromHex,
  sessionIdToHex,
} from "../src/codec/session-id.js";
import { DIGEST_LENGTH, digestParts } from "../src/backends/digest.js";
import { PacketError } from "../src/interfaces/codec.js";
import type { DecodeError, DecodeResult, Packet } from "../src/types/packet.js";

const TIMESTAMP = 1_700_000_000_000;

describe("Network Codec", () => {
  describe("Constants", () => {
    it("should define the packet geometry", () => {
      expect(PROTOCOL_VERSION).toBe(1);
      expect(HEADER_SIZE).toBe(36);
      expect(HASH_SIZE).toBe(32);
      expect(MIN_PACKET_SIZE).toBe(68);
      expect(MAX_PAYLOAD_SIZE).toBe(10_485_760);
      expect(MAX_PACKET_SIZE).toBe(10_485_828);
      expect(packetSize(5)).toBe(73);
    });

    it("should size the trailer to the digest output", () => {
      expect(HASH_SIZE).toBe(DIGEST_LENGTH);
      expect(digestParts(new Uint8Array(3)).length).toBe(HASH_SIZE);
    });
  });

  describe("encodePacket()", () => {
    it("should encode an empty PING on the nil session to 68 bytes", () => {
      const buffer = encodePacket(createPingPacket());
      expect(buffer.length).toBe(68);
    });

    it("should lay out the header fields", () => {
      const buffer = encodePacket(createPingPacket());
      expect(buffer[0]).toBe(1); // version
      expect(Array.from(buffer.subarray(1, 17))).toEqual(new Array(16).fill(0));
      expect(buffer[17]).toBe(0x01); // PING
      expect(buffer[18]).toBe(128); // NORMAL
      expect(buffer[19]).toBe(0x09); // LZ4 + CHACHA20
      expect(Array.from(buffer.subarray(20, 24))).toEqual([0, 0, 0, 0]);
      expect(Array.from(buffer.subarray(24, 28))).toEqual([0, 0, 0, 0]);
      expect(Array.from(buffer.subarray(28, 36))).toEqual([
        0, 0, 0x01, 0x8b, 0xcf, 0xe5, 0x68, 0x00,
      ]);
    });

    it("should append the SHA-256 of the header and payload", () => {
      const buffer = encodePacket(createPingPacket());
      expect(bytesToHex(buffer.subarray(36))).toBe(
        "20b4a48b06509f2c164d75c6c88386ec0a85cec55250b3a6e78c1220e6a574f8"
      );
    });

    it("should write sequence and payload length big-endian", () => {
      const packet = withSequence(
        createTestPacket(new Uint8Array(0x0102)),
        0x0a0b0c0d
      );
      const buffer = encodePacket(packet);
      expect(Array.from(buffer.subarray(20, 24))).toEqual([0x0a, 0x0b, 0x0c, 0x0d]);
      expect(Array.from(buffer.subarray(24, 28))).toEqual([0, 0, 0x01, 0x02]);
    });

    it("should place the payload after the header", () => {
      const payload = Uint8Array.from([9, 8, 7, 6, 5]);
      const buffer = encodePacket(createTestPacket(payload));
      expect(Array.from(buffer.subarray(36, 41))).toEqual([9, 8, 7, 6, 5]);
    });

    it("should size every packet as header + payload + hash", () => {
      for (const size of [0, 1, 31, 32, 33, 1024, 65_537]) {
        const packet = createTestPacket(new Uint8Array(size));
        expect(encodePacket(packet).length).toBe(36 + size + 32);
      }
    });

    it("should encode a maximum-size payload", () => {
      const packet = createTestPacket(new Uint8Array(MAX_PAYLOAD_SIZE));
      const buffer = encodePacket(packet);
      expect(buffer.length).toBe(MAX_PACKET_SIZE);
      expect(expectOk(decodePacket(buffer)).payload.length).toBe(MAX_PAYLOAD_SIZE);
    });

    it("should not mutate the packet", () => {
      const packet = createTestPacket(Uint8Array.from([1, 2, 3]));
      const hashBefore = Array.from(packet.hash);
      encodePacket(packet);
      expect(Array.from(packet.hash)).toEqual(hashBefore);
      expect(Array.from(packet.payload)).toEqual([1, 2, 3]);
    });
  });

  describe("decodePacket()", () => {
    it("should recover the empty PING and verify it", () => {
      const decoded = expectOk(decodePacket(encodePacket(createPingPacket())));
      expect(decoded.intent).toBe("PING");
      expect(decoded.payload.length).toBe(0);
      expect(sessionIdToHex(decoded.sessionId)).toBe("0".repeat(32));
      expect(verifyPacket(decoded)).toBe(true);
    });

    it("should roundtrip every field including the hash", () => {
      const original = withSequence(
        createPacket(
          sessionIdFromHex("00112233445566778899aabbccddeeff"),
          "RANKING_UPDATE",
          Uint8Array.from([0xde, 0xad, 0xbe, 0xef]),
          {
            priority: 200,
            flags: Flags.fromByte(0b1010_1111),
            timestamp: 0xffffffffffffffffn,
          }
        ),
        123_456
      );

      const decoded = expectOk(decodePacket(encodePacket(original)));

      expect(decoded).toEqual(original);
      expect(decoded.version).toBe(1);
      expect(sessionIdToHex(decoded.sessionId)).toBe(
        "00112233445566778899aabbccddeeff"
      );
      expect(decoded.intent).toBe("RANKING_UPDATE");
      expect(decoded.priority).toBe(200);
      expect(decoded.flags.toByte()).toBe(0b1010_1111);
      expect(decoded.sequence).toBe(123_456);
      expect(decoded.timestamp).toBe(0xffffffffffffffffn);
      expect(Array.from(decoded.payload)).toEqual([0xde, 0xad, 0xbe, 0xef]);
      expect(Array.from(decoded.hash)).toEqual(Array.from(original.hash));
    });

    it("should decode from a view into a larger buffer", () => {
      const encoded = encodePacket(createTestPacket(Uint8Array.from([4, 5])));
      const outer = new Uint8Array(encoded.length + 10);
      outer.set(encoded, 10);
      const decoded = expectOk(decodePacket(outer.subarray(10)));
      expect(Array.from(decoded.payload)).toEqual([4, 5]);
    });

    it("should not alias the input buffer", () => {
      const encoded = encodePacket(createTestPacket(Uint8Array.from([1, 2, 3])));
      const decoded = expectOk(decodePacket(encoded));
      encoded.fill(0);
      expect(Array.from(decoded.payload)).toEqual([1, 2, 3]);
      expect(verifyPacket(decoded)).toBe(true);
    });

    it("should not alias a reused Node Buffer", () => {
      const received = Buffer.from(
        encodePacket(createTestPacket(Uint8Array.from([1, 2, 3])))
      );
      const decoded = expectOk(decodePacket(received));

      received.fill(0);

      expect(Array.from(decoded.payload)).toEqual([1, 2, 3]);
      expect(sessionIdToHex(decoded.sessionId)).toBe(
        "0f0e0d0c0b0a09080706050403020100"
      );
      expect(verifyPacket(decoded)).toBe(true);
    });

    describe("structural checks", () => {
      it("should return TOO_SMALL below 68 bytes", () => {
        expect(expectError(decodePacket(new Uint8Array(0)))).toEqual({
          code: "TOO_SMALL",
          length: 0,
        });
        expect(expectError(decodePacket(new Uint8Array(67)))).toEqual({
          code: "TOO_SMALL",
          length: 67,
        });
      });

      it("should return TOO_LARGE above the maximum packet size", () => {
        expect(expectError(decodePacket(new Uint8Array(MAX_PACKET_SIZE + 1)))).toEqual({
          code: "TOO_LARGE",
          length: MAX_PACKET_SIZE + 1,
        });
      });

      it("should return UNSUPPORTED_VERSION for any other version byte", () => {
        for (const version of [0, 2, 0xff]) {
          const buffer = encodePacket(createTestPacket(new Uint8Array(4)));
          buffer[0] = version;
          expect(expectError(decodePacket(buffer))).toEqual({
            code: "UNSUPPORTED_VERSION",
            version,
          });
        }
      });

      it("should return INVALID_INTENT for undefined intent codes", () => {
        for (const intentCode of [0x00, 0x06, 0x24, 0xff]) {
          const buffer = encodePacket(createTestPacket(new Uint8Array(4)));
          buffer[17] = intentCode;
          expect(expectError(decodePacket(buffer))).toEqual({
            code: "INVALID_INTENT",
            intentCode,
          });
        }
      });

      it("should return LENGTH_MISMATCH for trailing bytes", () => {
        const encoded = encodePacket(createTestPacket(new Uint8Array(5)));
        const padded = new Uint8Array(encoded.length + 1);
        padded.set(encoded);
        expect(expectError(decodePacket(padded))).toEqual({
          code: "LENGTH_MISMATCH",
          declaredPayloadLength: 5,
          length: 74,
        });
      });

      it("should return LENGTH_MISMATCH for a truncated buffer", () => {
        const encoded = encodePacket(createTestPacket(new Uint8Array(5)));
        expect(expectError(decodePacket(encoded.subarray(0, 72)))).toEqual({
          code: "LENGTH_MISMATCH",
          declaredPayloadLength: 5,
          length: 72,
        });
      });

      it("should return LENGTH_MISMATCH for a declared length beyond the buffer", () => {
        const buffer = encodePacket(createTestPacket(new Uint8Array(0)));
        buffer.set([0xff, 0xff, 0xff, 0xff], 24);
        expect(expectError(decodePacket(buffer))).toEqual({
          code: "LENGTH_MISMATCH",
          declaredPayloadLength: 0xffffffff,
          length: 68,
        });
      });
    });

    describe("check order", () => {
      it("should report TOO_SMALL before inspecting the version", () => {
        const buffer = new Uint8Array(40).fill(0xff);
        expect(expectError(decodePacket(buffer)).code).toBe("TOO_SMALL");
      });

      it("should report UNSUPPORTED_VERSION before INVALID_INTENT", () => {
        const buffer = encodePacket(createTestPacket(new Uint8Array(0)));
        buffer[0] = 9;
        buffer[17] = 0x99;
        expect(expectError(decodePacket(buffer)).code).toBe("UNSUPPORTED_VERSION");
      });

      it("should report INVALID_INTENT before LENGTH_MISMATCH", () => {
        const buffer = encodePacket(createTestPacket(new Uint8Array(0)));
        buffer[17] = 0x99;
        buffer[27] = 0x10;
        expect(expectError(decodePacket(buffer)).code).toBe("INVALID_INTENT");
      });

      it("should report LENGTH_MISMATCH before INVALID_HASH", () => {
        const buffer = encodePacket(createTestPacket(new Uint8Array(8)));
        buffer[27] = 0x07;
        buffer[50] = (buffer[50] ?? 0) ^ 0xff;
        expect(expectError(decodePacket(buffer)).code).toBe("LENGTH_MISMATCH");
      });
    });

    describe("tamper sensitivity", () => {
      it("should detect a flip of any single byte", () => {
        const encoded = encodePacket(
          createPacket(nilSessionId(), "DATA_PUSH", Uint8Array.from([1, 2, 3, 4, 5]), {
            timestamp: TIMESTAMP,
          })
        );

        for (let i = 0; i < encoded.length; i++) {
          const tampered = Uint8Array.from(encoded);
          tampered[i] = (tampered[i] ?? 0) ^ 0xff;
          const error = expectError(decodePacket(tampered));

          if (i === 0) {
            expect(error.code).toBe("UNSUPPORTED_VERSION");
          } else if (i === 17) {
            expect(error.code).toBe("INVALID_INTENT");
          } else if (i >= 24 && i < 28) {
            expect(error.code).toBe("LENGTH_MISMATCH");
          } else {
            expect(error.code).toBe("INVALID_HASH");
          }
        }
      });

      it("should detect an intent swapped for another defined intent", () => {
        const buffer = encodePacket(createTestPacket(new Uint8Array(3)));
        buffer[17] = 0x20; // DATA_PUSH -> DATA_REQUEST
        expect(expectError(decodePacket(buffer))).toEqual({ code: "INVALID_HASH" });
      });

      it("should detect a flipped reserved flag bit", () => {
        const buffer = encodePacket(createTestPacket(new Uint8Array(3)));
        buffer[19] = (buffer[19] ?? 0) ^ 0x80;
        expect(expectError(decodePacket(buffer))).toEqual({ code: "INVALID_HASH" });
      });
    });
  });

  describe("decodePacketOrThrow()", () => {
    it("should return the packet on success", () => {
      const packet = decodePacketOrThrow(encodePacket(createPingPacket()));
      expect(packet.intent).toBe("PING");
    });

    it("should throw a PacketError carrying the decode code", () => {
      const buffer = encodePacket(createPingPacket());
      buffer[40] = (buffer[40] ?? 0) ^ 0x01;
      expect(() => decodePacketOrThrow(buffer)).toThrow(PacketError);
      expect(() => decodePacketOrThrow(buffer)).toThrow("Integrity hash mismatch");
      try {
        decodePacketOrThrow(buffer);
      } catch (error) {
        expect(error).toMatchObject({ code: "INVALID_HASH" });
      }
    });
  });

  describe("verifyPacket()", () => {
    it("should hold for a fresh packet", () => {
      expect(verifyPacket(createTestPacket(Uint8Array.from([1])))).toBe(true);
    });

    it("should fail after the flags are mutated in place", () => {
      const packet = createTestPacket(Uint8Array.from([1]));
      packet.flags.setAckRequired(true);
      expect(verifyPacket(packet)).toBe(false);
    });

    it("should fail after the payload is mutated in place", () => {
      const packet = createTestPacket(Uint8Array.from([1, 2]));
      packet.payload[1] = 3;
      expect(verifyPacket(packet)).toBe(false);
    });

    it("should fail for a forged hash", () => {
      const packet = createTestPacket(Uint8Array.from([1]));
      const forged: Packet = { ...packet, hash: withSequence(packet, 1).hash };
      expect(verifyPacket(forged)).toBe(false);
    });

    it("should hash the mutated fields when encoding", () => {
      const packet = createTestPacket(Uint8Array.from([1]));
      packet.flags.setFragmented(true);
      const decoded = expectOk(decodePacket(encodePacket(packet)));
      expect(decoded.flags.fragmented).toBe(true);
      expect(verifyPacket(decoded)).toBe(true);
    });
  });

  describe("describeDecodeError()", () => {
    it("should describe each failure", () => {
      const cases: Array<[DecodeError, string]> = [
        [{ code: "TOO_SMALL", length: 10 }, "Packet too small: 10 bytes (minimum 68)"],
        [
          { code: "TOO_LARGE", length: 10_485_829 },
          "Packet too large: 10485829 bytes (maximum 10485828)",
        ],
        [
          { code: "UNSUPPORTED_VERSION", version: 2 },
          "Unsupported protocol version: 2 (expected 1)",
        ],
        [{ code: "INVALID_INTENT", intentCode: 0x0e }, "Invalid intent code: 0x0e"],
        [
          { code: "LENGTH_MISMATCH", declaredPayloadLength: 5, length: 74 },
          "Length mismatch: payload length 5 implies 73 bytes, got 74",
        ],
        [{ code: "INVALID_HASH" }, "Integrity hash mismatch"],
      ];
      for (const [error, message] of cases) {
        expect(describeDecodeError(error)).toBe(message);
      }
    });
  });
});

// ─── Test Helpers ───────────────────────────────────────────────────

function createPingPacket(): Packet {
  return createPacket(nilSessionId(), "PING", new Uint8Array(0), {
    timestamp: TIMESTAMP,
  });
}

function createTestPacket(payload: Uint8Array): Packet {
  return createPacket(
    sessionIdFromHex("0f0e0d0c0b0a09080706050403020100"),
    "DATA_PUSH",
    payload,
    { timestamp: TIMESTAMP }
  );
}

function expectOk(result: DecodeResult): Packet {
  if (!result.ok) {
    throw new Error(`Expected decode to succeed: ${describeDecodeError(result.error)}`);
  }
  return result.packet;
}

function expectError(result: DecodeResult): DecodeError {
  if (result.ok) {
    throw new Error("Expected decode to fail");
  }
  return result.error;
}
