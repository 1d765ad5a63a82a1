/**
 * @module primitives/packet-dispatcher
 * @description Decode-and-route stage between a transport and the
 * handlers the session layer registers per Intent.
 */

import { PacketEmitter } from "./base-emitter.js";
import type {
  DispatchOutcome,
  IPacketDispatcher,
  PacketHandler,
} from "../interfaces/dispatcher.js";
import { DispatchError } from "../interfaces/dispatcher.js";
import { describeDecodeError, decodePacket } from "../codec/wire.js";
import { sessionIdToHex } from "../codec/session-id.js";
import { toUnixMillis } from "../codec/packet.js";
import { Logger, type LogLevel, type LogSink } from "../utils/logger.js";
import {
  ClockReadingSchema,
  DispatcherConfigSchema,
  parseField,
} from "../validation.js";
import type { Intent } from "../types/vocabulary.js";
import type { UnixMillis } from "../types/branded.js";

// ─── Configuration ────────────────────────────────────────────────

export interface DispatcherConfig {
  /** Minimum log level. Default: "info" */
  logLevel?: LogLevel;
  /** Log line prefix. Default: "intent-wire" */
  logTag?: string;
  /** Emit JSON log lines. Default: false */
  json?: boolean;
  /** Log destination. Default: console */
  logSink?: LogSink;
  /** Event timestamp source in ms, fractions truncated. Default: Date.now */
  clock?: () => number;
}

/**
 * PacketDispatcher — one handler per intent, one event per buffer.
 *
 * @example
 * ```ts
 * const dispatcher = new PacketDispatcher({ logLevel: "warn" });
 * dispatcher.handle("PING", (packet) => reply(packet.sessionId, "PONG"));
 * transport.onReceive((bytes) => dispatcher.receive(bytes));
 * ```
 */
export class PacketDispatcher
  extends PacketEmitter
  implements IPacketDispatcher
{
  private readonly handlers = new Map<Intent, PacketHandler>();
  private readonly logger: Logger;
  private readonly clock: () => number;

  constructor(config: DispatcherConfig = {}) {
    super();
    const parsed = parseField(
      DispatcherConfigSchema,
      { logLevel: config.logLevel, logTag: config.logTag, json: config.json },
      "dispatcher config"
    );
    this.logger = new Logger({
      level: parsed.logLevel ?? "info",
      tag: parsed.logTag ?? "intent-wire",
      json: parsed.json ?? false,
      sink: config.logSink,
    });
    this.clock = config.clock ?? Date.now;
    parseField(ClockReadingSchema, this.clock(), "dispatcher clock");
  }

  // ─── Commands ───────────────────────────────────────────────────

  handle(intent: Intent, handler: PacketHandler): () => void {
    if (this.handlers.has(intent)) {
      throw new DispatchError(
        `Intent ${intent} already has a handler`,
        "HANDLER_ALREADY_REGISTERED"
      );
    }
    this.handlers.set(intent, handler);
    this.logger.debug("Handler registered", { intent });

    return () => {
      if (this.handlers.get(intent) === handler) {
        this.handlers.delete(intent);
        this.logger.debug("Handler removed", { intent });
      }
    };
  }

  receive(data: Uint8Array): DispatchOutcome {
    const result = decodePacket(data);

    if (!result.ok) {
      this.logger.warn(`Dropped packet: ${describeDecodeError(result.error)}`, {
        code: result.error.code,
        byteLength: data.length,
      });
      this.emit({
        type: "PACKET_REJECTED",
        error: result.error,
        byteLength: data.length,
        timestamp: this.now(),
      });
      return { status: "rejected", error: result.error };
    }

    const packet = result.packet;
    const sessionId = sessionIdToHex(packet.sessionId);
    const handler = this.handlers.get(packet.intent);

    if (!handler) {
      this.logger.debug("No handler for packet", {
        intent: packet.intent,
        sessionId,
        sequence: packet.sequence,
      });
      this.emit({
        type: "PACKET_UNHANDLED",
        intent: packet.intent,
        sessionId,
        sequence: packet.sequence,
        timestamp: this.now(),
      });
      return { status: "unhandled", packet };
    }

    handler(packet);

    this.emit({
      type: "PACKET_DISPATCHED",
      intent: packet.intent,
      sessionId,
      sequence: packet.sequence,
      priority: packet.priority,
      timestamp: this.now(),
    });
    return { status: "dispatched", packet };
  }

  // ─── Queries ────────────────────────────────────────────────────

  handledIntents(): readonly Intent[] {
    return [...this.handlers.keys()];
  }

  // Sub-millisecond precision is dropped.
  private now(): UnixMillis {
    return toUnixMillis(Math.floor(this.clock()));
  }
}
