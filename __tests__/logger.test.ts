import { describe, it, expect, vi } from "vitest";
import { Logger, type LogSink } from "../src/utils/logger.js";

function createSink() {
  const sink = {
    debug: vi.fn(),
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
  } satisfies LogSink;
  return sink;
}

describe("Logger", () => {
  it("should default to info level", () => {
    const sink = createSink();
    const logger = new Logger({ sink });

    logger.debug("hidden");
    logger.info("shown");

    expect(logger.getLevel()).toBe("info");
    expect(sink.debug).not.toHaveBeenCalled();
    expect(sink.info).toHaveBeenCalledWith("[intent-wire] INFO shown");
  });

  it("should format text lines with tag, level and data", () => {
    const sink = createSink();
    const logger = new Logger({ sink, tag: "codec" });

    logger.warn("msg", { k: 1 });

    expect(sink.warn).toHaveBeenCalledWith('[codec] WARN msg {"k":1}');
  });

  it("should route each level to the matching sink method", () => {
    const sink = createSink();
    const logger = new Logger({ sink, level: "debug" });

    logger.debug("d");
    logger.info("i");
    logger.warn("w");
    logger.error("e");

    expect(sink.debug).toHaveBeenCalledWith("[intent-wire] DEBUG d");
    expect(sink.info).toHaveBeenCalledWith("[intent-wire] INFO i");
    expect(sink.warn).toHaveBeenCalledWith("[intent-wire] WARN w");
    expect(sink.error).toHaveBeenCalledWith("[intent-wire] ERROR e");
  });

  it("should filter below the configured level", () => {
    const sink = createSink();
    const logger = new Logger({ sink, level: "warn" });

    logger.info("dropped");
    logger.error("kept");

    expect(logger.isEnabled("info")).toBe(false);
    expect(logger.isEnabled("error")).toBe(true);
    expect(sink.info).not.toHaveBeenCalled();
    expect(sink.error).toHaveBeenCalledOnce();
  });

  it("should write nothing when silent", () => {
    const sink = createSink();
    const logger = new Logger({ sink, level: "silent" });

    logger.error("nope");

    expect(sink.error).not.toHaveBeenCalled();
  });

  it("should change level at runtime", () => {
    const sink = createSink();
    const logger = new Logger({ sink, level: "error" });

    logger.setLevel("debug");
    logger.debug("now visible");

    expect(logger.getLevel()).toBe("debug");
    expect(sink.debug).toHaveBeenCalledWith("[intent-wire] DEBUG now visible");
  });

  it("should serialize bigint values as strings", () => {
    const sink = createSink();
    const logger = new Logger({ sink });

    logger.info("stamp", { timestamp: 1_700_000_000_000n });

    expect(sink.info).toHaveBeenCalledWith(
      '[intent-wire] INFO stamp {"timestamp":"1700000000000"}'
    );
  });

  it("should write one JSON object per line in json mode", () => {
    const sink = createSink();
    const logger = new Logger({
      sink,
      json: true,
      tag: "dispatch",
      now: () => new Date(Date.UTC(2024, 0, 2, 3, 4, 5)),
    });

    logger.warn("Dropped packet", { code: "INVALID_HASH", size: 10n });

    expect(sink.warn).toHaveBeenCalledWith(
      '{"timestamp":"2024-01-02T03:04:05.000Z","level":"warn","tag":"dispatch",' +
        '"message":"Dropped packet","data":{"code":"INVALID_HASH","size":"10"}}'
    );
  });

  it("should omit data from JSON lines when none is given", () => {
    const sink = createSink();
    const logger = new Logger({
      sink,
      json: true,
      now: () => new Date(0),
    });

    logger.info("ready");

    expect(sink.info).toHaveBeenCalledWith(
      '{"timestamp":"1970-01-01T00:00:00.000Z","level":"info","tag":"intent-wire","message":"ready"}'
    );
  });
});
