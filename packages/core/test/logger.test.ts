import { afterEach, describe, expect, it, vi } from "vitest";
import { consoleSink, createLogger, type LogRecord, silentLogger } from "../src/logger";

afterEach(() => {
  vi.restoreAllMocks();
});

describe("createLogger", () => {
  it("drops records below the configured level", () => {
    const records: LogRecord[] = [];
    const logger = createLogger({ level: "warn", sink: (record) => records.push(record) });
    logger.debug("d");
    logger.info("i");
    logger.warn("w", { attempt: 2 });
    logger.error("e");
    expect(records.map((r) => [r.level, r.message, r.fields])).toEqual([
      ["warn", "w", { attempt: 2 }],
      ["error", "e", undefined],
    ]);
  });

  it("scopes child loggers under their parent", () => {
    const records: LogRecord[] = [];
    const logger = createLogger({ scope: "gateway", sink: (record) => records.push(record) });
    logger.child("tools").info("hello");
    expect(records[0]?.scope).toBe("gateway:tools");
  });

  it("silent logger writes nothing", () => {
    const log = vi.spyOn(console, "log").mockImplementation(() => {});
    const error = vi.spyOn(console, "error").mockImplementation(() => {});
    silentLogger.error("nothing");
    silentLogger.info("nothing");
    expect(log).not.toHaveBeenCalled();
    expect(error).not.toHaveBeenCalled();
  });
});

describe("consoleSink", () => {
  it("writes one line with trailing JSON fields", () => {
    const warn = vi.spyOn(console, "warn").mockImplementation(() => {});
    consoleSink({ level: "warn", scope: "chatbridge", message: "slow", fields: { ms: 12 }, ts: 0 });
    expect(warn).toHaveBeenCalledWith('[1970-01-01T00:00:00.000Z] WARN chatbridge: slow {"ms":12}');
  });

  it("routes errors to stderr", () => {
    const error = vi.spyOn(console, "error").mockImplementation(() => {});
    consoleSink({ level: "error", scope: "s", message: "boom", ts: 0 });
    expect(error).toHaveBeenCalledWith("[1970-01-01T00:00:00.000Z] ERROR s: boom");
  });
});
