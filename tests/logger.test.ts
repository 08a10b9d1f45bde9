import { describe, expect, it } from "vitest";
import { createLogger, type LogLevel, logLevelFromEnv } from "../src/logger.js";

function capture(level: LogLevel) {
  const lines: Record<string, unknown>[] = [];
  const logger = createLogger({
    level,
    redactPaths: ["secret"],
    destination: {
      write(msg: string): void {
        lines.push(JSON.parse(msg));
      },
    },
  });
  return { logger, lines };
}

describe("Logger Module", () => {
  it("writes structured lines with child bindings", () => {
    const { logger, lines } = capture("debug");
    logger.child({ module: "signing" }).debug({ connectionId: "0xabc" }, "computed action hash");
    expect(lines).toHaveLength(1);
    expect(lines[0]).toMatchObject({
      level: 20,
      module: "signing",
      connectionId: "0xabc",
      msg: "computed action hash",
    });
  });

  it("redacts key material and configured paths", () => {
    const { logger, lines } = capture("info");
    logger.info({ privateKey: "test-secret", wallet: { privateKeyHex: "test-secret" }, secret: "x" }, "loaded");
    expect(lines[0]).toMatchObject({
      privateKey: "[REDACTED]",
      wallet: { privateKeyHex: "[REDACTED]" },
      secret: "[REDACTED]",
    });
  });

  it("drops lines below the configured level", () => {
    const { logger, lines } = capture("warn");
    logger.info("hidden");
    logger.debug({ a: 1 }, "hidden");
    logger.error("shown");
    expect(lines).toHaveLength(1);
    expect(lines[0]).toMatchObject({ level: 50, msg: "shown" });
  });

  it("writes nothing when silent", () => {
    const { logger, lines } = capture("silent");
    logger.error("hidden");
    expect(lines).toHaveLength(0);
  });

  describe("logLevelFromEnv", () => {
    it("reads SIGNER_LOG_LEVEL", () => {
      expect(logLevelFromEnv({ SIGNER_LOG_LEVEL: " DEBUG " })).toBe("debug");
      expect(logLevelFromEnv({ SIGNER_LOG_LEVEL: "warn" })).toBe("warn");
    });

    it("falls back to silent", () => {
      expect(logLevelFromEnv({})).toBe("silent");
      expect(logLevelFromEnv({ SIGNER_LOG_LEVEL: "verbose" })).toBe("silent");
    });
  });
});
