// ============================================
// Logger Tests — runs against the real module
// ============================================

import { describe, it, expect, vi, beforeEach, afterEach, type MockInstance } from "vitest";

const { logger, setLogLevel, createRequestLogger } =
  await vi.importActual<typeof import("../src/lib/logger.js")>("../src/lib/logger.js");

function lastLine(spy: { mock: { calls: unknown[][] } }): Record<string, unknown> {
  const call = spy.mock.calls.at(-1);
  const line = call?.[0];
  if (typeof line !== "string") throw new Error("expected a log line");
  return JSON.parse(line);
}

describe("logger", () => {
  let logSpy: MockInstance<typeof console.log>;
  let warnSpy: MockInstance<typeof console.warn>;
  let errorSpy: MockInstance<typeof console.error>;

  beforeEach(() => {
    setLogLevel("debug");
    logSpy = vi.spyOn(console, "log").mockImplementation(() => undefined);
    warnSpy = vi.spyOn(console, "warn").mockImplementation(() => undefined);
    errorSpy = vi.spyOn(console, "error").mockImplementation(() => undefined);
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("writes one JSON object per entry", () => {
    logger.info("Server started", { stage: "startup", port: 5000 });

    expect(logSpy).toHaveBeenCalledTimes(1);
    const entry = lastLine(logSpy);
    expect(entry).toMatchObject({
      level: "info",
      message: "Server started",
      stage: "startup",
      port: 5000,
    });
    expect(typeof entry["timestamp"]).toBe("string");
  });

  it("routes warnings and errors to their console streams", () => {
    logger.warn("careful");
    logger.error("failed");

    expect(lastLine(warnSpy)["level"]).toBe("warn");
    expect(lastLine(errorSpy)["level"]).toBe("error");
    expect(logSpy).not.toHaveBeenCalled();
  });

  it("drops entries below the configured level", () => {
    setLogLevel("warn");

    logger.debug("hidden");
    logger.info("hidden");
    logger.warn("shown");

    expect(logSpy).not.toHaveBeenCalled();
    expect(warnSpy).toHaveBeenCalledTimes(1);
  });

  it("expands errors into name, message and stack", () => {
    logger.error("Request failed", { error: new TypeError("bad input") });

    const entry = lastLine(errorSpy);
    expect(entry["errorName"]).toBe("TypeError");
    expect(entry["errorMessage"]).toBe("bad input");
    expect(typeof entry["errorStack"]).toBe("string");
    expect(entry).not.toHaveProperty("error");
  });

  it("stringifies thrown values that are not errors", () => {
    logger.error("Request failed", { error: "plain" });

    expect(lastLine(errorSpy)["errorMessage"]).toBe("plain");
  });
});

describe("createRequestLogger", () => {
  let logSpy: MockInstance<typeof console.log>;

  beforeEach(() => {
    setLogLevel("debug");
    logSpy = vi.spyOn(console, "log").mockImplementation(() => undefined);
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("tags every entry with the request id and stage", () => {
    createRequestLogger("req-1", "api").info("Request decoded", { bytes: 12 });

    expect(lastLine(logSpy)).toMatchObject({
      requestId: "req-1",
      stage: "api",
      message: "Request decoded",
      bytes: 12,
    });
  });

  it("switches stage in child loggers", () => {
    const log = createRequestLogger("req-2", "api", { format: "application/json" });

    log.withStage("codec").debug("Decoded");

    expect(lastLine(logSpy)).toMatchObject({
      requestId: "req-2",
      stage: "codec",
      format: "application/json",
    });
  });

  it("carries extra fields in child loggers", () => {
    createRequestLogger("req-3", "predict").withContext({ readout: "track" }).info("Predicted");

    expect(lastLine(logSpy)).toMatchObject({
      requestId: "req-3",
      stage: "predict",
      readout: "track",
    });
  });
});
