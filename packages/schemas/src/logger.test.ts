import { describe, it, expect, vi, afterEach } from "vitest";
import { ConsoleLogger, createLogger, logError, parseLogLevel } from "./logger.js";

describe("parseLogLevel", () => {
  it("parses known levels case-insensitively", () => {
    expect(parseLogLevel("DEBUG")).toBe("debug");
    expect(parseLogLevel(" warn ")).toBe("warn");
  });

  it("falls back for unknown or missing values", () => {
    expect(parseLogLevel(undefined)).toBe("info");
    expect(parseLogLevel("verbose", "error")).toBe("error");
  });
});

describe("ConsoleLogger", () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("prefixes messages with the scope", () => {
    const spy = vi.spyOn(console, "log").mockImplementation(() => {});
    createLogger("api", { level: "info" }).info("listening");
    expect(spy).toHaveBeenCalledWith("[api] listening", "");
  });

  it("redacts structured data", () => {
    const spy = vi.spyOn(console, "warn").mockImplementation(() => {});
    new ConsoleLogger("executor", { level: "debug" }).warn("login", { password: "pw", website: "github.com" });
    expect(spy).toHaveBeenCalledWith("[executor] login", { password: "[REDACTED]", website: "github.com" });
  });

  it("drops messages below the threshold", () => {
    const debug = vi.spyOn(console, "debug").mockImplementation(() => {});
    const info = vi.spyOn(console, "log").mockImplementation(() => {});
    const logger = new ConsoleLogger("resolver", { level: "warn" });
    logger.debug("hidden");
    logger.info("hidden");
    expect(debug).not.toHaveBeenCalled();
    expect(info).not.toHaveBeenCalled();
  });

  it("silent suppresses errors too", () => {
    const spy = vi.spyOn(console, "error").mockImplementation(() => {});
    new ConsoleLogger("x", { level: "silent" }).error("nope");
    expect(spy).not.toHaveBeenCalled();
  });

  it("sanitizes control characters in the scope", () => {
    const spy = vi.spyOn(console, "log").mockImplementation(() => {});
    new ConsoleLogger("a\nb", { level: "info" }).info("hi");
    expect(spy).toHaveBeenCalledWith("[a_b] hi", "");
  });
});

describe("logError", () => {
  afterEach(() => {
    vi.unstubAllEnvs();
    vi.restoreAllMocks();
  });

  it("omits the stack in production", () => {
    vi.stubEnv("NODE_ENV", "production");
    const spy = vi.spyOn(console, "error").mockImplementation(() => {});
    logError(new ConsoleLogger("api", { level: "error" }), "Interaction failed", new Error("boom"));
    expect(spy).toHaveBeenCalledWith("[api] Interaction failed: boom", "");
  });

  it("includes the stack outside production", () => {
    vi.stubEnv("NODE_ENV", "test");
    const spy = vi.spyOn(console, "error").mockImplementation(() => {});
    logError(new ConsoleLogger("api", { level: "error" }), "Interaction failed", new Error("boom"));
    const [message, data] = spy.mock.calls[0] ?? [];
    expect(message).toBe("[api] Interaction failed: boom");
    expect(data).toHaveProperty("stack");
  });
});
