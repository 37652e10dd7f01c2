import { describe, it, expect } from "vitest";
import { resolve } from "node:path";
import { DEFAULT_PROFILES_PATH } from "@webpilot/executor";
import { loadConfig, parseNonNegativeInt, parsePort } from "./config.js";

describe("loadConfig", () => {
  it("uses defaults for an empty environment", () => {
    expect(loadConfig({})).toEqual({
      port: 8000,
      host: "127.0.0.1",
      headless: true,
      slowMo: 50,
      navigationTimeoutMs: 30_000,
      elementTimeoutMs: 5_000,
      idleTimeoutMs: 600_000,
      screenshotDir: resolve("screenshots"),
      siteProfilesPath: DEFAULT_PROFILES_PATH,
      logLevel: "info",
    });
  });

  it("reads every variable", () => {
    const config = loadConfig({
      WEBPILOT_PORT: "9000",
      WEBPILOT_HOST: "0.0.0.0",
      WEBPILOT_HEADLESS: "false",
      WEBPILOT_SLOW_MO: "0",
      WEBPILOT_NAV_TIMEOUT_MS: "45000",
      WEBPILOT_ELEMENT_TIMEOUT_MS: "2500",
      WEBPILOT_IDLE_TIMEOUT_MS: "0",
      WEBPILOT_SCREENSHOT_DIR: "/tmp/shots",
      WEBPILOT_SITE_PROFILES: "/etc/webpilot/profiles.yaml",
      WEBPILOT_API_TOKEN: "test-secret",
      WEBPILOT_LOG_LEVEL: "DEBUG",
    });
    expect(config).toEqual({
      port: 9000,
      host: "0.0.0.0",
      headless: false,
      slowMo: 0,
      navigationTimeoutMs: 45_000,
      elementTimeoutMs: 2_500,
      idleTimeoutMs: 0,
      screenshotDir: "/tmp/shots",
      siteProfilesPath: "/etc/webpilot/profiles.yaml",
      apiToken: "test-secret",
      logLevel: "debug",
    });
  });

  it("treats blank values as unset", () => {
    const config = loadConfig({ WEBPILOT_PORT: "  ", WEBPILOT_API_TOKEN: "" });
    expect(config.port).toBe(8000);
    expect(config.apiToken).toBeUndefined();
  });

  it("accepts the usual boolean spellings", () => {
    expect(loadConfig({ WEBPILOT_HEADLESS: "no" }).headless).toBe(false);
    expect(loadConfig({ WEBPILOT_HEADLESS: "1" }).headless).toBe(true);
  });

  it("reports every invalid value in one error", () => {
    expect(() =>
      loadConfig({ WEBPILOT_PORT: "99999", WEBPILOT_HEADLESS: "maybe", WEBPILOT_LOG_LEVEL: "loud" }),
    ).toThrow(
      "Invalid configuration:\n" +
        '  - WEBPILOT_PORT must be an integer between 1 and 65535 (got "99999")\n' +
        '  - WEBPILOT_HEADLESS must be a boolean (true/false) (got "maybe")\n' +
        '  - WEBPILOT_LOG_LEVEL must be one of debug, info, warn, error, silent (got "loud")',
    );
  });

  it("rejects non-integer timeouts", () => {
    expect(() => loadConfig({ WEBPILOT_NAV_TIMEOUT_MS: "1.5" })).toThrow(
      'WEBPILOT_NAV_TIMEOUT_MS must be an integer between 1000 and 600000 (got "1.5")',
    );
  });
});

describe("flag parsers", () => {
  it("parses ports", () => {
    expect(parsePort("3000")).toBe(3000);
    expect(() => parsePort("0")).toThrow('Invalid port: "0" (must be 1-65535)');
    expect(() => parsePort("http")).toThrow('Invalid port: "http"');
  });

  it("parses non-negative integers", () => {
    expect(parseNonNegativeInt("0", "slow-mo")).toBe(0);
    expect(() => parseNonNegativeInt("-5", "slow-mo")).toThrow(
      'Invalid slow-mo: "-5" (must be a non-negative integer)',
    );
  });
});
