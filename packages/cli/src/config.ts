import { resolve } from "node:path";
import type { LogLevel } from "@webpilot/schemas";
import { parseLogLevel } from "@webpilot/schemas";
import { DEFAULT_PROFILES_PATH } from "@webpilot/executor";

export type Env = Readonly<Record<string, string | undefined>>;

export interface WebpilotConfig {
  port: number;
  host: string;
  headless: boolean;
  slowMo: number;
  navigationTimeoutMs: number;
  elementTimeoutMs: number;
  idleTimeoutMs: number;
  screenshotDir: string;
  siteProfilesPath: string;
  apiToken?: string;
  logLevel: LogLevel;
}

const TRUE_VALUES = new Set(["1", "true", "yes", "on"]);
const FALSE_VALUES = new Set(["0", "false", "no", "off"]);

function readInt(env: Env, key: string, fallback: number, min: number, max: number, errors: string[]): number {
  const raw = env[key]?.trim();
  if (!raw) return fallback;
  const n = Number(raw);
  if (!Number.isInteger(n) || n < min || n > max) {
    errors.push(`${key} must be an integer between ${min} and ${max} (got "${raw}")`);
    return fallback;
  }
  return n;
}

function readBool(env: Env, key: string, fallback: boolean, errors: string[]): boolean {
  const raw = env[key]?.trim().toLowerCase();
  if (!raw) return fallback;
  if (TRUE_VALUES.has(raw)) return true;
  if (FALSE_VALUES.has(raw)) return false;
  errors.push(`${key} must be a boolean (true/false) (got "${raw}")`);
  return fallback;
}

function readLogLevel(env: Env, errors: string[]): LogLevel {
  const raw = env.WEBPILOT_LOG_LEVEL?.trim();
  if (!raw) return "info";
  const level = parseLogLevel(raw, "info");
  if (level.toLowerCase() !== raw.toLowerCase()) {
    errors.push(`WEBPILOT_LOG_LEVEL must be one of debug, info, warn, error, silent (got "${raw}")`);
  }
  return level;
}

/**
 * Build the runtime configuration from environment variables. Every invalid
 * value is reported in a single error.
 */
export function loadConfig(env: Env = process.env): WebpilotConfig {
  const errors: string[] = [];
  const profilesPath = env.WEBPILOT_SITE_PROFILES?.trim();
  const config: WebpilotConfig = {
    port: readInt(env, "WEBPILOT_PORT", 8000, 1, 65535, errors),
    host: env.WEBPILOT_HOST?.trim() || "127.0.0.1",
    headless: readBool(env, "WEBPILOT_HEADLESS", true, errors),
    slowMo: readInt(env, "WEBPILOT_SLOW_MO", 50, 0, 10_000, errors),
    navigationTimeoutMs: readInt(env, "WEBPILOT_NAV_TIMEOUT_MS", 30_000, 1_000, 600_000, errors),
    elementTimeoutMs: readInt(env, "WEBPILOT_ELEMENT_TIMEOUT_MS", 5_000, 100, 600_000, errors),
    idleTimeoutMs: readInt(env, "WEBPILOT_IDLE_TIMEOUT_MS", 600_000, 0, 86_400_000, errors),
    screenshotDir: resolve(env.WEBPILOT_SCREENSHOT_DIR?.trim() || "screenshots"),
    siteProfilesPath: profilesPath ? resolve(profilesPath) : DEFAULT_PROFILES_PATH,
    logLevel: readLogLevel(env, errors),
  };
  const token = env.WEBPILOT_API_TOKEN?.trim();
  if (token) config.apiToken = token;

  if (errors.length > 0) {
    throw new Error(`Invalid configuration:\n  - ${errors.join("\n  - ")}`);
  }
  return config;
}

export function parsePort(value: string): number {
  const port = Number(value);
  if (!Number.isInteger(port) || port < 1 || port > 65535) {
    throw new Error(`Invalid port: "${value}" (must be 1-65535)`);
  }
  return port;
}

export function parseNonNegativeInt(value: string, label: string): number {
  const n = Number(value);
  if (!Number.isInteger(n) || n < 0) {
    throw new Error(`Invalid ${label}: "${value}" (must be a non-negative integer)`);
  }
  return n;
}
