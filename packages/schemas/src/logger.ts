import type { Logger, LogLevel } from "./types.js";
import { redactRecord } from "./redact.js";

const LEVEL_ORDER: Record<LogLevel, number> = { debug: 10, info: 20, warn: 30, error: 40, silent: 100 };
const LEVELS: readonly LogLevel[] = ["debug", "info", "warn", "error", "silent"];

export function parseLogLevel(value: string | undefined, fallback: LogLevel = "info"): LogLevel {
  if (value === undefined) return fallback;
  const lower = value.trim().toLowerCase();
  for (const level of LEVELS) {
    if (level === lower) return level;
  }
  return fallback;
}

export interface ConsoleLoggerOptions {
  level?: LogLevel;
}

export class ConsoleLogger implements Logger {
  private readonly prefix: string;
  private readonly threshold: number;

  constructor(scope: string, options?: ConsoleLoggerOptions) {
    // biome-ignore lint/suspicious/noControlCharactersInRegex: strips control chars from the scope
    const safeScope = scope.replace(/[\x00-\x1f\x7f]/g, "_").slice(0, 64);
    this.prefix = `[${safeScope}]`;
    this.threshold = LEVEL_ORDER[options?.level ?? parseLogLevel(process.env.WEBPILOT_LOG_LEVEL)];
  }

  debug(message: string, data?: Record<string, unknown>): void {
    if (this.enabled("debug")) console.debug(`${this.prefix} ${message}`, data !== undefined ? redactRecord(data) : "");
  }

  info(message: string, data?: Record<string, unknown>): void {
    if (this.enabled("info")) console.log(`${this.prefix} ${message}`, data !== undefined ? redactRecord(data) : "");
  }

  warn(message: string, data?: Record<string, unknown>): void {
    if (this.enabled("warn")) console.warn(`${this.prefix} ${message}`, data !== undefined ? redactRecord(data) : "");
  }

  error(message: string, data?: Record<string, unknown>): void {
    if (this.enabled("error")) console.error(`${this.prefix} ${message}`, data !== undefined ? redactRecord(data) : "");
  }

  private enabled(level: LogLevel): boolean {
    return LEVEL_ORDER[level] >= this.threshold;
  }
}

export function createLogger(scope: string, options?: ConsoleLoggerOptions): Logger {
  return new ConsoleLogger(scope, options);
}

/** Error logging that omits stack traces in production. */
export function logError(logger: Logger, label: string, err: unknown): void {
  const message = err instanceof Error ? err.message : String(err);
  if (process.env.NODE_ENV === "production" || !(err instanceof Error)) {
    logger.error(`${label}: ${message}`);
  } else {
    logger.error(`${label}: ${message}`, { stack: err.stack ?? "" });
  }
}
