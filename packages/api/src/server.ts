import express from "express";
import type { ErrorRequestHandler, Request } from "express";
import type { Server } from "node:http";
import { timingSafeEqual } from "node:crypto";
import type { InteractionResult, Intent, Logger } from "@webpilot/schemas";
import {
  AutomationError,
  InvalidRequestError,
  UnrecognizedCommandError,
  createLogger,
  isInteractRequest,
  logError,
  toErrorPayload,
  withTimeout,
  validateInteractRequest,
} from "@webpilot/schemas";
import type { ExecutionOptions } from "@webpilot/resolver";
import { applyOptions, describeIntent, extractExecutionOptions, resolveAll } from "@webpilot/resolver";
import type { ActionExecutor } from "@webpilot/executor";
import type { MetricsCollector } from "@webpilot/metrics";
import { SerialQueue } from "./serial-queue.js";

const RATE_LIMITER_PRUNE_INTERVAL_MS = 60_000;
const BODY_LIMIT = "64kb";
const BROWSER_CLOSE_TIMEOUT_MS = 10_000;
export const DEFAULT_VERSION = "0.1.0";

// ─── Rate Limiter ──────────────────────────────────────────────────

export interface RateLimitDecision {
  allowed: boolean;
  limit: number;
  remaining: number;
  /** Epoch ms at which the current window ends. */
  resetAt: number;
}

/** Fixed-window request budget per caller key. */
export class RateLimiter {
  private readonly windows = new Map<string, { used: number; resetAt: number }>();

  constructor(
    private readonly maxRequests = 120,
    private readonly windowMs = 60_000,
    private readonly now: () => number = Date.now,
  ) {}

  consume(key: string): RateLimitDecision {
    const now = this.now();
    let window = this.windows.get(key);
    if (!window || now >= window.resetAt) {
      window = { used: 0, resetAt: now + this.windowMs };
      this.windows.set(key, window);
    }
    window.used++;
    return {
      allowed: window.used <= this.maxRequests,
      limit: this.maxRequests,
      remaining: Math.max(0, this.maxRequests - window.used),
      resetAt: window.resetAt,
    };
  }

  /** Drop windows that have ended. */
  prune(): void {
    const now = this.now();
    for (const [key, window] of this.windows) {
      if (now >= window.resetAt) this.windows.delete(key);
    }
  }

  get size(): number {
    return this.windows.size;
  }
}

/**
 * Address of the caller. `X-Forwarded-For` is read only when the socket peer
 * is a trusted proxy; the rightmost untrusted hop is taken.
 */
function clientAddress(req: Request, trustedProxies: readonly string[]): string {
  const peer = req.socket.remoteAddress ?? "unknown";
  const forwarded = req.headers["x-forwarded-for"];
  if (!trustedProxies.includes(peer) || typeof forwarded !== "string") return peer;
  const hops = forwarded.split(",").map((hop) => hop.trim()).filter((hop) => hop.length > 0);
  return hops.reverse().find((hop) => !trustedProxies.includes(hop)) ?? peer;
}

/**
 * With a token configured every caller that gets this far holds the one
 * token and drives the one browser, so they share a budget. Without auth the
 * budget is per address.
 */
function rateLimitKey(req: Request, authenticated: boolean, trustedProxies: readonly string[]): string {
  return authenticated ? "token" : `ip:${clientAddress(req, trustedProxies)}`;
}

// ─── Config ────────────────────────────────────────────────────────

export interface RateLimitConfig {
  maxRequests: number;
  windowMs: number;
}

export interface ApiServerConfig {
  executor: ActionExecutor;
  metrics?: MetricsCollector;
  /** When set, every route except /health requires `Authorization: Bearer <token>`. */
  apiToken?: string;
  version?: string;
  rateLimit?: RateLimitConfig;
  /** IP addresses of trusted reverse proxies; enables X-Forwarded-For parsing. */
  trustedProxies?: string[];
  logger?: Logger;
}

export function validateApiConfig(config: ApiServerConfig): void {
  const errors: string[] = [];
  if (config.apiToken !== undefined && config.apiToken.trim().length === 0) {
    errors.push("apiToken must be a non-empty string when provided");
  }
  if (config.rateLimit) {
    const { maxRequests, windowMs } = config.rateLimit;
    if (!Number.isInteger(maxRequests) || maxRequests < 1) {
      errors.push("rateLimit.maxRequests must be a positive integer");
    }
    if (!Number.isInteger(windowMs) || windowMs < 1000) {
      errors.push("rateLimit.windowMs must be an integer >= 1000");
    }
  }
  if (config.trustedProxies) {
    for (const p of config.trustedProxies) {
      if (p.trim().length === 0) {
        errors.push("trustedProxies entries must be non-empty strings");
        break;
      }
    }
  }
  if (errors.length > 0) {
    throw new Error(`Invalid API server configuration:\n  - ${errors.join("\n  - ")}`);
  }
}

// ─── Helpers ───────────────────────────────────────────────────────

function failureBody(err: unknown): InteractionResult {
  const error = toErrorPayload(err);
  return { success: false, message: error.message, data: {}, error };
}

function httpStatusOf(err: unknown): number {
  if (typeof err === "object" && err !== null && "status" in err && typeof err.status === "number") {
    return err.status;
  }
  return 500;
}

function failureStatus(result: InteractionResult): number {
  return result.error?.code === "INVALID_REQUEST" ? 400 : 422;
}

interface ParsedRequest {
  command: string;
  intent: Intent;
  alternatives: Array<{ pattern: string; intent: Intent }>;
  execution: ExecutionOptions;
}

/** Validate the body and resolve the command. Throws AutomationError on bad input. */
function parseRequest(body: unknown): ParsedRequest {
  if (!isInteractRequest(body)) {
    const { errors } = validateInteractRequest(body);
    throw new InvalidRequestError(`Invalid request: ${errors.join("; ")}`, { errors });
  }
  const [primary, ...rest] = resolveAll(body.command);
  if (!primary) throw new UnrecognizedCommandError(body.command);
  return {
    command: body.command,
    intent: applyOptions(primary.intent, body.options),
    alternatives: rest.map((m) => ({ pattern: m.pattern, intent: m.intent })),
    execution: extractExecutionOptions(body.options),
  };
}

// ─── Server ────────────────────────────────────────────────────────

export class ApiServer {
  private readonly app: express.Application;
  private readonly executor: ActionExecutor;
  private readonly metrics?: MetricsCollector;
  private readonly apiToken?: string;
  private readonly version: string;
  private readonly trustedProxies: readonly string[];
  private readonly log: Logger;
  private readonly queue = new SerialQueue();
  private readonly rateLimiter: RateLimiter;
  private readonly rateLimiterPruneInterval: ReturnType<typeof setInterval>;
  private readonly startedAt = Date.now();
  private httpServer?: Server;

  constructor(config: ApiServerConfig) {
    validateApiConfig(config);
    this.executor = config.executor;
    this.metrics = config.metrics;
    this.apiToken = config.apiToken;
    this.version = config.version ?? DEFAULT_VERSION;
    this.trustedProxies = config.trustedProxies ?? [];
    this.log = config.logger ?? createLogger("api");
    this.rateLimiter = new RateLimiter(config.rateLimit?.maxRequests, config.rateLimit?.windowMs);
    this.rateLimiterPruneInterval = setInterval(() => this.rateLimiter.prune(), RATE_LIMITER_PRUNE_INTERVAL_MS);
    this.rateLimiterPruneInterval.unref();

    if (!this.apiToken) {
      this.log.warn("No API token configured; all endpoints are unauthenticated");
    }

    this.app = express();
    this.app.disable("x-powered-by");
    this.app.use(express.json({ limit: BODY_LIMIT }));
    this.app.use((_req, res, next) => {
      res.setHeader("X-Content-Type-Options", "nosniff");
      res.setHeader("X-Frame-Options", "DENY");
      res.setHeader("X-XSS-Protection", "0");
      res.setHeader("Content-Security-Policy", "default-src 'none'; frame-ancestors 'none'; base-uri 'none'; form-action 'none'");
      res.setHeader("Cache-Control", "no-store");
      next();
    });
    this.setupRoutes();
  }

  getExpressApp(): express.Application {
    return this.app;
  }

  listen(port: number, host = "127.0.0.1"): Promise<Server> {
    return new Promise((resolve, reject) => {
      const server = this.app.listen(port, host);
      server.once("error", reject);
      server.once("listening", () => {
        const addr = server.address();
        const actualPort = typeof addr === "object" && addr ? addr.port : port;
        this.log.info(`API listening on http://${host}:${actualPort}`);
        resolve(server);
      });
      this.httpServer = server;
    });
  }

  async shutdown(): Promise<void> {
    clearInterval(this.rateLimiterPruneInterval);
    const server = this.httpServer;
    if (server) {
      await new Promise<void>((resolve, reject) => {
        server.close((err) => (err ? reject(err) : resolve()));
      });
      this.httpServer = undefined;
    }
    await this.queue.drain();
    try {
      await withTimeout(this.executor.close(), BROWSER_CLOSE_TIMEOUT_MS, "Browser shutdown");
    } catch (err) {
      logError(this.log, "Browser did not close cleanly", err);
    }
    this.log.info("API server stopped");
  }

  /** Run browser work strictly one request at a time. */
  private async serialized<T>(task: () => Promise<T>): Promise<T> {
    this.metrics?.setBusy(true);
    try {
      return await this.queue.run(task);
    } finally {
      if (this.queue.size === 0) this.metrics?.setBusy(false);
    }
  }

  private setupRoutes(): void {
    const router = express.Router();

    router.get("/health", (_req, res) => {
      res.json({
        status: "healthy",
        browser_active: this.executor.browserActive,
        uptime_ms: Date.now() - this.startedAt,
        version: this.version,
      });
    });

    if (this.apiToken) {
      const expected = Buffer.from(this.apiToken);
      router.use((req, res, next) => {
        const auth = req.headers.authorization;
        const provided = auth?.startsWith("Bearer ") ? Buffer.from(auth.slice(7)) : undefined;
        if (!provided || provided.length !== expected.length || !timingSafeEqual(provided, expected)) {
          this.log.warn(
            `AUTH_FAIL: ${provided ? "invalid token" : "missing/malformed Authorization header"} from ` +
              `${clientAddress(req, this.trustedProxies)} ${req.method} ${req.path.replace(/[\r\n]/g, "")}`,
          );
          res.status(401).json({ success: false, message: "Unauthorized", data: {} });
          return;
        }
        delete req.headers.authorization;
        next();
      });
    }

    router.use((req, res, next) => {
      const result = this.rateLimiter.consume(rateLimitKey(req, Boolean(this.apiToken), this.trustedProxies));
      res.setHeader("X-RateLimit-Limit", String(result.limit));
      res.setHeader("X-RateLimit-Remaining", String(result.remaining));
      res.setHeader("X-RateLimit-Reset", String(Math.ceil(result.resetAt / 1000)));
      if (!result.allowed) {
        res.status(429).json({ success: false, message: "Rate limit exceeded. Try again later.", data: {} });
        return;
      }
      next();
    });

    router.post("/interact", async (req, res) => {
      let parsed: ParsedRequest;
      try {
        parsed = parseRequest(req.body);
      } catch (err) {
        if (err instanceof UnrecognizedCommandError) this.metrics?.recordUnrecognized();
        if (err instanceof AutomationError) {
          res.status(400).json(failureBody(err));
          return;
        }
        logError(this.log, "POST /interact", err);
        res.status(500).json(failureBody(err));
        return;
      }

      try {
        const { intent, execution, command } = parsed;
        const result = await this.serialized(() => this.executor.execute(intent, execution));
        if (result.success) {
          res.json({ ...result, message: `Successfully executed: ${command}` });
        } else {
          res.status(failureStatus(result)).json(result);
        }
      } catch (err) {
        logError(this.log, "POST /interact", err);
        res.status(500).json(failureBody(err));
      }
    });

    router.post("/resolve", (req, res) => {
      try {
        const { intent, alternatives } = parseRequest(req.body);
        res.json({ intent, description: describeIntent(intent), alternatives });
      } catch (err) {
        if (err instanceof AutomationError) {
          res.status(400).json(failureBody(err));
          return;
        }
        logError(this.log, "POST /resolve", err);
        res.status(500).json(failureBody(err));
      }
    });

    router.get("/status", (_req, res) => {
      const snapshot = this.executor.status();
      res.json({ status: snapshot.status, browser_info: snapshot });
    });

    router.post("/reset", async (_req, res) => {
      try {
        await this.serialized(() => this.executor.reset());
        res.json({ success: true, message: "Browser session reset", data: {} });
      } catch (err) {
        logError(this.log, "POST /reset", err);
        res.status(500).json(failureBody(err));
      }
    });

    router.get("/metrics", async (_req, res) => {
      if (!this.metrics) {
        res.status(404).json({ success: false, message: "Metrics are disabled", data: {} });
        return;
      }
      try {
        res.setHeader("Content-Type", this.metrics.getContentType());
        res.send(await this.metrics.getMetrics());
      } catch (err) {
        logError(this.log, "GET /metrics", err);
        res.status(500).json(failureBody(err));
      }
    });

    this.app.use(router);

    this.app.use((_req, res) => {
      res.status(404).json({ success: false, message: "Not found", data: {} });
    });

    const errorHandler: ErrorRequestHandler = (err: unknown, _req, res, _next) => {
      const status = httpStatusOf(err);
      if (status >= 500) {
        logError(this.log, "Unhandled request error", err);
        res.status(500).json(failureBody(err));
        return;
      }
      // body-parser rejections: malformed JSON (400) or an oversized body (413)
      const message = status === 413 ? "Request body too large" : "Malformed JSON request body";
      res.status(status).json(failureBody(new InvalidRequestError(message)));
    };
    this.app.use(errorHandler);
  }
}
