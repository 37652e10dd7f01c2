/**
 * webpilot core types
 *
 * Canonical data models shared by the resolver, the executor and the HTTP
 * layer. Intents and wait conditions are closed unions; every consumer
 * switches over them exhaustively.
 */

import type { ErrorCode } from "./errors.js";

// ─── Command ────────────────────────────────────────────────────────

export type CommandOptions = Record<string, unknown>;

export interface CommandRequest {
  command: string;
  options?: CommandOptions | null;
}

// ─── Intent ─────────────────────────────────────────────────────────

export type ClickRole = "button" | "link";

export type WaitCondition =
  | { type: "duration"; seconds: number }
  | { type: "element"; element: string; timeout_ms: number }
  | { type: "text"; text: string; timeout_ms: number };

export interface NavigateIntent {
  kind: "navigate";
  url: string;
}

export interface ClickIntent {
  kind: "click";
  target: string;
  role?: ClickRole;
}

export interface TypeIntent {
  kind: "type";
  text: string;
  field: string;
}

export interface SubmitIntent {
  kind: "submit";
}

export interface WaitIntent {
  kind: "wait";
  condition: WaitCondition;
}

export interface ScreenshotIntent {
  kind: "screenshot";
  full_page: boolean;
}

export interface LoginIntent {
  kind: "login";
  website: string;
  username?: string;
  password?: string;
  /** Poll this long for a detected challenge to be cleared by hand. 0 = report immediately. */
  manual_wait_ms?: number;
}

export interface SearchIntent {
  kind: "search";
  query: string;
  website: string;
}

export type Intent =
  | NavigateIntent
  | ClickIntent
  | TypeIntent
  | SubmitIntent
  | WaitIntent
  | ScreenshotIntent
  | LoginIntent
  | SearchIntent;

export type IntentKind = Intent["kind"];

export const INTENT_KINDS: readonly IntentKind[] = [
  "navigate",
  "click",
  "type",
  "submit",
  "wait",
  "screenshot",
  "login",
  "search",
];

/** Compile-time exhaustiveness guard for switches over closed unions. */
export function assertNever(value: never, label = "value"): never {
  throw new Error(`Unhandled ${label}: ${JSON.stringify(value)}`);
}

// ─── Results ────────────────────────────────────────────────────────

export interface ErrorPayload {
  error_type: string;
  code: ErrorCode;
  message: string;
  details: Record<string, unknown>;
  recovery_suggestions: string[];
  screenshot?: string;
}

export interface InteractionResult {
  success: boolean;
  message: string;
  data: Record<string, unknown>;
  error?: ErrorPayload;
}

// ─── Browser session ────────────────────────────────────────────────

export type SessionStatus = "not_initialized" | "ready" | "busy" | "error";

export interface PageInfo {
  url: string;
  title: string;
}

export interface SessionSnapshot {
  status: SessionStatus;
  current_url: string | null;
  title: string | null;
  last_action: IntentKind | null;
  last_error: ErrorPayload | null;
  actions_executed: number;
  updated_at: string;
}

// ─── Challenges ─────────────────────────────────────────────────────

export type ChallengeType =
  | "recaptcha"
  | "hcaptcha"
  | "turnstile"
  | "text_captcha"
  | "two_factor"
  | "unknown";

export interface Challenge {
  type: ChallengeType;
  /** Selector or text fragment that triggered the detection. */
  indicator: string;
}

// ─── Site profiles ──────────────────────────────────────────────────

export interface SiteProfile {
  host: string;
  login_url?: string;
  username_selector?: string;
  password_selector?: string;
  submit_selector?: string;
  search_selector?: string;
  /** Search results URL with a `{query}` placeholder. */
  search_url?: string;
  login_link_texts?: string[];
  challenge_selectors?: string[];
  credentials_env?: { username: string; password: string };
}

// ─── Logging ────────────────────────────────────────────────────────

export type LogLevel = "debug" | "info" | "warn" | "error" | "silent";

export interface Logger {
  debug(message: string, data?: Record<string, unknown>): void;
  info(message: string, data?: Record<string, unknown>): void;
  warn(message: string, data?: Record<string, unknown>): void;
  error(message: string, data?: Record<string, unknown>): void;
}
