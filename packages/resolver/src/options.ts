import type { ClickRole, CommandOptions, Intent, WaitCondition } from "@webpilot/schemas";
import { InvalidRequestError, assertNever } from "@webpilot/schemas";
import { normalizeUrl } from "./command-resolver.js";

/** Options that steer how an intent runs rather than what it does. */
export interface ExecutionOptions {
  include_base64: boolean;
}

function optString(options: CommandOptions, key: string): string | undefined {
  const value = options[key];
  if (value === undefined || value === null) return undefined;
  if (typeof value !== "string" || value.length === 0) {
    throw new InvalidRequestError(`Option "${key}" must be a non-empty string`, { option: key });
  }
  return value;
}

function optNumber(options: CommandOptions, key: string, min: number): number | undefined {
  const value = options[key];
  if (value === undefined || value === null) return undefined;
  if (typeof value !== "number" || !Number.isFinite(value) || value < min) {
    throw new InvalidRequestError(`Option "${key}" must be a finite number >= ${min}`, { option: key });
  }
  return value;
}

function optBoolean(options: CommandOptions, key: string): boolean | undefined {
  const value = options[key];
  if (value === undefined || value === null) return undefined;
  if (typeof value !== "boolean") {
    throw new InvalidRequestError(`Option "${key}" must be a boolean`, { option: key });
  }
  return value;
}

function isClickRole(value: string): value is ClickRole {
  return value === "button" || value === "link";
}

function applyWaitOptions(condition: WaitCondition, options: CommandOptions): WaitCondition {
  switch (condition.type) {
    case "duration":
      return { ...condition, seconds: optNumber(options, "seconds", 0) ?? condition.seconds };
    case "element":
    case "text":
      return { ...condition, timeout_ms: optNumber(options, "timeout_ms", 1) ?? condition.timeout_ms };
    default:
      return assertNever(condition, "wait condition");
  }
}

/**
 * Merges request options into a resolved intent. Each kind accepts its own
 * keys; unknown keys are ignored, wrongly typed known keys are rejected.
 */
export function applyOptions(intent: Intent, options: CommandOptions | null | undefined): Intent {
  if (!options) return intent;
  switch (intent.kind) {
    case "navigate": {
      const url = optString(options, "url");
      return url ? { ...intent, url: normalizeUrl(url) } : intent;
    }
    case "click": {
      const roleOption = optString(options, "role");
      if (roleOption !== undefined && !isClickRole(roleOption)) {
        throw new InvalidRequestError(`Option "role" must be "button" or "link"`, { option: "role" });
      }
      const role = roleOption ?? intent.role;
      return {
        kind: "click",
        target: optString(options, "target") ?? intent.target,
        ...(role ? { role } : {}),
      };
    }
    case "type":
      return {
        ...intent,
        text: optString(options, "text") ?? intent.text,
        field: optString(options, "field") ?? intent.field,
      };
    case "submit":
      return intent;
    case "wait":
      return { ...intent, condition: applyWaitOptions(intent.condition, options) };
    case "screenshot":
      return { ...intent, full_page: optBoolean(options, "full_page") ?? intent.full_page };
    case "login": {
      const username = optString(options, "username") ?? intent.username;
      const password = optString(options, "password") ?? intent.password;
      const manualWait = optNumber(options, "manual_wait_ms", 0) ?? intent.manual_wait_ms;
      return {
        kind: "login",
        website: optString(options, "website") ?? intent.website,
        ...(username !== undefined ? { username } : {}),
        ...(password !== undefined ? { password } : {}),
        ...(manualWait !== undefined ? { manual_wait_ms: manualWait } : {}),
      };
    }
    case "search":
      return {
        ...intent,
        query: optString(options, "query") ?? intent.query,
        website: optString(options, "website") ?? intent.website,
      };
    default:
      return assertNever(intent, "intent");
  }
}

export function extractExecutionOptions(options: CommandOptions | null | undefined): ExecutionOptions {
  if (!options) return { include_base64: false };
  return { include_base64: optBoolean(options, "include_base64") ?? false };
}
