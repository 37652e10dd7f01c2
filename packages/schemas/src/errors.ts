import type { Challenge, ErrorPayload } from "./types.js";

export const ErrorCodes = {
  UNRECOGNIZED_COMMAND: "UNRECOGNIZED_COMMAND",
  INVALID_REQUEST: "INVALID_REQUEST",
  ELEMENT_NOT_FOUND: "ELEMENT_NOT_FOUND",
  NAVIGATION_FAILED: "NAVIGATION_FAILED",
  NAVIGATION_TIMEOUT: "NAVIGATION_TIMEOUT",
  WAIT_TIMEOUT: "WAIT_TIMEOUT",
  CHALLENGE_DETECTED: "CHALLENGE_DETECTED",
  AUTHENTICATION_FAILED: "AUTHENTICATION_FAILED",
  BROWSER_INIT_FAILED: "BROWSER_INIT_FAILED",
  LIBRARY_ERROR: "LIBRARY_ERROR",
} as const;

export type ErrorCode = (typeof ErrorCodes)[keyof typeof ErrorCodes];

const RECOVERY_SUGGESTIONS: Record<ErrorCode, string[]> = {
  UNRECOGNIZED_COMMAND: [
    "Check the command syntax",
    "Use a supported phrasing such as: go to <site>, click on <text>, type \"<text>\" into <field>",
    "Try rephrasing the command",
  ],
  INVALID_REQUEST: [
    "Send a JSON body with a non-empty string \"command\"",
    "Check the types of the values in \"options\"",
  ],
  ELEMENT_NOT_FOUND: [
    "Check if the element identifier is correct",
    "Try waiting longer for the element to appear",
    "The page structure might have changed",
  ],
  NAVIGATION_FAILED: [
    "Check if the URL is correct and accessible",
    "Verify your internet connection",
    "The website might be down or blocking automated access",
  ],
  NAVIGATION_TIMEOUT: [
    "Try increasing the navigation timeout",
    "Check if the page is loading slowly",
  ],
  WAIT_TIMEOUT: [
    "Try increasing the timeout value",
    "Check that the awaited element or text actually appears on the page",
  ],
  CHALLENGE_DETECTED: [
    "Solve the CAPTCHA or enter the verification code in the browser window",
    "Run the server with a visible browser (--headed) to intervene manually",
    "Retry the login with manual_wait_ms set to allow time for manual solving",
  ],
  AUTHENTICATION_FAILED: [
    "Verify your credentials",
    "Provide username and password in the command, the options or the site's environment variables",
    "The website might have anti-bot measures in place",
  ],
  BROWSER_INIT_FAILED: [
    "Install a browser with: npx playwright install chromium",
    "Verify that no other instances are running that might cause conflicts",
    "Try resetting the session with POST /reset",
  ],
  LIBRARY_ERROR: [
    "Check the server log for the underlying browser error",
    "Try resetting the session with POST /reset",
  ],
};

/** Base error for every failure the automation pipeline reports. */
export class AutomationError extends Error {
  readonly code: ErrorCode;
  readonly details: Record<string, unknown>;
  readonly recoverySuggestions: string[];

  constructor(code: ErrorCode, message: string, details?: Record<string, unknown>) {
    super(message);
    this.name = "AutomationError";
    this.code = code;
    this.details = details ?? {};
    this.recoverySuggestions = RECOVERY_SUGGESTIONS[code];
  }

  /** Challenges need a human; retrying the same action cannot help. */
  get retryable(): boolean {
    return this.code !== ErrorCodes.CHALLENGE_DETECTED && this.code !== ErrorCodes.UNRECOGNIZED_COMMAND;
  }
}

export class UnrecognizedCommandError extends AutomationError {
  constructor(command: string) {
    super(ErrorCodes.UNRECOGNIZED_COMMAND, `Could not understand command: ${command}`, { command });
    this.name = "UnrecognizedCommandError";
  }
}

export class InvalidRequestError extends AutomationError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(ErrorCodes.INVALID_REQUEST, message, details);
    this.name = "InvalidRequestError";
  }
}

export class ElementNotFoundError extends AutomationError {
  constructor(identifier: string, details?: Record<string, unknown>) {
    super(ErrorCodes.ELEMENT_NOT_FOUND, `Could not find element: ${identifier}`, { element_identifier: identifier, ...details });
    this.name = "ElementNotFoundError";
  }
}

export class NavigationError extends AutomationError {
  constructor(url: string, reason: string) {
    super(ErrorCodes.NAVIGATION_FAILED, `Failed to navigate to ${url}: ${reason}`, { url });
    this.name = "NavigationError";
  }
}

export class NavigationTimeoutError extends AutomationError {
  constructor(url: string, timeoutMs: number) {
    super(ErrorCodes.NAVIGATION_TIMEOUT, `Navigation to ${url} timed out after ${timeoutMs}ms`, { url, timeout_ms: timeoutMs });
    this.name = "NavigationTimeoutError";
  }
}

export class WaitTimeoutError extends AutomationError {
  constructor(what: string, timeoutMs: number) {
    super(ErrorCodes.WAIT_TIMEOUT, `Timed out after ${timeoutMs}ms waiting for ${what}`, { waiting_for: what, timeout_ms: timeoutMs });
    this.name = "WaitTimeoutError";
  }
}

export class ChallengeDetectedError extends AutomationError {
  readonly challenge: Challenge;

  constructor(challenge: Challenge, website?: string) {
    super(
      ErrorCodes.CHALLENGE_DETECTED,
      `Manual intervention required: ${challenge.type} challenge detected${website ? ` on ${website}` : ""}`,
      { challenge_type: challenge.type, indicator: challenge.indicator, ...(website ? { website } : {}) },
    );
    this.name = "ChallengeDetectedError";
    this.challenge = challenge;
  }
}

export class AuthenticationError extends AutomationError {
  constructor(message: string, website?: string) {
    super(ErrorCodes.AUTHENTICATION_FAILED, message, website ? { website } : {});
    this.name = "AuthenticationError";
  }
}

export class BrowserInitializationError extends AutomationError {
  constructor(reason: string, browserType = "chromium") {
    super(ErrorCodes.BROWSER_INIT_FAILED, `Browser initialization failed: ${reason}`, { browser_type: browserType });
    this.name = "BrowserInitializationError";
  }
}

export class LibraryError extends AutomationError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(ErrorCodes.LIBRARY_ERROR, message, details);
    this.name = "LibraryError";
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

/** Pass AutomationErrors through; wrap anything else as a LibraryError. */
export function wrapLibraryError(err: unknown, context: string): AutomationError {
  if (err instanceof AutomationError) return err;
  return new LibraryError(`${context}: ${errorMessage(err)}`, {
    cause: err instanceof Error ? err.name : typeof err,
  });
}

export function toErrorPayload(err: unknown): ErrorPayload {
  const wrapped = err instanceof AutomationError ? err : wrapLibraryError(err, "Unexpected error");
  return {
    error_type: wrapped.name,
    code: wrapped.code,
    message: wrapped.message,
    details: wrapped.details,
    recovery_suggestions: [...wrapped.recoverySuggestions],
  };
}
