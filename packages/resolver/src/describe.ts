import type { Intent, WaitCondition } from "@webpilot/schemas";
import { assertNever } from "@webpilot/schemas";

const SECRET_FIELD = /pass(word)?|passcode|pin|otp|secret|token/i;

export function isSecretField(field: string): boolean {
  return SECRET_FIELD.test(field);
}

function describeWait(condition: WaitCondition): string {
  switch (condition.type) {
    case "duration":
      return `wait ${condition.seconds} second${condition.seconds === 1 ? "" : "s"}`;
    case "element":
      return `wait for "${condition.element}"`;
    case "text":
      return `wait for text "${condition.text}"`;
    default:
      return assertNever(condition, "wait condition");
  }
}

/** One-line label for logs and result messages. Never includes passwords. */
export function describeIntent(intent: Intent): string {
  switch (intent.kind) {
    case "navigate":
      return `navigate to ${intent.url}`;
    case "click":
      return `click ${intent.role ? `${intent.role} ` : ""}"${intent.target}"`;
    case "type":
      return isSecretField(intent.field)
        ? `type ${intent.text.length} characters into "${intent.field}"`
        : `type "${intent.text}" into "${intent.field}"`;
    case "submit":
      return "submit the form";
    case "wait":
      return describeWait(intent.condition);
    case "screenshot":
      return intent.full_page ? "take a full page screenshot" : "take a screenshot";
    case "login":
      return `log in to ${intent.website}${intent.username ? ` as ${intent.username}` : ""}`;
    case "search":
      return `search for "${intent.query}" on ${intent.website}`;
    default:
      return assertNever(intent, "intent");
  }
}
